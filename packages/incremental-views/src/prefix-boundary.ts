/**
 * @module @seqview/incremental-views/prefix-boundary
 *
 * Tracks the longest prefix of a sequence whose elements all satisfy a
 * predicate, for takeWhile/dropWhile.
 */
import { IndexOutOfRangeError } from '@seqview/core';

/**
 * Per-position predicate results plus `lastValid`, the index of the last
 * element of the all-true prefix (`-1` when the first element fails).
 *
 * The boundary is adjusted in place when a change cannot move it past a
 * failing element, and rescanned when the element right after it changes.
 */
export class PrefixBoundary {
  private readonly valid: boolean[];
  private last: number;

  constructor(valid: Iterable<boolean>) {
    this.valid = Array.from(valid);
    this.last = this.scan();
  }

  static fromItems<T>(items: Iterable<T>, predicate: (value: T) => boolean): PrefixBoundary {
    const valid: boolean[] = [];
    for (const item of items) {
      valid.push(predicate(item));
    }
    return new PrefixBoundary(valid);
  }

  get lastValid(): number {
    return this.last;
  }

  get length(): number {
    return this.valid.length;
  }

  isValid(index: number): boolean {
    this.check(index, this.valid.length);
    return this.valid[index]!;
  }

  insert(index: number, isValid: boolean): void {
    this.check(index, this.valid.length + 1);
    this.valid.splice(index, 0, isValid);
    if (index <= this.last) {
      this.last = isValid ? this.last + 1 : index - 1;
    } else if (isValid && index === this.last + 1) {
      this.last = this.scan();
    }
  }

  remove(index: number): void {
    this.check(index, this.valid.length);
    this.valid.splice(index, 1);
    if (index <= this.last) {
      this.last--;
    } else if (index === this.last + 1) {
      this.last = this.scan();
    }
  }

  set(index: number, isValid: boolean): void {
    this.check(index, this.valid.length);
    const previous = this.valid[index]!;
    this.valid[index] = isValid;
    if (index <= this.last && !isValid) {
      this.last = index - 1;
    } else if (index === this.last + 1 && previous !== isValid) {
      this.last = this.scan();
    }
  }

  toArray(): boolean[] {
    return this.valid.slice();
  }

  private scan(): number {
    const firstInvalid = this.valid.indexOf(false);
    return (firstInvalid === -1 ? this.valid.length : firstInvalid) - 1;
  }

  private check(index: number, bound: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= bound) {
      throw new IndexOutOfRangeError(index, this.valid.length, { table: 'prefix' });
    }
  }
}
