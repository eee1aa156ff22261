/**
 * @module @seqview/incremental-views/index-table
 *
 * Source-to-result position bookkeeping for transforms whose result length
 * differs from the source length (filter, flatMap).
 */
import { IndexOutOfRangeError } from '@seqview/core';
import { update, type AtomicDelta, type Include, type Remove } from './delta.js';

/**
 * `sourceLength + 1` offsets. Entry `i` is the result position where the
 * expansion of source element `i` starts; the last entry is the result length.
 *
 * @example
 * ```typescript
 * const table = IndexTable.fromWidths([1, 2, 3]); // ['a', 'bb', 'ccc'] flattened
 * table.toArray(); // [0, 1, 3, 6]
 * table.insert(1, 2);
 * table.toArray(); // [0, 1, 3, 5, 8]
 * ```
 */
export class IndexTable {
  private readonly entries: number[];

  private constructor(entries: number[]) {
    this.entries = entries;
  }

  static fromWidths(widths: Iterable<number>): IndexTable {
    const entries = [0];
    let offset = 0;
    for (const width of widths) {
      offset += width;
      entries.push(offset);
    }
    return new IndexTable(entries);
  }

  get sourceLength(): number {
    return this.entries.length - 1;
  }

  get resultLength(): number {
    return this.entries[this.entries.length - 1]!;
  }

  /** Result position of source position `index` (`index` may equal `sourceLength`) */
  start(index: number): number {
    this.check(index, this.entries.length);
    return this.entries[index]!;
  }

  /** Number of result elements produced by source position `index` */
  width(index: number): number {
    this.check(index, this.sourceLength);
    return this.entries[index + 1]! - this.entries[index]!;
  }

  /** Record a new source element at `index` producing `width` result elements */
  insert(index: number, width: number): void {
    this.check(index, this.entries.length);
    this.entries.splice(index, 0, this.entries[index]!);
    this.shiftFrom(index + 1, width);
  }

  /** Forget source element `index`; returns the width it had */
  delete(index: number): number {
    const width = this.width(index);
    this.entries.splice(index + 1, 1);
    this.shiftFrom(index + 1, -width);
    return width;
  }

  /** Change the width of source element `index` */
  resize(index: number, width: number): void {
    this.shiftFrom(index + 1, width - this.width(index));
  }

  toArray(): number[] {
    return this.entries.slice();
  }

  private shiftFrom(from: number, amount: number): void {
    if (amount === 0) return;
    for (let j = from; j < this.entries.length; j++) {
      this.entries[j] = this.entries[j]! + amount;
    }
  }

  private check(index: number, bound: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= bound) {
      throw new IndexOutOfRangeError(index, this.sourceLength, { table: 'index' });
    }
  }
}

/**
 * Order the result deltas produced by one source delta so they apply in
 * sequence.
 *
 * `removals` carry positions in the result as it was before the change and
 * `inclusions` positions in the result as it is after. Removals go first,
 * sorted by index, each shifted left by the number of removals already
 * applied; inclusions follow in ascending order. A lone removal and
 * inclusion at the same position become an update.
 */
export function reconcile<U>(
  removals: readonly Remove<U>[],
  inclusions: readonly Include<U>[]
): AtomicDelta<U>[] {
  const merged: AtomicDelta<U>[] = [...removals, ...inclusions].sort(
    (a, b) => phase(a) - phase(b) || a.index - b.index
  );

  let offset = 0;
  const result = merged.map((delta): AtomicDelta<U> => {
    if (delta.kind !== 'remove') return delta;
    const shifted: AtomicDelta<U> = { ...delta, index: delta.index - offset };
    offset++;
    return shifted;
  });

  const [first, second] = result;
  if (
    result.length === 2 &&
    first?.kind === 'remove' &&
    second?.kind === 'include' &&
    first.index === second.index
  ) {
    return [update(first.index, first.element, second.element)];
  }
  return result;
}

function phase(delta: AtomicDelta<unknown>): number {
  return delta.kind === 'remove' ? 0 : 1;
}
