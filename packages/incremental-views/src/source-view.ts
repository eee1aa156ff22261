/**
 * @module @seqview/incremental-views/source-view
 *
 * The mutable root of a view chain. Every mutation becomes a delta that is
 * validated, applied, and then published to derived views and subscribers.
 */
import { IndexOutOfRangeError } from '@seqview/core';
import {
  assertWellFormed,
  batch,
  flatten,
  include,
  remove,
  revertDeltas,
  update,
  type Delta,
} from './delta.js';
import { TransformedView } from './transformed-view.js';
import type { ViewOptions } from './view-options.js';

export class SourceView<T> extends TransformedView<T> {
  // Deltas applied inside the current `batch()` call, published when it ends
  private pending: Delta<T>[] | undefined;

  constructor(items: T[], options: ViewOptions<T> = {}) {
    super(items, options, 'source');
  }

  insert(index: number, value: T): void {
    this.apply(include(index, value));
  }

  /** Append values at the end; several values are published as one batch */
  push(...values: T[]): void {
    if (values.length === 0) return;
    const start = this.items.length;
    const deltas = values.map((value, k) => include(start + k, value));
    this.apply(deltas.length === 1 ? deltas[0]! : batch(deltas));
  }

  /** Remove the element at `index` and return it */
  remove(index: number): T {
    const element = this.elementAt(index);
    this.apply(remove(index, element));
    return element;
  }

  /** Replace the element at `index` and return the previous one */
  update(index: number, value: T): T {
    const element = this.elementAt(index);
    this.apply(update(index, element, value));
    return element;
  }

  clear(): void {
    if (this.items.length === 0) return;
    const deltas = this.items.map((element) => remove(0, element));
    this.apply(deltas.length === 1 ? deltas[0]! : batch(deltas));
  }

  /**
   * Apply an externally produced delta.
   *
   * @throws IndexOutOfRangeError when an index is outside the current bounds
   * @throws InconsistentDeltaError when a carried element does not match (if `validate` is on)
   * @throws MalformedBatchError when the delta is or contains an empty batch
   */
  apply(delta: Delta<T>): void {
    if (this.pending) {
      assertWellFormed(delta);
      this.applyToItems(delta, this.options.validate);
      this.pending.push(delta);
      return;
    }
    this.commit(delta, this.options.validate);
  }

  /**
   * Run `fn`, collecting every mutation it makes into one batch published
   * when it returns. If `fn` throws, its mutations are rolled back and
   * nothing is published. Nested calls join the outer batch.
   */
  batch<R>(fn: () => R): R {
    if (this.pending) return fn();

    this.assertIdle();
    const pending: Delta<T>[] = [];
    this.pending = pending;
    let result: R;
    try {
      result = fn();
    } catch (error) {
      revertDeltas(this.items, pending.flatMap((delta) => flatten(delta)));
      throw error;
    } finally {
      this.pending = undefined;
    }

    if (pending.length > 0) {
      this.deliver(pending.length === 1 ? pending[0]! : batch(pending));
    }
    return result;
  }

  private elementAt(index: number): T {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new IndexOutOfRangeError(index, this.items.length, { view: this.name });
    }
    return this.items[index]!;
  }
}

