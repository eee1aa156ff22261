/**
 * @module @seqview/incremental-views/view-builder
 *
 * Entry points for building view chains from plain sequences.
 *
 * @example
 * ```typescript
 * const words = createSource(['a', 'bb', 'ccc']);
 * const letters = words.flatMap((word) => word.split(''));
 *
 * words.update(1, 'x');
 * letters.materialize(); // ['a', 'x', 'c', 'c', 'c']
 * ```
 */
import { SourceView } from './source-view.js';
import { TransformedView } from './transformed-view.js';
import type { ViewOptions } from './view-options.js';

/** A fixed view over a copy of `items`, for snapshots and derivations that never change */
export function fromArray<T>(items: Iterable<T>, options?: ViewOptions<T>): TransformedView<T> {
  return new TransformedView(Array.from(items), options);
}

/** A mutable root view over a copy of `items` */
export function createSource<T>(items: Iterable<T> = [], options?: ViewOptions<T>): SourceView<T> {
  return new SourceView(Array.from(items), options);
}
