/**
 * @module @seqview/incremental-views/delta
 *
 * The delta algebra: one atomic change to an ordered sequence, or an
 * ordered group of changes that happened together.
 *
 * Members of a batch apply in order; each member's index is relative to
 * the state left by the members before it.
 *
 * @example
 * ```typescript
 * const items = ['a', 'b'];
 * applyDelta(items, batch([include(0, 'z'), remove(2, 'b')]));
 * // items: ['z', 'a']
 * ```
 */
import {
  IndexOutOfRangeError,
  InconsistentDeltaError,
  MalformedBatchError,
} from '@seqview/core';

/** `element` inserted at `index`; later elements shift right */
export interface Include<T> {
  readonly kind: 'include';
  readonly index: number;
  readonly element: T;
}

/** The element at `index` removed; later elements shift left */
export interface Remove<T> {
  readonly kind: 'remove';
  readonly index: number;
  readonly element: T;
}

/** In-place replacement */
export interface Update<T> {
  readonly kind: 'update';
  readonly index: number;
  readonly oldElement: T;
  readonly newElement: T;
}

/** Ordered group of deltas applied together */
export interface Batch<T> {
  readonly kind: 'batch';
  readonly deltas: readonly Delta<T>[];
}

export type AtomicDelta<T> = Include<T> | Remove<T> | Update<T>;

export type Delta<T> = AtomicDelta<T> | Batch<T>;

export type DeltaKind = Delta<unknown>['kind'];

export function include<T>(index: number, element: T): Include<T> {
  return { kind: 'include', index, element };
}

export function remove<T>(index: number, element: T): Remove<T> {
  return { kind: 'remove', index, element };
}

export function update<T>(index: number, oldElement: T, newElement: T): Update<T> {
  return { kind: 'update', index, oldElement, newElement };
}

export function batch<T>(deltas: readonly Delta<T>[]): Batch<T> {
  return { kind: 'batch', deltas };
}

export function isAtomic<T>(delta: Delta<T>): delta is AtomicDelta<T> {
  return delta.kind !== 'batch';
}

export function deltaIndex(delta: AtomicDelta<unknown>): number {
  return delta.index;
}

/** Atomic members of a delta in application order, nested batches expanded */
export function flatten<T>(delta: Delta<T>): AtomicDelta<T>[] {
  if (delta.kind !== 'batch') return [delta];
  return flattenAll(delta.deltas);
}

export function flattenAll<T>(deltas: readonly Delta<T>[]): AtomicDelta<T>[] {
  const result: AtomicDelta<T>[] = [];
  for (const delta of deltas) {
    if (delta.kind === 'batch') {
      result.push(...flattenAll(delta.deltas));
    } else {
      result.push(delta);
    }
  }
  return result;
}

/**
 * Wrap a translated delta list the way views publish it: nothing for an
 * empty list, the delta itself for one, a batch otherwise.
 */
export function group<T>(deltas: readonly Delta<T>[]): Delta<T> | undefined {
  if (deltas.length === 0) return undefined;
  if (deltas.length === 1) return deltas[0];
  return batch(deltas);
}

/**
 * @throws MalformedBatchError if the delta is, or contains, an empty batch
 */
export function assertWellFormed(delta: Delta<unknown>): void {
  if (delta.kind !== 'batch') return;
  if (delta.deltas.length === 0) {
    throw new MalformedBatchError('Batch contains no deltas');
  }
  for (const member of delta.deltas) {
    assertWellFormed(member);
  }
}

/** Short form used in log entries */
export function describeDelta(delta: Delta<unknown>): string {
  if (delta.kind === 'batch') return `batch(${flatten(delta).length})`;
  return `${delta.kind}@${delta.index}`;
}

export interface ApplyOptions<T> {
  /** Check the elements carried by remove/update deltas (default: true) */
  validate?: boolean;
  /** Element equality used by validation (default: `Object.is`) */
  equals?: (a: T, b: T) => boolean;
  /** Extra fields for error context */
  context?: Record<string, unknown>;
}

function checkIndex(index: number, length: number, context?: Record<string, unknown>): void {
  if (!Number.isInteger(index) || index < 0 || index >= length) {
    throw new IndexOutOfRangeError(index, length, context);
  }
}

function applyAtomic<T>(items: T[], delta: AtomicDelta<T>, options: ApplyOptions<T>): void {
  const validate = options.validate ?? true;
  const equals = options.equals ?? Object.is;

  switch (delta.kind) {
    case 'include':
      checkIndex(delta.index, items.length + 1, options.context);
      items.splice(delta.index, 0, delta.element);
      break;
    case 'remove':
      checkIndex(delta.index, items.length, options.context);
      if (validate && !equals(items[delta.index]!, delta.element)) {
        throw new InconsistentDeltaError(
          delta.index,
          `Remove at ${delta.index} carries an element that is not the one at that position`,
          options.context
        );
      }
      items.splice(delta.index, 1);
      break;
    case 'update':
      checkIndex(delta.index, items.length, options.context);
      if (validate && !equals(items[delta.index]!, delta.oldElement)) {
        throw new InconsistentDeltaError(
          delta.index,
          `Update at ${delta.index} carries an old element that is not the one at that position`,
          options.context
        );
      }
      items[delta.index] = delta.newElement;
      break;
  }
}

/**
 * Apply a delta to `items` in place. A batch is applied all-or-nothing:
 * if any member fails, `items` is left untouched.
 */
export function applyDelta<T>(items: T[], delta: Delta<T>, options: ApplyOptions<T> = {}): void {
  if (delta.kind !== 'batch') {
    applyAtomic(items, delta, options);
    return;
  }

  assertWellFormed(delta);
  const working = items.slice();
  for (const member of flatten(delta)) {
    applyAtomic(working, member, options);
  }
  items.length = 0;
  for (const item of working) {
    items.push(item);
  }
}

/** Apply deltas in order to a copy of `items` */
export function applyDeltas<T>(
  items: readonly T[],
  deltas: readonly Delta<T>[],
  options: ApplyOptions<T> = {}
): T[] {
  const result = items.slice();
  for (const delta of deltas) {
    applyDelta(result, delta, options);
  }
  return result;
}

/**
 * Undo already-applied atomic deltas in place, last first. Used to recover
 * the state a batch started from.
 */
export function revertDeltas<T>(items: T[], deltas: readonly AtomicDelta<T>[]): void {
  for (let i = deltas.length - 1; i >= 0; i--) {
    const delta = deltas[i]!;
    switch (delta.kind) {
      case 'include':
        items.splice(delta.index, 1);
        break;
      case 'remove':
        items.splice(delta.index, 0, delta.element);
        break;
      case 'update':
        items[delta.index] = delta.oldElement;
        break;
    }
  }
}
