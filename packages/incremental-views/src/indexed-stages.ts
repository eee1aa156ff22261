/**
 * @module @seqview/incremental-views/indexed-stages
 *
 * Filter and flatMap: every source element expands to a run of zero or more
 * result elements, located through an {@link IndexTable}.
 *
 * @example
 * ```typescript
 * const stage = createFlatMapStage({ kind: 'flatMap', fn: (s: string) => s.split('') }, ['a', 'bb']);
 * stage.initial; // ['a', 'b', 'b']
 * stage.step(update(1, 'bb', 'x'), ['a', 'x']);
 * // [remove(1, 'b'), remove(1, 'b'), include(1, 'x')]
 * ```
 */
import { InconsistentDeltaError } from '@seqview/core';
import { include, remove, type AtomicDelta } from './delta.js';
import { IndexTable, reconcile } from './index-table.js';
import { diff } from './lcs.js';
import type { FilterSpec, FlatMapSpec, Stage, TransformKind } from './types.js';

interface IndexedStage<T, U> extends Stage<T, U> {
  readonly table: IndexTable;
}

function createIndexedStage<T, U>(
  kind: TransformKind,
  expand: (value: T) => U[],
  source: readonly T[]
): IndexedStage<T, U> {
  const initial: U[] = [];
  const widths: number[] = [];
  for (const value of source) {
    const run = expand(value);
    widths.push(run.length);
    initial.push(...run);
  }
  const table = IndexTable.fromWidths(widths);

  // Re-expanding a removed element must give the run recorded for it.
  function expandRecorded(index: number, value: T): U[] {
    const width = table.width(index);
    const run = expand(value);
    if (run.length !== width) {
      throw new InconsistentDeltaError(
        index,
        `Element at ${index} expands to ${run.length} results but ${width} were recorded`,
        { transform: kind }
      );
    }
    return run;
  }

  function step(delta: AtomicDelta<T>): AtomicDelta<U>[] {
    switch (delta.kind) {
      case 'include': {
        const start = table.start(delta.index);
        const run = expand(delta.element);
        table.insert(delta.index, run.length);
        return reconcile(
          [],
          run.map((element, k) => include(start + k, element))
        );
      }
      case 'remove': {
        const run = expandRecorded(delta.index, delta.element);
        const start = table.start(delta.index);
        table.delete(delta.index);
        return reconcile(
          run.map((element, k) => remove(start + k, element)),
          []
        );
      }
      case 'update': {
        const previous = expandRecorded(delta.index, delta.oldElement);
        const next = expand(delta.newElement);
        const start = table.start(delta.index);
        table.resize(delta.index, next.length);
        return reconcile(
          previous.map((element, k) => remove(start + k, element)),
          next.map((element, k) => include(start + k, element))
        );
      }
    }
  }

  return {
    kind,
    initial,
    table,
    step,
    fromParent: (parent, result) => diff(parent, result),
    inspect: () => ({ kind: 'indexed', table: table.toArray() }),
  };
}

export function createFlatMapStage<T, U>(
  spec: FlatMapSpec<T, U>,
  source: readonly T[]
): Stage<T, U> {
  return createIndexedStage('flatMap', (value: T) => Array.from(spec.fn(value)), source);
}

/**
 * A filter is an expansion of width 0 or 1. The baseline from the parent
 * removes each failing element at its already-shifted position.
 */
export function createFilterStage<T>(spec: FilterSpec<T>, source: readonly T[]): Stage<T, T> {
  const { predicate } = spec;
  const stage = createIndexedStage(
    'filter',
    (value: T): T[] => (predicate(value) ? [value] : []),
    source
  );

  function fromParent(parent: readonly T[]): AtomicDelta<T>[] {
    const script: AtomicDelta<T>[] = [];
    let offset = 0;
    parent.forEach((element, i) => {
      if (stage.table.width(i) === 0) {
        script.push(remove(i - offset, element));
        offset++;
      }
    });
    return script;
  }

  return { ...stage, fromParent };
}
