/**
 * @module @seqview/incremental-views/window-stages
 *
 * Transforms that keep source elements at fixed offsets: a window over the
 * source, and the source followed by a static tail.
 */
import { include, remove, update, type AtomicDelta } from './delta.js';
import type { AppendSpec, SliceSpec, Stage } from './types.js';

/**
 * Window `[from, until)` over the source, clamped to its length.
 *
 * The window keeps its length: an insertion before or inside a full window
 * pushes the last element out, and a removal before or inside it pulls the
 * next source element in at the end. Elements rolling across the edges are
 * read from the post-change source, whose element at `until - 1` is the one
 * that slid into the window on removal.
 */
export function createSliceStage<T>(spec: SliceSpec, source: readonly T[]): Stage<T, T> {
  const { from, until } = spec;

  function step(delta: AtomicDelta<T>, after: readonly T[]): AtomicDelta<T>[] {
    if (from === until || delta.index >= until) return [];

    switch (delta.kind) {
      case 'include': {
        const before = after.length - 1;
        const out: AtomicDelta<T>[] = [];
        if (delta.index < from) {
          if (from >= after.length) return [];
          out.push(include(0, after[from]!));
        } else {
          out.push(include(delta.index - from, delta.element));
        }
        if (before >= until) {
          out.push(remove(until - from, after[until]!));
        }
        return out;
      }
      case 'remove': {
        const before = after.length + 1;
        const out: AtomicDelta<T>[] = [];
        if (delta.index < from) {
          if (from >= before) return [];
          out.push(remove(0, after[from - 1]!));
        } else {
          out.push(remove(delta.index - from, delta.element));
        }
        if (until < before) {
          out.push(include(until - from - 1, after[until - 1]!));
        }
        return out;
      }
      case 'update':
        if (delta.index < from) return [];
        return [update(delta.index - from, delta.oldElement, delta.newElement)];
    }
  }

  function fromParent(parent: readonly T[]): AtomicDelta<T>[] {
    const script: AtomicDelta<T>[] = [];
    const head = Math.min(from, parent.length);
    for (let i = 0; i < head; i++) {
      script.push(remove(0, parent[i]!));
    }
    for (let i = until; i < parent.length; i++) {
      script.push(remove(until - from, parent[i]!));
    }
    return script;
  }

  return {
    kind: 'slice',
    initial: source.slice(from, until),
    step,
    fromParent,
    inspect: () => ({ kind: 'window', from, until }),
  };
}

/** Source deltas pass through unchanged; the tail stays after the last source element */
export function createAppendStage<T>(spec: AppendSpec<T>, source: readonly T[]): Stage<T, T> {
  const tail = spec.tail.slice();

  return {
    kind: 'append',
    initial: [...source, ...tail],
    step: (delta) => [delta],
    fromParent: (parent) => tail.map((element, k) => include(parent.length + k, element)),
    inspect: () => ({ kind: 'stateless' }),
  };
}
