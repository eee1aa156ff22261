/**
 * @module @seqview/incremental-views/prefix-stages
 *
 * takeWhile keeps the all-true prefix, dropWhile keeps what follows it.
 * Whenever the boundary moves, the elements crossing it are emitted.
 */
import { include, remove, update, type AtomicDelta } from './delta.js';
import { diff } from './lcs.js';
import { PrefixBoundary } from './prefix-boundary.js';
import type { DropWhileSpec, Stage, StageState, TakeWhileSpec } from './types.js';

function snapshot(boundary: PrefixBoundary): StageState {
  return { kind: 'prefix', lastValid: boundary.lastValid, valid: boundary.toArray() };
}

export function createTakeWhileStage<T>(
  spec: TakeWhileSpec<T>,
  source: readonly T[]
): Stage<T, T> {
  const { predicate } = spec;
  const boundary = PrefixBoundary.fromItems(source, predicate);

  // Source positions from..to (inclusive) enter the view at the same positions.
  function takeIn(after: readonly T[], from: number, to: number): AtomicDelta<T>[] {
    const out: AtomicDelta<T>[] = [];
    for (let j = from; j <= to; j++) {
      out.push(include(j, after[j]!));
    }
    return out;
  }

  function step(delta: AtomicDelta<T>, after: readonly T[]): AtomicDelta<T>[] {
    const last = boundary.lastValid;
    const index = delta.index;

    switch (delta.kind) {
      case 'include': {
        const valid = predicate(delta.element);
        boundary.insert(index, valid);
        if (index <= last) {
          if (valid) return [include(index, delta.element)];
          // the old prefix from `index` on now sits at index+1..last+1
          const out: AtomicDelta<T>[] = [];
          for (let j = index + 1; j <= last + 1; j++) {
            out.push(remove(index, after[j]!));
          }
          return out;
        }
        if (index === last + 1 && valid) {
          return takeIn(after, index, boundary.lastValid);
        }
        return [];
      }
      case 'remove': {
        boundary.remove(index);
        if (index <= last) return [remove(index, delta.element)];
        if (index === last + 1) return takeIn(after, index, boundary.lastValid);
        return [];
      }
      case 'update': {
        const valid = predicate(delta.newElement);
        boundary.set(index, valid);
        if (index <= last) {
          if (valid) return [update(index, delta.oldElement, delta.newElement)];
          const out: AtomicDelta<T>[] = [remove(index, delta.oldElement)];
          for (let j = index + 1; j <= last; j++) {
            out.push(remove(index, after[j]!));
          }
          return out;
        }
        if (index === last + 1 && valid) {
          return takeIn(after, index, boundary.lastValid);
        }
        return [];
      }
    }
  }

  return {
    kind: 'takeWhile',
    initial: source.slice(0, boundary.lastValid + 1),
    step,
    fromParent: (parent, result) => diff(parent, result),
    inspect: () => snapshot(boundary),
  };
}

export function createDropWhileStage<T>(
  spec: DropWhileSpec<T>,
  source: readonly T[]
): Stage<T, T> {
  const { predicate } = spec;
  const boundary = PrefixBoundary.fromItems(source, predicate);

  // Source positions from..to (inclusive) leave the front of the view.
  function dropOut(after: readonly T[], from: number, to: number): AtomicDelta<T>[] {
    const out: AtomicDelta<T>[] = [];
    for (let j = from; j <= to; j++) {
      out.push(remove(0, after[j]!));
    }
    return out;
  }

  // Source positions from..to (inclusive) appear at the front of the view.
  function exposeFront(after: readonly T[], from: number, to: number): AtomicDelta<T>[] {
    const out: AtomicDelta<T>[] = [];
    for (let j = from; j <= to; j++) {
      out.push(include(j - from, after[j]!));
    }
    return out;
  }

  function step(delta: AtomicDelta<T>, after: readonly T[]): AtomicDelta<T>[] {
    const last = boundary.lastValid;
    const index = delta.index;
    const offset = last + 1;

    switch (delta.kind) {
      case 'include': {
        const valid = predicate(delta.element);
        boundary.insert(index, valid);
        if (index <= last) {
          return valid ? [] : exposeFront(after, index, last + 1);
        }
        if (index === offset) {
          if (!valid) return [include(0, delta.element)];
          return dropOut(after, offset + 1, boundary.lastValid);
        }
        return [include(index - offset, delta.element)];
      }
      case 'remove': {
        boundary.remove(index);
        if (index <= last) return [];
        if (index === offset) {
          return [remove(0, delta.element), ...dropOut(after, offset, boundary.lastValid)];
        }
        return [remove(index - offset, delta.element)];
      }
      case 'update': {
        const valid = predicate(delta.newElement);
        boundary.set(index, valid);
        if (index <= last) {
          return valid ? [] : exposeFront(after, index, last);
        }
        if (index === offset) {
          if (!valid) return [update(0, delta.oldElement, delta.newElement)];
          return [
            remove(0, delta.oldElement),
            ...dropOut(after, offset + 1, boundary.lastValid),
          ];
        }
        return [update(index - offset, delta.oldElement, delta.newElement)];
      }
    }
  }

  return {
    kind: 'dropWhile',
    initial: source.slice(boundary.lastValid + 1),
    step,
    fromParent: (parent, result) => diff(parent, result),
    inspect: () => snapshot(boundary),
  };
}
