import { include, remove, update, type AtomicDelta } from './delta.js';
import { diff } from './lcs.js';
import type { MapSpec, Stage } from './types.js';

/** 1:1 translation; indices pass through, carried elements are mapped */
export function createMapStage<T, U>(spec: MapSpec<T, U>, source: readonly T[]): Stage<T, U> {
  const { fn } = spec;

  function step(delta: AtomicDelta<T>): AtomicDelta<U>[] {
    switch (delta.kind) {
      case 'include':
        return [include(delta.index, fn(delta.element))];
      case 'remove':
        return [remove(delta.index, fn(delta.element))];
      case 'update':
        return [update(delta.index, fn(delta.oldElement), fn(delta.newElement))];
    }
  }

  return {
    kind: 'map',
    initial: source.map((value) => fn(value)),
    step,
    fromParent: (parent, result) => diff(parent, result),
    inspect: () => ({ kind: 'stateless' }),
  };
}

