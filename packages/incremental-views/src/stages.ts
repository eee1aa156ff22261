/**
 * @module @seqview/incremental-views/stages
 *
 * Builds the stage for a transform spec and drives delta translation,
 * including batches.
 */
import { SeqError } from '@seqview/core';
import { applyDelta, flatten, revertDeltas, type AtomicDelta, type Delta } from './delta.js';
import { createFilterStage, createFlatMapStage } from './indexed-stages.js';
import { createMapStage } from './map-stage.js';
import { createDropWhileStage, createTakeWhileStage } from './prefix-stages.js';
import type {
  FlatMapSpec,
  MappingSpec,
  MapSpec,
  PreservingSpec,
  Stage,
  TransformSpec,
} from './types.js';
import { createAppendStage, createSliceStage } from './window-stages.js';

export function createStage<T, U>(spec: MapSpec<T, U>, source: readonly T[]): Stage<T, U>;
export function createStage<T, U>(spec: FlatMapSpec<T, U>, source: readonly T[]): Stage<T, U>;
export function createStage<T, U>(spec: MappingSpec<T, U>, source: readonly T[]): Stage<T, U>;
export function createStage<T>(spec: PreservingSpec<T>, source: readonly T[]): Stage<T, T>;
export function createStage<T, U>(
  spec: TransformSpec<T, U>,
  source: readonly T[]
): Stage<T, U> | Stage<T, T> {
  switch (spec.kind) {
    case 'map':
      return createMapStage(spec, source);
    case 'flatMap':
      return createFlatMapStage(spec, source);
    case 'filter':
      return createFilterStage(spec, source);
    case 'slice':
      return createSliceStage(spec, source);
    case 'append':
      return createAppendStage(spec, source);
    case 'takeWhile':
      return createTakeWhileStage(spec, source);
    case 'dropWhile':
      return createDropWhileStage(spec, source);
    default: {
      const unknownSpec: never = spec;
      throw new SeqError({
        code: 'SEQ_X900',
        message: 'Unknown transform kind',
        context: { spec: unknownSpec },
      });
    }
  }
}

/**
 * Translate a source delta through a stage. `source` is the source state
 * after the whole delta has been applied.
 *
 * The members of a batch are replayed one at a time against a working copy
 * of the source rewound to where the batch started, so each step sees the
 * state right after its own member. The outputs are concatenated in order.
 */
export function translate<T, U>(
  stage: Stage<T, U>,
  delta: Delta<T>,
  source: readonly T[]
): AtomicDelta<U>[] {
  if (delta.kind !== 'batch') {
    return stage.step(delta, source);
  }

  const members = flatten(delta);
  const working = source.slice();
  revertDeltas(working, members);

  const out: AtomicDelta<U>[] = [];
  for (const member of members) {
    applyDelta(working, member, { validate: false });
    out.push(...stage.step(member, working));
  }
  return out;
}
