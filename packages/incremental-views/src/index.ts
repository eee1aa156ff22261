// Delta algebra
export {
  applyDelta,
  applyDeltas,
  assertWellFormed,
  batch,
  deltaIndex,
  describeDelta,
  flatten,
  flattenAll,
  group,
  include,
  isAtomic,
  remove,
  revertDeltas,
  update,
} from './delta.js';
export type {
  ApplyOptions,
  AtomicDelta,
  Batch,
  Delta,
  DeltaKind,
  Include,
  Remove,
  Update,
} from './delta.js';

// LCS diff
export { diff } from './lcs.js';

// Bookkeeping
export { IndexTable, reconcile } from './index-table.js';
export { PrefixBoundary } from './prefix-boundary.js';

// Stages
export { createStage, translate } from './stages.js';
export type {
  AppendSpec,
  DropWhileSpec,
  FilterSpec,
  FlatMapSpec,
  MapSpec,
  MappingSpec,
  PreservingSpec,
  SliceSpec,
  Stage,
  StageState,
  TakeWhileSpec,
  TransformKind,
  TransformSpec,
} from './types.js';

// Views
export { DerivedView, TransformedView } from './transformed-view.js';
export type { DeltaListener, PairOptions } from './transformed-view.js';
export { SourceView } from './source-view.js';
export { createSource, fromArray } from './view-builder.js';
export { resolveViewOptions } from './view-options.js';
export type { DeriveOptions, ResolvedViewOptions, ViewOptions } from './view-options.js';
