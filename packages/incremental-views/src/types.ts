import type { AtomicDelta } from './delta.js';

/** Element-wise mapping, index preserving */
export interface MapSpec<T, U> {
  readonly kind: 'map';
  readonly fn: (value: T) => U;
}

/** Each source element expands to a finite ordered run of results */
export interface FlatMapSpec<T, U> {
  readonly kind: 'flatMap';
  readonly fn: (value: T) => Iterable<U>;
}

export interface FilterSpec<T> {
  readonly kind: 'filter';
  readonly predicate: (value: T) => boolean;
}

/** Window `[from, until)` over the source; `until` may be `Infinity` */
export interface SliceSpec {
  readonly kind: 'slice';
  readonly from: number;
  readonly until: number;
}

/** Source followed by a static tail */
export interface AppendSpec<T> {
  readonly kind: 'append';
  readonly tail: readonly T[];
}

export interface TakeWhileSpec<T> {
  readonly kind: 'takeWhile';
  readonly predicate: (value: T) => boolean;
}

export interface DropWhileSpec<T> {
  readonly kind: 'dropWhile';
  readonly predicate: (value: T) => boolean;
}

/** Transforms whose result elements are source elements */
export type PreservingSpec<T> =
  | FilterSpec<T>
  | SliceSpec
  | AppendSpec<T>
  | TakeWhileSpec<T>
  | DropWhileSpec<T>;

/** Transforms that produce a new element type */
export type MappingSpec<T, U> = MapSpec<T, U> | FlatMapSpec<T, U>;

/** Closed set of transform variants */
export type TransformSpec<T, U> = MappingSpec<T, U> | PreservingSpec<T>;

export type TransformKind = TransformSpec<unknown, unknown>['kind'];

/** Snapshot of a stage's private bookkeeping */
export type StageState =
  | { readonly kind: 'stateless' }
  | { readonly kind: 'indexed'; readonly table: number[] }
  | { readonly kind: 'window'; readonly from: number; readonly until: number }
  | { readonly kind: 'prefix'; readonly lastValid: number; readonly valid: boolean[] };

/**
 * One transform applied to one parent. Owns the transform's bookkeeping
 * exclusively; nothing else mutates it.
 */
export interface Stage<T, U> {
  readonly kind: TransformKind;
  /** Result of the transform over the source the stage was created with */
  readonly initial: U[];
  /**
   * Translate one atomic source delta into result deltas that apply in order.
   * `source` is the source state right after `delta`.
   */
  step(delta: AtomicDelta<T>, source: readonly T[]): AtomicDelta<U>[];
  /** Edit script from `source` to `result` */
  fromParent(source: readonly T[], result: readonly U[]): AtomicDelta<T | U>[];
  inspect(): StageState;
}
