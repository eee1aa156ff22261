/**
 * @module @seqview/incremental-views/transformed-view
 *
 * Views over ordered sequences that stay in sync through deltas.
 *
 * A view materializes its items once, at construction, and afterwards only
 * changes them by applying the deltas it publishes, so its state and its
 * delta stream never disagree. Derived views are linked to their parent
 * and translate every parent delta through their {@link Stage}.
 *
 * @example
 * ```typescript
 * const source = createSource([1, 2, 3]);
 * const odd = source.filter((n) => n % 2 === 1);
 *
 * odd.subscribe((delta) => console.log(delta));
 * source.remove(0); // logs { kind: 'remove', index: 0, element: 1 }
 * odd.materialize(); // [3]
 * ```
 */
import {
  ConcurrentModificationError,
  ensureSeqError,
  parseSliceBounds,
  type SeqLogger,
} from '@seqview/core';
import { Subject, type Observable, type Subscription } from 'rxjs';
import {
  applyDelta,
  batch,
  describeDelta,
  group,
  type AtomicDelta,
  type Delta,
} from './delta.js';
import { diff } from './lcs.js';
import { createStage, translate } from './stages.js';
import type { Stage, StageState, TransformKind } from './types.js';
import {
  resolveViewOptions,
  type DeriveOptions,
  type ResolvedViewOptions,
  type ViewOptions,
} from './view-options.js';

/** Synchronous downstream receiver of a view's deltas */
export type DeltaListener<T> = (delta: Delta<T>) => void;

/** Options for the two views of `partition`, `splitAt` and `span`, in order */
export type PairOptions = readonly [DeriveOptions?, DeriveOptions?];

export class TransformedView<T> implements Iterable<T> {
  readonly name: string;
  protected readonly items: T[];
  protected readonly options: ResolvedViewOptions<T>;
  protected readonly logger: SeqLogger;
  private readonly listeners = new Set<DeltaListener<T>>();
  private subject: Subject<Delta<T>> | undefined;
  private delivering = false;

  constructor(items: T[], options: ViewOptions<T> = {}, kind = 'view') {
    this.options = resolveViewOptions(kind, options);
    this.name = this.options.name;
    this.logger = this.options.logger;
    this.items = items;
  }

  get length(): number {
    return this.items.length;
  }

  at(index: number): T | undefined {
    return this.items[index];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  /** Current state. The array is live; callers must not mutate it. */
  materialize(): readonly T[] {
    return this.items;
  }

  toArray(): T[] {
    return this.items.slice();
  }

  /** Deltas published by this view, in the order they were applied */
  get deltas(): Observable<Delta<T>> {
    return this.publication().asObservable();
  }

  subscribe(handler: (delta: Delta<T>) => void): Subscription {
    return this.publication().subscribe(handler);
  }

  unsubscribe(subscription: Subscription): void {
    subscription.unsubscribe();
  }

  /**
   * Register a listener that runs synchronously, before subscribers, for
   * every delta. Errors it throws propagate to the call that changed the
   * view. Returns a function that removes the listener.
   */
  attach(listener: DeltaListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Edit script from an empty sequence to the current state */
  baselineDeltas(): AtomicDelta<T>[] {
    const done = this.logger.time('baseline');
    const script = diff<T, T>([], this.items);
    done({ size: script.length });
    return script;
  }

  // ── Derivations ──────────────────────────────────────────────────────

  map<U>(fn: (value: T) => U, options?: DeriveOptions): DerivedView<T, U> {
    return this.derive(createStage({ kind: 'map', fn }, this.items), options);
  }

  flatMap<U>(fn: (value: T) => Iterable<U>, options?: DeriveOptions): DerivedView<T, U> {
    return this.derive(createStage({ kind: 'flatMap', fn }, this.items), options);
  }

  filter(predicate: (value: T) => boolean, options?: DeriveOptions): DerivedView<T, T> {
    return this.derive(createStage({ kind: 'filter', predicate }, this.items), options);
  }

  /** Elements passing `predicate`, mapped through `fn`; a single flatMap stage */
  collect<U>(
    predicate: (value: T) => boolean,
    fn: (value: T) => U,
    options?: DeriveOptions
  ): DerivedView<T, U> {
    const keep = (value: T): U[] => (predicate(value) ? [fn(value)] : []);
    return this.derive(createStage({ kind: 'flatMap', fn: keep }, this.items), options);
  }

  /** `[passing, failing]` */
  partition(
    predicate: (value: T) => boolean,
    options: PairOptions = []
  ): [DerivedView<T, T>, DerivedView<T, T>] {
    return [
      this.filter(predicate, options[0]),
      this.filter((value) => !predicate(value), options[1]),
    ];
  }

  /**
   * Window `[from, until)`. Bounds are clamped: `from` to at least 0 and
   * `until` to at least `from`.
   *
   * @throws ConfigError when a bound is not an integer (`until` may be `Infinity`)
   */
  slice(from: number, until = Infinity, options?: DeriveOptions): DerivedView<T, T> {
    const bounds = parseSliceBounds(from, until);
    return this.derive(createStage({ kind: 'slice', ...bounds }, this.items), options);
  }

  take(count: number, options?: DeriveOptions): DerivedView<T, T> {
    return this.slice(0, count, options);
  }

  drop(count: number, options?: DeriveOptions): DerivedView<T, T> {
    return this.slice(count, Infinity, options);
  }

  /** Every element but the last, as the view is now; the window size stays fixed */
  init(options?: DeriveOptions): DerivedView<T, T> {
    return this.slice(0, this.items.length - 1, options);
  }

  splitAt(count: number, options: PairOptions = []): [DerivedView<T, T>, DerivedView<T, T>] {
    return [this.take(count, options[0]), this.drop(count, options[1])];
  }

  takeWhile(predicate: (value: T) => boolean, options?: DeriveOptions): DerivedView<T, T> {
    return this.derive(createStage({ kind: 'takeWhile', predicate }, this.items), options);
  }

  dropWhile(predicate: (value: T) => boolean, options?: DeriveOptions): DerivedView<T, T> {
    return this.derive(createStage({ kind: 'dropWhile', predicate }, this.items), options);
  }

  /** `[takeWhile(predicate), dropWhile(predicate)]` */
  span(
    predicate: (value: T) => boolean,
    options: PairOptions = []
  ): [DerivedView<T, T>, DerivedView<T, T>] {
    return [this.takeWhile(predicate, options[0]), this.dropWhile(predicate, options[1])];
  }

  append(tail: Iterable<T>, options?: DeriveOptions): DerivedView<T, T> {
    const stage = createStage({ kind: 'append', tail: Array.from(tail) }, this.items);
    return this.derive(stage, options);
  }

  /** Stop publishing; subscribers are completed and listeners dropped */
  destroy(): void {
    this.listeners.clear();
    this.subject?.complete();
    this.subject = undefined;
  }

  // ── Internals ────────────────────────────────────────────────────────

  protected derive<U>(stage: Stage<T, U>, options: DeriveOptions = {}): DerivedView<T, U> {
    return new DerivedView(this, stage, {
      ...options,
      logger: this.options.baseLogger,
      validate: false,
    });
  }

  /**
   * Apply `delta` to the items; all-or-nothing.
   *
   * @throws ConcurrentModificationError while the view is delivering a delta
   */
  protected applyToItems(delta: Delta<T>, validate: boolean): void {
    this.assertIdle();
    try {
      applyDelta(this.items, delta, {
        validate,
        equals: this.options.equals,
        context: { view: this.name },
      });
    } catch (error) {
      this.logger.error('Delta rejected', ensureSeqError(error), {
        delta: describeDelta(delta),
      });
      throw error;
    }
  }

  /** Hand an already-applied delta to listeners, then to subscribers */
  protected deliver(delta: Delta<T>): void {
    this.logger.debug('Delta applied', { delta: describeDelta(delta), length: this.items.length });
    this.delivering = true;
    try {
      for (const listener of Array.from(this.listeners)) {
        listener(delta);
      }
      this.subject?.next(delta);
    } finally {
      this.delivering = false;
    }
  }

  protected commit(delta: Delta<T>, validate: boolean): void {
    this.applyToItems(delta, validate);
    this.deliver(delta);
  }

  protected assertIdle(): void {
    if (this.delivering) {
      throw new ConcurrentModificationError(this.name);
    }
  }

  private publication(): Subject<Delta<T>> {
    this.subject ??= new Subject<Delta<T>>();
    return this.subject;
  }
}

/**
 * A view computed from a parent view through one transform.
 */
export class DerivedView<S, T> extends TransformedView<T> {
  readonly parent: TransformedView<S>;
  private readonly stage: Stage<S, T>;
  private readonly detach: () => void;

  constructor(parent: TransformedView<S>, stage: Stage<S, T>, options: ViewOptions<T> = {}) {
    super(stage.initial, options, stage.kind);
    this.parent = parent;
    this.stage = stage;
    this.detach = parent.attach((delta) => this.receive(delta));
  }

  get kind(): TransformKind {
    return this.stage.kind;
  }

  /** The stage's bookkeeping (index table, window or prefix boundary) */
  inspect(): StageState {
    return this.stage.inspect();
  }

  /** Edit script from the parent's current state to this view's state */
  deltasFromParent(): AtomicDelta<S | T>[] {
    const done = this.logger.time('deltasFromParent');
    const script = this.stage.fromParent(this.parent.materialize(), this.items);
    done({ size: script.length });
    return script;
  }

  override destroy(): void {
    this.detach();
    super.destroy();
  }

  private receive(delta: Delta<S>): void {
    const out = translate(this.stage, delta, this.parent.materialize());
    // A batch upstream stays one batch downstream.
    const translated = delta.kind === 'batch' && out.length > 0 ? batch(out) : group(out);
    if (translated) {
      this.commit(translated, false);
    }
  }
}
