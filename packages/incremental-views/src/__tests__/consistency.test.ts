import { describe, expect, it } from 'vitest';
import {
  applyDelta,
  applyDeltas,
  batch,
  include,
  remove,
  update,
  type AtomicDelta,
  type Delta,
} from '../delta.js';
import type { SourceView } from '../source-view.js';
import type { TransformedView } from '../transformed-view.js';
import { createSource } from '../view-builder.js';

/** Seeded PRNG (mulberry32) */
class SeededRng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Returns an integer in [min, max). */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min;
  }
}

const isOdd = (n: number) => n % 2 === 1;
const repeat = (n: number): number[] => (n % 3 === 0 ? [] : n % 3 === 1 ? [n] : [n, n]);

interface CheckedView {
  label: string;
  view: TransformedView<number>;
  eager: (source: number[]) => number[];
  initial: number[];
  published: Delta<number>[];
}

function takeWhile(items: number[], predicate: (n: number) => boolean): number[] {
  const end = items.findIndex((n) => !predicate(n));
  return end === -1 ? items.slice() : items.slice(0, end);
}

function dropWhile(items: number[], predicate: (n: number) => boolean): number[] {
  const end = items.findIndex((n) => !predicate(n));
  return end === -1 ? [] : items.slice(end);
}

/** Offsets of each source position's expansion: `[0, w0, w0 + w1, ...]` */
function cumulative(widths: number[]): number[] {
  const table = [0];
  for (const width of widths) {
    table.push(table[table.length - 1]! + width);
  }
  return table;
}

function checkedViews(source: SourceView<number>): CheckedView[] {
  const defs: Array<[string, TransformedView<number>, (s: number[]) => number[]]> = [
    ['map', source.map((n) => n * 2), (s) => s.map((n) => n * 2)],
    ['flatMap', source.flatMap(repeat), (s) => s.flatMap(repeat)],
    ['filter', source.filter(isOdd), (s) => s.filter(isOdd)],
    ['slice', source.slice(2, 6), (s) => s.slice(2, 6)],
    ['drop', source.drop(3), (s) => s.slice(3)],
    ['take', source.take(4), (s) => s.slice(0, 4)],
    ['empty slice', source.slice(1, 1), () => []],
    ['append', source.append([100, 101]), (s) => [...s, 100, 101]],
    ['takeWhile', source.takeWhile((n) => n < 7), (s) => takeWhile(s, (n) => n < 7)],
    ['dropWhile', source.dropWhile((n) => n < 7), (s) => dropWhile(s, (n) => n < 7)],
    [
      'map.filter',
      source.map((n) => n + 1).filter((n) => n % 2 === 0),
      (s) => s.map((n) => n + 1).filter((n) => n % 2 === 0),
    ],
    ['filter.slice', source.filter(isOdd).slice(1, 3), (s) => s.filter(isOdd).slice(1, 3)],
    [
      'takeWhile.flatMap',
      source.takeWhile((n) => n < 8).flatMap(repeat),
      (s) => takeWhile(s, (n) => n < 8).flatMap(repeat),
    ],
    [
      'dropWhile.takeWhile',
      source.dropWhile((n) => n < 5).takeWhile((n) => n > 2),
      (s) => takeWhile(dropWhile(s, (n) => n < 5), (n) => n > 2),
    ],
    [
      'slice.dropWhile',
      source.slice(1, 5).dropWhile((n) => n % 2 === 0),
      (s) => dropWhile(s.slice(1, 5), (n) => n % 2 === 0),
    ],
    ['flatMap.slice', source.flatMap(repeat).slice(1, 4), (s) => s.flatMap(repeat).slice(1, 4)],
  ];

  return defs.map(([label, view, eager]) => {
    const published: Delta<number>[] = [];
    view.subscribe((delta) => published.push(delta));
    return { label, view, eager, initial: view.toArray(), published };
  });
}

/** Random atomic delta valid against `items`, applied to it */
function randomDelta(rng: SeededRng, items: number[]): AtomicDelta<number> {
  const choice = items.length === 0 ? 0 : rng.int(0, 3);
  let delta: AtomicDelta<number>;
  if (choice === 0) {
    delta = include(rng.int(0, items.length + 1), rng.int(0, 10));
  } else {
    const index = rng.int(0, items.length);
    const element = items[index]!;
    delta = choice === 1 ? remove(index, element) : update(index, element, rng.int(0, 10));
  }
  applyDelta(items, delta);
  return delta;
}

describe('views stay consistent with eager recomputation', () => {
  it.each([1, 2, 3, 5, 8, 13, 21, 34, 55, 89])('seed %i', (seed) => {
    const rng = new SeededRng(seed);
    const initial = Array.from({ length: rng.int(0, 8) }, () => rng.int(0, 10));
    const source = createSource(initial);
    const checks = checkedViews(source);
    const odd = source.filter(isOdd);
    const repeated = source.flatMap(repeat);
    const small = source.takeWhile((n) => n < 7);

    const mutate = () => {
      const length = source.length;
      const op = length === 0 ? 0 : rng.int(0, 3);
      if (op === 0) source.insert(rng.int(0, length + 1), rng.int(0, 10));
      else if (op === 1) source.remove(rng.int(0, length));
      else source.update(rng.int(0, length), rng.int(0, 10));
    };

    for (let step = 0; step < 80; step++) {
      const kind = rng.int(0, 10);
      if (kind < 6) {
        mutate();
      } else if (kind < 8) {
        source.batch(() => {
          const count = rng.int(1, 5);
          for (let k = 0; k < count; k++) mutate();
        });
      } else if (kind < 9) {
        source.push(rng.int(0, 10), rng.int(0, 10));
      } else {
        const working = source.toArray();
        const members = Array.from({ length: rng.int(1, 4) }, () => randomDelta(rng, working));
        source.apply(batch(members));
        expect(source.toArray()).toEqual(working);
      }

      const state = source.toArray();
      for (const checked of checks) {
        expect(checked.view.toArray(), `${checked.label} after step ${step}`).toEqual(
          checked.eager(state)
        );
      }
      expect(odd.inspect()).toEqual({
        kind: 'indexed',
        table: cumulative(state.map((n) => (isOdd(n) ? 1 : 0))),
      });
      expect(repeated.inspect()).toEqual({
        kind: 'indexed',
        table: cumulative(state.map((n) => repeat(n).length)),
      });
      expect(small.inspect()).toEqual({
        kind: 'prefix',
        lastValid: takeWhile(state, (n) => n < 7).length - 1,
        valid: state.map((n) => n < 7),
      });
    }

    for (const checked of checks) {
      // Validated replay: every carried element must match what it replaces
      expect(applyDeltas(checked.initial, checked.published), checked.label).toEqual(
        checked.view.toArray()
      );
    }
  });
});
