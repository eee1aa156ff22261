/**
 * @module @seqview/incremental-views/lcs
 *
 * Edit scripts from a longest-common-subsequence table. O(|a|·|b|) in time
 * and space; used for baselines only, never on the per-delta path.
 */
import { include, remove, type AtomicDelta } from './delta.js';

/**
 * Compute the deltas that turn `a` into `b`.
 *
 * Only removes and includes are emitted. When dropping `a[i]` and inserting
 * `b[j]` lead to equally long common subsequences, the removal comes first,
 * so disjoint inputs yield every remove followed by every include.
 *
 * @example
 * ```typescript
 * diff([1, 2, 3], [1, 3, 2, 4]);
 * // [remove(1, 2), include(2, 2), include(3, 4)]
 * ```
 */
export function diff<A, B = A>(
  a: readonly A[],
  b: readonly B[],
  equals: (x: A, y: B) => boolean = Object.is
): AtomicDelta<A | B>[] {
  const n = a.length;
  const m = b.length;

  // lengths[i * (m + 1) + j] = LCS length of a[i..] and b[j..]
  const width = m + 1;
  const lengths = new Uint32Array((n + 1) * width);
  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      lengths[i * width + j] = equals(a[i]!, b[j]!)
        ? lengths[(i + 1) * width + j + 1]! + 1
        : Math.max(lengths[(i + 1) * width + j]!, lengths[i * width + j + 1]!);
    }
  }

  const script: AtomicDelta<A | B>[] = [];
  let i = 0;
  let j = 0;
  let position = 0;

  while (i < n && j < m) {
    if (equals(a[i]!, b[j]!)) {
      i++;
      j++;
      position++;
    } else if (lengths[(i + 1) * width + j]! >= lengths[i * width + j + 1]!) {
      script.push(remove(position, a[i]!));
      i++;
    } else {
      script.push(include(position, b[j]!));
      j++;
      position++;
    }
  }
  for (; i < n; i++) {
    script.push(remove(position, a[i]!));
  }
  for (; j < m; j++) {
    script.push(include(position, b[j]!));
    position++;
  }

  return script;
}
