/**
 * Pooled mid-ranks with tie adjustment
 *
 * Tied values share the mean of the sorted positions they occupy. Alongside
 * the ranks, the tie blocks are summarised as the adjustment subtracted from
 * rank-sum variances.
 */

import type { RankResult } from "./types.js";

/**
 * Rank values in ascending order, averaging ranks over ties
 */
export function tiedRank(values: readonly number[]): RankResult {
  const n = values.length;
  const order = values
    .map((value, index) => ({ value, index }))
    .sort((a, b) => a.value - b.value || a.index - b.index);

  const ranks = new Array<number>(n).fill(0);
  const tieBlocks: number[] = [];
  let tieSum = 0;

  let start = 0;
  while (start < n) {
    const value = order[start]!.value;
    let end = start;
    while (end + 1 < n && order[end + 1]!.value === value) {
      end += 1;
    }

    const size = end - start + 1;
    // sorted positions start+1 .. end+1 averaged
    const rank = (start + end) / 2 + 1;
    for (let i = start; i <= end; i++) {
      ranks[order[i]!.index] = rank;
    }

    if (size > 1) {
      tieBlocks.push(size);
      tieSum += size ** 3 - size;
    }
    start = end + 1;
  }

  const denominator = n ** 3 - n;

  return {
    ranks,
    tieAdjustment: tieSum / 2,
    tieFraction: denominator === 0 ? 0 : tieSum / denominator,
    tieBlocks,
  };
}
