import type { GroupPartition, Observation } from "./types.js";

/**
 * Count observations per group. Labels are assumed validated (integers 1..k).
 */
export function partitionGroups(observations: readonly Observation[], groups: number): GroupPartition {
  const counts = new Array<number>(groups).fill(0);
  for (const [, label] of observations) {
    counts[label - 1] = (counts[label - 1] ?? 0) + 1;
  }
  const total = counts.reduce((sum, count) => sum + count, 0);
  return { counts, total };
}

/**
 * Sum the pooled ranks belonging to each group
 */
export function sumRanksByGroup(
  observations: readonly Observation[],
  ranks: readonly number[],
  groups: number,
): number[] {
  const sums = new Array<number>(groups).fill(0);
  observations.forEach(([, label], index) => {
    sums[label - 1] = (sums[label - 1] ?? 0) + (ranks[index] ?? 0);
  });
  return sums;
}
