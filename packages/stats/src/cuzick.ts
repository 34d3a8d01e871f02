/**
 * Cuzick's test for trend across ordered groups
 *
 * A Wilcoxon-type test for trend across independent samples whose groups are
 * selected in a meaningful order. Data must be at least ordinal. When no
 * scores are given, groups are scored 1..k in label order.
 */

import { partitionGroups, sumRanksByGroup } from "./partition.js";
import { tiedRank } from "./ranks.js";
import { computeTrendStatistics } from "./trend.js";
import type {
  CuzickOptions,
  CuzickResult,
  GroupSummary,
  Observation,
  TrendDirection,
  TrendStatistics,
} from "./types.js";
import { validateInput } from "./validation.js";

const directionOf = (T: number, E: number): TrendDirection => {
  if (T > E) {
    return "increasing";
  }
  if (T < E) {
    return "decreasing";
  }
  return "none";
};

/**
 * Package the group table and global statistics into the result record
 */
export function assembleResult(
  groupTable: readonly GroupSummary[],
  statistics: TrendStatistics,
  tieAdjustment: number,
  total: number,
): CuzickResult {
  return Object.freeze({
    groupTable: Object.freeze(groupTable.map((row) => Object.freeze({ ...row }))),
    ...statistics,
    tail: "right" as const,
    tiesFactor: 2 * tieAdjustment,
    direction: directionOf(statistics.T, statistics.E),
    groups: groupTable.length,
    total,
  });
}

/**
 * Run Cuzick's test on pooled observations.
 *
 * @param observations - `[value, group]` pairs, groups labelled 1..k
 * @throws CuzickError on invalid input or a degenerate null variance
 */
export function cuzick(
  observations: readonly Observation[],
  options: CuzickOptions = {},
): CuzickResult {
  const { observations: rows, scores, groups } = validateInput(observations, options.scores);

  const { counts, total } = partitionGroups(rows, groups);
  const { ranks, tieAdjustment } = tiedRank(rows.map(([value]) => value));
  const rankSums = sumRanksByGroup(rows, ranks, groups);

  const groupTable: GroupSummary[] = scores.map((score, index) => ({
    group: index + 1,
    score,
    samples: counts[index] ?? 0,
    rankSum: rankSums[index] ?? 0,
  }));

  const statistics = computeTrendStatistics({ groupTable, total, tieAdjustment });
  const result = assembleResult(groupTable, statistics, tieAdjustment, total);

  if ((options.display ?? true) && options.presenter) {
    options.presenter.present(result);
  }

  return result;
}
