/**
 * Cuzick's weighted rank-sum statistic and its null distribution
 *
 * Cuzick J. A Wilcoxon-Type Test for Trend. Statistics in Medicine
 * 1985;4:87-89.
 */

import { CuzickError } from "./errors.js";
import { upperTailProbability } from "./normal.js";
import type { GroupSummary, TrendStatistics } from "./types.js";

export interface TrendInputs {
  readonly groupTable: readonly GroupSummary[];
  /** Total number of observations (N) */
  readonly total: number;
  /** Tie adjustment t from the rank engine */
  readonly tieAdjustment: number;
}

/**
 * Compute L, T, E(T), Var(T), z and the one-tailed p-value.
 *
 * @throws CuzickError `DegenerateVariance` when Var(T) is not strictly positive
 */
export function computeTrendStatistics(inputs: TrendInputs): TrendStatistics {
  const { groupTable, total: N, tieAdjustment } = inputs;

  let L = 0;
  let T = 0;
  let weightedL = 0;
  for (const { score, samples, rankSum } of groupTable) {
    const Li = score * samples;
    L += Li;
    T += score * rankSum;
    weightedL += score * Li;
  }

  const E = (L * (N + 1)) / 2;
  const Var = ((N * weightedL - L ** 2) * (N + 1)) / 12 - tieAdjustment / 6;

  if (!Number.isFinite(Var) || Var <= 0) {
    throw new CuzickError(
      "DegenerateVariance",
      `Variance of T under the null hypothesis must be positive, got ${Var}`,
      { variance: Var, expected: "> 0" },
    );
  }

  const z = Math.abs(T - E) / Math.sqrt(Var);
  const pValue = upperTailProbability(z);

  return { L, T, E, Var, z, pValue };
}
