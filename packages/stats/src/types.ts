/**
 * Types for Cuzick's nonparametric test for trend
 */

/** A single pooled observation: measured value and its 1-based group label */
export type Observation = readonly [value: number, group: number];

export type TrendDirection = "increasing" | "decreasing" | "none";

export interface ValidatedInput {
  readonly observations: readonly Observation[];
  /** One score per group, label order 1..k */
  readonly scores: readonly number[];
  /** Number of groups (k) */
  readonly groups: number;
}

export interface GroupPartition {
  /** Sample count per group, index 0 holds group 1 */
  readonly counts: readonly number[];
  /** Total number of observations (N) */
  readonly total: number;
}

export interface RankResult {
  /** Mid-ranks in input order */
  readonly ranks: readonly number[];
  /** Sum over tie blocks of (m^3 - m) / 2 */
  readonly tieAdjustment: number;
  /** Sum over tie blocks of (m^3 - m) / (N^3 - N); 0 when N <= 1 */
  readonly tieFraction: number;
  /** Sizes of tie blocks with two or more members, in ascending value order */
  readonly tieBlocks: readonly number[];
}

export interface GroupSummary {
  readonly group: number;
  readonly score: number;
  readonly samples: number;
  readonly rankSum: number;
}

export interface TrendStatistics {
  /** Sum of score(i) * n(i) */
  readonly L: number;
  /** Sum of score(i) * R(i) */
  readonly T: number;
  /** Expected value of T under the null hypothesis */
  readonly E: number;
  /** Variance of T under the null hypothesis, tie adjusted */
  readonly Var: number;
  /** Normalised test statistic */
  readonly z: number;
  /** One-tailed (right tail) p-value */
  readonly pValue: number;
}

export interface CuzickResult extends TrendStatistics {
  readonly groupTable: readonly GroupSummary[];
  readonly tail: "right";
  /** Twice the tie adjustment, i.e. sum of (m^3 - m) over tie blocks */
  readonly tiesFactor: number;
  /** Sign of T - E; informational, the test itself is one-sided */
  readonly direction: TrendDirection;
  /** Number of groups (k) */
  readonly groups: number;
  /** Number of observations (N) */
  readonly total: number;
}

/**
 * Receives the finished result record when display is enabled
 */
export interface ResultPresenter {
  present(result: CuzickResult): void;
}

export interface CuzickOptions {
  /** Group scores, label order; omitted or empty means 1..k */
  readonly scores?: readonly number[];
  /** Whether the presenter is invoked; never affects the computed values */
  readonly display?: boolean;
  readonly presenter?: ResultPresenter;
}
