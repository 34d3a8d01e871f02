import { errorFunction } from "simple-statistics";

/**
 * Standard normal cumulative distribution function
 */
export function normalCdf(z: number): number {
  return 0.5 * (1 + errorFunction(z / Math.SQRT2));
}

/**
 * Right-tail probability P(Z >= z), clamped to [0, 1]
 */
export function upperTailProbability(z: number): number {
  return Math.min(1, Math.max(0, 1 - normalCdf(z)));
}
