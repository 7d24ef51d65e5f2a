import type { ScoringWeights } from "./types.js";

export const WEIGHT_TOLERANCE = 1e-6;

export const weightsSumToOne = (weights: ScoringWeights): boolean =>
  Math.abs(weights.compilation + weights.pattern_match + weights.naming - 1) <= WEIGHT_TOLERANCE;

/**
 * `10 * (w_c * compiles + w_p * pattern / 10 + w_n * naming)` with pattern in 0..10 and naming
 * in 0..1. The only place a final score is produced.
 */
export const computeFinalScore = (
  weights: ScoringWeights,
  compiles: boolean,
  patternScore: number,
  namingScore: number
): number =>
  10 * (weights.compilation * (compiles ? 1 : 0) + weights.pattern_match * (patternScore / 10) + weights.naming * namingScore);

/** Per-dimension points for reports, on the same 0..10 scale as the final score. */
export const scoreBreakdown = (
  weights: ScoringWeights,
  compiles: boolean,
  patternScore: number,
  namingScore: number
): { compile: number; pattern: number; naming: number } => ({
  compile: 10 * weights.compilation * (compiles ? 1 : 0),
  pattern: 10 * weights.pattern_match * (patternScore / 10),
  naming: 10 * weights.naming * namingScore
});
