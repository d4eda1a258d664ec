import type { ModelName } from "../contract/types.js";

export interface EloConfig {
  /** Rating a model starts from on first appearance. */
  initialRating: number;
  /** Largest possible change from one pairwise comparison. */
  kFactor: number;
  /** Rating gap at which the stronger side is expected to win ten times as often. */
  scaleFactor: number;
}

export const DEFAULT_ELO_CONFIG: EloConfig = {
  initialRating: 1000,
  kFactor: 32,
  scaleFactor: 400,
};

/** Probability that a model rated `ratingA` beats one rated `ratingB`. */
export function expectedScore(ratingA: number, ratingB: number, scaleFactor: number): number {
  return 1 / (1 + Math.pow(10, (ratingB - ratingA) / scaleFactor));
}

export function updateRating(
  rating: number,
  actual: number,
  expected: number,
  kFactor: number,
): number {
  return rating + kFactor * (actual - expected);
}

export interface PairUpdate {
  expectedA: number;
  deltaA: number;
  deltaB: number;
  ratingA: number;
  ratingB: number;
}

/**
 * One pairwise comparison from both sides. B's delta is the exact negation of
 * A's, so the pair is zero-sum for any shared k.
 */
export function updatePair(
  ratingA: number,
  ratingB: number,
  actualA: number,
  config: Pick<EloConfig, "kFactor" | "scaleFactor">,
): PairUpdate {
  const expectedA = expectedScore(ratingA, ratingB, config.scaleFactor);
  const deltaA = updateRating(ratingA, actualA, expectedA, config.kFactor) - ratingA;
  const deltaB = -deltaA;
  return {
    expectedA,
    deltaA,
    deltaB,
    ratingA: ratingA + deltaA,
    ratingB: ratingB + deltaB,
  };
}

/**
 * `matrix[i][j]` is the probability that `models[i]` beats `models[j]`;
 * the diagonal is 0.5.
 */
export function winProbabilityMatrix(
  ratings: Record<ModelName, number>,
  scaleFactor: number,
  models: ModelName[] = Object.keys(ratings),
): { models: ModelName[]; matrix: number[][] } {
  const matrix = models.map((a, i) =>
    models.map((b, j) => (i === j ? 0.5 : expectedScore(ratings[a] ?? 0, ratings[b] ?? 0, scaleFactor))),
  );
  return { models, matrix };
}
