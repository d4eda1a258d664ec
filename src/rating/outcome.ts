/**
 * How two model averages become an Elo "actual" value for model A.
 *
 * - proportional: equal → 0.5, otherwise A's share of the combined score, so a
 *   narrow win moves ratings less than a rout;
 * - binary: higher average → 1, equal → 0.5, lower → 0.
 */
export const OUTCOME_POLICIES = ["proportional", "binary"] as const;

export type OutcomePolicy = (typeof OUTCOME_POLICIES)[number];

function binaryOutcome(scoreA: number, scoreB: number): number {
  if (scoreA > scoreB) {
    return 1;
  }
  if (scoreA < scoreB) {
    return 0;
  }
  return 0.5;
}

export function relativeOutcome(
  scoreA: number,
  scoreB: number,
  policy: OutcomePolicy = "proportional",
): number {
  if (scoreA === scoreB) {
    return 0.5;
  }
  if (policy === "binary" || scoreA < 0 || scoreB < 0) {
    return binaryOutcome(scoreA, scoreB);
  }
  // Both non-negative and unequal, so the sum is positive.
  const share = scoreA / (scoreA + scoreB);
  return Math.min(1, Math.max(0, share));
}
