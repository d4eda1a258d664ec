import type { RubricConfig } from "../contract/interfaces.js";
import type { AgentId, Round, RoundScore } from "../contract/types.js";

export const ACTION_MATCH_POINTS = 1.0;
export const BET_MATCH_POINTS = 0.5;

export const DEFAULT_RUBRIC: RubricConfig = {
  includeSelfInBetBonus: false,
};

function tally(values: Readonly<Record<AgentId, number>>): Map<number, number> {
  const counts = new Map<number, number>();
  for (const value of Object.values(values)) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

/**
 * Score a sealed round.
 *
 * - action: +1.0 for every other agent that chose the same action (never self);
 * - bet: +0.5 for every agent whose bet equals this agent's bet, with the
 *   agent itself counted only when `includeSelfInBetBonus` is set.
 *
 * Bets and actions are tallied independently; a bet never affects action matching.
 */
export function scoreRound(
  round: Round,
  rubric: Partial<RubricConfig> = {},
): Record<AgentId, RoundScore> {
  const { includeSelfInBetBonus } = { ...DEFAULT_RUBRIC, ...rubric };
  const actionCounts = tally(round.actions);
  const betCounts = tally(round.bets);
  const selfBets = includeSelfInBetBonus ? 0 : 1;

  const scores: Record<AgentId, RoundScore> = {};
  for (const [agentId, action] of Object.entries(round.actions)) {
    const bet = round.bets[agentId];
    const actionScore = ((actionCounts.get(action) ?? 1) - 1) * ACTION_MATCH_POINTS;
    const betScore = ((betCounts.get(bet) ?? selfBets) - selfBets) * BET_MATCH_POINTS;
    scores[agentId] = { action: actionScore, bet: betScore, total: actionScore + betScore };
  }
  return scores;
}

/** Flatten component scores to the per-agent totals the scoreboard and ratings consume. */
export function totalsOf(scores: Record<AgentId, RoundScore>): Record<AgentId, number> {
  return Object.fromEntries(Object.entries(scores).map(([agentId, score]) => [agentId, score.total]));
}
