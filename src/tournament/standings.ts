import type { AgentId, GameResult, ModelName } from "../contract/types.js";
import type { ModelGroup } from "../engine/modelGroups.js";
import type { AgentStandingsRow, ModelStandingsRow } from "./types.js";

function countFallbacks(game: GameResult): Map<AgentId, number> {
  const counts = new Map<AgentId, number>();
  for (const { fallbacks } of game.rounds) {
    for (const agentId of [...fallbacks.bet, ...fallbacks.action]) {
      counts.set(agentId, (counts.get(agentId) ?? 0) + 1);
    }
  }
  return counts;
}

export function computeAgentStandings(
  game: GameResult,
  groups: readonly ModelGroup[],
): AgentStandingsRow[] {
  const fallbacks = countFallbacks(game);
  const rows = groups.flatMap((group) =>
    group.agentIds.map((agentId) => ({
      agentId,
      model: group.name,
      score: game.scores[agentId] ?? 0,
      fallbacks: fallbacks.get(agentId) ?? 0,
    })),
  );
  return rows.sort((a, b) => b.score - a.score || a.agentId.localeCompare(b.agentId));
}

/** Per-model totals, ranked by rating, then mean score, then name. */
export function computeModelStandings(
  game: GameResult,
  groups: readonly ModelGroup[],
  ratings: Record<ModelName, number>,
  initialRating: number,
): ModelStandingsRow[] {
  const rows = groups.map((group) => {
    const totalScore = group.agentIds.reduce((sum, agentId) => sum + (game.scores[agentId] ?? 0), 0);
    return {
      model: group.name,
      agents: group.agentIds.length,
      totalScore,
      meanScore: group.agentIds.length > 0 ? totalScore / group.agentIds.length : 0,
      rating: ratings[group.name] ?? initialRating,
    };
  });
  return rows.sort(
    (a, b) => b.rating - a.rating || b.meanScore - a.meanScore || a.model.localeCompare(b.model),
  );
}
