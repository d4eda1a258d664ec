import type {
  ActionObservation,
  Agent,
  AgentConfig,
  AgentContext,
  BetObservation,
} from "../contract/interfaces.js";
import type { AgentId } from "../contract/types.js";

/** Most frequent value in a snapshot; ties go to the smallest value. */
export function mostPopular(values: Readonly<Record<AgentId, number>>): number | null {
  const counts = new Map<number, number>();
  for (const value of Object.values(values)) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  let best: number | null = null;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && best !== null && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Herding agent: bets on last round's most popular action and then plays the
 * most popular revealed bet, so it scores whenever the table coordinates.
 */
export function createBaselineAgent(id: AgentId): Agent {
  return {
    id,
    init(_config: AgentConfig): void {
      // stateless: everything it needs is in the observation
    },
    bet(observation: BetObservation, _ctx: AgentContext): number {
      if (!observation.lastRoundActions) {
        return 0;
      }
      return mostPopular(observation.lastRoundActions) ?? 0;
    },
    act(observation: ActionObservation, _ctx: AgentContext): number {
      return mostPopular(observation.bets) ?? 0;
    },
  };
}
