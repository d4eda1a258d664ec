import type {
  ActionObservation,
  Agent,
  AgentConfig,
  AgentContext,
  BetObservation,
} from "../contract/interfaces.js";
import type { AgentId } from "../contract/types.js";
import { randomChoice } from "../core/rng.js";

/**
 * Bets and acts uniformly at random.
 * Draws only from the seeded RNG in the context, never Math.random.
 */
export function createRandomAgent(id: AgentId): Omit<Agent, "bet" | "act"> & {
  bet(observation: BetObservation, ctx: AgentContext): number;
  act(observation: ActionObservation, ctx: AgentContext): number;
} {
  return {
    id,
    init(_config: AgentConfig): void {
      // stateless
    },
    bet(observation: BetObservation, ctx: AgentContext): number {
      return randomChoice(ctx.rng, observation.numActions);
    },
    act(observation: ActionObservation, ctx: AgentContext): number {
      return randomChoice(ctx.rng, observation.numActions);
    },
  };
}
