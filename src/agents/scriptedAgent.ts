import type { Agent, AgentConfig, AgentContext } from "../contract/interfaces.js";
import type { AgentId } from "../contract/types.js";

export interface AgentScript {
  bets: number[];
  actions: number[];
}

/**
 * Replays a fixed script of bets and actions, cycling when the game runs
 * longer than the script. Meant for smoke tests and reproducible examples.
 */
export function createScriptedAgent(id: AgentId, script: AgentScript): Agent {
  if (script.bets.length === 0 || script.actions.length === 0) {
    throw new Error(`Scripted agent "${id}" needs at least one bet and one action`);
  }
  let betCalls = 0;
  let actCalls = 0;

  return {
    id,
    init(_config: AgentConfig): void {
      betCalls = 0;
      actCalls = 0;
    },
    bet(_observation, _ctx: AgentContext): number {
      return script.bets[betCalls++ % script.bets.length];
    },
    act(_observation, _ctx: AgentContext): number {
      return script.actions[actCalls++ % script.actions.length];
    },
  };
}
