import type { AgentId, Round } from "../contract/types.js";
import { RoundIntegrityError } from "../core/errors.js";

export interface PhaseEntry {
  agentId: AgentId;
  value: number;
}

/**
 * Merge one phase's results into a map keyed by agent id, listing every way
 * the entries disagree with the roster instead of silently collapsing them.
 */
export function collectPhase(
  label: "bet" | "action",
  entries: readonly PhaseEntry[],
  roster: readonly AgentId[],
  numActions: number,
): { values: Record<AgentId, number>; problems: string[] } {
  const problems: string[] = [];
  const expected = new Set(roster);
  const values: Record<AgentId, number> = {};
  const seen = new Set<AgentId>();

  for (const { agentId, value } of entries) {
    if (seen.has(agentId)) {
      problems.push(`duplicate ${label} for agent "${agentId}"`);
      continue;
    }
    seen.add(agentId);
    if (!expected.has(agentId)) {
      problems.push(`${label} from unknown agent "${agentId}"`);
      continue;
    }
    if (!Number.isInteger(value) || value < 0 || value >= numActions) {
      problems.push(`${label} ${value} from "${agentId}" is outside [0, ${numActions - 1}]`);
      continue;
    }
    values[agentId] = value;
  }

  for (const agentId of roster) {
    if (!seen.has(agentId)) {
      problems.push(`missing ${label} for agent "${agentId}"`);
    }
  }

  return { values, problems };
}

/** Freeze a phase snapshot so no later step can alter what agents were shown. */
export function freezeSnapshot(values: Record<AgentId, number>): Readonly<Record<AgentId, number>> {
  return Object.freeze({ ...values });
}

/**
 * Seal a round from both phases' entries. Throws RoundIntegrityError when
 * either phase is not exactly one legal value per rostered agent.
 */
export function sealRound(
  turn: number,
  bets: readonly PhaseEntry[],
  actions: readonly PhaseEntry[],
  roster: readonly AgentId[],
  numActions: number,
): Round {
  const betPhase = collectPhase("bet", bets, roster, numActions);
  const actionPhase = collectPhase("action", actions, roster, numActions);
  const problems = [...betPhase.problems, ...actionPhase.problems];
  if (problems.length > 0) {
    throw new RoundIntegrityError(turn, problems);
  }
  return Object.freeze({
    turn,
    bets: freezeSnapshot(betPhase.values),
    actions: freezeSnapshot(actionPhase.values),
  });
}
