import type { AgentId } from "../contract/types.js";

export interface ScoreDeltaEntry {
  turn: number;
  deltas: Readonly<Record<AgentId, number>>;
}

/**
 * Cumulative per-agent scores. Updated once per scored round, and only by the
 * orchestrating flow after that round's barrier; per-round deltas are kept
 * for audit.
 */
export class ScoreBoard {
  private readonly totals = new Map<AgentId, number>();
  private readonly entries: ScoreDeltaEntry[] = [];

  constructor(agentIds: readonly AgentId[]) {
    for (const agentId of agentIds) {
      this.totals.set(agentId, 0);
    }
  }

  apply(turn: number, deltas: Record<AgentId, number>): void {
    const last = this.entries[this.entries.length - 1];
    if (last && turn <= last.turn) {
      throw new Error(`Scores for turn ${turn} applied after turn ${last.turn}`);
    }
    for (const agentId of Object.keys(deltas)) {
      if (!this.totals.has(agentId)) {
        throw new Error(`Unknown agent "${agentId}" in score deltas for turn ${turn}`);
      }
    }
    for (const [agentId, delta] of Object.entries(deltas)) {
      this.totals.set(agentId, (this.totals.get(agentId) ?? 0) + delta);
    }
    this.entries.push({ turn, deltas: Object.freeze({ ...deltas }) });
  }

  get(agentId: AgentId): number {
    return this.totals.get(agentId) ?? 0;
  }

  snapshot(): Record<AgentId, number> {
    return Object.fromEntries(this.totals);
  }

  history(): readonly ScoreDeltaEntry[] {
    return [...this.entries];
  }
}
