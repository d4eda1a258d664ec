import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { stableStringify, toStableJsonl } from "../core/json.js";
import { isSafeGameId } from "../engine/gameId.js";
import type { TournamentResult } from "./types.js";

export interface TournamentArtifactPaths {
  dir: string;
  events: string;
  summary: string;
}

/** Everything in the result except the raw event log and per-round records. */
export function buildTournamentSummary(result: TournamentResult): Record<string, unknown> {
  const { game } = result;
  return {
    config: result.config,
    gameId: game.gameId,
    runId: game.runId,
    seed: game.seed,
    reason: game.reason,
    turnsPlayed: game.turnsPlayed,
    turnsVoided: game.turnsVoided,
    agentStandings: result.agentStandings,
    modelStandings: result.modelStandings,
    rankings: result.rankings,
    winProbabilities: result.winProbabilities,
    ratingHistory: result.ratingHistory,
  };
}

/**
 * Write `<outDir>/<gameId>/events.jsonl` (the full event log, one event per
 * line) and `summary.json` next to it.
 */
export function writeTournamentArtifacts(
  result: TournamentResult,
  outDir: string,
): TournamentArtifactPaths {
  const { gameId } = result.game;
  if (!isSafeGameId(gameId)) {
    throw new Error(`Refusing to write artifacts for unsafe game id "${gameId}"`);
  }
  const dir = join(outDir, gameId);
  mkdirSync(dir, { recursive: true });

  const events = join(dir, "events.jsonl");
  writeFileSync(events, toStableJsonl(result.game.events), "utf-8");

  const summary = join(dir, "summary.json");
  writeFileSync(summary, stableStringify(buildTournamentSummary(result), "  ") + "\n", "utf-8");

  return { dir, events, summary };
}
