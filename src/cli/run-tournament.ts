#!/usr/bin/env node
import { ConfigError, errorMessage } from "../core/errors.js";
import { LlmPreflightError } from "../agents/llm/preflight.js";
import type { GameEvent } from "../contract/types.js";
import { writeTournamentArtifacts } from "../tournament/artifacts.js";
import { loadTournamentConfig, parseTournamentConfig } from "../tournament/config.js";
import { runTournament } from "../tournament/runTournament.js";
import type { AgentStandingsRow, ModelStandingsRow } from "../tournament/types.js";

// ---------------------------------------------------------------------------
// Arg parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  configPath: string | undefined;
  seed: number | undefined;
  numTurns: number | undefined;
  runId: string | undefined;
  ratingsPath: string | undefined;
  outDir: string | undefined;
  quiet: boolean;
  skipPreflight: boolean;
}

const USAGE =
  "Usage: modgame-tournament --config <file.json> [--seed N] [--turns N] [--runId ID] " +
  "[--ratings <file.json>] [--outDir <dir>] [--quiet] [--skipPreflight]";

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    configPath: undefined,
    seed: undefined,
    numTurns: undefined,
    runId: undefined,
    ratingsPath: undefined,
    outDir: undefined,
    quiet: false,
    skipPreflight: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config" && i + 1 < argv.length) {
      args.configPath = argv[++i];
    } else if (arg === "--seed" && i + 1 < argv.length) {
      args.seed = parseInt(argv[++i], 10);
    } else if (arg === "--turns" && i + 1 < argv.length) {
      args.numTurns = parseInt(argv[++i], 10);
    } else if (arg === "--runId" && i + 1 < argv.length) {
      args.runId = argv[++i];
    } else if (arg === "--ratings" && i + 1 < argv.length) {
      args.ratingsPath = argv[++i];
    } else if (arg === "--outDir" && i + 1 < argv.length) {
      args.outDir = argv[++i];
    } else if (arg === "--quiet") {
      args.quiet = true;
    } else if (arg === "--skipPreflight") {
      args.skipPreflight = true;
    }
  }

  return args;
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

function printTable(header: string[], data: string[][]): void {
  const widths = header.map((h, col) => Math.max(h.length, ...data.map((row) => row[col].length)));
  const sep = widths.map((w) => "-".repeat(w)).join("-+-");
  const formatRow = (row: string[]) =>
    row.map((cell, col) => cell.padStart(widths[col])).join(" | ");

  // eslint-disable-next-line no-console
  console.log(formatRow(header));
  // eslint-disable-next-line no-console
  console.log(sep);
  for (const row of data) {
    // eslint-disable-next-line no-console
    console.log(formatRow(row));
  }
}

function printModelStandings(rows: ModelStandingsRow[]): void {
  printTable(
    ["Rank", "Model", "Agents", "Total", "Mean", "Rating"],
    rows.map((r, i) => [
      String(i + 1),
      r.model,
      String(r.agents),
      r.totalScore.toFixed(1),
      r.meanScore.toFixed(2),
      r.rating.toFixed(1),
    ]),
  );
}

function printAgentStandings(rows: AgentStandingsRow[]): void {
  printTable(
    ["Agent", "Model", "Score", "Fallbacks"],
    rows.map((r) => [r.agentId, r.model, r.score.toFixed(1), String(r.fallbacks)]),
  );
}

/** One line per event worth a human's attention. */
function describeEvent(event: GameEvent): string | null {
  switch (event.type) {
    case "TurnStarted":
      return `Turn ${event.turn + 1}`;
    case "BetsRevealed":
      return `  bets:    ${Object.values(event.bets).join(" ")}`;
    case "ActionsSubmitted":
      return `  actions: ${Object.values(event.actions).join(" ")}`;
    case "AgentError":
      return `  ! ${event.agentId} ${event.phase} ${event.errorType}: ${event.message} (fallback ${event.fallbackValue})`;
    case "RatingsUpdated":
      return `  ratings: ${Object.entries(event.ratings)
        .map(([model, rating]) => `${model}=${rating.toFixed(1)}`)
        .join(" ")}`;
    case "RatingsPersistFailed":
      return `  ! ratings not saved: ${event.message}`;
    case "RoundVoided":
      return `  ! round voided: ${event.problems.join("; ")}`;
    case "RoundDiscarded":
      return `  ! round discarded during ${event.phase} phase`;
    default:
      return null;
  }
}

function logEvent(event: GameEvent): void {
  const line = describeEvent(event);
  if (line === null) {
    return;
  }
  if (event.type === "AgentError" || event.type === "RatingsPersistFailed" || event.type === "RoundVoided") {
    // eslint-disable-next-line no-console
    console.warn(line);
  } else {
    // eslint-disable-next-line no-console
    console.log(line);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (!args.configPath) {
    // eslint-disable-next-line no-console
    console.error(`Error: --config <file.json> is required\n${USAGE}`);
    process.exit(1);
  }

  const loaded = await loadTournamentConfig(args.configPath);
  const config = parseTournamentConfig({
    ...loaded,
    ...(args.seed !== undefined && { seed: args.seed }),
    ...(args.numTurns !== undefined && { numTurns: args.numTurns }),
    ...(args.runId !== undefined && { runId: args.runId }),
    ...(args.ratingsPath !== undefined && { ratingsPath: args.ratingsPath }),
    ...(args.outDir !== undefined && { outDir: args.outDir }),
  });

  // eslint-disable-next-line no-console
  console.log(
    `Tournament: seed=${config.seed} turns=${config.numTurns} actions=${config.numActions} ` +
      `models=[${config.models.map((m) => `${m.name}(${m.agent})`).join(", ")}] x${config.agentsPerModel}`,
  );

  const controller = new AbortController();
  process.once("SIGINT", () => {
    // eslint-disable-next-line no-console
    console.warn("\nCancelling: the current round will be discarded.");
    controller.abort();
  });

  const result = await runTournament(config, {
    signal: controller.signal,
    skipPreflight: args.skipPreflight,
    ...(args.quiet ? {} : { onEvent: logEvent }),
  });

  // eslint-disable-next-line no-console
  console.log(
    `\nGame ${result.game.gameId} ${result.game.reason}: ${result.game.turnsPlayed} turns scored, ` +
      `${result.game.turnsVoided} voided.\n`,
  );
  printModelStandings(result.modelStandings);
  // eslint-disable-next-line no-console
  console.log();
  printAgentStandings(result.agentStandings);

  if (config.outDir) {
    const paths = writeTournamentArtifacts(result, config.outDir);
    // eslint-disable-next-line no-console
    console.log(`\nWrote event log to ${paths.events}`);
    // eslint-disable-next-line no-console
    console.log(`Wrote summary to ${paths.summary}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError || error instanceof LlmPreflightError) {
    // eslint-disable-next-line no-console
    console.error(`Error: ${error.message}`);
    if (error instanceof LlmPreflightError) {
      for (const detail of error.details) {
        // eslint-disable-next-line no-console
        console.error(`  - ${detail}`);
      }
    }
  } else {
    // eslint-disable-next-line no-console
    console.error(`Error: ${errorMessage(error)}`);
  }
  process.exit(1);
});
