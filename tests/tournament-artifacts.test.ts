import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { runTournament } from "../src/tournament/runTournament.js";
import { buildTournamentSummary, writeTournamentArtifacts } from "../src/tournament/artifacts.js";
import { stableStringify } from "../src/core/json.js";
import { parseTournamentConfig } from "../src/tournament/config.js";

const config = parseTournamentConfig({
  numActions: 3,
  numTurns: 4,
  agentsPerModel: 2,
  seed: 123,
  runId: "artifact-run",
  models: [
    { name: "rand", agent: "random" },
    { name: "herd", agent: "baseline" },
  ],
});

describe("Tournament artifacts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "modgame-artifacts-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes the event log and summary under the game id", async () => {
    const result = await runTournament(config);
    const paths = writeTournamentArtifacts(result, dir);

    expect(paths.dir).toBe(join(dir, result.game.gameId));
    expect(readdirSync(paths.dir).sort()).toEqual(["events.jsonl", "summary.json"]);

    const lines = readFileSync(paths.events, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(result.game.events.length);
    expect(lines[0]).toBe(stableStringify(result.game.events[0]));

    const summary: unknown = JSON.parse(readFileSync(paths.summary, "utf-8"));
    expect(summary).toEqual(JSON.parse(stableStringify(buildTournamentSummary(result))));
    expect(summary).toMatchObject({ runId: "artifact-run", turnsPlayed: 4, reason: "completed" });
  });

  it("writes byte-identical artifacts for identical inputs", async () => {
    const first = writeTournamentArtifacts(await runTournament(config), join(dir, "a"));
    const second = writeTournamentArtifacts(await runTournament(config), join(dir, "b"));

    expect(readFileSync(first.events, "utf-8")).toBe(readFileSync(second.events, "utf-8"));
    expect(readFileSync(first.summary, "utf-8")).toBe(readFileSync(second.summary, "utf-8"));
  });

  it("refuses game ids that could escape the output directory", async () => {
    const result = await runTournament(config);
    const tampered = { ...result, game: { ...result.game, gameId: "../escape" } };
    expect(() => writeTournamentArtifacts(tampered, dir)).toThrow(
      'Refusing to write artifacts for unsafe game id "../escape"',
    );
  });
});
