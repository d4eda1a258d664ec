import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "../src/core/errors.js";
import { loadTournamentConfig, parseTournamentConfig } from "../src/tournament/config.js";

const minimal = {
  numActions: 4,
  numTurns: 3,
  agentsPerModel: 2,
  seed: 7,
  models: [
    { name: "rand", agent: "random" },
    { name: "herd", agent: "baseline" },
  ],
};

function issuesOf(raw: unknown): string[] {
  try {
    parseTournamentConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("parseTournamentConfig", () => {
  it("fills in rating and engine defaults", () => {
    const config = parseTournamentConfig(minimal);
    expect(config).toMatchObject({
      initialRating: 1000,
      kFactor: 32,
      scaleFactor: 400,
      includeSelfInBetBonus: false,
      outcomePolicy: "proportional",
    });
    expect(config.runId).toBeUndefined();
    expect(config.agentTimeoutMs).toBeUndefined();
  });

  it("rejects fewer than two actions", () => {
    expect(issuesOf({ ...minimal, numActions: 1 })).toEqual([
      "numActions: numActions must be at least 2",
    ]);
  });

  it("rejects a non-positive number of turns", () => {
    expect(issuesOf({ ...minimal, numTurns: 0 })).toEqual(["numTurns: numTurns must be positive"]);
  });

  it("rejects an empty model list", () => {
    expect(issuesOf({ ...minimal, models: [] })).toEqual(["models: at least one model is required"]);
  });

  it("rejects duplicate model names and counts that disagree with agentsPerModel", () => {
    expect(
      issuesOf({
        ...minimal,
        models: [
          { name: "rand", agent: "random" },
          { name: "rand", agent: "baseline", count: 3 },
        ],
      }),
    ).toEqual([
      'models: duplicate model name "rand"',
      'models: "rand" has count 3 but agentsPerModel is 2',
    ]);
  });

  it("rejects the reserved model name __proto__", () => {
    expect(issuesOf({ ...minimal, models: [{ name: "__proto__", agent: "random" }] })).toEqual([
      'models.0.name: model name "__proto__" is reserved',
    ]);
  });

  it("rejects an unknown outcome policy", () => {
    const issues = issuesOf({ ...minimal, outcomePolicy: "elo" });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("outcomePolicy:")).toBe(true);
  });
});

describe("loadTournamentConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "modgame-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads and validates a JSON file", async () => {
    const path = join(dir, "tournament.json");
    writeFileSync(path, JSON.stringify({ ...minimal, kFactor: 16 }), "utf-8");
    const config = await loadTournamentConfig(path);
    expect(config.kFactor).toBe(16);
    expect(config.models.map((model) => model.name)).toEqual(["rand", "herd"]);
  });

  it("reports unreadable and malformed files as ConfigError", async () => {
    await expect(loadTournamentConfig(join(dir, "missing.json"))).rejects.toThrow(ConfigError);
    const path = join(dir, "broken.json");
    writeFileSync(path, "{", "utf-8");
    await expect(loadTournamentConfig(path)).rejects.toThrow(/is not valid JSON/);
  });
});
