import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PersistenceError } from "../src/core/errors.js";
import { DEFAULT_ELO_CONFIG } from "../src/rating/eloCore.js";
import {
  InMemoryRatingStore,
  JsonFileRatingStore,
  type RatingSnapshot,
} from "../src/rating/ratingStore.js";

const snapshot: RatingSnapshot = {
  version: 1,
  config: DEFAULT_ELO_CONFIG,
  ratings: {
    alpha: { rating: 1016, history: [{ runId: "r1", turn: 0, rating: 1016 }] },
    beta: { rating: 984, history: [{ runId: "r1", turn: 0, rating: 984 }] },
  },
  recordedTurns: { r1: [0] },
};

describe("JsonFileRatingStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "modgame-ratings-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns null when the file does not exist yet", async () => {
    const store = new JsonFileRatingStore(join(dir, "ratings.json"));
    expect(await store.load()).toBeNull();
  });

  it("round-trips a snapshot and leaves no temp file behind", async () => {
    const path = join(dir, "nested", "ratings.json");
    const store = new JsonFileRatingStore(path);
    await store.save(snapshot);

    expect(await store.load()).toEqual(snapshot);
    expect(readdirSync(join(dir, "nested"))).toEqual(["ratings.json"]);
    expect(readFileSync(path, "utf-8").endsWith("}\n")).toBe(true);
  });

  it("rejects a file that is not JSON", async () => {
    const path = join(dir, "ratings.json");
    writeFileSync(path, "{ not json", "utf-8");
    await expect(new JsonFileRatingStore(path).load()).rejects.toThrow(PersistenceError);
  });

  it("rejects a snapshot with the wrong shape", async () => {
    const path = join(dir, "ratings.json");
    writeFileSync(path, JSON.stringify({ version: 2, ratings: {} }), "utf-8");
    await expect(new JsonFileRatingStore(path).load()).rejects.toThrow(/Invalid rating snapshot/);
  });

  it("wraps write failures in PersistenceError", async () => {
    // A directory where the file should be makes the rename fail.
    const path = join(dir, "taken");
    const blocker = new JsonFileRatingStore(join(path, "inner.json"));
    await blocker.save(snapshot);
    await expect(new JsonFileRatingStore(path).save(snapshot)).rejects.toThrow(PersistenceError);
  });
});

describe("InMemoryRatingStore", () => {
  it("hands out copies rather than shared references", async () => {
    const store = new InMemoryRatingStore();
    await store.save(snapshot);
    const loaded = await store.load();
    expect(loaded).toEqual(snapshot);
    expect(loaded).not.toBe(snapshot);
    expect(store.saves).toBe(1);
  });
});
