import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { ModelName } from "../contract/types.js";
import { PersistenceError, errorMessage } from "../core/errors.js";
import { stableStringify } from "../core/json.js";
import type { EloConfig } from "./eloCore.js";

export interface RatingHistoryEntry {
  runId: string;
  turn: number;
  rating: number;
}

export interface StoredRating {
  rating: number;
  history: RatingHistoryEntry[];
}

/** Everything needed to resume rating aggregation in a later process. */
export interface RatingSnapshot {
  version: 1;
  config: EloConfig;
  ratings: Record<ModelName, StoredRating>;
  /** Turns already folded into the ratings, per run; replays of these are skipped. */
  recordedTurns: Record<string, number[]>;
}

/** Persistence sink for rating state. Reporting reads through RatingManager, not the store. */
export interface RatingStore {
  load(): Promise<RatingSnapshot | null>;
  save(snapshot: RatingSnapshot): Promise<void>;
}

const RatingSnapshotSchema = z.object({
  version: z.literal(1),
  config: z.object({
    initialRating: z.number(),
    kFactor: z.number(),
    scaleFactor: z.number().positive(),
  }),
  ratings: z.record(
    z.string(),
    z.object({
      rating: z.number(),
      history: z.array(
        z.object({ runId: z.string(), turn: z.number().int(), rating: z.number() }),
      ),
    }),
  ),
  recordedTurns: z.record(z.string(), z.array(z.number().int())),
});

export function parseRatingSnapshot(value: unknown, source: string): RatingSnapshot {
  const parsed = RatingSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "$"}: ${issue.message}`)
      .join("; ");
    throw new PersistenceError(`Invalid rating snapshot in ${source}: ${issues}`);
  }
  return parsed.data;
}

/** Keeps a serialized copy so callers never share references with the store. */
export class InMemoryRatingStore implements RatingStore {
  private serialized: string | null;
  saves = 0;

  constructor(initial?: RatingSnapshot) {
    this.serialized = initial ? stableStringify(initial) : null;
  }

  async load(): Promise<RatingSnapshot | null> {
    if (this.serialized === null) {
      return null;
    }
    return parseRatingSnapshot(JSON.parse(this.serialized), "memory");
  }

  async save(snapshot: RatingSnapshot): Promise<void> {
    this.serialized = stableStringify(snapshot);
    this.saves += 1;
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error as { code?: unknown }).code === "ENOENT"
  );
}

/**
 * Rating state as a single JSON file. Writes go to a temporary sibling first
 * and are renamed into place, so a crash mid-write leaves the old file intact.
 */
export class JsonFileRatingStore implements RatingStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<RatingSnapshot | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw new PersistenceError(`Failed to read ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new PersistenceError(`Failed to parse ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return parseRatingSnapshot(parsed, this.filePath);
  }

  async save(snapshot: RatingSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, stableStringify(snapshot, "  ") + "\n", "utf-8");
      await rename(tempPath, this.filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to write ${this.filePath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
