import type { AgentId, MatchOutcome, ModelName } from "../contract/types.js";
import { PersistenceError, errorMessage } from "../core/errors.js";
import type { ModelGroup } from "../engine/modelGroups.js";
import { DEFAULT_ELO_CONFIG, updatePair, winProbabilityMatrix, type EloConfig } from "./eloCore.js";
import { relativeOutcome, type OutcomePolicy } from "./outcome.js";
import type { RatingHistoryEntry, RatingSnapshot, RatingStore, StoredRating } from "./ratingStore.js";

export interface RatingManagerOptions {
  store?: RatingStore;
  config?: Partial<EloConfig>;
  outcomePolicy?: OutcomePolicy;
}

/** One turn's finalized per-agent scores, as handed over by the game engine. */
export interface TurnScores {
  runId: string;
  turn: number;
  scores: Record<AgentId, number>;
  groups: readonly ModelGroup[];
}

export interface TurnRatingResult {
  /** False when this (runId, turn) was already folded in, or no model scored. */
  applied: boolean;
  modelScores: Record<ModelName, number>;
  outcomes: MatchOutcome[];
  ratings: Record<ModelName, number>;
  persistError: PersistenceError | null;
}

export interface RankingRow {
  model: ModelName;
  rating: number;
}

/** Arithmetic mean per model over the group's agents that have a score this turn. */
export function averageByModel(
  scores: Record<AgentId, number>,
  groups: readonly ModelGroup[],
): Record<ModelName, number> {
  const averages: Record<ModelName, number> = {};
  for (const group of groups) {
    const values = group.agentIds
      .filter((agentId) => Object.prototype.hasOwnProperty.call(scores, agentId))
      .map((agentId) => scores[agentId]);
    if (values.length === 0) {
      continue;
    }
    averages[group.name] = values.reduce((sum, value) => sum + value, 0) / values.length;
  }
  return averages;
}

/**
 * Owns per-model Elo ratings and their history.
 *
 * Each turn, every unordered pair of models present is compared on their
 * average score. All pairs read the same pre-turn ratings and their deltas
 * are summed, so the order pairs are visited in cannot change the result.
 * Persistence is best effort: a failed save leaves the in-memory state
 * authoritative and is retried on the next turn.
 */
export class RatingManager {
  readonly config: EloConfig;
  readonly outcomePolicy: OutcomePolicy;
  private readonly store: RatingStore | undefined;
  private readonly ratings = new Map<ModelName, StoredRating>();
  private readonly recordedTurns = new Map<string, Set<number>>();
  private dirty = false;

  constructor(options: RatingManagerOptions = {}) {
    this.config = { ...DEFAULT_ELO_CONFIG, ...options.config };
    this.outcomePolicy = options.outcomePolicy ?? "proportional";
    this.store = options.store;
  }

  /** Construct and load prior state from the store, if any. */
  static async open(options: RatingManagerOptions = {}): Promise<RatingManager> {
    const manager = new RatingManager(options);
    await manager.load();
    return manager;
  }

  /**
   * Replace in-memory state with the store's snapshot. Throws PersistenceError
   * when the store cannot be read; a missing store leaves the state empty.
   */
  async load(): Promise<void> {
    if (!this.store) {
      return;
    }
    const snapshot = await this.store.load();
    this.ratings.clear();
    this.recordedTurns.clear();
    if (!snapshot) {
      return;
    }
    for (const [model, stored] of Object.entries(snapshot.ratings)) {
      this.ratings.set(model, {
        rating: stored.rating,
        history: stored.history.map((entry) => ({ ...entry })),
      });
    }
    for (const [runId, turns] of Object.entries(snapshot.recordedTurns)) {
      this.recordedTurns.set(runId, new Set(turns));
    }
  }

  hasRecorded(runId: string, turn: number): boolean {
    return this.recordedTurns.get(runId)?.has(turn) ?? false;
  }

  async recordTurn(input: TurnScores): Promise<TurnRatingResult> {
    const { runId, turn, scores, groups } = input;
    const modelScores = averageByModel(scores, groups);
    const models = Object.keys(modelScores).sort();

    if (this.hasRecorded(runId, turn) || models.length === 0) {
      return {
        applied: false,
        modelScores,
        outcomes: [],
        ratings: this.getCurrentRatings(),
        persistError: await this.persist(),
      };
    }

    for (const model of models) {
      if (!this.ratings.has(model)) {
        this.ratings.set(model, { rating: this.config.initialRating, history: [] });
      }
    }

    const before = new Map(models.map((model) => [model, this.ratingOf(model)]));
    const adjustments = new Map(models.map((model) => [model, 0]));
    const outcomes: MatchOutcome[] = [];

    for (let i = 0; i < models.length; i++) {
      for (let j = i + 1; j < models.length; j++) {
        const modelA = models[i];
        const modelB = models[j];
        const actual = relativeOutcome(modelScores[modelA], modelScores[modelB], this.outcomePolicy);
        const update = updatePair(
          before.get(modelA) ?? this.config.initialRating,
          before.get(modelB) ?? this.config.initialRating,
          actual,
          this.config,
        );
        adjustments.set(modelA, (adjustments.get(modelA) ?? 0) + update.deltaA);
        adjustments.set(modelB, (adjustments.get(modelB) ?? 0) + update.deltaB);
        outcomes.push({ modelA, modelB, turn, actual });
      }
    }

    for (const model of models) {
      const stored = this.ratings.get(model);
      if (!stored) {
        continue;
      }
      stored.rating = (before.get(model) ?? stored.rating) + (adjustments.get(model) ?? 0);
      stored.history.push({ runId, turn, rating: stored.rating });
    }

    let turns = this.recordedTurns.get(runId);
    if (!turns) {
      turns = new Set();
      this.recordedTurns.set(runId, turns);
    }
    turns.add(turn);
    this.dirty = true;

    return {
      applied: true,
      modelScores,
      outcomes,
      ratings: this.getCurrentRatings(),
      persistError: await this.persist(),
    };
  }

  /** Retry a pending save, e.g. once the game has ended. */
  async flush(): Promise<PersistenceError | null> {
    return this.persist();
  }

  hasPendingChanges(): boolean {
    return this.dirty;
  }

  // -------------------------------------------------------------------------
  // Reporting (query only)
  // -------------------------------------------------------------------------

  getCurrentRatings(): Record<ModelName, number> {
    return Object.fromEntries([...this.ratings].map(([model, stored]) => [model, stored.rating]));
  }

  getHistory(model: ModelName): Array<{ turn: number; rating: number }> {
    return (this.ratings.get(model)?.history ?? []).map(({ turn, rating }) => ({ turn, rating }));
  }

  /** History including the run each entry came from, for multi-run stores. */
  getFullHistory(model: ModelName): RatingHistoryEntry[] {
    return (this.ratings.get(model)?.history ?? []).map((entry) => ({ ...entry }));
  }

  getRankings(): RankingRow[] {
    return [...this.ratings]
      .map(([model, stored]) => ({ model, rating: stored.rating }))
      .sort((a, b) => b.rating - a.rating || a.model.localeCompare(b.model));
  }

  getWinProbabilityMatrix(models?: ModelName[]): { models: ModelName[]; matrix: number[][] } {
    const ordered = models ?? this.getRankings().map((row) => row.model);
    return winProbabilityMatrix(this.getCurrentRatings(), this.config.scaleFactor, ordered);
  }

  toSnapshot(): RatingSnapshot {
    const ratings: Record<ModelName, StoredRating> = {};
    for (const [model, stored] of this.ratings) {
      ratings[model] = { rating: stored.rating, history: stored.history.map((entry) => ({ ...entry })) };
    }
    const recordedTurns: Record<string, number[]> = {};
    for (const [runId, turns] of this.recordedTurns) {
      recordedTurns[runId] = [...turns].sort((a, b) => a - b);
    }
    return { version: 1, config: { ...this.config }, ratings, recordedTurns };
  }

  private ratingOf(model: ModelName): number {
    return this.ratings.get(model)?.rating ?? this.config.initialRating;
  }

  private async persist(): Promise<PersistenceError | null> {
    if (!this.store || !this.dirty) {
      return null;
    }
    try {
      await this.store.save(this.toSnapshot());
      this.dirty = false;
      return null;
    } catch (error) {
      return error instanceof PersistenceError
        ? error
        : new PersistenceError(`Failed to persist ratings: ${errorMessage(error)}`, {
            cause: error,
          });
    }
  }
}
