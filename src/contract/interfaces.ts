import type { AgentId, GameEvent, ModelName, Seed } from "./types.js";

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

/** Configuration handed to an agent before the game begins. */
export interface AgentConfig {
  agentId: AgentId;
  model: ModelName;
  seed: Seed;
  numActions: number;
  /** The scoring rules in force, so agents can explain them to a model. */
  rubric: RubricConfig;
}

/** Per-call context provided alongside the observation. */
export interface AgentContext {
  /** Seeded PRNG scoped to this agent; use instead of Math.random. */
  rng: () => number;
  turn: number;
  agentId: AgentId;
  /**
   * Aborted when the game is cancelled or this call exceeds its time limit.
   * Work finishing after the abort is discarded by the engine.
   */
  signal?: AbortSignal;
}

/** One scored round as seen by the agent that played it. */
export interface AgentHistoryEntry {
  turn: number;
  bet: number;
  action: number;
  score: number;
  cumulativeScore: number;
}

/** What an agent sees when asked for its public bet. */
export interface BetObservation {
  turn: number;
  numActions: number;
  cumulativeScore: number;
  history: AgentHistoryEntry[];
  /** Every agent's action from the previous scored round; null before the first. */
  lastRoundActions: Readonly<Record<AgentId, number>> | null;
}

/** What an agent sees when asked for its private action: the full bet snapshot. */
export interface ActionObservation extends BetObservation {
  bets: Readonly<Record<AgentId, number>>;
}

/**
 * An agent that can participate in a game. Both calls must resolve to an
 * integer in [0, numActions); anything else is replaced by a fallback.
 */
export interface Agent {
  readonly id: AgentId;
  init(config: AgentConfig): void;
  bet(observation: BetObservation, ctx: AgentContext): number | Promise<number>;
  act(observation: ActionObservation, ctx: AgentContext): number | Promise<number>;
}

// ---------------------------------------------------------------------------
// Engine config
// ---------------------------------------------------------------------------

/** Scoring options for the bet/action rubric. */
export interface RubricConfig {
  /** Whether an agent's own bet counts toward its bet bonus. */
  includeSelfInBetBonus: boolean;
}

/** Configuration for a single game run. */
export interface GameEngineConfig {
  seed: Seed;
  numActions: number;
  numTurns: number;
  rubric?: Partial<RubricConfig>;
  gameId?: string;
  /**
   * Identifies the run in the rating store; defaults to a fresh random id.
   * Pass an earlier run's id to resume it without rating its turns twice.
   */
  runId?: string;
  agentTimeoutMs?: number;
  maxConcurrency?: number;
  signal?: AbortSignal;
  onEvent?: (event: GameEvent) => void;
}
