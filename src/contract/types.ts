/** Branded string types for domain clarity. */
export type AgentId = string;
export type ModelName = string;
export type GameId = string;
export type Seed = number;

/** A JSON-serializable value (no functions, no undefined). */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// ---------------------------------------------------------------------------
// Rounds
// ---------------------------------------------------------------------------

/** One completed bet → reveal → action cycle. Frozen once sealed. */
export interface Round {
  readonly turn: number;
  readonly bets: Readonly<Record<AgentId, number>>;
  readonly actions: Readonly<Record<AgentId, number>>;
}

/** Per-agent score for a single round, split by rubric component. */
export interface RoundScore {
  action: number;
  bet: number;
  total: number;
}

/** Which agents had a value substituted during each phase. */
export interface RoundFallbacks {
  bet: AgentId[];
  action: AgentId[];
}

/** History entry appended after a round is scored. */
export interface RoundRecord {
  round: Round;
  scores: Record<AgentId, RoundScore>;
  fallbacks: RoundFallbacks;
}

/** Pairwise comparison between two models for one turn. Never persisted. */
export interface MatchOutcome {
  modelA: ModelName;
  modelB: ModelName;
  turn: number;
  actual: number;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** Fields shared by every event. */
export interface BaseEvent {
  type: string;
  seq: number;
  gameId: GameId;
}

export interface GameStartedEvent extends BaseEvent {
  type: "GameStarted";
  seed: Seed;
  runId: string;
  numActions: number;
  numTurns: number;
  models: Record<ModelName, AgentId[]>;
}

export interface TurnStartedEvent extends BaseEvent {
  type: "TurnStarted";
  turn: number;
}

export interface BetsRevealedEvent extends BaseEvent {
  type: "BetsRevealed";
  turn: number;
  bets: Record<AgentId, number>;
}

export interface ActionsSubmittedEvent extends BaseEvent {
  type: "ActionsSubmitted";
  turn: number;
  actions: Record<AgentId, number>;
}

export type AgentErrorType = "timeout" | "invalid" | "error";

export interface AgentErrorEvent extends BaseEvent {
  type: "AgentError";
  agentId: AgentId;
  turn: number;
  phase: "bet" | "action";
  message: string;
  errorType: AgentErrorType;
  fallbackValue: number;
}

export interface RoundScoredEvent extends BaseEvent {
  type: "RoundScored";
  turn: number;
  scores: Record<AgentId, number>;
}

export interface RatingsUpdatedEvent extends BaseEvent {
  type: "RatingsUpdated";
  turn: number;
  modelScores: Record<ModelName, number>;
  outcomes: MatchOutcome[];
  ratings: Record<ModelName, number>;
}

export interface RatingsPersistFailedEvent extends BaseEvent {
  type: "RatingsPersistFailed";
  turn: number;
  message: string;
}

export interface RoundVoidedEvent extends BaseEvent {
  type: "RoundVoided";
  turn: number;
  problems: string[];
}

export interface RoundDiscardedEvent extends BaseEvent {
  type: "RoundDiscarded";
  turn: number;
  phase: "bet" | "action";
}

export type GameEndReason = "completed" | "cancelled";

export interface GameEndedEvent extends BaseEvent {
  type: "GameEnded";
  reason: GameEndReason;
  turnsPlayed: number;
  turnsVoided: number;
  scores: Record<AgentId, number>;
}

/** Discriminated union of all game events. */
export type GameEvent =
  | GameStartedEvent
  | TurnStartedEvent
  | BetsRevealedEvent
  | ActionsSubmittedEvent
  | AgentErrorEvent
  | RoundScoredEvent
  | RatingsUpdatedEvent
  | RatingsPersistFailedEvent
  | RoundVoidedEvent
  | RoundDiscardedEvent
  | GameEndedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An event as handed to the emitter, before seq and gameId are stamped. */
export type GameEventInput = DistributiveOmit<GameEvent, "seq" | "gameId">;

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/** Completed game result containing the full event log. */
export interface GameResult {
  gameId: GameId;
  runId: string;
  seed: Seed;
  reason: GameEndReason;
  turnsPlayed: number;
  turnsVoided: number;
  scores: Record<AgentId, number>;
  rounds: RoundRecord[];
  events: GameEvent[];
}
