// Contract types
export type {
  AgentId,
  ModelName,
  GameId,
  Seed,
  JsonValue,
  Round,
  RoundScore,
  RoundRecord,
  RoundFallbacks,
  MatchOutcome,
  GameEvent,
  GameStartedEvent,
  TurnStartedEvent,
  BetsRevealedEvent,
  ActionsSubmittedEvent,
  AgentErrorEvent,
  AgentErrorType,
  RoundScoredEvent,
  RatingsUpdatedEvent,
  RatingsPersistFailedEvent,
  RoundVoidedEvent,
  RoundDiscardedEvent,
  GameEndedEvent,
  GameEndReason,
  GameResult,
} from "./contract/types.js";

// Contract interfaces
export type {
  Agent,
  AgentConfig,
  AgentContext,
  AgentHistoryEntry,
  BetObservation,
  ActionObservation,
  RubricConfig,
  GameEngineConfig,
} from "./contract/interfaces.js";

// Core
export { createRng, randomInt, randomChoice, deriveSeed, deriveNamedSeed } from "./core/rng.js";
export { stableStringify, toStableJsonl } from "./core/json.js";
export { mapWithConcurrency, FanOutAbortedError } from "./core/concurrency.js";
export { decodeChoice } from "./core/decodeChoice.js";
export {
  AgentResponseError,
  ConfigError,
  PersistenceError,
  RoundIntegrityError,
} from "./core/errors.js";

// Engine
export { GameEngine } from "./engine/gameEngine.js";
export type { GameEngineOptions, RoundOutcome } from "./engine/gameEngine.js";
export { buildModelGroups, agentIdFor } from "./engine/modelGroups.js";
export type { ModelGroup, ModelGroupSpec } from "./engine/modelGroups.js";
export { scoreRound, totalsOf, ACTION_MATCH_POINTS, BET_MATCH_POINTS } from "./engine/roundScorer.js";
export { sealRound } from "./engine/sealRound.js";
export { ScoreBoard } from "./engine/scoreBoard.js";

// Ratings
export {
  DEFAULT_ELO_CONFIG,
  expectedScore,
  updateRating,
  updatePair,
  winProbabilityMatrix,
} from "./rating/eloCore.js";
export type { EloConfig } from "./rating/eloCore.js";
export { relativeOutcome, OUTCOME_POLICIES } from "./rating/outcome.js";
export type { OutcomePolicy } from "./rating/outcome.js";
export { RatingManager, averageByModel } from "./rating/ratingManager.js";
export type { RankingRow, TurnRatingResult, TurnScores } from "./rating/ratingManager.js";
export { InMemoryRatingStore, JsonFileRatingStore } from "./rating/ratingStore.js";
export type { RatingSnapshot, RatingStore } from "./rating/ratingStore.js";

// Agents
export { createRandomAgent } from "./agents/randomAgent.js";
export { createBaselineAgent } from "./agents/baselineAgent.js";
export { createScriptedAgent } from "./agents/scriptedAgent.js";
export { createLlmAgent } from "./agents/llm/createLlmAgent.js";

// Tournament
export { runTournament } from "./tournament/runTournament.js";
export { loadTournamentConfig, parseTournamentConfig } from "./tournament/config.js";
export type { TournamentConfig, TournamentConfigInput } from "./tournament/config.js";
export { writeTournamentArtifacts } from "./tournament/artifacts.js";
export type {
  AgentStandingsRow,
  ModelStandingsRow,
  TournamentResult,
} from "./tournament/types.js";
