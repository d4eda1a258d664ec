import type { AgentId, GameResult, ModelName } from "../contract/types.js";
import type { RankingRow } from "../rating/ratingManager.js";
import type { TournamentConfig } from "./config.js";

export interface AgentStandingsRow {
  agentId: AgentId;
  model: ModelName;
  score: number;
  /** Bets and actions replaced by a fallback over the whole game. */
  fallbacks: number;
}

export interface ModelStandingsRow {
  model: ModelName;
  agents: number;
  totalScore: number;
  meanScore: number;
  rating: number;
}

export interface WinProbabilities {
  models: ModelName[];
  matrix: number[][];
}

export interface TournamentResult {
  config: TournamentConfig;
  game: GameResult;
  agentStandings: AgentStandingsRow[];
  modelStandings: ModelStandingsRow[];
  rankings: RankingRow[];
  winProbabilities: WinProbabilities;
  /** Rating history per model, as (turn, rating) pairs. */
  ratingHistory: Record<ModelName, Array<{ turn: number; rating: number }>>;
}
