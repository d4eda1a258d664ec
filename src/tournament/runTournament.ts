import type { Agent } from "../contract/interfaces.js";
import type { AgentId, GameEvent } from "../contract/types.js";
import { createBaselineAgent } from "../agents/baselineAgent.js";
import { createRandomAgent } from "../agents/randomAgent.js";
import { createLlmAgent } from "../agents/llm/createLlmAgent.js";
import { parseLlmAgentKey } from "../agents/llm/keys.js";
import { preflightValidateLlmAgents } from "../agents/llm/preflight.js";
import type { LlmAgentDescriptor } from "../agents/llm/types.js";
import { ConfigError } from "../core/errors.js";
import { GameEngine } from "../engine/gameEngine.js";
import { buildModelGroups } from "../engine/modelGroups.js";
import { RatingManager } from "../rating/ratingManager.js";
import { InMemoryRatingStore, JsonFileRatingStore, type RatingStore } from "../rating/ratingStore.js";
import type { ModelEntry, TournamentConfig } from "./config.js";
import { computeAgentStandings, computeModelStandings } from "./standings.js";
import type { TournamentResult } from "./types.js";

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

type AgentFactory = (id: AgentId) => Agent;

const agentRegistry: Record<string, AgentFactory> = {
  random: createRandomAgent,
  baseline: createBaselineAgent,
};

const llmAgentKeys = ["llm:<provider>:<model>"];
const DEFAULT_TEMPERATURE = 0.7;

function resolveTemperature(entry: ModelEntry): number {
  if (entry.temperature !== undefined) {
    return entry.temperature;
  }
  const raw = process.env.MODGAME_LLM_TEMPERATURE;
  if (!raw || raw.trim().length === 0) {
    return DEFAULT_TEMPERATURE;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : DEFAULT_TEMPERATURE;
}

function listAvailableAgentKeys(): string {
  return [...Object.keys(agentRegistry), ...llmAgentKeys].join(", ");
}

/** Resolve the factory for a model entry's agent key. Throws ConfigError if unknown. */
export function getAgentFactory(entry: ModelEntry): AgentFactory {
  if (entry.agent.startsWith("llm:")) {
    const { provider, model } = parseLlmAgentKey(entry.agent);
    const temperature = resolveTemperature(entry);
    return (id: AgentId) =>
      createLlmAgent(id, {
        provider,
        model,
        temperature,
        ...(entry.maxOutputTokens !== undefined ? { maxOutputTokens: entry.maxOutputTokens } : {}),
      });
  }

  const factory = agentRegistry[entry.agent];
  if (!factory) {
    throw new ConfigError(
      `Unknown agent "${entry.agent}" for model "${entry.name}". Available: ${listAvailableAgentKeys()}`,
    );
  }
  return factory;
}

// ---------------------------------------------------------------------------
// Tournament runner
// ---------------------------------------------------------------------------

export interface RunTournamentOptions {
  /** Overrides the store implied by `ratingsPath`. */
  store?: RatingStore;
  signal?: AbortSignal;
  onEvent?: (event: GameEvent) => void;
  /** Skip the provider reachability check (tests, offline dry runs). */
  skipPreflight?: boolean;
}

/**
 * Run one game of `numTurns` rounds between every configured model and fold
 * each scored round into the models' ratings.
 *
 * Configuration problems surface as ConfigError before turn 1; a rating store
 * that exists but cannot be read fails here too, rather than being overwritten.
 */
export async function runTournament(
  config: TournamentConfig,
  options: RunTournamentOptions = {},
): Promise<TournamentResult> {
  const groups = buildModelGroups(
    config.models.map((entry) => ({ name: entry.name, count: entry.count ?? config.agentsPerModel })),
  );
  const factories = new Map(config.models.map((entry) => [entry.name, getAgentFactory(entry)]));

  const llmAgents: LlmAgentDescriptor[] = config.models.flatMap((entry) =>
    entry.agent.startsWith("llm:") ? [parseLlmAgentKey(entry.agent)] : [],
  );
  if (llmAgents.length > 0 && !options.skipPreflight) {
    await preflightValidateLlmAgents(llmAgents);
  }

  // Fresh agent instances per seat (agents can be stateful)
  const agents = groups.flatMap((group) => {
    const factory = factories.get(group.name);
    return factory ? group.agentIds.map((agentId) => factory(agentId)) : [];
  });

  const store =
    options.store ??
    (config.ratingsPath ? new JsonFileRatingStore(config.ratingsPath) : new InMemoryRatingStore());
  const ratings = await RatingManager.open({
    store,
    config: {
      initialRating: config.initialRating,
      kFactor: config.kFactor,
      scaleFactor: config.scaleFactor,
    },
    outcomePolicy: config.outcomePolicy,
  });

  const engine = new GameEngine({
    agents,
    groups,
    ratings,
    config: {
      seed: config.seed,
      numActions: config.numActions,
      numTurns: config.numTurns,
      rubric: { includeSelfInBetBonus: config.includeSelfInBetBonus },
      ...(config.runId !== undefined ? { runId: config.runId } : {}),
      ...(config.agentTimeoutMs !== undefined ? { agentTimeoutMs: config.agentTimeoutMs } : {}),
      ...(config.maxConcurrency !== undefined ? { maxConcurrency: config.maxConcurrency } : {}),
      ...(options.signal ? { signal: options.signal } : {}),
      ...(options.onEvent ? { onEvent: options.onEvent } : {}),
    },
  });

  const game = await engine.play();
  const current = ratings.getCurrentRatings();

  return {
    config,
    game,
    agentStandings: computeAgentStandings(game, groups),
    modelStandings: computeModelStandings(game, groups, current, config.initialRating),
    rankings: ratings.getRankings(),
    winProbabilities: ratings.getWinProbabilityMatrix(),
    ratingHistory: Object.fromEntries(
      groups.map((group) => [group.name, ratings.getHistory(group.name)]),
    ),
  };
}
