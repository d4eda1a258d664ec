import type {
  Agent,
  AgentContext,
  AgentHistoryEntry,
  BetObservation,
  GameEngineConfig,
  RubricConfig,
} from "../contract/interfaces.js";
import type {
  AgentErrorType,
  AgentId,
  GameEndReason,
  GameEvent,
  GameEventInput,
  GameResult,
  ModelName,
  Round,
  RoundRecord,
} from "../contract/types.js";
import { FanOutAbortedError, mapWithConcurrency } from "../core/concurrency.js";
import { AgentResponseError, ConfigError, RoundIntegrityError, errorMessage } from "../core/errors.js";
import { createRng, deriveNamedSeed, deriveSeed, randomChoice } from "../core/rng.js";
import type { RatingManager } from "../rating/ratingManager.js";
import { createRunId, generateGameId } from "./gameId.js";
import { indexAgentsByModel, type ModelGroup } from "./modelGroups.js";
import { DEFAULT_RUBRIC, scoreRound, totalsOf } from "./roundScorer.js";
import { ScoreBoard } from "./scoreBoard.js";
import { sealRound, type PhaseEntry } from "./sealRound.js";
import { resolveAgentTimeoutMs, resolveMaxConcurrency } from "./turnTimeout.js";

export interface GameEngineOptions {
  agents: Agent[];
  groups: readonly ModelGroup[];
  config: GameEngineConfig;
  /** Receives each scored turn; omitted for unrated games. */
  ratings?: RatingManager;
}

type Phase = "bet" | "action";

export type RoundOutcome =
  | { status: "scored"; record: RoundRecord }
  | { status: "voided"; turn: number; problems: string[] }
  | { status: "discarded"; turn: number; phase: Phase };

type TimedResult<T> = { timedOut: true } | { timedOut: false; value: T };

type CallResult =
  | { ok: true; value: number }
  | { ok: false; errorType: AgentErrorType; message: string };

interface PhaseFailure {
  agentId: AgentId;
  errorType: AgentErrorType;
  message: string;
  fallbackValue: number;
}

interface PhaseResult {
  entries: PhaseEntry[];
  fallbacks: AgentId[];
  failures: PhaseFailure[];
}

async function raceWithTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<TimedResult<T>> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return { timedOut: false, value: await promise };
  }
  let timeoutId: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<{ timedOut: true }>((resolve) => {
    timeoutId = setTimeout(() => resolve({ timedOut: true }), timeoutMs);
  });
  const wrappedPromise = promise.then(
    (value) => ({ timedOut: false as const, value }),
    (error: unknown) => ({ timedOut: false as const, error }),
  );
  try {
    const result = await Promise.race([wrappedPromise, timeoutPromise]);
    if ("error" in result) {
      throw result.error;
    }
    return result;
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Drives one game: for each turn, a concurrent bet phase, a single reveal of
 * the frozen bet snapshot, a concurrent action phase, then scoring and rating.
 *
 * Agents never see each other's bets before the reveal, and the scoreboard and
 * ratings are only touched here, after a phase's join barrier. Failed agent
 * calls are replaced by a seeded fallback so every round stays complete.
 */
export class GameEngine {
  readonly gameId: string;
  readonly runId: string;
  private readonly config: GameEngineConfig;
  private readonly agents: Agent[];
  private readonly groups: readonly ModelGroup[];
  private readonly ratings: RatingManager | undefined;
  private readonly roster: AgentId[];
  private readonly modelOf: Map<AgentId, ModelName>;
  private readonly rubric: RubricConfig;
  private readonly agentTimeoutMs: number;
  private readonly maxConcurrency: number;
  private readonly agentSeeds = new Map<AgentId, number>();
  private readonly agentRngs = new Map<AgentId, () => number>();
  private readonly fallbackRngs = new Map<AgentId, () => number>();
  private readonly histories = new Map<AgentId, AgentHistoryEntry[]>();
  private readonly scoreBoard: ScoreBoard;
  private readonly events: GameEvent[] = [];
  private readonly rounds: RoundRecord[] = [];
  private lastRoundActions: Readonly<Record<AgentId, number>> | null = null;
  private seq = 0;
  private started = false;
  private running = false;
  private nextTurn = 0;
  private turnsVoided = 0;

  constructor(options: GameEngineOptions) {
    const { agents, groups, config } = options;
    if (!Number.isInteger(config.numActions) || config.numActions < 2) {
      throw new ConfigError("Invalid game config", [
        `numActions must be an integer >= 2 (got ${config.numActions})`,
      ]);
    }

    this.config = config;
    this.groups = groups;
    this.ratings = options.ratings;
    this.modelOf = indexAgentsByModel(groups);
    this.roster = groups.flatMap((group) => [...group.agentIds]);

    const byId = new Map<AgentId, Agent>();
    const issues: string[] = [];
    for (const agent of agents) {
      if (byId.has(agent.id)) {
        issues.push(`duplicate agent id "${agent.id}"`);
      } else if (!this.modelOf.has(agent.id)) {
        issues.push(`agent "${agent.id}" does not belong to any model`);
      }
      byId.set(agent.id, agent);
    }
    for (const agentId of this.roster) {
      if (!byId.has(agentId)) {
        issues.push(`no agent supplied for "${agentId}"`);
      }
    }
    if (issues.length > 0) {
      throw new ConfigError("Agents do not match model groups", issues);
    }
    // Roster order: groups in declaration order, agents by index.
    this.agents = this.roster.flatMap((agentId) => {
      const agent = byId.get(agentId);
      return agent ? [agent] : [];
    });

    this.rubric = { ...DEFAULT_RUBRIC, ...config.rubric };
    this.agentTimeoutMs = resolveAgentTimeoutMs(config);
    this.maxConcurrency = resolveMaxConcurrency(config);

    const masterRng = createRng(config.seed);
    const generatedGameId = generateGameId(masterRng);
    this.gameId = config.gameId ?? generatedGameId;
    // Never derived from the seed: two games with one seed are still two runs.
    this.runId = config.runId ?? createRunId();

    // Each agent gets its own stream; fallbacks use a separate one so a
    // substitution never shifts the values a scripted agent draws.
    for (const agentId of this.roster) {
      const agentSeed = deriveSeed(masterRng);
      this.agentSeeds.set(agentId, agentSeed);
      this.agentRngs.set(agentId, createRng(agentSeed));
      this.fallbackRngs.set(agentId, createRng(deriveNamedSeed(config.seed, `fallback:${agentId}`)));
      this.histories.set(agentId, []);
    }

    this.scoreBoard = new ScoreBoard(this.roster);
  }

  getEvents(): readonly GameEvent[] {
    return [...this.events];
  }

  getRounds(): readonly RoundRecord[] {
    return [...this.rounds];
  }

  getScoreBoard(): ScoreBoard {
    return this.scoreBoard;
  }

  /** Play every remaining turn and end the game. */
  async play(): Promise<GameResult> {
    this.start();
    let reason: GameEndReason = "completed";

    while (this.nextTurn < this.config.numTurns) {
      if (this.config.signal?.aborted) {
        reason = "cancelled";
        break;
      }
      const outcome = await this.runRound(this.nextTurn);
      if (outcome.status === "discarded") {
        reason = "cancelled";
        break;
      }
    }

    if (this.ratings) {
      const persistError = await this.ratings.flush();
      if (persistError) {
        this.emit({
          type: "RatingsPersistFailed",
          turn: Math.max(0, this.nextTurn - 1),
          message: persistError.message,
        });
      }
    }

    const scores = this.scoreBoard.snapshot();
    this.emit({
      type: "GameEnded",
      reason,
      turnsPlayed: this.rounds.length,
      turnsVoided: this.turnsVoided,
      scores,
    });

    return {
      gameId: this.gameId,
      runId: this.runId,
      seed: this.config.seed,
      reason,
      turnsPlayed: this.rounds.length,
      turnsVoided: this.turnsVoided,
      scores,
      rounds: [...this.rounds],
      events: [...this.events],
    };
  }

  /**
   * Run one bet → reveal → action → score cycle. Turns must be run in order
   * and never overlap.
   */
  async runRound(turn: number): Promise<RoundOutcome> {
    if (this.running) {
      throw new Error(`Turn ${turn} requested while turn ${this.nextTurn} is still running`);
    }
    if (turn !== this.nextTurn) {
      throw new Error(`Turn ${turn} requested out of order; expected turn ${this.nextTurn}`);
    }
    this.start();
    this.running = true;
    try {
      return await this.playTurn(turn);
    } finally {
      this.running = false;
    }
  }

  private start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const agent of this.agents) {
      agent.init({
        agentId: agent.id,
        model: this.modelOf.get(agent.id) ?? agent.id,
        seed: this.agentSeeds.get(agent.id) ?? this.config.seed,
        numActions: this.config.numActions,
        rubric: { ...this.rubric },
      });
    }
    this.emit({
      type: "GameStarted",
      seed: this.config.seed,
      runId: this.runId,
      numActions: this.config.numActions,
      numTurns: this.config.numTurns,
      models: Object.fromEntries(this.groups.map((group) => [group.name, [...group.agentIds]])),
    });
  }

  private async playTurn(turn: number): Promise<RoundOutcome> {
    this.emit({ type: "TurnStarted", turn });

    let bets: PhaseResult;
    try {
      bets = await this.runPhase(turn, "bet", (agent, ctx) =>
        agent.bet(this.betObservation(agent.id, turn), ctx),
      );
    } catch (error) {
      return this.discard(turn, "bet", error);
    }
    this.reportFailures(turn, "bet", bets.failures);

    // The reveal: one frozen snapshot, built only after every bet is in.
    const revealed: Readonly<Record<AgentId, number>> = Object.freeze(
      Object.fromEntries(bets.entries.map(({ agentId, value }) => [agentId, value])),
    );
    this.emit({ type: "BetsRevealed", turn, bets: { ...revealed } });

    let actions: PhaseResult;
    try {
      actions = await this.runPhase(turn, "action", (agent, ctx) =>
        agent.act({ ...this.betObservation(agent.id, turn), bets: revealed }, ctx),
      );
    } catch (error) {
      return this.discard(turn, "action", error);
    }
    this.reportFailures(turn, "action", actions.failures);
    this.emit({
      type: "ActionsSubmitted",
      turn,
      actions: Object.fromEntries(actions.entries.map(({ agentId, value }) => [agentId, value])),
    });

    let round: Round;
    try {
      round = sealRound(turn, bets.entries, actions.entries, this.roster, this.config.numActions);
    } catch (error) {
      if (!(error instanceof RoundIntegrityError)) {
        throw error;
      }
      this.nextTurn = turn + 1;
      this.turnsVoided += 1;
      this.emit({ type: "RoundVoided", turn, problems: error.problems });
      return { status: "voided", turn, problems: error.problems };
    }

    const scores = scoreRound(round, this.rubric);
    const totals = totalsOf(scores);
    this.scoreBoard.apply(turn, totals);
    for (const agentId of this.roster) {
      this.histories.get(agentId)?.push({
        turn,
        bet: round.bets[agentId],
        action: round.actions[agentId],
        score: totals[agentId],
        cumulativeScore: this.scoreBoard.get(agentId),
      });
    }
    this.lastRoundActions = round.actions;
    this.emit({ type: "RoundScored", turn, scores: totals });

    if (this.ratings) {
      const rated = await this.ratings.recordTurn({
        runId: this.runId,
        turn,
        scores: totals,
        groups: this.groups,
      });
      if (rated.applied) {
        this.emit({
          type: "RatingsUpdated",
          turn,
          modelScores: rated.modelScores,
          outcomes: rated.outcomes,
          ratings: rated.ratings,
        });
      }
      if (rated.persistError) {
        this.emit({ type: "RatingsPersistFailed", turn, message: rated.persistError.message });
      }
    }

    const record: RoundRecord = {
      round,
      scores,
      fallbacks: { bet: bets.fallbacks, action: actions.fallbacks },
    };
    this.rounds.push(record);
    this.nextTurn = turn + 1;
    return { status: "scored", record };
  }

  private discard(turn: number, phase: Phase, error: unknown): RoundOutcome {
    if (!(error instanceof FanOutAbortedError)) {
      throw error;
    }
    this.emit({ type: "RoundDiscarded", turn, phase });
    return { status: "discarded", turn, phase };
  }

  private betObservation(agentId: AgentId, turn: number): BetObservation {
    return {
      turn,
      numActions: this.config.numActions,
      cumulativeScore: this.scoreBoard.get(agentId),
      history: [...(this.histories.get(agentId) ?? [])],
      lastRoundActions: this.lastRoundActions,
    };
  }

  private async runPhase(
    turn: number,
    phase: Phase,
    call: (agent: Agent, ctx: AgentContext) => number | Promise<number>,
  ): Promise<PhaseResult> {
    const { signal } = this.config;
    const results = await mapWithConcurrency(
      this.agents,
      this.maxConcurrency,
      async (agent) => {
        // One controller per call: aborted by a timeout or by the game signal.
        const controller = new AbortController();
        const cancel = () => controller.abort(signal?.reason);
        if (signal?.aborted) {
          cancel();
        }
        signal?.addEventListener("abort", cancel, { once: true });
        const ctx: AgentContext = {
          rng: this.agentRngs.get(agent.id) ?? createRng(this.config.seed),
          turn,
          agentId: agent.id,
          signal: controller.signal,
        };
        try {
          return await this.callAgent(phase, () => call(agent, ctx), controller);
        } finally {
          signal?.removeEventListener("abort", cancel);
        }
      },
      signal ? { signal } : {},
    );

    const phaseResult: PhaseResult = { entries: [], fallbacks: [], failures: [] };
    results.forEach((result, index) => {
      const agentId = this.agents[index].id;
      if (result.ok) {
        phaseResult.entries.push({ agentId, value: result.value });
        return;
      }
      const fallbackValue = randomChoice(
        this.fallbackRngs.get(agentId) ?? createRng(this.config.seed),
        this.config.numActions,
      );
      phaseResult.entries.push({ agentId, value: fallbackValue });
      phaseResult.fallbacks.push(agentId);
      phaseResult.failures.push({
        agentId,
        errorType: result.errorType,
        message: result.message,
        fallbackValue,
      });
    });
    return phaseResult;
  }

  private async callAgent(
    phase: Phase,
    call: () => number | Promise<number>,
    controller: AbortController,
  ): Promise<CallResult> {
    try {
      const result = await raceWithTimeout(Promise.resolve().then(call), this.agentTimeoutMs);
      if (result.timedOut) {
        controller.abort(
          new AgentResponseError(`Agent exceeded agentTimeoutMs (${this.agentTimeoutMs}ms)`, "timeout"),
        );
        return {
          ok: false,
          errorType: "timeout",
          message: `Agent exceeded agentTimeoutMs (${this.agentTimeoutMs}ms). Fallback ${phase} applied.`,
        };
      }
      const value = result.value;
      if (!Number.isInteger(value) || value < 0 || value >= this.config.numActions) {
        return {
          ok: false,
          errorType: "invalid",
          message: `${phase} ${String(value)} is not an integer in [0, ${this.config.numActions - 1}]`,
        };
      }
      return { ok: true, value };
    } catch (error) {
      return {
        ok: false,
        errorType: error instanceof AgentResponseError ? error.kind : "error",
        message: errorMessage(error),
      };
    }
  }

  private reportFailures(turn: number, phase: Phase, failures: PhaseFailure[]): void {
    for (const failure of failures) {
      this.emit({ type: "AgentError", turn, phase, ...failure });
    }
  }

  private emit(partial: GameEventInput): void {
    const event = { ...partial, seq: this.seq++, gameId: this.gameId } as GameEvent;
    this.events.push(event);
    this.config.onEvent?.(event);
  }
}
