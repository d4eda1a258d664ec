import type { ModelMessage } from "ai";
import type {
  ActionObservation,
  Agent,
  AgentConfig,
  AgentContext,
  BetObservation,
} from "../../contract/interfaces.js";
import type { AgentId } from "../../contract/types.js";
import { decodeChoice } from "../../core/decodeChoice.js";
import { AgentResponseError } from "../../core/errors.js";
import { generatePlainText } from "./client.js";
import {
  ACTION_TAGS,
  BET_TAGS,
  buildSystemPrompt,
  formatActionPrompt,
  formatBetPrompt,
} from "./prompts.js";
import type { LlmProvider } from "./types.js";

export interface LlmAgentRuntimeConfig {
  provider: LlmProvider;
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  baseUrl?: string;
  apiKey?: string;
  /** Most recent prompt/reply exchanges resent with each call. */
  maxTranscriptExchanges?: number;
}

const DEFAULT_MAX_TRANSCRIPT_EXCHANGES = 10;
// Reasoning models spend most of their output on <think> blocks.
const DEFAULT_MAX_OUTPUT_TOKENS = 4096;

interface Exchange {
  prompt: string;
  reply: string;
}

/**
 * An agent backed by a chat model. Each bet and action is one completion; the
 * agent keeps a bounded transcript so the model sees its own earlier rounds.
 * A reply that carries no legal choice raises AgentResponseError and the
 * engine substitutes a fallback.
 */
export function createLlmAgent(id: AgentId, config: LlmAgentRuntimeConfig): Agent {
  const maxExchanges = Math.max(0, config.maxTranscriptExchanges ?? DEFAULT_MAX_TRANSCRIPT_EXCHANGES);
  let system = "";
  let numActions = 0;
  let transcript: Exchange[] = [];

  const requestConfig = {
    provider: config.provider,
    model: config.model,
    maxOutputTokens: config.maxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS,
    ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
    ...(config.baseUrl !== undefined ? { baseUrl: config.baseUrl } : {}),
    ...(config.apiKey !== undefined ? { apiKey: config.apiKey } : {}),
  };

  async function ask(
    prompt: string,
    label: "bet" | "action",
    tags: string[],
    ctx: AgentContext,
  ): Promise<number> {
    const messages: ModelMessage[] = transcript.flatMap((exchange): ModelMessage[] => [
      { role: "user", content: exchange.prompt },
      { role: "assistant", content: exchange.reply },
    ]);
    messages.push({ role: "user", content: prompt });

    const result = await generatePlainText(requestConfig, {
      system,
      messages,
      ...(ctx.signal ? { abortSignal: ctx.signal } : {}),
    });

    // A reply to an abandoned call was replaced by a fallback; keeping it would
    // show the model a choice that never counted.
    if (ctx.signal?.aborted) {
      throw new AgentResponseError(
        `Reply from ${config.model} arrived after the call was abandoned`,
        "timeout",
      );
    }
    transcript.push({ prompt, reply: result.text });
    if (transcript.length > maxExchanges) {
      transcript = transcript.slice(transcript.length - maxExchanges);
    }

    const decoded = decodeChoice(result.text, numActions, {
      tags,
      keys: [label, "choice", "value"],
    });
    if (!decoded.ok || decoded.value === null) {
      const truncated = result.finishReason === "length" ? " (output truncated)" : "";
      throw new AgentResponseError(
        `No legal ${label} in ${config.model} reply: ${decoded.failureReason ?? "unknown"}${truncated}`,
        "invalid",
      );
    }
    return decoded.value;
  }

  return {
    id,
    init(agentConfig: AgentConfig): void {
      numActions = agentConfig.numActions;
      system = buildSystemPrompt(agentConfig.numActions, agentConfig.rubric);
      transcript = [];
    },
    bet(observation: BetObservation, ctx: AgentContext): Promise<number> {
      return ask(formatBetPrompt(observation, id), "bet", BET_TAGS, ctx);
    },
    act(observation: ActionObservation, ctx: AgentContext): Promise<number> {
      return ask(formatActionPrompt(observation, id), "action", ACTION_TAGS, ctx);
    },
  };
}
