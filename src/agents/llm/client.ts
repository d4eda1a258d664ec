import { generateText, type LanguageModelUsage, type ModelMessage } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import type { LlmProvider } from "./types.js";

export interface LlmProviderClientConfig {
  provider: LlmProvider;
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  baseUrl?: string;
  apiKey?: string;
}

export interface LlmTextResult {
  text: string;
  usage: LanguageModelUsage | undefined;
  finishReason: string;
}

const DEFAULT_OLLAMA_ENDPOINT = "http://localhost:11434";
const DEFAULT_OPENROUTER_ENDPOINT = "https://openrouter.ai/api/v1";

/** Provider root URL, from the environment when set. */
export function resolveBaseUrl(provider: LlmProvider): string {
  if (provider === "openrouter") {
    return process.env.OPENROUTER_BASE_URL?.trim() || DEFAULT_OPENROUTER_ENDPOINT;
  }
  return process.env.OLLAMA_ENDPOINT?.trim() || DEFAULT_OLLAMA_ENDPOINT;
}

/** Base URL of the provider's OpenAI-compatible API. */
export function resolveApiBaseUrl(provider: LlmProvider): string {
  const root = resolveBaseUrl(provider).replace(/\/$/, "");
  return provider === "ollama" && !root.endsWith("/v1") ? `${root}/v1` : root;
}

export function resolveApiKey(provider: LlmProvider): string | undefined {
  const raw = provider === "openrouter" ? process.env.OPENROUTER_API_KEY : process.env.OLLAMA_API_KEY;
  const trimmed = raw?.trim();
  if (trimmed) {
    return trimmed;
  }
  // Ollama ignores the key, but the OpenAI client refuses to start without one.
  return provider === "ollama" ? "ollama" : undefined;
}

export function createProviderClient(config: LlmProviderClientConfig) {
  const provider = createOpenAI({
    baseURL: config.baseUrl ?? resolveApiBaseUrl(config.provider),
    apiKey: config.apiKey ?? resolveApiKey(config.provider),
    name: config.provider,
  });
  // OpenRouter and Ollama speak chat completions, not the Responses API.
  return provider.chat(config.model);
}

export async function generatePlainText(
  config: LlmProviderClientConfig,
  params: {
    system: string;
    messages: ModelMessage[];
    abortSignal?: AbortSignal;
  },
): Promise<LlmTextResult> {
  const model = createProviderClient(config);
  const result = await generateText({
    model,
    system: params.system,
    messages: params.messages,
    ...(params.abortSignal ? { abortSignal: params.abortSignal } : {}),
    ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
    ...(config.maxOutputTokens !== undefined ? { maxOutputTokens: config.maxOutputTokens } : {}),
  });
  return {
    text: result.text,
    usage: result.usage,
    finishReason: result.finishReason,
  };
}
