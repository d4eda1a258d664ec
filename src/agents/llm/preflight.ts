import { z } from "zod";
import { resolveApiKey, resolveBaseUrl } from "./client.js";
import type { LlmAgentDescriptor } from "./types.js";

export class LlmPreflightError extends Error {
  readonly details: string[];

  constructor(message: string, details: string[]) {
    super(message);
    this.name = "LlmPreflightError";
    this.details = details;
  }
}

const OpenRouterModelsSchema = z.object({
  data: z.array(z.object({ id: z.string().optional() })).optional(),
});

const OllamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string().optional() })).optional(),
});

function withTimeout(input: string, init: RequestInit = {}, timeoutMs = 5000): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  return fetch(input, { ...init, signal: controller.signal }).finally(() => clearTimeout(timeoutId));
}

async function fetchListing(url: string, init: RequestInit, providerLabel: string): Promise<unknown> {
  let response: Response;
  try {
    response = await withTimeout(url, init);
  } catch (error) {
    throw new Error(`${providerLabel} endpoint unreachable (${url})`, { cause: error });
  }
  if (!response.ok) {
    throw new Error(`${providerLabel} endpoint returned ${response.status}`);
  }
  return response.json();
}

async function checkOpenRouterModels(model: string): Promise<void> {
  const apiKey = resolveApiKey("openrouter");
  if (!apiKey) {
    throw new Error("Missing OPENROUTER_API_KEY for OpenRouter provider.");
  }
  const url = `${resolveBaseUrl("openrouter").replace(/\/$/, "")}/models`;
  const listing = OpenRouterModelsSchema.safeParse(
    await fetchListing(url, { headers: { Authorization: `Bearer ${apiKey}` } }, "OpenRouter"),
  );
  const models = listing.success
    ? (listing.data.data ?? []).flatMap((entry) => (entry.id ? [entry.id] : []))
    : [];
  if (models.length > 0 && !models.includes(model)) {
    throw new Error(`OpenRouter model "${model}" not found in /models listing.`);
  }
}

async function checkOllamaModels(model: string): Promise<void> {
  const url = `${resolveBaseUrl("ollama").replace(/\/$/, "")}/api/tags`;
  const listing = OllamaTagsSchema.safeParse(await fetchListing(url, {}, "Ollama"));
  const models = listing.success
    ? (listing.data.models ?? []).flatMap((entry) => (entry.name ? [entry.name] : []))
    : [];
  if (models.length > 0 && !models.includes(model)) {
    throw new Error(`Ollama model "${model}" not found in /api/tags listing.`);
  }
}

/** Fail fast, before turn 1, when a provider is unreachable or lacks a model. */
export async function preflightValidateLlmAgents(agents: LlmAgentDescriptor[]): Promise<void> {
  const errors: string[] = [];
  const unique = new Map<string, LlmAgentDescriptor>();
  for (const agent of agents) {
    unique.set(`${agent.provider}:${agent.model}`, agent);
  }

  for (const agent of unique.values()) {
    try {
      if (agent.provider === "openrouter") {
        await checkOpenRouterModels(agent.model);
      } else {
        await checkOllamaModels(agent.model);
      }
    } catch (error) {
      errors.push(error instanceof Error ? error.message : String(error));
    }
  }

  if (errors.length > 0) {
    throw new LlmPreflightError("LLM preflight validation failed.", errors);
  }
}
