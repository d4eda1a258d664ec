export const LLM_PROVIDERS = ["ollama", "openrouter"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export interface LlmAgentDescriptor {
  kind: "llm";
  provider: LlmProvider;
  model: string;
}

export function isLlmProvider(value: string): value is LlmProvider {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}
