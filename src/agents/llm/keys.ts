import { ConfigError } from "../../core/errors.js";
import { isLlmProvider, LLM_PROVIDERS, type LlmAgentDescriptor } from "./types.js";

const KEY_FORMAT =
  "Use format llm:<provider>:<model> (example: llm:ollama:qwen2.5:3b or llm:openrouter:deepseek/deepseek-r1-distill-qwen-14b).";

/** Parse `llm:<provider>:<model>`; the model part may itself contain colons. */
export function parseLlmAgentKey(key: string): LlmAgentDescriptor {
  if (!key.startsWith("llm:")) {
    throw new ConfigError(`Invalid LLM agent key "${key}". ${KEY_FORMAT}`);
  }
  const tokens = key.slice(4).split(":");
  const provider = tokens[0];
  const model = tokens.slice(1).join(":");
  if (!provider || !model) {
    throw new ConfigError(`Invalid LLM agent key "${key}". ${KEY_FORMAT}`);
  }
  if (!isLlmProvider(provider)) {
    throw new ConfigError(
      `Unknown LLM provider "${provider}" in "${key}". Available: ${LLM_PROVIDERS.join(", ")}`,
    );
  }
  return { kind: "llm", provider, model };
}
