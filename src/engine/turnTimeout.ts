import type { GameEngineConfig } from "../contract/interfaces.js";

const DEFAULT_AGENT_TIMEOUT_MS = 30000;
const DEFAULT_MAX_CONCURRENCY = 8;

function resolveNumber(value: unknown): number | undefined {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return undefined;
  }
  const normalized = Math.floor(value);
  if (normalized <= 0) {
    return undefined;
  }
  return normalized;
}

function readEnvNumber(key: string): number | undefined {
  const raw = process.env[key];
  if (!raw || raw.trim().length === 0) {
    return undefined;
  }
  return resolveNumber(Number(raw));
}

/** Per-call limit for a single bet or action request. */
export function resolveAgentTimeoutMs(config: Pick<GameEngineConfig, "agentTimeoutMs">): number {
  return (
    resolveNumber(config.agentTimeoutMs) ??
    readEnvNumber("MODGAME_AGENT_TIMEOUT_MS") ??
    DEFAULT_AGENT_TIMEOUT_MS
  );
}

/** Cap on simultaneous in-flight agent calls within one phase. */
export function resolveMaxConcurrency(config: Pick<GameEngineConfig, "maxConcurrency">): number {
  return (
    resolveNumber(config.maxConcurrency) ??
    readEnvNumber("MODGAME_MAX_CONCURRENCY") ??
    DEFAULT_MAX_CONCURRENCY
  );
}
