import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "../core/errors.js";
import { OUTCOME_POLICIES } from "../rating/outcome.js";

const ModelEntrySchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "model name must not be empty")
    .refine((name) => name !== "__proto__", { message: 'model name "__proto__" is reserved' }),
  /** Agent key: `random`, `baseline` or `llm:<provider>:<model>`. */
  agent: z.string().trim().min(1, "agent key must not be empty"),
  count: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxOutputTokens: z.number().int().positive().optional(),
});

export const TournamentConfigSchema = z.object({
  numActions: z.number().int("numActions must be an integer").min(2, "numActions must be at least 2"),
  numTurns: z.number().int("numTurns must be an integer").positive("numTurns must be positive"),
  agentsPerModel: z.number().int().positive(),
  models: z.array(ModelEntrySchema).min(1, "at least one model is required"),
  initialRating: z.number().finite().default(1000),
  kFactor: z.number().positive().default(32),
  scaleFactor: z.number().positive().default(400),
  includeSelfInBetBonus: z.boolean().default(false),
  outcomePolicy: z.enum(OUTCOME_POLICIES).default("proportional"),
  seed: z.number().int(),
  /** Unset falls back to MODGAME_AGENT_TIMEOUT_MS, then 30000. */
  agentTimeoutMs: z.number().int().positive().optional(),
  /** Unset falls back to MODGAME_MAX_CONCURRENCY, then 8. */
  maxConcurrency: z.number().int().positive().optional(),
  runId: z.string().trim().min(1).optional(),
  ratingsPath: z.string().min(1).optional(),
  outDir: z.string().min(1).optional(),
});

export type ModelEntry = z.infer<typeof ModelEntrySchema>;
/** Validated configuration with defaults applied. */
export type TournamentConfig = z.infer<typeof TournamentConfigSchema>;
/** What a caller writes: every defaulted field may be left out. */
export type TournamentConfigInput = z.input<typeof TournamentConfigSchema>;

/**
 * Validate a raw config object. Shape errors and cross-field problems are
 * reported together in a single ConfigError.
 */
export function parseTournamentConfig(raw: unknown): TournamentConfig {
  const parsed = TournamentConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid tournament config",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "$"}: ${issue.message}`),
    );
  }

  const config = parsed.data;
  const issues: string[] = [];
  const seen = new Set<string>();
  for (const model of config.models) {
    if (seen.has(model.name)) {
      issues.push(`models: duplicate model name "${model.name}"`);
    }
    seen.add(model.name);
    if (model.count !== undefined && model.count !== config.agentsPerModel) {
      issues.push(
        `models: "${model.name}" has count ${model.count} but agentsPerModel is ${config.agentsPerModel}`,
      );
    }
  }
  if (issues.length > 0) {
    throw new ConfigError("Invalid tournament config", issues);
  }
  return config;
}

export async function loadTournamentConfig(path: string): Promise<TournamentConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(error)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  return parseTournamentConfig(json);
}
