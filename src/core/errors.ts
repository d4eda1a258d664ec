import type { AgentErrorType } from "../contract/types.js";

/** An agent failed to produce a usable bet or action. Recovered per agent. */
export class AgentResponseError extends Error {
  readonly kind: AgentErrorType;

  constructor(message: string, kind: AgentErrorType = "invalid") {
    super(message);
    this.name = "AgentResponseError";
    this.kind = kind;
  }
}

/** The tournament configuration cannot be run. Fatal before turn 1. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Reading or writing the rating store failed. */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

/** A sealed round is missing agents or holds values it should not. */
export class RoundIntegrityError extends Error {
  readonly turn: number;
  readonly problems: string[];

  constructor(turn: number, problems: string[]) {
    super(`Round ${turn} failed integrity check: ${problems.join("; ")}`);
    this.name = "RoundIntegrityError";
    this.turn = turn;
    this.problems = problems;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
