import type { AgentId, ModelName } from "../contract/types.js";
import { ConfigError } from "../core/errors.js";

/** A named, fixed set of agents sharing one rating. Frozen at construction. */
export interface ModelGroup {
  readonly name: ModelName;
  readonly agentIds: readonly AgentId[];
}

export interface ModelGroupSpec {
  name: ModelName;
  count: number;
}

// Model names key plain objects in events and snapshots; assigning this key
// would set the prototype instead of a property.
const RESERVED_NAME = "__proto__";

/** Stable agent id for the `index`-th agent of a model. */
export function agentIdFor(model: ModelName, index: number): AgentId {
  return `${model}-${index}`;
}

/**
 * Resolve model specs into immutable groups. Every group must have the same
 * number of agents, otherwise per-model averages are not comparable.
 */
export function buildModelGroups(specs: readonly ModelGroupSpec[]): readonly ModelGroup[] {
  const issues: string[] = [];
  if (specs.length === 0) {
    issues.push("at least one model is required");
  }

  const names = new Set<ModelName>();
  for (const spec of specs) {
    if (names.has(spec.name)) {
      issues.push(`duplicate model name "${spec.name}"`);
    }
    names.add(spec.name);
    if (spec.name === RESERVED_NAME) {
      issues.push(`model name "${spec.name}" is reserved`);
    }
    if (!Number.isInteger(spec.count) || spec.count < 1) {
      issues.push(`model "${spec.name}" needs a positive integer agent count (got ${spec.count})`);
    }
  }

  const sizes = new Set(specs.map((spec) => spec.count));
  if (sizes.size > 1) {
    const detail = specs.map((spec) => `${spec.name}=${spec.count}`).join(", ");
    issues.push(`every model needs the same number of agents (${detail})`);
  }

  const groups = specs.map((spec) =>
    Object.freeze({
      name: spec.name,
      agentIds: Object.freeze(
        Array.from({ length: Math.max(0, spec.count) }, (_, i) => agentIdFor(spec.name, i)),
      ),
    }),
  );

  const seen = new Map<AgentId, ModelName>();
  for (const group of groups) {
    for (const agentId of group.agentIds) {
      const owner = seen.get(agentId);
      if (owner !== undefined && owner !== group.name) {
        issues.push(`agent id "${agentId}" is produced by both "${owner}" and "${group.name}"`);
      }
      seen.set(agentId, group.name);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError("Invalid model groups", issues);
  }
  return Object.freeze(groups);
}

/** Reverse lookup from agent id to the model it belongs to. */
export function indexAgentsByModel(groups: readonly ModelGroup[]): Map<AgentId, ModelName> {
  const index = new Map<AgentId, ModelName>();
  for (const group of groups) {
    for (const agentId of group.agentIds) {
      index.set(agentId, group.name);
    }
  }
  return index;
}
