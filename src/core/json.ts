import type { JsonValue } from "../contract/types.js";

function assertJsonValue(value: unknown, path = "$"): asserts value is JsonValue {
  if (value === null) {
    return;
  }

  const type = typeof value;
  if (type === "string" || type === "boolean") {
    return;
  }

  if (type === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid JSON value at ${path}: non-finite number`);
    }
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => assertJsonValue(item, `${path}[${index}]`));
    return;
  }

  if (type === "object") {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      throw new Error(`Invalid JSON object at ${path}: non-plain object`);
    }
    for (const [key, nested] of Object.entries(value as Record<string, unknown>)) {
      assertJsonValue(nested, `${path}.${key}`);
    }
    return;
  }

  throw new Error(`Invalid JSON value at ${path}: ${type}`);
}

function render(value: JsonValue, indent: string, depth: number): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  const pad = indent ? `\n${indent.repeat(depth + 1)}` : "";
  const close = indent ? `\n${indent.repeat(depth)}` : "";
  const colon = indent ? ": " : ":";

  if (Array.isArray(value)) {
    if (value.length === 0) {
      return "[]";
    }
    const items = value.map((item) => pad + render(item, indent, depth + 1));
    return `[${items.join(",")}${close}]`;
  }

  const keys = Object.keys(value).sort();
  if (keys.length === 0) {
    return "{}";
  }
  const items = keys.map(
    (key) => `${pad}${JSON.stringify(key)}${colon}${render(value[key], indent, depth + 1)}`,
  );
  return `{${items.join(",")}${close}}`;
}

/**
 * Deterministic JSON serialization with stable key ordering.
 * Validates unknown input at runtime before serialization; pass `indent`
 * for files meant to be read by people (the rating store).
 */
export function stableStringify(value: unknown, indent = ""): string {
  assertJsonValue(value);
  return render(value, indent, 0);
}

/** Render JSONL with stable serialization, always ending in a newline. */
export function toStableJsonl(values: unknown[]): string {
  return values.map((value) => stableStringify(value)).join("\n") + "\n";
}
