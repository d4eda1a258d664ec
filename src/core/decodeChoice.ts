import { z, type ZodIssue } from "zod";

export type DecodeMethod =
  | "tagged"
  | "direct-json"
  | "fenced-json"
  | "brace-extract"
  | "bare-integer"
  | "failed";

export interface DecodeChoiceResult {
  ok: boolean;
  value: number | null;
  method: DecodeMethod;
  warnings: string[];
  errors: ZodIssue[] | null;
  failureReason: string | null;
}

export interface DecodeChoiceOptions {
  /** XML-style tags to look for, most specific first (e.g. ["personal_bet", "bet"]). */
  tags?: string[];
  /** JSON keys that may carry the choice, checked in order. */
  keys?: string[];
  maxScanBytes?: number;
  maxBraceDepth?: number;
}

export const DEFAULT_CHOICE_KEYS = ["choice", "bet", "action", "value"];

type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

const tryParseJson = (text: string): JsonParseResult => {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : "parse error" };
  }
};

/** Reasoning models wrap their chain of thought in <think> blocks; it is never the answer. */
const stripReasoning = (text: string): string =>
  text.replace(/<think>[\s\S]*?<\/think>/gi, "").trim();

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const extractTagged = (text: string, tags: string[]): string | null => {
  for (const tag of tags) {
    const name = escapeRegExp(tag);
    const pattern = new RegExp(`<${name}>\\s*([^<]*?)\\s*</${name}>`, "gi");
    const matches = [...text.matchAll(pattern)];
    const last = matches[matches.length - 1];
    if (last?.[1] !== undefined) {
      return last[1];
    }
  }
  return null;
};

const extractFencedContent = (
  text: string,
): { content: string; method: DecodeMethod } | null => {
  const jsonFence = text.match(/```json\s*([\s\S]*?)```/i);
  if (jsonFence?.[1] !== undefined) {
    return { content: jsonFence[1].trim(), method: "fenced-json" };
  }
  return null;
};

const limitByBytes = (text: string, maxBytes: number): { text: string; truncated: boolean } => {
  const bytes = Buffer.from(text, "utf-8");
  if (bytes.length <= maxBytes) {
    return { text, truncated: false };
  }
  return { text: bytes.subarray(0, maxBytes).toString("utf-8"), truncated: true };
};

const extractBalancedBraces = (
  text: string,
  maxScanBytes: number,
  maxBraceDepth: number,
): { json: string | null; truncated: boolean; exceededDepth: boolean } => {
  const { text: scanText, truncated } = limitByBytes(text, maxScanBytes);
  let depth = 0;
  let startIndex = -1;
  let inString = false;
  let escape = false;
  for (let i = 0; i < scanText.length; i += 1) {
    const ch = scanText[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (ch === "\\" && inString) {
      escape = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) {
      continue;
    }
    if (ch === "{") {
      if (depth === 0) {
        startIndex = i;
      }
      depth += 1;
      if (depth > maxBraceDepth) {
        return { json: null, truncated, exceededDepth: true };
      }
      continue;
    }
    if (ch === "}") {
      if (depth === 0) {
        continue;
      }
      depth -= 1;
      if (depth === 0 && startIndex >= 0) {
        return { json: scanText.slice(startIndex, i + 1), truncated, exceededDepth: false };
      }
    }
  }
  return { json: null, truncated, exceededDepth: false };
};

const IntegerText = /^[-+]?\d+$/;

/** Pull a numeric candidate out of a parsed JSON payload. */
const pickCandidate = (payload: unknown, keys: string[]): unknown => {
  if (typeof payload === "number" || typeof payload === "string") {
    return payload;
  }
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    return undefined;
  }
  const record = payload as Record<string, unknown>;
  for (const key of keys) {
    if (key in record) {
      return record[key];
    }
  }
  return undefined;
};

const toNumber = (candidate: unknown): unknown => {
  if (typeof candidate === "string" && IntegerText.test(candidate.trim())) {
    return Number(candidate.trim());
  }
  return candidate;
};

/**
 * Decode an integer choice in [0, numActions) from free-form model output.
 *
 * Tried in order: the last matching XML tag, a response that is only an
 * integer, then JSON (direct, fenced, or the first balanced object in prose).
 * Never throws; callers decide what a failed decode means.
 */
export function decodeChoice(
  rawText: string,
  numActions: number,
  opts?: DecodeChoiceOptions,
): DecodeChoiceResult {
  const warnings: string[] = [];
  const {
    tags = [],
    keys = DEFAULT_CHOICE_KEYS,
    maxScanBytes = 10_000,
    maxBraceDepth = 8,
  } = opts ?? {};
  const schema = z.number().int().min(0).max(numActions - 1);
  const text = stripReasoning(rawText);

  let method: DecodeMethod = "failed";
  let candidate: unknown;

  const tagged = extractTagged(text, tags);
  if (tagged !== null) {
    method = "tagged";
    candidate = tagged;
  } else if (IntegerText.test(text)) {
    method = "bare-integer";
    candidate = text;
  } else {
    const fenced = extractFencedContent(text);
    let jsonMethod: DecodeMethod = fenced ? fenced.method : "direct-json";
    let parsed = tryParseJson(fenced ? fenced.content : text);
    if (!parsed.ok) {
      const braceResult = extractBalancedBraces(text, maxScanBytes, maxBraceDepth);
      if (braceResult.truncated) {
        warnings.push("Input truncated during brace scan.");
      }
      if (braceResult.exceededDepth) {
        warnings.push("Brace scan exceeded max depth.");
      }
      if (braceResult.json) {
        jsonMethod = "brace-extract";
        parsed = tryParseJson(braceResult.json);
      }
    }
    if (parsed.ok) {
      method = jsonMethod;
      candidate = pickCandidate(parsed.value, keys);
    }
  }

  if (method === "failed" || candidate === undefined) {
    return {
      ok: false,
      value: null,
      method: "failed",
      warnings,
      errors: null,
      failureReason: method === "failed" ? "no-choice-found" : "missing-choice-key",
    };
  }

  const result = schema.safeParse(toNumber(candidate));
  if (result.success) {
    return { ok: true, value: result.data, method, warnings, errors: null, failureReason: null };
  }

  return {
    ok: false,
    value: null,
    method,
    warnings,
    errors: result.error.issues,
    failureReason: "invalid-choice",
  };
}
