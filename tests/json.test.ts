import { describe, expect, it } from "vitest";
import { stableStringify, toStableJsonl } from "../src/core/json.js";

describe("stableStringify", () => {
  it("orders object keys deterministically", () => {
    expect(stableStringify({ b: 1, a: 2 })).toBe('{"a":2,"b":1}');
  });

  it("pretty prints with sorted keys when given an indent", () => {
    expect(stableStringify({ b: [1], a: {} }, "  ")).toBe('{\n  "a": {},\n  "b": [\n    1\n  ]\n}');
  });

  it("rejects non-JSON values", () => {
    expect(() => stableStringify({ ok: true, nope: undefined })).toThrow("Invalid JSON value");
  });

  it("rejects non-finite numbers", () => {
    expect(() => stableStringify(NaN)).toThrow("non-finite number");
  });
});

describe("toStableJsonl", () => {
  it("serializes unknown inputs with a trailing newline", () => {
    expect(toStableJsonl([{ b: 1, a: 2 }, [3]])).toBe('{"a":2,"b":1}\n[3]\n');
  });
});
