import { describe, expect, it } from "vitest";
import { decodeChoice } from "../src/core/decodeChoice.js";

describe("decodeChoice", () => {
  it("reads the last matching tag", () => {
    const result = decodeChoice(
      "Maybe <personal_bet>2</personal_bet>... no, <personal_bet> 5 </personal_bet>",
      8,
      { tags: ["personal_bet"] },
    );
    expect(result).toMatchObject({ ok: true, value: 5, method: "tagged" });
  });

  it("tries tags in the order given", () => {
    const result = decodeChoice("<bet>1</bet>", 4, { tags: ["personal_bet", "bet"] });
    expect(result.value).toBe(1);
  });

  it("ignores anything inside reasoning blocks", () => {
    const text = "<think>I could say <action>7</action></think>\n<action>3</action>";
    expect(decodeChoice(text, 8, { tags: ["action"] })).toMatchObject({ ok: true, value: 3 });
  });

  it("accepts a reply that is only an integer", () => {
    expect(decodeChoice("  6\n", 8)).toMatchObject({ ok: true, value: 6, method: "bare-integer" });
  });

  it("reads direct JSON by key", () => {
    expect(decodeChoice('{"action": 4}', 8)).toMatchObject({
      ok: true,
      value: 4,
      method: "direct-json",
    });
  });

  it("reads fenced JSON", () => {
    const text = 'Here you go:\n```json\n{"bet": "2"}\n```';
    expect(decodeChoice(text, 8)).toMatchObject({ ok: true, value: 2, method: "fenced-json" });
  });

  it("extracts the first balanced object from prose", () => {
    const text = 'I will go with {"choice": 1, "why": "a {nested} brace"} today.';
    expect(decodeChoice(text, 8)).toMatchObject({ ok: true, value: 1, method: "brace-extract" });
  });

  it("honours the key list", () => {
    const result = decodeChoice('{"bet": 1, "action": 3}', 8, { keys: ["action"] });
    expect(result.value).toBe(3);
  });

  it("rejects values outside the action range", () => {
    const result = decodeChoice("<action>8</action>", 8, { tags: ["action"] });
    expect(result.ok).toBe(false);
    expect(result.failureReason).toBe("invalid-choice");
    expect(result.errors?.length).toBeGreaterThan(0);
  });

  it("rejects fractional values", () => {
    expect(decodeChoice('{"action": 2.5}', 8).failureReason).toBe("invalid-choice");
  });

  it("reports JSON without a usable key", () => {
    expect(decodeChoice('{"move": 2}', 8)).toMatchObject({
      ok: false,
      value: null,
      failureReason: "missing-choice-key",
    });
  });

  it("reports text with no choice at all", () => {
    expect(decodeChoice("I refuse to play.", 8)).toMatchObject({
      ok: false,
      method: "failed",
      failureReason: "no-choice-found",
    });
  });
});
