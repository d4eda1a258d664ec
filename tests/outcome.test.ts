import { describe, expect, it } from "vitest";
import { relativeOutcome } from "../src/rating/outcome.js";

describe("relativeOutcome", () => {
  it("is 0.5 for equal scores, including two zeros", () => {
    expect(relativeOutcome(2, 2)).toBe(0.5);
    expect(relativeOutcome(0, 0)).toBe(0.5);
    expect(relativeOutcome(0, 0, "binary")).toBe(0.5);
  });

  it("uses the score share under the proportional policy", () => {
    expect(relativeOutcome(3, 1)).toBe(0.75);
    expect(relativeOutcome(1, 3)).toBe(0.25);
    expect(relativeOutcome(2, 0)).toBe(1);
  });

  it("only looks at the sign under the binary policy", () => {
    expect(relativeOutcome(3, 1, "binary")).toBe(1);
    expect(relativeOutcome(1, 3, "binary")).toBe(0);
  });

  it("falls back to comparison when a score is negative", () => {
    expect(relativeOutcome(-1, 1)).toBe(0);
    expect(relativeOutcome(1, -1)).toBe(1);
  });
});
