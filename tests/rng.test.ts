import { describe, expect, it } from "vitest";
import { createRng, deriveNamedSeed, deriveSeed, randomChoice, randomInt } from "../src/core/rng.js";

describe("Deterministic RNG", () => {
  it("same seed produces same sequence", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("output is in [0, 1)", () => {
    const rng = createRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("randomInt returns values within bounds (inclusive)", () => {
    const rng = createRng(99);
    for (let i = 0; i < 500; i++) {
      const v = randomInt(rng, 5, 10);
      expect(v).toBeGreaterThanOrEqual(5);
      expect(v).toBeLessThanOrEqual(10);
      expect(Number.isInteger(v)).toBe(true);
    }
  });

  it("randomChoice covers every legal action and nothing else", () => {
    const rng = createRng(5);
    const seen = new Set<number>();
    for (let i = 0; i < 400; i++) {
      seen.add(randomChoice(rng, 4));
    }
    expect([...seen].sort()).toEqual([0, 1, 2, 3]);
  });

  it("deriveSeed produces different seeds from different parents", () => {
    expect(deriveSeed(createRng(1))).not.toBe(deriveSeed(createRng(2)));
  });

  it("deriveNamedSeed is stable per label and differs across labels", () => {
    expect(deriveNamedSeed(7, "fallback:a-0")).toBe(deriveNamedSeed(7, "fallback:a-0"));
    expect(deriveNamedSeed(7, "fallback:a-0")).not.toBe(deriveNamedSeed(7, "fallback:a-1"));
    expect(deriveNamedSeed(7, "x")).not.toBe(deriveNamedSeed(8, "x"));
  });
});
