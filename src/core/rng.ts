import type { Seed } from "../contract/types.js";

/**
 * Mulberry32: a small seedable 32-bit PRNG.
 * Returns a function that produces numbers in [0, 1).
 *
 * Fallback values and scripted agents draw from this, never from Math.random,
 * so a game replays identically from its seed.
 */
export function createRng(seed: Seed): () => number {
  let s = seed | 0;
  return (): number => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded random integer in [min, max] (inclusive). */
export function randomInt(rng: () => number, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

/** Uniformly sampled legal choice in [0, numActions). */
export function randomChoice(rng: () => number, numActions: number): number {
  return randomInt(rng, 0, numActions - 1);
}

/** Derive a child seed from a parent RNG stream. */
export function deriveSeed(rng: () => number): Seed {
  return (rng() * 4294967296) | 0;
}

/** 32-bit FNV-1a hash. */
function fnv1a32(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Derive a stable seed from a parent seed and a label (e.g. an agent id). */
export function deriveNamedSeed(seed: Seed, label: string): Seed {
  return fnv1a32(`${seed}:${label}`);
}
