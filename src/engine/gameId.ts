import { randomUUID } from "node:crypto";

export const GAME_ID_PATTERN = /^g_[a-z0-9]{12}$/i;

/** Generate a deterministic game id from the RNG stream. */
export function generateGameId(rng: () => number): string {
  const chars = "abcdefghijklmnopqrstuvwxyz0123456789";
  let id = "g_";
  for (let i = 0; i < 12; i++) {
    id += chars[Math.floor(rng() * chars.length)];
  }
  return id;
}

/** Game ids name artifact directories, so only the generated shapes are accepted. */
export function isSafeGameId(gameId: string): boolean {
  return GAME_ID_PATTERN.test(gameId);
}

/** Identifies one tournament run in the rating store; reuse it to resume a run. */
export function createRunId(): string {
  return `r_${randomUUID().replace(/-/g, "")}`;
}
