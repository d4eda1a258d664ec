import { describe, expect, it } from "vitest";
import type { ActionObservation, BetObservation } from "../src/contract/interfaces.js";
import { createBaselineAgent, mostPopular } from "../src/agents/baselineAgent.js";
import { createRandomAgent } from "../src/agents/randomAgent.js";
import { createScriptedAgent } from "../src/agents/scriptedAgent.js";
import { createRng } from "../src/core/rng.js";

const betObservation: BetObservation = {
  turn: 1,
  numActions: 5,
  cumulativeScore: 0,
  history: [],
  lastRoundActions: { a: 4, b: 2, c: 4, d: 1 },
};

const actionObservation: ActionObservation = {
  ...betObservation,
  bets: { a: 3, b: 1, c: 1, d: 3 },
};

const ctx = { rng: createRng(1), turn: 1, agentId: "a" };

describe("mostPopular", () => {
  it("breaks ties toward the smaller value", () => {
    expect(mostPopular({ a: 3, b: 1, c: 1, d: 3 })).toBe(1);
    expect(mostPopular({ a: 2 })).toBe(2);
    expect(mostPopular({})).toBeNull();
  });
});

describe("baseline agent", () => {
  it("bets on last round's most popular action and plays the most popular bet", () => {
    const agent = createBaselineAgent("a");
    expect(agent.bet(betObservation, ctx)).toBe(4);
    expect(agent.act(actionObservation, ctx)).toBe(1);
  });

  it("opens with 0 before any round has been played", () => {
    const agent = createBaselineAgent("a");
    expect(agent.bet({ ...betObservation, turn: 0, lastRoundActions: null }, ctx)).toBe(0);
  });
});

describe("random agent", () => {
  it("draws legal values from the seeded context RNG", () => {
    const agent = createRandomAgent("a");
    const first = Array.from({ length: 20 }, () => agent.bet(betObservation, { ...ctx, rng: createRng(9) }));
    const rng = createRng(9);
    const second = Array.from({ length: 20 }, () => agent.act(actionObservation, { ...ctx, rng }));
    expect(first.every((value) => value === first[0])).toBe(true);
    expect(second.every((value) => Number.isInteger(value) && value >= 0 && value < 5)).toBe(true);
  });
});

describe("scripted agent", () => {
  it("cycles through its script and restarts on init", () => {
    const agent = createScriptedAgent("a", { bets: [1, 2], actions: [0] });
    expect([agent.bet(betObservation, ctx), agent.bet(betObservation, ctx), agent.bet(betObservation, ctx)]).toEqual([
      1, 2, 1,
    ]);
    agent.init({ agentId: "a", model: "m", seed: 1, numActions: 5, rubric: { includeSelfInBetBonus: false } });
    expect(agent.bet(betObservation, ctx)).toBe(1);
    expect(agent.act(actionObservation, ctx)).toBe(0);
  });

  it("refuses an empty script", () => {
    expect(() => createScriptedAgent("a", { bets: [], actions: [1] })).toThrow("needs at least one bet");
  });
});
