import type { ActionObservation, BetObservation, RubricConfig } from "../../contract/interfaces.js";
import type { AgentId } from "../../contract/types.js";

export const BET_TAGS = ["personal_bet", "bet"];
export const ACTION_TAGS = ["action"];

function betRule(rubric: RubricConfig): string {
  return rubric.includeSelfInBetBonus
    ? "- +0.5 points for every player who placed the same bet as you, your own bet included."
    : "- +0.5 points for every other player who placed the same bet as you.";
}

/** Game rules, rendered once per agent at init. */
export function buildSystemPrompt(numActions: number, rubric: RubricConfig): string {
  const max = numActions - 1;
  return [
    "You are one of several players in a repeated coordination game.",
    "",
    "Each round has two steps:",
    `1. Every player secretly places a public bet: an integer from 0 to ${max}.`,
    "   All bets are revealed together once everyone has bet.",
    `2. Every player then secretly chooses an action: an integer from 0 to ${max}.`,
    "",
    "Scoring for each round:",
    "- +1 point for every other player who chose the same action as you.",
    betRule(rubric),
    "",
    "After each round you see every player's action. Your goal is the highest total score.",
    "",
    "When asked for a bet, reply with <personal_bet>N</personal_bet>.",
    "When asked for an action, reply with <action>N</action>.",
    "Think as long as you like, but end your reply with exactly one of those tags.",
  ].join("\n");
}

function formatChoices(values: Readonly<Record<AgentId, number>>, self: AgentId): string {
  return Object.entries(values)
    .map(([agentId, value]) => `- ${agentId}${agentId === self ? " (you)" : ""}: ${value}`)
    .join("\n");
}

export function formatBetPrompt(observation: BetObservation, self: AgentId): string {
  const lines = [`Round ${observation.turn + 1}. Your total score: ${observation.cumulativeScore}.`];
  const previous = observation.history[observation.history.length - 1];
  if (previous) {
    lines.push(`Last round you scored ${previous.score}.`);
  }
  if (observation.lastRoundActions) {
    lines.push("", "Actions chosen last round:", formatChoices(observation.lastRoundActions, self));
  }
  lines.push("", "Place your bet as <personal_bet>N</personal_bet>.");
  return lines.join("\n");
}

export function formatActionPrompt(observation: ActionObservation, self: AgentId): string {
  return [
    `Round ${observation.turn + 1}. All bets are in:`,
    formatChoices(observation.bets, self),
    "",
    "Choose your action as <action>N</action>.",
  ].join("\n");
}
