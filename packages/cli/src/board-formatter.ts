// Pure formatting functions for the game CLI: no I/O, no state.

import type { BoardView, Evaluation, GameEvent, GameEventType, Money, StatsSummary } from "@briefcase/schemas";
import type { GameSummary } from "@briefcase/journal";
import { LOW_PRIZE_THRESHOLD } from "@briefcase/engine";

// ANSI color helpers
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const RULE = "=".repeat(50);
export const CASES_PER_ROW = 13;

export type PlayMode = "human" | "computer";

export function formatMoney(value: Money, decimals = 2): string {
  return `$${value.toFixed(decimals)}`;
}

// ─── Board ──────────────────────────────────────────────────────

/** Low prizes ascending with cents, high prizes descending without. */
export function formatRemainingPrizes(hiddenPrizes: readonly Money[]): string {
  const low = hiddenPrizes.filter((p) => p <= LOW_PRIZE_THRESHOLD).sort((a, b) => a - b);
  const high = hiddenPrizes.filter((p) => p > LOW_PRIZE_THRESHOLD).sort((a, b) => b - a);
  return [
    `Low Prizes: ${low.map((p) => formatMoney(p)).join(" ")}`,
    `High Prizes: ${high.map((p) => formatMoney(p, 0)).join(" ")}`,
  ].join("\n");
}

export function formatBoard(view: BoardView): string {
  const rows: string[] = [];
  let row = "";
  view.opened.forEach((opened, id) => {
    const label = String(id + 1).padStart(2, " ");
    if (id === view.playerCase) row += `[${label}]`;
    else if (opened) row += " XX ";
    else row += ` ${label} `;
    if ((id + 1) % CASES_PER_ROW === 0) {
      rows.push(row);
      row = "";
    }
  });
  if (row) rows.push(row);

  return [
    `\n${bold(`=== DEAL OR NO DEAL - ROUND ${view.round} ===`)}`,
    `Your Case: ${view.playerCase + 1}`,
    "\nCases Status:",
    ...rows,
    "\nRemaining Prizes:",
    formatRemainingPrizes(view.hiddenPrizes),
  ].join("\n");
}

// ─── Advisor ────────────────────────────────────────────────────

export function formatAdvice(evaluation: Evaluation, offer: Money): string {
  const recommendation = evaluation.recommendation === "accept"
    ? green("RECOMMENDATION: DEAL! The offer is favorable.")
    : red("RECOMMENDATION: NO DEAL! You can likely do better.");
  return [
    "\n=== AI ADVISOR ===",
    `Expected Value: ${formatMoney(evaluation.expectedValue)}`,
    `Bank Offer: ${formatMoney(offer)}`,
    `Offer vs Expected: ${(evaluation.offerRatio * 100).toFixed(1)}%`,
    `Risk Level: ${(evaluation.riskLevel * 100).toFixed(1)}%`,
    recommendation,
  ].join("\n");
}

// ─── Statistics & rules ─────────────────────────────────────────

export function formatStats(stats: StatsSummary): string {
  return [
    "\n=== GAME STATISTICS ===",
    `Games Played: ${stats.gamesPlayed}`,
    `Games Won: ${stats.gamesWon}`,
    `Win Rate: ${stats.winRate.toFixed(1)}%`,
    `Total Winnings: ${formatMoney(stats.totalWinnings)}`,
    `Best Winning: ${formatMoney(stats.bestWinning)}`,
    `Average Winning: ${formatMoney(stats.averageWinning)}`,
  ].join("\n");
}

export const RULES: readonly string[] = [
  "Choose your lucky case (1-26)",
  "Open other cases to reveal their prizes",
  "The bank will make offers based on remaining prizes",
  "Decide: DEAL (accept offer) or NO DEAL (continue)",
  "If you reject all offers, you win your case's prize",
  "AI Advisor provides recommendations",
  "Computer player uses the same advisor strategy",
];

export function formatRules(): string {
  return [
    `\n${RULE}`,
    "                 GAME RULES",
    RULE,
    ...RULES.map((rule, i) => `${i + 1}. ${rule}`),
    "\nPrizes range from $0.01 to $1,000,000",
    RULE,
  ].join("\n");
}

// ─── Game events ────────────────────────────────────────────────

function num(payload: Record<string, unknown>, key: string): number {
  const value = payload[key];
  return typeof value === "number" ? value : 0;
}

/** Terminal line(s) for a sequencer event, or null when the event prints nothing. */
export function formatGameEvent(
  type: GameEventType,
  payload: Record<string, unknown>,
  mode: PlayMode,
): string | null {
  const human = mode === "human";
  switch (type) {
    case "game.started": {
      const playerCase = num(payload, "player_case") + 1;
      return human
        ? `\nYou chose case ${playerCase}!\nNow let's see what's in the other cases...`
        : `Computer chose case ${playerCase}`;
    }
    case "round.started":
      // The human board is printed by the actor before it prompts
      return human ? null : `\n=== ROUND ${num(payload, "round")} ===`;
    case "case.opened":
      return `Case ${num(payload, "case_id") + 1} contained: ${formatMoney(num(payload, "value"))}`;
    case "offer.made": {
      const offer = formatMoney(num(payload, "offer"));
      return human ? `\n${RULE}\n${bold(`THE BANK OFFERS: ${offer}`)}\n${RULE}` : `\nBank Offer: ${offer}`;
    }
    case "decision.made":
      if (human) return null;
      return payload.decision === "accept" ? green("Computer says: DEAL!") : "Computer says: NO DEAL!";
    case "game.concluded": {
      const payout = formatMoney(num(payload, "payout"));
      const caseValue = formatMoney(num(payload, "player_case_value"));
      if (payload.result === "deal") {
        return human
          ? `\n${green(`Congratulations! You won ${payout}!`)}\nYour case contained: ${caseValue}`
          : `Computer won: ${payout}\nComputer's case contained: ${caseValue}`;
      }
      return human
        ? `\nNo more deals! You're going home with your case!\nYour case contained: ${caseValue}!`
        : `\nComputer's final case contained: ${caseValue}!`;
    }
    case "game.abandoned":
      return null;
  }
}

// ─── Journal views ──────────────────────────────────────────────

export function formatGameSummary(summary: GameSummary): string {
  const payout = summary.payout !== undefined ? `  ${formatMoney(summary.payout)}` : "";
  return `${summary.game_id}  [${summary.status}]  ${summary.events} events  ${summary.started_at}${payout}`;
}

export function formatJournalEvent(event: GameEvent): string {
  const ts = event.timestamp.split("T")[1]?.slice(0, 12) ?? "";
  const lines = [`[${ts}] ${event.type}`];
  if (Object.keys(event.payload).length > 0) {
    for (const line of JSON.stringify(event.payload, null, 2).split("\n")) lines.push(`         ${line}`);
  }
  return lines.join("\n");
}
