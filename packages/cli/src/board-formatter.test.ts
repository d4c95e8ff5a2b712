import { describe, it, expect } from "vitest";
import type { BoardView, GameEvent } from "@briefcase/schemas";
import { evaluate } from "@briefcase/engine";
import {
  green, red, bold,
  RULE,
  formatMoney, formatRemainingPrizes, formatBoard, formatAdvice, formatStats, formatRules,
  formatGameEvent, formatGameSummary, formatJournalEvent,
} from "./board-formatter.js";

describe("ANSI helpers", () => {
  it("wrap with the expected codes", () => {
    expect(green("a")).toBe("\x1b[32ma\x1b[0m");
    expect(red("a")).toBe("\x1b[31ma\x1b[0m");
    expect(bold("a")).toBe("\x1b[1ma\x1b[0m");
  });
});

describe("formatMoney", () => {
  it("uses two decimals by default", () => {
    expect(formatMoney(0.01)).toBe("$0.01");
    expect(formatMoney(75000.0005)).toBe("$75000.00");
  });

  it("can drop cents", () => {
    expect(formatMoney(1000000, 0)).toBe("$1000000");
  });
});

describe("formatRemainingPrizes", () => {
  it("splits low prizes ascending from high prizes descending", () => {
    expect(formatRemainingPrizes([1000000, 750, 500, 100, 0.01])).toBe(
      "Low Prizes: $0.01 $100.00 $500.00\nHigh Prizes: $1000000 $750",
    );
  });

  it("keeps a prize equal to the threshold on the low side", () => {
    expect(formatRemainingPrizes([501, 500])).toBe("Low Prizes: $500.00\nHigh Prizes: $501");
  });

  it("leaves an empty side blank", () => {
    expect(formatRemainingPrizes([5, 1])).toBe("Low Prizes: $1.00 $5.00\nHigh Prizes: ");
  });
});

describe("formatBoard", () => {
  it("brackets the player's case and marks opened cases", () => {
    const opened = Array.from({ length: 26 }, (_, id) => id === 0 || id === 13);
    const view: BoardView = { round: 2, playerCase: 2, opened, hiddenPrizes: [1000, 1] };

    const firstRow = [" XX ", "  2 ", "[ 3]", "  4 ", "  5 ", "  6 ", "  7 ", "  8 ", "  9 ", " 10 ", " 11 ", " 12 ", " 13 "].join("");
    const secondRow = [" XX ", " 15 ", " 16 ", " 17 ", " 18 ", " 19 ", " 20 ", " 21 ", " 22 ", " 23 ", " 24 ", " 25 ", " 26 "].join("");

    expect(formatBoard(view)).toBe(
      `\n${bold("=== DEAL OR NO DEAL - ROUND 2 ===")}\n` +
      "Your Case: 3\n\nCases Status:\n" +
      `${firstRow}\n${secondRow}\n` +
      "\nRemaining Prizes:\nLow Prizes: $1.00\nHigh Prizes: $1000",
    );
  });
});

describe("formatAdvice", () => {
  it("recommends a deal when the advisor accepts", () => {
    const offer = 250;
    expect(formatAdvice(evaluate([300, 200, 100], offer, 3), offer)).toBe(
      "\n=== AI ADVISOR ===\n" +
      "Expected Value: $200.00\n" +
      "Bank Offer: $250.00\n" +
      "Offer vs Expected: 125.0%\n" +
      "Risk Level: 40.8%\n" +
      green("RECOMMENDATION: DEAL! The offer is favorable."),
    );
  });

  it("recommends no deal when the advisor rejects", () => {
    const text = formatAdvice(evaluate([300, 200, 100], 150, 3), 150);
    expect(text.split("\n")[4]).toBe("Offer vs Expected: 75.0%");
    expect(text.endsWith(red("RECOMMENDATION: NO DEAL! You can likely do better."))).toBe(true);
  });
});

describe("formatStats", () => {
  it("prints every aggregate", () => {
    expect(formatStats({
      gamesPlayed: 4,
      gamesWon: 3,
      totalWinnings: 1300,
      bestWinning: 1000,
      averageWinning: 325,
      winRate: 75,
    })).toBe(
      "\n=== GAME STATISTICS ===\n" +
      "Games Played: 4\n" +
      "Games Won: 3\n" +
      "Win Rate: 75.0%\n" +
      "Total Winnings: $1300.00\n" +
      "Best Winning: $1000.00\n" +
      "Average Winning: $325.00",
    );
  });
});

describe("formatRules", () => {
  it("numbers the seven rules between rule lines", () => {
    const lines = formatRules().split("\n");
    expect(lines[1]).toBe(RULE);
    expect(lines[4]).toBe("1. Choose your lucky case (1-26)");
    expect(lines[10]).toBe("7. Computer player uses the same advisor strategy");
    expect(lines[lines.length - 1]).toBe(RULE);
  });
});

describe("formatGameEvent", () => {
  it("announces the chosen case", () => {
    expect(formatGameEvent("game.started", { player_case: 4 }, "human")).toBe(
      "\nYou chose case 5!\nNow let's see what's in the other cases...",
    );
    expect(formatGameEvent("game.started", { player_case: 4 }, "computer")).toBe("Computer chose case 5");
  });

  it("prints round headers for the computer only", () => {
    expect(formatGameEvent("round.started", { round: 2 }, "human")).toBeNull();
    expect(formatGameEvent("round.started", { round: 2 }, "computer")).toBe("\n=== ROUND 2 ===");
  });

  it("reveals opened cases by display number", () => {
    expect(formatGameEvent("case.opened", { case_id: 0, value: 0.01 }, "computer")).toBe("Case 1 contained: $0.01");
  });

  it("shows offers", () => {
    expect(formatGameEvent("offer.made", { offer: 1234.5 }, "human")).toBe(
      `\n${RULE}\n${bold("THE BANK OFFERS: $1234.50")}\n${RULE}`,
    );
    expect(formatGameEvent("offer.made", { offer: 1234.5 }, "computer")).toBe("\nBank Offer: $1234.50");
  });

  it("shows computer decisions", () => {
    expect(formatGameEvent("decision.made", { decision: "accept" }, "computer")).toBe(green("Computer says: DEAL!"));
    expect(formatGameEvent("decision.made", { decision: "reject" }, "computer")).toBe("Computer says: NO DEAL!");
    expect(formatGameEvent("decision.made", { decision: "reject" }, "human")).toBeNull();
  });

  it("reports the outcome", () => {
    const deal = { result: "deal", payout: 500, player_case_value: 10 };
    const noDeal = { result: "no_deal", payout: 10, player_case_value: 10 };
    expect(formatGameEvent("game.concluded", deal, "human")).toBe(
      `\n${green("Congratulations! You won $500.00!")}\nYour case contained: $10.00`,
    );
    expect(formatGameEvent("game.concluded", deal, "computer")).toBe(
      "Computer won: $500.00\nComputer's case contained: $10.00",
    );
    expect(formatGameEvent("game.concluded", noDeal, "human")).toBe(
      "\nNo more deals! You're going home with your case!\nYour case contained: $10.00!",
    );
    expect(formatGameEvent("game.concluded", noDeal, "computer")).toBe("\nComputer's final case contained: $10.00!");
  });

  it("leaves abandonment to the caller", () => {
    expect(formatGameEvent("game.abandoned", { error: "x" }, "human")).toBeNull();
  });
});

describe("journal views", () => {
  it("summarises a game on one line", () => {
    expect(formatGameSummary({
      game_id: "g1",
      started_at: "2026-01-01T00:00:00.000Z",
      status: "deal",
      events: 12,
      payout: 500,
    })).toBe("g1  [deal]  12 events  2026-01-01T00:00:00.000Z  $500.00");
    expect(formatGameSummary({
      game_id: "g2",
      started_at: "2026-01-01T00:00:00.000Z",
      status: "in_progress",
      events: 3,
    })).toBe("g2  [in_progress]  3 events  2026-01-01T00:00:00.000Z");
  });

  it("prints an event with its payload indented", () => {
    const event: GameEvent = {
      event_id: "e1",
      timestamp: "2026-01-01T12:34:56.789Z",
      game_id: "g1",
      type: "case.opened",
      payload: { case_id: 2 },
    };
    expect(formatJournalEvent(event)).toBe(
      '[12:34:56.789] case.opened\n         {\n           "case_id": 2\n         }',
    );
    expect(formatJournalEvent({ ...event, type: "game.started", payload: {} })).toBe("[12:34:56.789] game.started");
  });
});
