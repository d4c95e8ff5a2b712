/**
 * Briefcase Core Types
 *
 * Canonical data models shared by the engine, the journal, the stats store
 * and the CLI.
 */

// ─── Money & Cases ──────────────────────────────────────────────────

/** Dollar amount. */
export type Money = number;

/** Zero-based case identifier (0..25). Players see `id + 1`. */
export type CaseId = number;

export const CASE_COUNT = 26;

// ─── Decisions ──────────────────────────────────────────────────────

export type Decision = "accept" | "reject";

export type AdvisorTier = "early" | "mid" | "late" | "none";

export interface Evaluation {
  expectedValue: Money;
  stdDeviation: number;
  probabilityExceedsOffer: number;
  riskFactor: number;
  /** offer / expectedValue, 0 when nothing is left. */
  offerRatio: number;
  /** stdDeviation / expectedValue, 0 when nothing is left. */
  riskLevel: number;
  tier: AdvisorTier;
  recommendation: Decision;
}

/**
 * The shape shared by the scripted advisor and a human prompt.
 * Human actors resolve asynchronously, so a promise is accepted too.
 */
export type ActorDecision = (
  hiddenPrizes: readonly Money[],
  offer: Money,
  casesRemaining: number,
) => Decision | Promise<Decision>;

// ─── Game state ─────────────────────────────────────────────────────

export interface BoardView {
  round: number;
  playerCase: CaseId;
  opened: readonly boolean[];
  hiddenPrizes: readonly Money[];
}

export interface CasePicker {
  pickCases(view: BoardView, count: number): CaseId[] | Promise<CaseId[]>;
}

export type GameResult = "deal" | "no_deal";

export interface GameOutcome {
  result: GameResult;
  payout: Money;
  playerCase: CaseId;
  playerCaseValue: Money;
  /** Round in which the game concluded. */
  round: number;
}

export type SequencerState =
  | { status: "not_started" }
  | { status: "in_progress"; round: number }
  | { status: "concluded"; outcome: GameOutcome }
  | { status: "abandoned"; error: string };

export interface OutcomeRecorder {
  recordOutcome(payout: Money): void;
}

// ─── Statistics ─────────────────────────────────────────────────────

export interface GameStats {
  gamesPlayed: number;
  gamesWon: number;
  totalWinnings: Money;
  bestWinning: Money;
}

export interface StatsSummary extends GameStats {
  averageWinning: Money;
  /** Percentage of games with a positive payout. */
  winRate: number;
}

// ─── Journal ────────────────────────────────────────────────────────

export type GameEventType =
  | "game.started"
  | "round.started"
  | "case.opened"
  | "offer.made"
  | "decision.made"
  | "game.concluded"
  | "game.abandoned";

export interface GameEvent {
  event_id: string;
  timestamp: string;
  game_id: string;
  type: GameEventType;
  payload: Record<string, unknown>;
  hash_prev?: string;
  seq?: number;
}

export type GameEventListener = (
  type: GameEventType,
  payload: Record<string, unknown>,
) => void | Promise<void>;

// ─── Logging ────────────────────────────────────────────────────────

export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
