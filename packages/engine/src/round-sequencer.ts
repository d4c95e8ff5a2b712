import type {
  ActorDecision,
  BoardView,
  CaseId,
  CasePicker,
  Decision,
  GameEventListener,
  GameEventType,
  GameOutcome,
  GameResult,
  Money,
  OutcomeRecorder,
  SequencerState,
} from "@briefcase/schemas";
import { StateError } from "@briefcase/schemas";
import { PrizePool } from "./prize-pool.js";
import { RevealTracker } from "./reveal-tracker.js";
import { computeOffer } from "./offer-engine.js";
import type { RandomSource } from "./random.js";

export const DEFAULT_ROUND_SCHEDULE: readonly number[] = Object.freeze([6, 5, 4, 3, 2, 1, 1, 1, 1]);

export interface SequencerConfig {
  rng: RandomSource;
  prizePool?: PrizePool;
  /** Cases to open in each round, in order. */
  schedule?: readonly number[];
  recorder?: OutcomeRecorder;
  onEvent?: GameEventListener;
}

type SequencerStatus = SequencerState["status"];

const VALID_TRANSITIONS: Record<SequencerStatus, SequencerStatus[]> = {
  not_started: ["in_progress"],
  in_progress: ["concluded", "abandoned"],
  concluded: [],
  abandoned: [],
};

/**
 * Drives one game: fixed schedule of case openings, one offer per round,
 * and the terminal conditions. A sequencer plays a single game.
 */
export class RoundSequencer {
  private config: SequencerConfig;
  private schedule: readonly number[];
  private state: SequencerState = { status: "not_started" };
  private tracker: RevealTracker | null = null;
  private playerCase: CaseId = -1;
  private round = 0;
  private running = false;

  constructor(config: SequencerConfig) {
    this.config = config;
    this.schedule = config.schedule ?? DEFAULT_ROUND_SCHEDULE;
    for (const count of this.schedule) {
      if (!Number.isInteger(count) || count < 1) {
        throw new StateError(`Invalid round schedule entry: ${count}`);
      }
    }
  }

  getState(): SequencerState {
    return this.state;
  }

  getSchedule(): readonly number[] {
    return this.schedule;
  }

  /** Current board. Throws StateError before start(). */
  view(): BoardView {
    const tracker = this.requireTracker();
    return {
      round: this.round,
      playerCase: this.playerCase,
      opened: tracker.openedSet(),
      hiddenPrizes: tracker.hiddenPrizes(),
    };
  }

  /**
   * Reserve the player's case and deal a fresh shuffled assignment.
   */
  async start(playerCase: CaseId): Promise<void> {
    if (this.state.status !== "not_started") {
      throw new StateError(`Game already started (status: ${this.state.status})`);
    }
    const pool = this.config.prizePool ?? new PrizePool();
    const tracker = new RevealTracker(pool.deal(this.config.rng));
    if (!Number.isInteger(playerCase) || playerCase < 0 || playerCase >= tracker.caseCount) {
      throw new StateError(`Invalid player case: ${playerCase + 1}`);
    }
    this.tracker = tracker;
    this.playerCase = playerCase;
    this.round = 1;
    this.transition({ status: "in_progress", round: this.round });
    await this.emit("game.started", {
      player_case: playerCase,
      case_count: tracker.caseCount,
      schedule: [...this.schedule],
    });
  }

  /**
   * Play the scheduled rounds. `picker` chooses cases to open, `decide`
   * answers each offer. Any error abandons the game and is rethrown.
   */
  async run(picker: CasePicker, decide: ActorDecision): Promise<GameOutcome> {
    if (this.state.status !== "in_progress") {
      throw new StateError(`Cannot run a game in status ${this.state.status}; call start() first`);
    }
    if (this.running) throw new StateError("Game is already running");
    this.running = true;
    const tracker = this.requireTracker();

    try {
      for (const [index, toOpen] of this.schedule.entries()) {
        if (tracker.remainingCount() < 2) break;

        // round stays at the last one played once the schedule runs out
        this.round = index + 1;
        this.transition({ status: "in_progress", round: this.round });
        await this.emit("round.started", { round: this.round, to_open: toOpen });
        const ids = await picker.pickCases(this.view(), toOpen);
        await this.openCases(ids);

        if (tracker.remainingCount() < 2) break;

        const hidden = tracker.hiddenPrizes();
        const offer = computeOffer(hidden, this.round);
        await this.emit("offer.made", {
          round: this.round,
          offer,
          cases_remaining: hidden.length,
        });

        const decision: Decision = await decide(hidden, offer, hidden.length);
        await this.emit("decision.made", { round: this.round, decision, offer });
        if (decision === "accept") {
          return await this.conclude("deal", offer);
        }
      }

      return await this.conclude("no_deal", tracker.valueOf(this.playerCase));
    } catch (err) {
      if (this.state.status === "in_progress") {
        const message = err instanceof Error ? err.message : String(err);
        this.transition({ status: "abandoned", error: message });
        try {
          await this.emit("game.abandoned", { round: this.round, error: message });
        } catch (listenerErr) {
          console.error("[engine] game.abandoned listener failed:", listenerErr);
        }
      }
      throw err;
    } finally {
      this.running = false;
    }
  }

  private async openCases(ids: readonly CaseId[]): Promise<void> {
    const tracker = this.requireTracker();
    const seen = new Set<CaseId>();
    for (const id of ids) {
      if (id === this.playerCase) {
        throw new StateError(`Case ${id + 1} is the player's own case and cannot be opened`);
      }
      if (seen.has(id)) {
        throw new StateError(`Case ${id + 1} selected twice in round ${this.round}`);
      }
      if (tracker.isOpened(id)) {
        throw new StateError(`Case ${id + 1} already opened`);
      }
      seen.add(id);
    }
    for (const id of ids) {
      const value = tracker.openCase(id);
      await this.emit("case.opened", { round: this.round, case_id: id, value });
    }
  }

  private async conclude(result: GameResult, payout: Money): Promise<GameOutcome> {
    const tracker = this.requireTracker();
    const outcome: GameOutcome = {
      result,
      payout,
      playerCase: this.playerCase,
      playerCaseValue: tracker.valueOf(this.playerCase),
      round: this.round,
    };
    this.transition({ status: "concluded", outcome });
    this.config.recorder?.recordOutcome(payout);
    await this.emit("game.concluded", {
      result,
      payout,
      player_case: this.playerCase,
      player_case_value: outcome.playerCaseValue,
      round: this.round,
    });
    return outcome;
  }

  private transition(next: SequencerState): void {
    const current = this.state.status;
    if (current !== next.status && !VALID_TRANSITIONS[current].includes(next.status)) {
      throw new StateError(`Invalid game transition: ${current} → ${next.status}`);
    }
    this.state = next;
  }

  private requireTracker(): RevealTracker {
    if (!this.tracker) throw new StateError("Game has not started");
    return this.tracker;
  }

  private async emit(type: GameEventType, payload: Record<string, unknown>): Promise<void> {
    await this.config.onEvent?.(type, payload);
  }
}
