import { Command } from "commander";
import { v4 as uuid } from "uuid";
import type { GameEventListener, GameEventType, Logger } from "@briefcase/schemas";
import { CASE_COUNT, isGameError, parsePositiveInt } from "@briefcase/schemas";
import { RoundSequencer, RandomCasePicker, advisorDecision, createSeededRandom, cryptoRandom } from "@briefcase/engine";
import type { RandomSource } from "@briefcase/engine";
import { Journal, createLogger } from "@briefcase/journal";
import { StatsStore } from "@briefcase/stats";
import type { CliConfig } from "./config.js";
import { resolveSeed } from "./config.js";
import type { ClosableLineReader, Output } from "./human-actor.js";
import { HumanActor, createTerminalReader } from "./human-actor.js";
import type { PlayMode } from "./board-formatter.js";
import {
  formatGameEvent,
  formatGameSummary,
  formatJournalEvent,
  formatRules,
  formatStats,
  red,
} from "./board-formatter.js";

export interface ProgramDeps {
  config: CliConfig;
  out?: Output;
  createReader?: () => ClosableLineReader;
  logger?: Logger;
  /** Defaults to setting process.exitCode. */
  setExitCode?: (code: number) => void;
}

interface GameOptions {
  seed?: string;
  journal: boolean;
}

export function createProgram(deps: ProgramDeps): Command {
  const { config } = deps;
  const out: Output = deps.out ?? console.log;
  const logger = deps.logger ?? createLogger("briefcase");
  const createReader = deps.createReader ?? (() => createTerminalReader());
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });

  async function openStats(): Promise<StatsStore> {
    const stats = new StatsStore(config.statsPath, logger);
    await stats.load();
    return stats;
  }

  /** Journal failures never stop play; the game just goes unrecorded. */
  async function openJournal(enabled: boolean): Promise<Journal | null> {
    if (!enabled) return null;
    const journal = new Journal(config.journalPath);
    try {
      await journal.init();
      return journal;
    } catch (err) {
      logger.warn(`journal disabled: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  function createRandom(seedFlag: string | undefined): RandomSource {
    const seed = resolveSeed(seedFlag, config);
    return seed !== undefined ? createSeededRandom(seed) : cryptoRandom;
  }

  function eventListener(mode: PlayMode, journal: Journal | null, gameId: string): GameEventListener {
    return async (type: GameEventType, payload: Record<string, unknown>) => {
      const line = formatGameEvent(type, payload, mode);
      if (line !== null) out(line);
      if (journal) await journal.tryEmit(gameId, type, payload);
    };
  }

  function reportGameError(prefix: string, err: unknown): void {
    if (isGameError(err)) {
      out(red(`${prefix}: ${err.message}`));
    } else {
      out(red(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`));
    }
    setExitCode(1);
  }

  const program = new Command();
  program.name("briefcase").description("Case selection game with escalating bank offers").version("0.1.0");

  program.command("play").description("Play a game at the terminal")
    .option("--seed <n>", "Seed for a reproducible deal")
    .option("--no-journal", "Do not record the game in the journal")
    .action(async (opts: GameOptions) => {
      const rng = createRandom(opts.seed);
      const stats = await openStats();
      const journal = await openJournal(opts.journal);
      const reader = createReader();
      const gameId = uuid();
      const sequencer = new RoundSequencer({
        rng,
        recorder: stats,
        onEvent: eventListener("human", journal, gameId),
      });
      const human = new HumanActor(reader, out);
      try {
        await sequencer.start(await human.chooseCase());
        await sequencer.run(human, human.decide);
      } catch (err) {
        reportGameError("Game error", err);
      } finally {
        reader.close();
        await stats.save();
        await journal?.close();
      }
    });

  program.command("auto").description("Let the computer play using the advisor")
    .option("--seed <n>", "Seed for reproducible games")
    .option("--games <n>", "Number of games to play", "1")
    .option("--no-journal", "Do not record the games in the journal")
    .action(async (opts: GameOptions & { games: string }) => {
      const games = parsePositiveInt(opts.games, "games");
      if (!games.ok) throw games.error;
      const rng = createRandom(opts.seed);
      const stats = await openStats();
      const journal = await openJournal(opts.journal);
      const picker = new RandomCasePicker(rng);
      try {
        for (let i = 0; i < games.value; i++) {
          out("\nComputer Player is playing...");
          const sequencer = new RoundSequencer({
            rng,
            recorder: stats,
            onEvent: eventListener("computer", journal, uuid()),
          });
          try {
            await sequencer.start(rng.int(CASE_COUNT));
            await sequencer.run(picker, advisorDecision);
          } catch (err) {
            reportGameError("Computer game error", err);
          }
        }
        if (games.value > 1) out(formatStats(stats.getStats()));
      } finally {
        await stats.save();
        await journal?.close();
      }
    });

  const statsCmd = program.command("stats").description("Show statistics across games")
    .action(async () => {
      const stats = await openStats();
      out(formatStats(stats.getStats()));
    });

  statsCmd.command("reset").description("Delete all recorded statistics")
    .action(async () => {
      const stats = new StatsStore(config.statsPath, logger);
      try {
        await stats.reset();
        out("Statistics reset successfully!");
      } catch (err) {
        logger.warn(`could not delete statistics file: ${err instanceof Error ? err.message : String(err)}`);
        setExitCode(1);
      }
    });

  program.command("rules").description("Show the game rules").action(() => {
    out(formatRules());
  });

  program.command("history").description("List games recorded in the journal").action(async () => {
    const journal = new Journal(config.journalPath);
    await journal.init();
    const games = journal.listGames();
    if (games.length === 0) { out("No games found."); return; }
    for (const game of games) out(formatGameSummary(game));
  });

  program.command("replay").description("Print the recorded events of one game").argument("<gameId>", "Game ID")
    .action(async (gameId: string) => {
      const journal = new Journal(config.journalPath);
      await journal.init();
      const events = journal.readGame(gameId);
      if (events.length === 0) { out(`No events found for game ${gameId}`); return; }
      out(`Replaying game ${gameId}\n${events.length} events\n`);
      for (const event of events) out(formatJournalEvent(event));
      const integrity = await journal.verifyIntegrity();
      out(`\nJournal integrity: ${integrity.valid ? "OK" : `BROKEN at event ${integrity.brokenAt}`}`);
    });

  return program;
}
