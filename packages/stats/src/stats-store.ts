import { readFile, mkdir, open, rename, rm } from "node:fs/promises";
import { dirname } from "node:path";
import type { GameStats, Logger, Money, OutcomeRecorder, StatsSummary } from "@briefcase/schemas";
import { validateGameStatsData } from "@briefcase/schemas";
import { createLogger } from "@briefcase/journal";

function emptyStats(): GameStats {
  return { gamesPlayed: 0, gamesWon: 0, totalWinnings: 0, bestWinning: 0 };
}

/**
 * Aggregate results across games, kept in a single JSON document.
 * Read and write failures are logged and never end a game.
 */
export class StatsStore implements OutcomeRecorder {
  private filePath: string;
  private logger: Logger;
  private stats: GameStats = emptyStats();
  private writeLock: Promise<void> = Promise.resolve();

  constructor(filePath: string, logger?: Logger) {
    this.filePath = filePath;
    this.logger = logger ?? createLogger("stats");
  }

  async load(): Promise<GameStats> {
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      this.stats = emptyStats();
      if (!isMissingFile(err)) {
        this.logger.warn(`could not read ${this.filePath}, starting from zero`, { error: errorMessage(err) });
      }
      return this.getStats();
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      this.stats = emptyStats();
      this.logger.warn(`${this.filePath} is not valid JSON, starting from zero`, { error: errorMessage(err) });
      return this.getStats();
    }

    const validation = validateGameStatsData(data);
    if (!validation.valid || !isGameStats(data)) {
      this.stats = emptyStats();
      this.logger.warn(`${this.filePath} failed validation, starting from zero`, { errors: validation.errors });
      return this.getStats();
    }
    if (data.gamesWon > data.gamesPlayed) {
      this.stats = emptyStats();
      this.logger.warn(`${this.filePath} records more wins than games, starting from zero`);
      return this.getStats();
    }

    this.stats = {
      gamesPlayed: data.gamesPlayed,
      gamesWon: data.gamesWon,
      totalWinnings: data.totalWinnings,
      bestWinning: data.bestWinning,
    };
    return this.getStats();
  }

  /** Write atomically via tmp + rename. Returns false when the write failed. */
  async save(): Promise<boolean> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const content = JSON.stringify({ ...this.stats, updatedAt: new Date().toISOString() }, null, 2) + "\n";
      const tmpPath = this.filePath + ".tmp";
      const fh = await open(tmpPath, "w");
      try {
        await fh.writeFile(content, "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      await rename(tmpPath, this.filePath);
      return true;
    } catch (err) {
      this.logger.warn(`could not save statistics to ${this.filePath}`, { error: errorMessage(err) });
      return false;
    } finally {
      releaseLock();
    }
  }

  /** Zero the counters and remove the file. */
  async reset(): Promise<void> {
    this.stats = emptyStats();
    await this.writeLock;
    await rm(this.filePath, { force: true });
  }

  recordOutcome(payout: Money): void {
    this.stats.gamesPlayed++;
    this.stats.totalWinnings += payout;
    if (payout > this.stats.bestWinning) this.stats.bestWinning = payout;
    if (payout > 0) this.stats.gamesWon++;
  }

  getStats(): StatsSummary {
    const { gamesPlayed, gamesWon, totalWinnings } = this.stats;
    return {
      ...this.stats,
      averageWinning: gamesPlayed > 0 ? totalWinnings / gamesPlayed : 0,
      winRate: gamesPlayed > 0 ? (gamesWon / gamesPlayed) * 100 : 0,
    };
  }
}

function isGameStats(data: unknown): data is GameStats {
  return (
    typeof data === "object" && data !== null &&
    "gamesPlayed" in data && typeof data.gamesPlayed === "number" &&
    "gamesWon" in data && typeof data.gamesWon === "number" &&
    "totalWinnings" in data && typeof data.totalWinnings === "number" &&
    "bestWinning" in data && typeof data.bestWinning === "number"
  );
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
