import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, open } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { GameEvent, GameEventType } from "@briefcase/schemas";
import { validateGameEventData } from "@briefcase/schemas";

export interface JournalOptions {
  fsync?: boolean;
  /** How to handle corruption on init. "truncate" (default) auto-repairs; "strict" throws. */
  recovery?: "truncate" | "strict";
}

export type JournalListener = (event: GameEvent) => void;

export interface GameSummary {
  game_id: string;
  started_at: string;
  status: string;
  events: number;
  payout?: number;
}

/**
 * Append-only JSONL log of game events. Each line carries the SHA-256 of the
 * previous line in `hash_prev`, so edits to history are detectable.
 */
export class Journal {
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private gameIndex = new Map<string, GameEvent[]>();
  private nextSeq = 0;
  private fsync: boolean;
  private recovery: "truncate" | "strict";

  constructor(filePath: string, options?: JournalOptions) {
    this.filePath = filePath;
    this.fsync = options?.fsync ?? true;
    this.recovery = options?.recovery ?? "truncate";
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    const last = lines[lines.length - 1];
    if (last !== undefined && !isJson(last)) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      console.error("[journal] truncated incomplete last line");
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const tempIndex = new Map<string, GameEvent[]>();
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i]!;
      const event = JSON.parse(line) as GameEvent;
      if (i > 0 && event.hash_prev !== prevHash) {
        if (this.recovery === "strict") {
          throw new Error(`Journal integrity violation at event ${i} (seq=${event.seq}): hash chain broken`);
        }
        console.error(`[journal] recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
        const tmpPath = `${this.filePath}.tmp`;
        const validLines = lines.slice(0, i);
        await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
        await rename(tmpPath, this.filePath);
        break;
      }
      prevHash = this.hash(line);
      const bucket = tempIndex.get(event.game_id);
      if (bucket) bucket.push(event);
      else tempIndex.set(event.game_id, [event]);
      if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
    }

    this.gameIndex = tempIndex;
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(gameId: string, type: GameEventType, payload: Record<string, unknown>): Promise<GameEvent> {
    let releaseLock: () => void = () => {};
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const seq = this.nextSeq;
      const event: GameEvent = {
        event_id: uuid(),
        timestamp: new Date().toISOString(),
        game_id: gameId,
        type,
        payload,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateGameEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      // In-memory state only moves after the line is on disk
      this.nextSeq = seq + 1;
      this.lastHash = lineHash;
      const bucket = this.gameIndex.get(gameId);
      if (bucket) bucket.push(event);
      else this.gameIndex.set(gameId, [event]);

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error("[journal] listener failed:", err);
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** emit() that reports failure as null instead of throwing. */
  async tryEmit(gameId: string, type: GameEventType, payload: Record<string, unknown>): Promise<GameEvent | null> {
    try {
      return await this.emit(gameId, type, payload);
    } catch (err) {
      console.warn(`[journal] could not record ${type}: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<GameEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events = content.trim().split("\n").filter(Boolean)
      .map((line) => JSON.parse(line) as GameEvent);
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readGame(gameId: string): GameEvent[] {
    return [...(this.gameIndex.get(gameId) ?? [])];
  }

  /** One entry per game, oldest first. */
  listGames(): GameSummary[] {
    const out: GameSummary[] = [];
    for (const [gameId, events] of this.gameIndex) {
      const first = events[0];
      if (!first) continue;
      let status = "in_progress";
      let payout: number | undefined;
      for (const event of events) {
        if (event.type === "game.concluded") {
          status = String(event.payload.result ?? "concluded");
          payout = typeof event.payload.payout === "number" ? event.payload.payout : undefined;
        } else if (event.type === "game.abandoned") {
          status = "abandoned";
        }
      }
      out.push({
        game_id: gameId,
        started_at: first.timestamp,
        status,
        events: events.length,
        ...(payout !== undefined ? { payout } : {}),
      });
    }
    return out;
  }

  async verifyIntegrity(): Promise<{ valid: boolean; brokenAt?: number }> {
    const events = await this.readAll();
    let prevHash: string | undefined;
    for (let i = 0; i < events.length; i++) {
      const event = events[i]!;
      if (i > 0 && event.hash_prev !== prevHash) {
        return { valid: false, brokenAt: i };
      }
      prevHash = this.hash(JSON.stringify(event));
    }
    return { valid: true };
  }

  /** Wait for pending writes. Call before process exit. */
  async close(): Promise<void> {
    await this.writeLock;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }
}

function isJson(line: string): boolean {
  try {
    JSON.parse(line);
    return true;
  } catch {
    return false;
  }
}
