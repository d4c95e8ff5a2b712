import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile, writeFile, appendFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { Journal } from "./journal.js";

describe("Journal", () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "briefcase-journal-"));
    filePath = join(dir, "nested", "games.jsonl");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("creates directory and file on init + emit", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    const event = await journal.emit("game-1", "game.started", { player_case: 4 });
    expect(event.event_id).toBeTruthy();
    expect(event.game_id).toBe("game-1");
    expect(event.type).toBe("game.started");
    expect(event.payload).toEqual({ player_case: 4 });
    expect(event.seq).toBe(0);
    expect(existsSync(filePath)).toBe(true);
  });

  it("writes with fsync enabled", async () => {
    const journal = new Journal(filePath);
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    const content = await readFile(filePath, "utf-8");
    expect(content.trim().split("\n")).toHaveLength(1);
  });

  it("reads all events and honours a limit", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    await journal.emit("game-1", "round.started", { round: 1 });
    await journal.emit("game-2", "game.started", {});

    expect(await journal.readAll()).toHaveLength(3);
    const last = await journal.readAll({ limit: 1 });
    expect(last).toHaveLength(1);
    expect(last[0]!.game_id).toBe("game-2");
  });

  it("reads events for one game", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    await journal.emit("game-2", "game.started", {});
    await journal.emit("game-1", "offer.made", { offer: 10 });

    const events = journal.readGame("game-1");
    expect(events.map((e) => e.type)).toEqual(["game.started", "offer.made"]);
    expect(journal.readGame("missing")).toEqual([]);
  });

  it("maintains hash chain integrity", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    const e1 = await journal.emit("game-1", "game.started", {});
    const e2 = await journal.emit("game-1", "round.started", { round: 1 });

    expect(e1.hash_prev).toBeUndefined();
    expect(e2.hash_prev).toMatch(/^[0-9a-f]{64}$/);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("returns valid integrity for an empty journal", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  async function tamperSecondLine(): Promise<void> {
    const content = await readFile(filePath, "utf-8");
    const lines = content.trim().split("\n");
    const parsed = JSON.parse(lines[1]!);
    parsed.payload = { tampered: true };
    lines[1] = JSON.stringify(parsed);
    await writeFile(filePath, lines.join("\n") + "\n", "utf-8");
  }

  it("throws on a broken chain in strict mode", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    await journal.emit("game-1", "round.started", {});
    await journal.emit("game-1", "game.concluded", {});
    await tamperSecondLine();

    const check = new Journal(filePath, { fsync: false });
    expect(await check.verifyIntegrity()).toEqual({ valid: false, brokenAt: 2 });

    const strict = new Journal(filePath, { fsync: false, recovery: "strict" });
    await expect(strict.init()).rejects.toThrow("Journal integrity violation at event 2");
  });

  it("truncates a broken chain by default and keeps appending", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    await journal.emit("game-1", "round.started", {});
    await journal.emit("game-1", "game.concluded", {});
    await tamperSecondLine();

    const repaired = new Journal(filePath, { fsync: false });
    await repaired.init();
    expect(await repaired.readAll()).toHaveLength(2);
    const next = await repaired.emit("game-1", "game.concluded", { result: "no_deal" });
    expect(next.seq).toBe(2);
    expect(await repaired.verifyIntegrity()).toEqual({ valid: true });
  });

  it("drops a torn last line on init", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    await appendFile(filePath, '{"event_id":"partial', "utf-8");

    const reopened = new Journal(filePath, { fsync: false });
    await reopened.init();
    expect(await reopened.readAll()).toHaveLength(1);
    expect(console.error).toHaveBeenCalledWith("[journal] truncated incomplete last line");
  });

  it("continues seq and chain across instances", async () => {
    const first = new Journal(filePath, { fsync: false });
    await first.init();
    await first.emit("game-1", "game.started", {});
    await first.emit("game-1", "round.started", {});
    await first.close();

    const second = new Journal(filePath, { fsync: false });
    await second.init();
    const event = await second.emit("game-1", "case.opened", { case_id: 3 });
    expect(event.seq).toBe(2);
    expect(second.readGame("game-1")).toHaveLength(3);
    expect(await second.verifyIntegrity()).toEqual({ valid: true });
  });

  it("rejects events that fail validation", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await expect(journal.emit("", "game.started", {})).rejects.toThrow(/^Invalid journal event/);
    expect(await journal.readAll()).toEqual([]);
  });

  it("tryEmit returns null and warns instead of throwing", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    expect(await journal.tryEmit("", "game.started", {})).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]![0])).toContain("[journal] could not record game.started");
  });

  it("notifies listeners until they unsubscribe", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    const seen: string[] = [];
    const off = journal.on((event) => seen.push(event.type));
    await journal.emit("game-1", "game.started", {});
    off();
    await journal.emit("game-1", "round.started", {});
    expect(seen).toEqual(["game.started"]);
  });

  it("keeps writing when a listener throws", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    journal.on(() => {
      throw new Error("boom");
    });
    await journal.emit("game-1", "game.started", {});
    await journal.emit("game-1", "round.started", {});
    expect(await journal.readAll()).toHaveLength(2);
  });

  it("serialises concurrent emits", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await Promise.all(
      Array.from({ length: 10 }, (_, i) => journal.emit("game-1", "case.opened", { case_id: i })),
    );
    const events = await journal.readAll();
    expect(events.map((e) => e.seq)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(await journal.verifyIntegrity()).toEqual({ valid: true });
  });

  it("summarises games", async () => {
    const journal = new Journal(filePath, { fsync: false });
    await journal.init();
    await journal.emit("game-1", "game.started", {});
    await journal.emit("game-1", "game.concluded", { result: "deal", payout: 1234.5 });
    await journal.emit("game-2", "game.started", {});
    await journal.emit("game-2", "game.abandoned", { error: "bad case" });
    await journal.emit("game-3", "game.started", {});

    const games = journal.listGames();
    expect(games.map((g) => [g.game_id, g.status, g.events, g.payout])).toEqual([
      ["game-1", "deal", 2, 1234.5],
      ["game-2", "abandoned", 2, undefined],
      ["game-3", "in_progress", 1, undefined],
    ]);
  });
});
