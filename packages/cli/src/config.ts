import { resolve } from "node:path";
import { parseSeed } from "@briefcase/schemas";

export interface CliConfig {
  statsPath: string;
  journalPath: string;
  /** Seed for reproducible games; absent means crypto randomness. */
  seed?: number;
}

export const DEFAULT_STATS_PATH = "briefcase-stats.json";
export const DEFAULT_JOURNAL_PATH = "journal/games.jsonl";

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): CliConfig {
  const config: CliConfig = {
    statsPath: resolve(cwd, env.BRIEFCASE_STATS_PATH || DEFAULT_STATS_PATH),
    journalPath: resolve(cwd, env.BRIEFCASE_JOURNAL_PATH || DEFAULT_JOURNAL_PATH),
  };
  const rawSeed = env.BRIEFCASE_SEED;
  if (rawSeed !== undefined && rawSeed.trim() !== "") {
    const parsed = parseSeed(rawSeed);
    if (!parsed.ok) throw parsed.error;
    config.seed = parsed.value;
  }
  return config;
}

/** A --seed flag wins over BRIEFCASE_SEED. */
export function resolveSeed(flag: string | undefined, config: CliConfig): number | undefined {
  if (flag === undefined) return config.seed;
  const parsed = parseSeed(flag);
  if (!parsed.ok) throw parsed.error;
  return parsed.value;
}
