#!/usr/bin/env node
import "dotenv/config";
import { loadConfig } from "./config.js";
import { createProgram } from "./program.js";

// Global error handlers: never exit silently on a stray rejection
process.on("unhandledRejection", (reason) => {
  console.error("[briefcase] Unhandled rejection:", reason);
  process.exit(1);
});
process.on("uncaughtException", (err) => {
  console.error("[briefcase] Uncaught exception:", err);
  process.exit(1);
});

try {
  await createProgram({ config: loadConfig() }).parseAsync(process.argv);
} catch (err) {
  console.error(`[briefcase] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
