export { Journal } from "./journal.js";
export type { JournalOptions, JournalListener, GameSummary } from "./journal.js";
export { ConsoleLogger, createLogger } from "./logger.js";
