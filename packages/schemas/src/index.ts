export * from "./types.js";
export { GameError, InputError, StateError, isGameError } from "./errors.js";
export type { GameErrorCode } from "./errors.js";
export { parseCaseNumber, parseYesNo, parsePositiveInt, parseSeed } from "./input.js";
export type { Result } from "./input.js";
export { GAME_EVENT_TYPES, GameEventSchema } from "./game-event.schema.js";
export { GameStatsSchema } from "./stats.schema.js";
export { PrizeCatalogSchema } from "./catalog.schema.js";
export {
  validateGameEventData,
  validateGameStatsData,
  validatePrizeCatalogData,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
