import Ajv, { type ErrorObject } from "ajv";
import addFormats from "ajv-formats";
import { GameEventSchema } from "./game-event.schema.js";
import { GameStatsSchema } from "./stats.schema.js";
import { PrizeCatalogSchema } from "./catalog.schema.js";

const ajv = new (Ajv.default ?? Ajv)({ allErrors: true, strict: false });
// ajv-formats has a nested .default in ESM due to CJS interop; resolve it safely.
type FormatsFn = (instance: unknown) => void;
const applyFormats: FormatsFn = (addFormats as unknown as { default?: FormatsFn }).default ?? (addFormats as unknown as FormatsFn);
applyFormats(ajv);

const validateGameEvent = ajv.compile(GameEventSchema);
const validateGameStats = ajv.compile(GameStatsSchema);
const validatePrizeCatalog = ajv.compile(PrizeCatalogSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

export function validateGameEventData(data: unknown): ValidationResult {
  const valid = validateGameEvent(data);
  return toResult(valid, validateGameEvent.errors);
}

export function validateGameStatsData(data: unknown): ValidationResult {
  const valid = validateGameStats(data);
  return toResult(valid, validateGameStats.errors);
}

export function validatePrizeCatalogData(data: unknown): ValidationResult {
  const valid = validatePrizeCatalog(data);
  return toResult(valid, validatePrizeCatalog.errors);
}
