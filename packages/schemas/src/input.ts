import { InputError } from "./errors.js";

export type Result<T, E = InputError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

const INTEGER_REGEX = /^[+-]?\d+$/;

function fail(message: string): { ok: false; error: InputError } {
  return { ok: false, error: new InputError(message) };
}

/**
 * Parse a whole number typed by a player and check it falls in [min, max].
 * Surrounding whitespace is ignored; anything else after the digits is not.
 */
export function parseCaseNumber(input: string, min: number, max: number): Result<number> {
  const trimmed = input.trim();
  if (trimmed.length === 0) return fail("Empty input");
  if (!INTEGER_REGEX.test(trimmed)) return fail("Non-numeric input");
  const value = parseInt(trimmed, 10);
  if (value < min || value > max) {
    return fail(`Input out of range (${min}-${max})`);
  }
  return { ok: true, value };
}

/** Only the first character counts, so "yes", "Nope" and "y" are all accepted. */
export function parseYesNo(input: string): Result<boolean> {
  const trimmed = input.trim();
  if (trimmed.length === 0) return fail("Empty input");
  const ch = trimmed[0]?.toLowerCase();
  if (ch === "y") return { ok: true, value: true };
  if (ch === "n") return { ok: true, value: false };
  return fail("Invalid choice");
}

export function parsePositiveInt(input: string, label: string): Result<number> {
  const trimmed = input.trim();
  if (!INTEGER_REGEX.test(trimmed)) {
    return fail(`Invalid ${label}: "${input}" (must be a positive integer)`);
  }
  const value = parseInt(trimmed, 10);
  if (value < 1 || !Number.isSafeInteger(value)) {
    return fail(`Invalid ${label}: "${input}" (must be a positive integer)`);
  }
  return { ok: true, value };
}

export function parseSeed(input: string): Result<number> {
  const trimmed = input.trim();
  if (!INTEGER_REGEX.test(trimmed)) {
    return fail(`Invalid seed: "${input}" (must be an integer)`);
  }
  const value = parseInt(trimmed, 10);
  if (!Number.isSafeInteger(value)) {
    return fail(`Invalid seed: "${input}" (outside the safe integer range)`);
  }
  return { ok: true, value };
}
