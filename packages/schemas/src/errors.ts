export type GameErrorCode = "INVALID_INPUT" | "INVALID_STATE";

export class GameError extends Error {
  readonly code: GameErrorCode;

  constructor(code: GameErrorCode, message: string) {
    super(message);
    this.name = "GameError";
    this.code = code;
  }
}

/**
 * Malformed or out-of-range actor input. Recoverable: the caller re-prompts.
 */
export class InputError extends GameError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InputError";
  }
}

/**
 * Contract violation by the caller (bad catalog, re-opened case,
 * out-of-range id). The game in progress is abandoned.
 */
export class StateError extends GameError {
  constructor(message: string) {
    super("INVALID_STATE", message);
    this.name = "StateError";
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
