export const GAME_EVENT_TYPES = [
  "game.started",
  "round.started",
  "case.opened",
  "offer.made",
  "decision.made",
  "game.concluded",
  "game.abandoned",
] as const;

export const GameEventSchema = {
  type: "object",
  required: ["event_id", "timestamp", "game_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    timestamp: { type: "string", format: "date-time" },
    game_id: { type: "string", minLength: 1 },
    type: { type: "string", enum: [...GAME_EVENT_TYPES] },
    payload: { type: "object" },
    hash_prev: { type: "string" },
    seq: { type: "integer", minimum: 0 },
  },
  additionalProperties: false,
} as const;
