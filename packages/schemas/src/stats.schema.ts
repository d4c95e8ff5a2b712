export const GameStatsSchema = {
  type: "object",
  required: ["gamesPlayed", "gamesWon", "totalWinnings", "bestWinning"],
  properties: {
    gamesPlayed: { type: "integer", minimum: 0 },
    gamesWon: { type: "integer", minimum: 0 },
    totalWinnings: { type: "number", minimum: 0 },
    bestWinning: { type: "number", minimum: 0 },
    updatedAt: { type: "string", format: "date-time" },
  },
  additionalProperties: false,
} as const;
