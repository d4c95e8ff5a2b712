export const PrizeCatalogSchema = {
  type: "array",
  minItems: 26,
  maxItems: 26,
  uniqueItems: true,
  items: { type: "number", minimum: 0 },
} as const;
