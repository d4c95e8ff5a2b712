import type { Money } from "@briefcase/schemas";

export const BASE_OFFER_PERCENTAGE = 0.1;
export const OFFER_PERCENTAGE_STEP = 0.05;
export const MAX_OFFER_PERCENTAGE = 0.9;

/** Share of the expected value the bank offers in a given round. */
export function offerPercentage(round: number): number {
  return Math.min(MAX_OFFER_PERCENTAGE, BASE_OFFER_PERCENTAGE + OFFER_PERCENTAGE_STEP * round);
}

export function computeOffer(hiddenPrizes: readonly Money[], round: number): Money {
  if (hiddenPrizes.length === 0) return 0;
  let sum = 0;
  for (const prize of hiddenPrizes) sum += prize;
  return (sum / hiddenPrizes.length) * offerPercentage(round);
}
