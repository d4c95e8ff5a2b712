import type { AdvisorTier, Decision, Evaluation, Money } from "@briefcase/schemas";

/** Cases remaining above which the early policy applies. */
export const EARLY_TIER_ABOVE = 10;
/** Cases remaining above which (and up to EARLY_TIER_ABOVE) the mid policy applies. */
export const MID_TIER_ABOVE = 5;

export const EARLY_ACCEPT_RATIO = 0.9;
export const MID_ACCEPT_RATIO = 0.85;
export const LATE_ACCEPT_RATIO = 0.8;
export const LATE_RISK_THRESHOLD = 0.4;
export const RISK_ADJUSTMENT_WEIGHT = 0.3;

export function expectedValue(prizes: readonly Money[]): Money {
  if (prizes.length === 0) return 0;
  let sum = 0;
  for (const prize of prizes) sum += prize;
  return sum / prizes.length;
}

/** Population standard deviation; 0 for fewer than two values. */
export function standardDeviation(prizes: readonly Money[]): number {
  if (prizes.length <= 1) return 0;
  const mean = expectedValue(prizes);
  let variance = 0;
  for (const prize of prizes) variance += (prize - mean) * (prize - mean);
  return Math.sqrt(variance / prizes.length);
}

/** Fraction of prizes strictly greater than the offer. */
export function probabilityExceeding(prizes: readonly Money[], offer: Money): number {
  if (prizes.length === 0) return 0;
  let better = 0;
  for (const prize of prizes) if (prize > offer) better++;
  return better / prizes.length;
}

export function riskFactor(prizes: readonly Money[], offer: Money): number {
  const ev = expectedValue(prizes);
  const adjustment = standardDeviation(prizes) / (ev + 1);
  return probabilityExceeding(prizes, offer) - adjustment * RISK_ADJUSTMENT_WEIGHT;
}

export function tierFor(casesRemaining: number): Exclude<AdvisorTier, "none"> {
  if (casesRemaining > EARLY_TIER_ABOVE) return "early";
  if (casesRemaining > MID_TIER_ABOVE) return "mid";
  return "late";
}

/**
 * Score an offer against the prizes still in play. The same function backs
 * the human advice screen and the computer player's decisions.
 */
export function evaluate(hiddenPrizes: readonly Money[], offer: Money, casesRemaining: number): Evaluation {
  if (hiddenPrizes.length === 0) {
    return {
      expectedValue: 0,
      stdDeviation: 0,
      probabilityExceedsOffer: 0,
      riskFactor: 0,
      offerRatio: 0,
      riskLevel: 0,
      tier: "none",
      recommendation: "accept",
    };
  }

  const ev = expectedValue(hiddenPrizes);
  const stdDeviation = standardDeviation(hiddenPrizes);
  const probabilityExceedsOffer = probabilityExceeding(hiddenPrizes, offer);
  const risk = riskFactor(hiddenPrizes, offer);
  const tier = tierFor(casesRemaining);

  let accept: boolean;
  if (tier === "early") {
    accept = offer >= ev * EARLY_ACCEPT_RATIO;
  } else if (tier === "mid") {
    accept = offer >= ev * MID_ACCEPT_RATIO;
  } else {
    accept = risk < LATE_RISK_THRESHOLD || offer >= ev * LATE_ACCEPT_RATIO;
  }

  return {
    expectedValue: ev,
    stdDeviation,
    probabilityExceedsOffer,
    riskFactor: risk,
    offerRatio: ev > 0 ? offer / ev : 0,
    riskLevel: ev > 0 ? stdDeviation / ev : 0,
    tier,
    recommendation: accept ? "accept" : "reject",
  };
}

/** Scripted actor: follows the advisor's recommendation. */
export function advisorDecision(
  hiddenPrizes: readonly Money[],
  offer: Money,
  casesRemaining: number,
): Decision {
  return evaluate(hiddenPrizes, offer, casesRemaining).recommendation;
}
