export { createSeededRandom, cryptoRandom, shuffle } from "./random.js";
export type { RandomSource } from "./random.js";
export { PrizePool, DEFAULT_PRIZE_CATALOG, LOW_PRIZE_THRESHOLD } from "./prize-pool.js";
export { RevealTracker } from "./reveal-tracker.js";
export {
  computeOffer,
  offerPercentage,
  BASE_OFFER_PERCENTAGE,
  OFFER_PERCENTAGE_STEP,
  MAX_OFFER_PERCENTAGE,
} from "./offer-engine.js";
export {
  evaluate,
  advisorDecision,
  expectedValue,
  standardDeviation,
  probabilityExceeding,
  riskFactor,
  tierFor,
} from "./decision-advisor.js";
export { selectCasesToOpen, RandomCasePicker } from "./case-selection.js";
export { RoundSequencer, DEFAULT_ROUND_SCHEDULE } from "./round-sequencer.js";
export type { SequencerConfig } from "./round-sequencer.js";
