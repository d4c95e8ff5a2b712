import type { Money } from "@briefcase/schemas";
import { CASE_COUNT, StateError, validatePrizeCatalogData } from "@briefcase/schemas";
import type { RandomSource } from "./random.js";
import { shuffle } from "./random.js";

export const DEFAULT_PRIZE_CATALOG: readonly Money[] = Object.freeze([
  0.01, 1, 5, 10, 25, 50, 75, 100, 200, 300,
  400, 500, 750, 1000, 5000, 10000, 25000, 50000,
  75000, 100000, 200000, 300000, 400000, 500000, 750000, 1000000,
]);

/** Prizes at or below this are shown on the "low" side of the board. */
export const LOW_PRIZE_THRESHOLD: Money = 500;

export class PrizePool {
  private catalog: readonly Money[];

  constructor(catalog: readonly Money[] = DEFAULT_PRIZE_CATALOG) {
    this.catalog = catalog;
  }

  /**
   * Returns a fresh copy of the catalog. Throws StateError unless it holds
   * exactly 26 distinct, non-negative values.
   */
  initialize(): Money[] {
    if (this.catalog.length !== CASE_COUNT) {
      throw new StateError(
        `Invalid number of prizes initialized: expected ${CASE_COUNT}, got ${this.catalog.length}`,
      );
    }
    const validation = validatePrizeCatalogData(this.catalog);
    if (!validation.valid) {
      throw new StateError(`Invalid prize catalog: ${validation.errors.join(", ")}`);
    }
    return [...this.catalog];
  }

  /** Assignment of prizes to cases: index is the case id. */
  shuffle(catalog: readonly Money[], rng: RandomSource): Money[] {
    return shuffle(catalog, rng);
  }

  /** initialize() followed by shuffle(). */
  deal(rng: RandomSource): Money[] {
    return this.shuffle(this.initialize(), rng);
  }
}
