import { randomInt } from "node:crypto";

/**
 * Source of uniform randomness for shuffles and samples. Injected everywhere
 * so games can be replayed from a seed.
 */
export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
}

const MODULUS = 2147483647;

/**
 * Park–Miller minimal standard generator. Deterministic for a given seed;
 * any integer is accepted and folded into the generator's range.
 */
export function createSeededRandom(seed: number): RandomSource {
  // State must land in [1, MODULUS - 1]; 0 is a fixed point of the recurrence
  let x = ((Math.trunc(seed) % MODULUS) + MODULUS) % MODULUS;
  if (x === 0) x = MODULUS - 1;
  const next = (): number => {
    x = (x * 16807) % MODULUS;
    return (x - 1) / (MODULUS - 1);
  };
  return {
    next,
    int: (maxExclusive) => Math.floor(next() * maxExclusive),
  };
}

const CRYPTO_RANGE = 2 ** 47;

export const cryptoRandom: RandomSource = {
  next: () => randomInt(0, CRYPTO_RANGE) / CRYPTO_RANGE,
  int: (maxExclusive) => randomInt(0, maxExclusive),
};

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], rng: RandomSource): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.int(i + 1);
    [arr[i], arr[j]] = [arr[j]!, arr[i]!];
  }
  return arr;
}
