/** Deterministic random source in [0, 1). */
export type Rng = () => number;

/**
 * Seeded linear congruential generator.
 * The same seed always yields the same sequence, so failures reproduce.
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 4294967296;
  };
}

/** Integer in [min, max], both inclusive. */
export function nextInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}
