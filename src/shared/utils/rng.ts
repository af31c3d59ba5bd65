/** Uniform float in [0, 1). Same contract as Math.random. */
export type Rng = () => number;

/**
 * Seeded mulberry32 generator. Deterministic across hosts for a given seed.
 */
export function createSeededRng(seed: number): Rng {
  let state = seed | 0;

  return (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seed for unseeded runs, taken from the clock so it can be logged and the run
 * replayed.
 */
export function randomSeed(): number {
  return Date.now() >>> 0;
}
