/** A source of uniform draws in [0, 1) */
export type RandomSource = () => number;

/**
 * Seeded PRNG (mulberry32). Small, fast and reproducible across runs,
 * which is all the exploration noise needs.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
