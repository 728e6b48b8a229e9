/** Uniform source of numbers in [0, 1), the shape of Math.random */
export type RandomSource = () => number;

/**
 * Mulberry32 PRNG. The same seed always yields the same sequence, which is
 * what makes scrambles reproducible.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const getDailySeed = (now: Date = new Date()): number => {
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return parseInt(`${now.getFullYear()}${month}${day}`);
};
