/**
 * Uniform generator in [0, 1). Every sampling helper takes one explicitly so
 * each render task can own its own stream.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

// Linear congruential generator, 31-bit state.
export function seededRandom(seed: number): RandomSource {
  let state = seed & 0x7fffffff;
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff;
    return state / 0x80000000;
  };
}

/**
 * Per-row generator. Unseeded renders share the thread's Math.random, which is
 * already independent per worker thread.
 */
export function rowRandom(seed: number | undefined, row: number): RandomSource {
  if (seed === undefined) return defaultRandom;
  // Spread rows apart so neighbouring rows don't start on neighbouring states
  return seededRandom(Math.imul(seed ^ 0x5bd1e995, 31) + Math.imul(row + 1, 0x9e3779b1));
}
