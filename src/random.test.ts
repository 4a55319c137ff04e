import { describe, it, expect } from 'vitest';
import { defaultRandom, rowRandom, seededRandom } from './random';

describe('random sources', () => {
  it('repeats a seeded sequence', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    for (let i = 0; i < 50; i++) {
      expect(a()).toBe(b());
    }
  });

  it('stays within [0, 1)', () => {
    const rng = seededRandom(3);
    for (let i = 0; i < 10000; i++) {
      const x = rng();
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it('falls back to the thread generator without a seed', () => {
    expect(rowRandom(undefined, 3)).toBe(defaultRandom);
  });

  it('gives each row its own stream', () => {
    expect(rowRandom(7, 0)()).not.toBe(rowRandom(7, 1)());
    expect(rowRandom(7, 4)()).toBe(rowRandom(7, 4)());
  });
});
