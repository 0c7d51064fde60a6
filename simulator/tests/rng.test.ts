import { describe, it, expect } from 'vitest';
import { hashStringToSeed, mulberry32, pickTwoDistinct, randomInt } from '../src/utils/rng';

describe('mulberry32', () => {
  it('should repeat the same sequence for the same seed', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('should differ between seeds', () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });

  it('should stay in [0, 1)', () => {
    const rng = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});

describe('hashStringToSeed', () => {
  it('should use the FNV-1a basis for the empty string', () => {
    expect(hashStringToSeed('')).toBe(2166136261);
  });

  it('should hash a single character', () => {
    expect(hashStringToSeed('a')).toBe(0xe40c292c);
  });
});

describe('pickTwoDistinct', () => {
  it('should always pick two different indices in range', () => {
    const rng = mulberry32(99);
    for (let i = 0; i < 200; i++) {
      const [a, b] = pickTwoDistinct(rng, 3);
      expect(a).not.toBe(b);
      expect([0, 1, 2]).toContain(a);
      expect([0, 1, 2]).toContain(b);
    }
  });

  it('should pick both of exactly two choices', () => {
    const [a, b] = pickTwoDistinct(mulberry32(5), 2);
    expect([a, b].sort()).toEqual([0, 1]);
  });

  it('should need two choices', () => {
    expect(() => pickTwoDistinct(mulberry32(5), 1)).toThrow('Need at least two choices, got 1');
  });

  it('should map the rng onto integers', () => {
    expect(randomInt(() => 0.999, 4)).toBe(3);
    expect(randomInt(() => 0, 4)).toBe(0);
  });
});
