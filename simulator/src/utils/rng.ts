// Deterministic RNG utilities

export type Rng = () => number;

// Simple fast PRNG suitable for reproducible shuffles.
// Returns a function that yields floats in [0, 1).
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return function next() {
    t = (t + 0x6D2B79F5) >>> 0;
    let r = t;
    r = Math.imul(r ^ (r >>> 15), r | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

// Stable non-crypto hash -> 32-bit unsigned seed
export function hashStringToSeed(s: string): number {
  let h = 2166136261 >>> 0; // FNV-1a basis
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/** Integer in [0, max) */
export function randomInt(rng: Rng, max: number): number {
  return Math.floor(rng() * max);
}

/**
 * Two distinct indices in [0, count). Needs count >= 2.
 */
export function pickTwoDistinct(rng: Rng, count: number): [number, number] {
  if (count < 2) {
    throw new Error(`Need at least two choices, got ${count}`);
  }
  const first = randomInt(rng, count);
  let second = randomInt(rng, count - 1);
  if (second >= first) second++;
  return [first, second];
}
