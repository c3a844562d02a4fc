/**
 * Seeded pseudo-random helpers.
 *
 * Every generation call receives an explicit `Rng` handle instead of sharing
 * process-wide state, so one patient's stream can be reproduced (or generated
 * on another worker) from `deriveSeed(baseSeed, patientIndex)` alone.
 */

/** Uniform source on [0, 1). */
export type Rng = () => number;

// Simple seeded PRNG (mulberry32)
export function seededRandom(seed: number): Rng {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Mixes a run seed with a patient index into an independent 32-bit seed.
 */
export function deriveSeed(baseSeed: number, index: number): number {
  let h = Math.imul((baseSeed ^ 0x9e3779b9) >>> 0, 0x85ebca6b);
  h ^= Math.imul(index + 1, 0xc2b2ae35);
  h ^= h >>> 16;
  h = Math.imul(h, 0x27d4eb2f);
  h ^= h >>> 15;
  return h >>> 0;
}

/** Seeds are unsigned 32-bit integers; wider values would alias. */
export const MAX_SEED = 0xffffffff;

export function isSeed(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_SEED;
}

/** Non-reproducible seed for runs that did not ask for one. */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}

export function uniform(rng: Rng, lo: number, hi: number): number {
  return lo + (hi - lo) * rng();
}

/** Integer on the closed interval [lo, hi]. */
export function randomInt(rng: Rng, lo: number, hi: number): number {
  return lo + Math.floor(rng() * (hi - lo + 1));
}

/** Gaussian draw (Box-Muller). Consumes exactly two uniforms. */
export function normal(rng: Rng, mean: number, sd: number): number {
  const u1 = rng();
  const u2 = rng();
  const z =
    Math.sqrt(-2 * Math.log(Math.max(u1, 1e-10))) * Math.cos(2 * Math.PI * u2);
  return mean + z * sd;
}

export function bernoulli(rng: Rng, p: number): boolean {
  return rng() < p;
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) throw new Error("pick() called with no items");
  return items[Math.floor(rng() * items.length)];
}

/**
 * Picks one item with probability proportional to its weight.
 */
export function weightedChoice<T>(
  rng: Rng,
  items: readonly T[],
  weights: readonly number[]
): T {
  if (items.length === 0 || items.length !== weights.length) {
    throw new Error("weightedChoice() needs one weight per item");
  }
  const total = weights.reduce((sum, w) => sum + w, 0);
  let target = rng() * total;
  for (let i = 0; i < items.length; i += 1) {
    target -= weights[i];
    if (target < 0) return items[i];
  }
  return items[items.length - 1];
}

/**
 * Triangular distribution on [low, high] peaking at `mode`.
 */
export function triangular(
  rng: Rng,
  low: number,
  high: number,
  mode: number
): number {
  if (high === low) return low;
  const u = rng();
  const c = (mode - low) / (high - low);
  if (u > c) {
    return high + (low - high) * Math.sqrt((1 - u) * (1 - c));
  }
  return low + (high - low) * Math.sqrt(u * c);
}

/**
 * RFC 4122 version-4 UUID whose random bits come from `rng`.
 */
export function uuidFromRng(rng: Rng): string {
  const bytes: number[] = [];
  for (let i = 0; i < 16; i += 1) bytes.push(Math.floor(rng() * 256));
  bytes[6] = (bytes[6] & 0x0f) | 0x40;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;
  const hex = bytes.map((b) => b.toString(16).padStart(2, "0")).join("");
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join("-");
}
