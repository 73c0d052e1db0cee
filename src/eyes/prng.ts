/**
 * Mulberry32: fast seeded 32-bit PRNG producing values in [0, 1).
 */
export function makePrng(seed: number): () => number {
  let s = seed >>> 0
  return () => {
    s += 0x6d2b79f5
    let z = s
    z = Math.imul(z ^ (z >>> 15), z | 1)
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61)
    return ((z ^ (z >>> 14)) >>> 0) / 0x100000000
  }
}

/**
 * FNV-1a over the UTF-16 code units of a string seed (unit serial, hostname).
 * Numeric seeds pass through as their unsigned 32-bit value.
 */
export function hashSeed(seed: string | number): number {
  if (typeof seed === 'number') return Math.trunc(seed) >>> 0
  let h = 0x811c9dc5
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i)
    h = Math.imul(h, 0x01000193)
  }
  return h >>> 0
}

/** Linear pick inside [lo, hi] for a unit sample. */
export function pickInRange([lo, hi]: [number, number], u: number): number {
  return lo + (hi - lo) * u
}
