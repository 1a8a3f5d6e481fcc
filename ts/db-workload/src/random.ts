/** Uniform source in [0, 1) */
export interface RandomSource {
  next(): number
}

const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789"

/**
 * Seeded 32-bit generator (mulberry32). The same seed always yields the same
 * sequence, so workload content is reproducible.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

/** Seed derived from the wall clock, used when none is configured */
export function timeSeed(now: number = Date.now()): number {
  return now % 4294967296
}

/** Integer in [0, max) */
export function randomInt(random: RandomSource, max: number): number {
  return Math.floor(random.next() * max)
}

/** Alphanumeric string of the given length */
export function randomString(random: RandomSource, length: number): string {
  let out = ""
  for (let i = 0; i < length; i++) {
    out += ALPHABET[randomInt(random, ALPHABET.length)]
  }
  return out
}
