import { describe, it, expect } from "vitest"
import { createSeededRandom, randomInt, randomString, timeSeed } from "./random"

describe("createSeededRandom", () => {
  it("repeats its sequence for the same seed", () => {
    const a = createSeededRandom(7)
    const b = createSeededRandom(7)
    const seqA = Array.from({ length: 5 }, () => a.next())
    const seqB = Array.from({ length: 5 }, () => b.next())
    expect(seqA).toEqual(seqB)
  })

  it("differs across seeds", () => {
    expect(createSeededRandom(1).next()).not.toBe(createSeededRandom(2).next())
  })

  it("stays within [0, 1)", () => {
    const random = createSeededRandom(123)
    for (let i = 0; i < 1000; i++) {
      const v = random.next()
      expect(v).toBeGreaterThanOrEqual(0)
      expect(v).toBeLessThan(1)
    }
  })
})

describe("randomInt / randomString", () => {
  it("maps the source onto the requested range", () => {
    expect(randomInt({ next: () => 0 }, 10)).toBe(0)
    expect(randomInt({ next: () => 0.999 }, 10)).toBe(9)
  })

  it("builds alphanumeric strings of the requested length", () => {
    const random = createSeededRandom(5)
    expect(randomString(random, 0)).toBe("")
    expect(randomString(random, 32)).toMatch(/^[A-Za-z0-9]{32}$/)
    expect(randomString({ next: () => 0 }, 3)).toBe("AAA")
  })
})

describe("timeSeed", () => {
  it("wraps the clock into 32 bits", () => {
    expect(timeSeed(5)).toBe(5)
    expect(timeSeed(4294967296 + 9)).toBe(9)
  })
})
