import { describe, it, expect } from 'vitest'
import { SeededRandom, mixSeed, perturbSeed } from './random'

function take(rng: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => rng.next())
}

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    expect(take(new SeededRandom(42), 20)).toEqual(take(new SeededRandom(42), 20))
  })

  it('produces different sequences for different seeds', () => {
    expect(take(new SeededRandom(1), 5)).not.toEqual(take(new SeededRandom(2), 5))
  })

  it('returns floats in [0, 1)', () => {
    for (const value of take(new SeededRandom(7), 500)) {
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })

  it('keeps nextInt within bounds', () => {
    const rng = new SeededRandom(99)
    for (let i = 0; i < 500; i++) {
      const n = rng.nextInt(6)
      expect(Number.isInteger(n)).toBe(true)
      expect(n).toBeGreaterThanOrEqual(0)
      expect(n).toBeLessThan(6)
    }
  })

  it('shuffles into a new array holding the same items', () => {
    const items = [1, 2, 3, 4, 5, 6, 7, 8]
    const shuffled = new SeededRandom(3).shuffle(items)
    expect(shuffled).not.toBe(items)
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items)
    expect(items).toEqual([1, 2, 3, 4, 5, 6, 7, 8])
  })

  it('picks from the list', () => {
    const items = ['a', 'b', 'c']
    expect(items).toContain(new SeededRandom(5).pick(items))
  })

  it('refuses to pick from an empty list', () => {
    expect(() => new SeededRandom(5).pick([])).toThrow(RangeError)
  })
})

describe('mixSeed', () => {
  it('is deterministic', () => {
    expect(mixSeed(12, 3, 0, 1)).toBe(mixSeed(12, 3, 0, 1))
  })

  it('returns an unsigned 32-bit integer', () => {
    const seed = mixSeed(-5, 100, 7)
    expect(Number.isInteger(seed)).toBe(true)
    expect(seed).toBeGreaterThanOrEqual(0)
    expect(seed).toBeLessThanOrEqual(0xffffffff)
  })

  it('separates levels and argument order', () => {
    expect(mixSeed(7, 3)).not.toBe(mixSeed(7, 4))
    expect(mixSeed(1, 2)).not.toBe(mixSeed(2, 1))
  })
})

describe('perturbSeed', () => {
  it('offsets by attempt times stride', () => {
    expect(perturbSeed(10, 0)).toBe(10)
    expect(perturbSeed(10, 2)).toBe(15848)
    expect(perturbSeed(10, 1, 5)).toBe(15)
  })
})
