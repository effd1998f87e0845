import { describe, it, expect } from 'vitest'
import { SeededRandom } from '../random.ts'

describe('SeededRandom', () => {
  it('repeats its sequence for the same seed', () => {
    const a = new SeededRandom(42)
    const b = new SeededRandom(42)
    const first = Array.from({ length: 8 }, () => a.random())
    const second = Array.from({ length: 8 }, () => b.random())
    expect(first).toEqual(second)
  })

  it('differs between seeds', () => {
    const a = new SeededRandom(1)
    const b = new SeededRandom(2)
    expect(a.random()).not.toBe(b.random())
  })

  it('draws integers within bounds', () => {
    const random = new SeededRandom(7)
    for (let i = 0; i < 200; i++) {
      const value = random.int(3, 5)
      expect(value).toBeGreaterThanOrEqual(3)
      expect(value).toBeLessThanOrEqual(5)
      expect(Number.isInteger(value)).toBe(true)
    }
  })

  it('draws floats in [0, 1)', () => {
    const random = new SeededRandom(0)
    for (let i = 0; i < 200; i++) {
      const value = random.random()
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThan(1)
    }
  })
})
