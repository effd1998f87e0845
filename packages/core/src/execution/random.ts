/**
 * Seedable PRNG (xorshift128+, seeded through splitmix64).
 */
const MASK_64 = 0xffffffffffffffffn

function splitmix64(seed: bigint): bigint {
  let s = (seed + 0x9e3779b97f4a7c15n) & MASK_64
  s = ((s ^ (s >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64
  s = ((s ^ (s >> 27n)) * 0x94d049bb133111ebn) & MASK_64
  return s ^ (s >> 31n)
}

export class SeededRandom {
  private state0: bigint
  private state1: bigint

  constructor(seed: number) {
    const base = BigInt(Math.trunc(seed)) & MASK_64
    this.state0 = splitmix64(base)
    this.state1 = splitmix64(base + 1n)
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = 1n
    }
  }

  private next(): bigint {
    let s1 = this.state0
    const s0 = this.state1
    const result = (s0 + s1) & MASK_64
    this.state0 = s0
    s1 = (s1 ^ (s1 << 23n)) & MASK_64
    this.state1 = s1 ^ s0 ^ (s1 >> 17n) ^ (s0 >> 26n)
    return result
  }

  /** Random float in [0, 1) */
  random(): number {
    return Number(this.next() & 0x1fffffffffffffn) / 0x20000000000000
  }

  /** Random integer in [min, max] */
  int(min: number, max: number): number {
    return Math.floor(this.random() * (max - min + 1)) + min
  }
}

/**
 * A fresh seed for callers that did not supply one.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * Number.MAX_SAFE_INTEGER)
}
