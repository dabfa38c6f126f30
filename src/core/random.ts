/** @file random.ts */

/**
 *  ## Random
 *
 *  Seeded pseudo-random source (Mulberry32). Every draw of a run goes through
 *  one instance so that a seed reproduces the run bit for bit. Never call
 *  `Math.random()` inside the engine.
 */
export class Random {
  private state: number

  constructor(readonly seed: number) {
    this.state = seed >>> 0
  }

  /**
   * Returns a float in [0, 1) and advances the internal state.
   */
  next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }

  /**
   * Normally distributed sample (Box-Muller), `std` of 0 returns the mean.
   */
  normal(mean = 0, std = 1): number {
    if (std === 0) return mean
    let u1 = 0
    do {
      u1 = this.next()
    } while (u1 <= 1e-12)
    const u2 = this.next()
    const z0 = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
    return mean + z0 * std
  }

  /**
   * Integer in [0, max).
   */
  integer(max: number): number {
    return Math.floor(this.next() * max)
  }

  /**
   * Uniform pick from a non-empty list, `undefined` when the list is empty.
   */
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined
    return items[this.integer(items.length)]
  }

  /**
   * Draws `count` distinct items (partial Fisher-Yates on a copy).
   */
  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items]
    const take = Math.min(count, pool.length)
    for (let i = 0; i < take; i++) {
      const j = i + this.integer(pool.length - i)
      ;[pool[i], pool[j]] = [pool[j], pool[i]]
    }
    return pool.slice(0, take)
  }
}
