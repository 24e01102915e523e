export class SeededRandom {
  private state: number

  constructor(seed: number) {
    // Force into uint32.
    this.state = seed >>> 0 || 0x12345678
  }

  /** xorshift32 */
  private nextU32(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state
  }

  nextFloat(): number {
    // [0, 1)
    return this.nextU32() / 0x1_0000_0000
  }

  /**
   * Box-Muller transform; u1 is kept in (0, 1] so the log is finite.
   */
  normal(mean: number, stdDev: number): number {
    const u1 = 1 - this.nextFloat()
    const u2 = this.nextFloat()
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
    return mean + stdDev * z
  }

  /**
   * Normal draw restricted to [min, max] by rejection, falling back to the clamped centre.
   */
  truncatedNormal(mean: number, stdDev: number, min: number, max: number, maxAttempts = 100): number {
    if (stdDev <= 0) return Math.min(Math.max(mean, min), max)
    for (let i = 0; i < maxAttempts; i++) {
      const x = this.normal(mean, stdDev)
      if (x >= min && x <= max) return x
    }
    return Math.min(Math.max(mean, min), max)
  }
}

export function generateSeed(): number {
  return Math.floor(Math.random() * 0x1_0000_0000) >>> 0
}
