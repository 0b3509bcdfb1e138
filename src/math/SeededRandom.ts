/**
 * The single source of randomness the simulation draws from.
 * Anything with a `next()` in [0, 1) will do; tests pass fixed sequences.
 */
export interface RandomSource {
  next(): number
}

/**
 * Weighted option for {@link weightedChoice}
 */
export interface WeightedEntry<T> {
  readonly value: T
  readonly weight: number
}

/**
 * Random integer in [min, max], both inclusive
 */
export function randomInt(rng: RandomSource, min: number, max: number): number {
  const span = max - min + 1
  return min + Math.min(span - 1, Math.floor(rng.next() * span))
}

/**
 * Random float in [min, max)
 */
export function randomRange(rng: RandomSource, min: number, max: number): number {
  return min + rng.next() * (max - min)
}

/**
 * True with the given probability
 */
export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability
}

/**
 * Random element of an array, undefined when empty
 */
export function pickOne<T>(rng: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined
  return items[Math.min(items.length - 1, Math.floor(rng.next() * items.length))]
}

/**
 * Weighted pick using an integer roll in [1, total weight].
 * Non-positive weights never win. Returns null when nothing can win.
 */
export function weightedChoice<T>(rng: RandomSource, entries: readonly WeightedEntry<T>[]): T | null {
  let total = 0
  for (const entry of entries) {
    total += Math.max(0, entry.weight)
  }
  if (total <= 0) return null

  const roll = Math.min(total, Math.floor(rng.next() * total) + 1)
  let cumulative = 0
  for (const entry of entries) {
    const weight = Math.max(0, entry.weight)
    cumulative += weight
    if (weight > 0 && roll <= cumulative) {
      return entry.value
    }
  }
  return null
}

/**
 * Deterministic seeded random number generator using xorshift32 algorithm.
 * Same seed, same sequence: the whole simulation replays from it.
 */
export class SeededRandom implements RandomSource {
  private state: number

  constructor(seed: number) {
    this.state = seed >>> 0 || 1
  }

  /**
   * Returns a random float between 0 (inclusive) and 1 (exclusive)
   */
  next(): number {
    let x = this.state
    x ^= x << 13
    x ^= x >>> 17
    x ^= x << 5
    this.state = x >>> 0
    return this.state / 0x100000000
  }
}
