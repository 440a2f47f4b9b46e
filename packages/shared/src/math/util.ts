/**
 * Math utility functions shared by the engine and its hosts
 */

/**
 * Clamp a value between min and max
 */
export function clamp(x: number, a: number, b: number): number {
  return x < a ? a : x > b ? b : x
}

/**
 * Modulo that always lands in [0, n), also for negative x
 */
export function mod(x: number, n: number): number {
  return ((x % n) + n) % n
}

/**
 * Source of uniform random numbers in [0, 1)
 */
export type RandomSource = () => number

/**
 * Pick a uniform random integer in [0, n)
 * @param n Exclusive upper bound
 * @param random Random source (default: Math.random)
 */
export function randomInt(n: number, random: RandomSource = Math.random): number {
  return clamp(Math.floor(random() * n), 0, n - 1)
}

/**
 * Check that a numeric list is strictly ascending
 */
export function isStrictlyAscending(values: readonly number[]): boolean {
  for (let i = 1; i < values.length; i++) {
    if (values[i] <= values[i - 1]) return false
  }
  return true
}

/**
 * Get current time in milliseconds using high-resolution timer
 */
export function nowMs(): number {
  return performance.now()
}
