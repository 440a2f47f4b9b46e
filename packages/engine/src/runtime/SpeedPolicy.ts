/**
 * Speed policy: score thresholds to scroll speed
 */

import { isStrictlyAscending } from '@taptiles/shared'

/**
 * Maps a score to a speed level and a level to pixels per tick
 */
export class SpeedPolicy {
  public readonly thresholds: readonly number[]
  public readonly steps: readonly number[]

  constructor(thresholds: readonly number[], steps: readonly number[]) {
    if (thresholds.length === 0) {
      throw new Error('SpeedPolicy: at least one threshold is required')
    }
    if (thresholds.length !== steps.length) {
      throw new Error(
        `SpeedPolicy: ${thresholds.length} thresholds but ${steps.length} speed steps`
      )
    }
    if (!isStrictlyAscending(thresholds)) {
      throw new Error('SpeedPolicy: thresholds must be strictly ascending')
    }
    if (steps.some(s => !(s > 0))) {
      throw new Error('SpeedPolicy: speed steps must be positive')
    }
    this.thresholds = [...thresholds]
    this.steps = [...steps]
  }

  /**
   * Highest level reachable by the configured tables
   */
  public get maxLevel(): number {
    return this.steps.length - 1
  }

  /**
   * Get the speed level for a score.
   * A score in [thresholds[i], thresholds[i + 1]) selects level i + 1; below the first
   * threshold the previous level is kept and past the last one the level clamps to maxLevel.
   * The result never drops below previousLevel.
   */
  public levelFor(score: number, previousLevel: number = 0): number {
    const t = this.thresholds
    let level = previousLevel

    if (score >= t[t.length - 1]) {
      level = this.maxLevel
    } else {
      for (let i = 0; i < t.length - 1; i++) {
        if (score >= t[i] && score < t[i + 1]) {
          level = i + 1
          break
        }
      }
    }

    return Math.min(this.maxLevel, Math.max(previousLevel, level))
  }

  /**
   * Pixels advanced per tick at a level
   */
  public speedFor(level: number): number {
    const i = Math.min(this.maxLevel, Math.max(0, Math.floor(level)))
    return this.steps[i]
  }
}
