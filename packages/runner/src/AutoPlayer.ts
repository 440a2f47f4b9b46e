/**
 * Headless player: presses the oldest pending target once its tile crosses the hit line
 */

import type { GameSnapshot, RandomSource } from '@taptiles/shared'
import type { GameSession } from '@taptiles/engine'

export type KeyTarget = Pick<GameSession, 'keyDown' | 'keyUp'>

export interface AutoPlayerOptions {
  /** Lane keys in lane order */
  keys: readonly string[]
  hitLine: number
  /** Chance of pressing the lane after the target instead */
  missRate?: number
  random?: RandomSource
}

export class AutoPlayer {
  private readonly keys: readonly string[]
  private readonly hitLine: number
  private readonly missRate: number
  private readonly random: RandomSource

  /** Number of key taps issued */
  public taps: number = 0

  constructor(
    private readonly target: KeyTarget,
    options: AutoPlayerOptions
  ) {
    this.keys = options.keys
    this.hitLine = options.hitLine
    this.missRate = options.missRate ?? 0
    this.random = options.random ?? Math.random
  }

  /**
   * Inspect a frame and tap at most one key
   * @returns Key tapped, or null
   */
  public onFrame(snapshot: GameSnapshot): string | null {
    const next = snapshot.pending[0]
    if (!next || !snapshot.running) return null

    const tile = snapshot.lanes[next.tileIndex]
    if (!tile || tile.offset < this.hitLine) return null

    let lane = next.targetLane
    if (this.missRate > 0 && this.random() < this.missRate) {
      lane = (lane + 1) % this.keys.length
    }

    const key = this.keys[lane]
    this.target.keyDown(key)
    this.target.keyUp(key)
    this.taps++
    return key
  }
}
