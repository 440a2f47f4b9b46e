/**
 * Run state management
 */

import type { EndReason, PendingHit, RunState } from '@taptiles/shared'

/**
 * State of one session: the current run plus the best score so far
 */
export class GameState implements RunState {
  // Playback state
  public running: boolean = false
  public endReason: EndReason | null = null

  // Score
  public score: number = 0
  public highScore: number = 0

  // Spawning
  public speedLevel: number = 0
  public activeLane: number = 0

  // Guide lock starts set so releases before the first run do nothing
  public guideLocked: boolean = true

  // Tiles waiting for a key press, oldest first
  public pending: PendingHit[] = []

  /**
   * Reset for a new run. The high score survives.
   */
  public reset(): void {
    this.running = true
    this.endReason = null
    this.score = 0
    this.speedLevel = 0
    this.activeLane = 0
    this.guideLocked = false
    this.pending = []
  }

  /**
   * Queue a tile for judgement
   */
  public enqueue(hit: PendingHit): void {
    this.pending.push(hit)
  }

  /**
   * Take the oldest pending hit
   */
  public dequeue(): PendingHit | undefined {
    return this.pending.shift()
  }

  public hasPending(): boolean {
    return this.pending.length > 0
  }

  /**
   * Fold the current score into the high score
   * @returns Whether the high score was raised
   */
  public recordHighScore(): boolean {
    if (this.score > this.highScore) {
      this.highScore = this.score
      return true
    }
    return false
  }
}
