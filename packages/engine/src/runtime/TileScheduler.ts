/**
 * Tile scheduler: spawns tiles round robin, advances them and detects misses
 */

import { randomInt, type RandomSource } from '@taptiles/shared'
import type { GameState } from '../game/GameState.js'
import type { LaneModel } from './LaneModel.js'
import type { SpeedPolicy } from './SpeedPolicy.js'

/**
 * Result of one scheduler tick
 */
export type TickOutcome =
  | { kind: 'advanced' }
  | { kind: 'missed'; lane: number }

/**
 * Drives the lanes once per frame.
 *
 * Only the active spawn lane may take a new tile, and only once its previous tile
 * is parked. The lane a tile scrolls in and the lane whose key resolves it are
 * chosen independently: the tile is drawn over a random target lane.
 */
export class TileScheduler {
  constructor(
    private readonly lanes: LaneModel,
    private readonly state: GameState,
    private readonly speed: SpeedPolicy,
    private readonly random: RandomSource = Math.random
  ) {}

  /**
   * Rewind to lane 0. The first tick spawns into lane 1 and moves it right away.
   */
  public reset(): void {
    this.state.activeLane = 0
    this.state.speedLevel = 0
  }

  /**
   * Current advance in pixels per tick
   */
  public get currentSpeed(): number {
    return this.speed.speedFor(this.state.speedLevel)
  }

  /**
   * Try to put a tile in the lane after the active one.
   * @returns Whether a tile was spawned
   */
  public spawn(): boolean {
    const next = (this.state.activeLane + 1) % this.lanes.count
    if (!this.lanes.isIdle(next)) return false

    this.state.activeLane = next
    const targetLane = randomInt(this.lanes.count, this.random)
    this.lanes.placeOver(next, targetLane)
    this.state.enqueue({ targetLane, tileIndex: next })
    this.state.speedLevel = this.speed.levelFor(this.state.score, this.state.speedLevel)
    return true
  }

  /**
   * Advance one frame.
   * A tile at or past the bottom is reported before anything moves.
   */
  public tick(): TickOutcome {
    for (let i = 0; i < this.lanes.count; i++) {
      if (this.lanes.isPast(i)) {
        return { kind: 'missed', lane: i }
      }
    }

    for (let i = 0; i < this.lanes.count; i++) {
      const isActive = i === this.state.activeLane
      if (!isActive && !this.lanes.isDescending(i)) continue

      if (isActive) {
        // Hand over to the next lane once this tile is fully in view or nothing is pending
        const offset = this.lanes.lanes[i].offset
        if (offset >= 0 || !this.state.hasPending()) {
          this.spawn()
          continue
        }
      }

      this.lanes.advance(i, this.currentSpeed)
    }

    return { kind: 'advanced' }
  }
}
