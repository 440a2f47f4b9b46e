/**
 * Core runtime types
 * These types represent the state of lanes, pending hits and a run
 */

/**
 * Key guide indicator shown under each lane
 */
export type GuideState = 'idle' | 'pressed' | 'failed'

/**
 * Runtime lane data
 */
export interface Lane {
  index: number
  key: string               // Assigned key identifier (upper case)
  offset: number            // Vertical position in pixels (parked = -tile height)
  x: number                 // Horizontal position, set from the target lane on spawn
  guide: GuideState
}

/**
 * A tile waiting to be resolved by a key press
 */
export interface PendingHit {
  /** Lane whose key must be pressed */
  targetLane: number
  /** Lane (tile) that scrolls for this hit and is parked on success */
  tileIndex: number
}

/**
 * Why a run ended
 */
export type EndReason = 'input-mismatch' | 'missed-tile' | 'stopped'

/**
 * Mutable state of the current run
 */
export interface RunState {
  running: boolean
  score: number
  highScore: number
  speedLevel: number
  /** Lane that spawns next (round robin) */
  activeLane: number
  /** Set until restart once the failed key guide has been shown */
  guideLocked: boolean
  endReason: EndReason | null
}

/**
 * Immutable view of a session, handed to renderers once per frame
 */
export interface GameSnapshot {
  lanes: readonly Readonly<Lane>[]
  pending: readonly Readonly<PendingHit>[]
  running: boolean
  score: number
  highScore: number
  speedLevel: number
  /** Pixels advanced per tick at the current level */
  speed: number
  activeLane: number
  endReason: EndReason | null
  menuVisible: boolean
  sheetStatus: string
}

/**
 * Result of a finished run
 */
export interface RunResult {
  reason: EndReason
  score: number
  highScore: number
  newHighScore: boolean
}
