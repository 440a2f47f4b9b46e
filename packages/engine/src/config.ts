/**
 * Game configuration and validation
 */

import {
  LANE_KEYS,
  NOTE_COUNT,
  SPEED_STEPS,
  SPEED_THRESHOLDS,
  TILE,
  VIEWPORT,
} from '@taptiles/shared'

/**
 * Game configuration
 */
export interface GameConfig {
  /** Key identifier for each lane, in lane order (also fixes the lane count) */
  laneKeys: readonly string[]
  /** Height of the playfield; a tile at or past it is missed */
  viewportHeight: number
  /** Tile width, used to place a tile over its target lane */
  tileWidth: number
  /** Tile height; parked tiles sit at -tileHeight */
  tileHeight: number
  /** Ascending score thresholds for each speed level */
  speedThresholds: readonly number[]
  /** Pixels per tick at each speed level */
  speedSteps: readonly number[]
  /** Number of playable notes; sheet values must lie in [0, noteCount) */
  noteCount: number
}

/**
 * Default configuration (four lanes on D F J K)
 */
export const DEFAULT_GAME_CONFIG: GameConfig = {
  laneKeys: LANE_KEYS,
  viewportHeight: VIEWPORT.HEIGHT,
  tileWidth: TILE.WIDTH,
  tileHeight: TILE.HEIGHT,
  speedThresholds: SPEED_THRESHOLDS,
  speedSteps: SPEED_STEPS,
  noteCount: NOTE_COUNT,
}

/**
 * Merge overrides onto the defaults and validate the result
 * @throws Error naming the first invalid field
 */
export function resolveGameConfig(overrides?: Partial<GameConfig>): GameConfig {
  const config: GameConfig = {
    ...DEFAULT_GAME_CONFIG,
    ...overrides,
  }

  const keys = config.laneKeys.map(k => k.toUpperCase())
  if (keys.length < 1) {
    throw new Error('Invalid config: laneKeys must name at least one lane')
  }
  if (new Set(keys).size !== keys.length) {
    throw new Error(`Invalid config: laneKeys must be unique (got ${keys.join(', ')})`)
  }
  if (!(config.viewportHeight > 0)) {
    throw new Error(`Invalid config: viewportHeight must be positive (got ${config.viewportHeight})`)
  }
  if (!(config.tileWidth > 0) || !(config.tileHeight > 0)) {
    throw new Error('Invalid config: tile dimensions must be positive')
  }
  if (!Number.isInteger(config.noteCount) || config.noteCount < 1) {
    throw new Error(`Invalid config: noteCount must be a positive integer (got ${config.noteCount})`)
  }

  return { ...config, laneKeys: keys }
}
