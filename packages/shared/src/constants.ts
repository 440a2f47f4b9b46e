// Playfield geometry (pixels)
export const VIEWPORT = {
  WIDTH: 400,
  HEIGHT: 450,
} as const

export const TILE = {
  WIDTH: 100,
  HEIGHT: 150,
} as const

/** Offset of a parked tile, fully above the visible band */
export const PARKED_OFFSET = -TILE.HEIGHT

export const LANE_COUNT = 4

// Lane index order
export const LANE_KEYS = ['D', 'F', 'J', 'K'] as const

/**
 * Score thresholds for each speed level.
 * Tile advance is kept a divisor of TILE.HEIGHT so consecutive tiles never leave a gap.
 */
export const SPEED_THRESHOLDS = [10, 25, 45, 75, 110] as const

/** Pixels advanced per tick at each speed level */
export const SPEED_STEPS = [2, 3, 5, 10, 15] as const

/**
 * Note catalogue, indexed by sheet value
 */
export const NOTE_NAMES = [
  'C6', 'C#6', 'D6', 'D#6', 'E6', 'F6',
  'F#6', 'G6', 'G#6', 'A6', 'A#6', 'B6',
  'C7', 'C#7', 'D7', 'D#7', 'E7', 'F7',
  'F#7', 'G7', 'G#7', 'A7', 'A#7', 'B7',
] as const

export const NOTE_COUNT = NOTE_NAMES.length

export type NoteName = typeof NOTE_NAMES[number]

export const SHEET_STATUS = {
  EMPTY: 'No sheet loaded',
  LOADED_PREFIX: 'Loaded ',
} as const
