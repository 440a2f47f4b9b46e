/**
 * Runner configuration from environment variables
 */

export interface RunnerConfig {
  /** Frames per second of the interval tick source */
  tickFps: number
  /** Sheet file (.txt) or sheet pack (.zip) to load before the run */
  sheetPath: string | null
  /** Chance in [0, 1] that the auto-player presses a wrong lane */
  missRate: number
  /** Tile offset at which the auto-player presses */
  hitLine: number
  /** Frames after which the run is stopped */
  maxTicks: number
}

type Env = Record<string, string | undefined>

function positiveInt(name: string, raw: string): number {
  const value = parseInt(raw, 10)
  if (!Number.isFinite(value) || value < 1) {
    throw new Error(`Invalid ${name}: expected a positive integer (got "${raw}")`)
  }
  return value
}

/**
 * Read the runner configuration. Absent variables take their defaults.
 * @throws Error naming the first invalid variable
 */
export function loadRunnerConfig(env: Env = process.env): RunnerConfig {
  const missRate = parseFloat(env.AUTOPLAY_MISS_RATE || '0')
  if (!(missRate >= 0 && missRate <= 1)) {
    throw new Error(`Invalid AUTOPLAY_MISS_RATE: expected a number in [0, 1] (got "${env.AUTOPLAY_MISS_RATE}")`)
  }

  const hitLine = parseInt(env.AUTOPLAY_HIT_LINE || '300', 10)
  if (!Number.isFinite(hitLine)) {
    throw new Error(`Invalid AUTOPLAY_HIT_LINE: expected an integer (got "${env.AUTOPLAY_HIT_LINE}")`)
  }

  return {
    tickFps: positiveInt('TICK_FPS', env.TICK_FPS || '60'),
    sheetPath: env.SHEET_PATH || null,
    missRate,
    hitLine,
    maxTicks: positiveInt('MAX_TICKS', env.MAX_TICKS || '3600'),
  }
}
