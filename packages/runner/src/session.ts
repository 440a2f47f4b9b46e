import { readFile } from 'node:fs/promises'
import path from 'node:path'
import {
  GameSession,
  IntervalTickSource,
  LoggingNotePlayer,
  createLogger,
  loadSheetFile,
  loadSheetPack,
  type Logger,
  type TickSource,
} from '@taptiles/engine'
import type { RandomSource, RunResult, SheetLoadResult } from '@taptiles/shared'
import { AutoPlayer } from './AutoPlayer.js'
import type { RunnerConfig } from './config.js'

export interface RunSessionOptions {
  tickSource?: TickSource
  random?: RandomSource
  logger?: Logger
}

/**
 * Read a sheet file, or a sheet pack when the path ends in .zip
 */
export async function readSheetSource(
  filePath: string,
  noteCount: number
): Promise<SheetLoadResult> {
  if (path.extname(filePath).toLowerCase() !== '.zip') {
    return loadSheetFile(filePath, noteCount)
  }

  let data: Uint8Array
  try {
    data = await readFile(filePath)
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: 'missing-file',
        message: `Failed to read sheet pack ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      },
    }
  }
  return loadSheetPack(data, path.basename(filePath), noteCount)
}

/**
 * Play one run with the auto-player and resolve with its result.
 * The run is stopped after config.maxTicks frames.
 */
export async function runSession(
  config: RunnerConfig,
  options: RunSessionOptions = {}
): Promise<RunResult> {
  const logger = options.logger ?? createLogger('runner')
  let frames = 0
  let player: AutoPlayer | null = null

  return new Promise<RunResult>((resolve, reject) => {
    const session = new GameSession({
      tickSource: options.tickSource ?? new IntervalTickSource(config.tickFps),
      player: new LoggingNotePlayer(logger.child({ module: 'notes' })),
      random: options.random,
      logger,
      onFrame: snapshot => {
        frames++
        player?.onFrame(snapshot)
        if (frames >= config.maxTicks) {
          session.end('stopped')
        }
      },
      onRunEnd: result => {
        logger.info({ ...result, frames, taps: player?.taps ?? 0 }, 'summary')
        resolve(result)
      },
    })

    player = new AutoPlayer(session, {
      keys: session.config.laneKeys,
      hitLine: config.hitLine,
      missRate: config.missRate,
      random: options.random,
    })

    const start = async () => {
      if (config.sheetPath) {
        const result = await readSheetSource(config.sheetPath, session.config.noteCount)
        session.applySheet(result, config.sheetPath)
      }
      logger.info({ ...config }, 'starting run')
      session.restart()
    }

    start().catch(reject)
  })
}
