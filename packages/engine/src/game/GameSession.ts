/**
 * Game session integrating lanes, scheduler, judge, sheet and tick source
 */

import type {
  EndReason,
  GameSnapshot,
  RandomSource,
  RunResult,
  SheetLoadResult,
} from '@taptiles/shared'
import { NULL_NOTE_PLAYER, type NotePlayer } from '../audio/NotePlayer.js'
import { resolveGameConfig, type GameConfig } from '../config.js'
import { NoteSheet } from '../loaders/NoteSheet.js'
import { loadSheet } from '../loaders/SheetLoader.js'
import { loadSheetPack } from '../loaders/SheetPackLoader.js'
import { createLogger, type Logger } from '../logger.js'
import { InputHandler } from '../runtime/InputHandler.js'
import { Judge, type PressOutcome } from '../runtime/Judge.js'
import { LaneModel } from '../runtime/LaneModel.js'
import { SpeedPolicy } from '../runtime/SpeedPolicy.js'
import { TileScheduler } from '../runtime/TileScheduler.js'
import { GameState } from './GameState.js'
import { IntervalTickSource, type TickSource } from './TickSource.js'

/**
 * Game session options
 */
export interface GameSessionOptions {
  /** Overrides for the default configuration */
  config?: Partial<GameConfig>
  /** Frame driver (default: 60 fps interval) */
  tickSource?: TickSource
  /** Audio collaborator for sheet notes */
  player?: NotePlayer
  /** Random source for target lanes (default: Math.random) */
  random?: RandomSource
  /** Logger (default: pino child logger "session") */
  logger?: Logger
  /** Called after every processed tick with a fresh snapshot */
  onFrame?: (snapshot: GameSnapshot) => void
  /** Called once when a run ends */
  onRunEnd?: (result: RunResult) => void
}

/**
 * One game session. Each instance owns its own state, so several can run side by side.
 */
export class GameSession {
  public readonly config: GameConfig

  private state: GameState = new GameState()
  private lanes: LaneModel
  private input: InputHandler
  private judge: Judge
  private scheduler: TileScheduler
  private sheet: NoteSheet = new NoteSheet()
  // Bumped by every load or clear so a slower pack load cannot overwrite a newer sheet
  private sheetGeneration: number = 0

  private tickSource: TickSource
  private logger: Logger
  private menuVisible: boolean = true

  private readonly onFrame?: (snapshot: GameSnapshot) => void
  private readonly onRunEnd?: (result: RunResult) => void

  constructor(options: GameSessionOptions = {}) {
    this.config = resolveGameConfig(options.config)
    this.tickSource = options.tickSource ?? new IntervalTickSource()
    this.logger = options.logger ?? createLogger('session')
    this.onFrame = options.onFrame
    this.onRunEnd = options.onRunEnd

    const speed = new SpeedPolicy(this.config.speedThresholds, this.config.speedSteps)

    // Initialize systems
    this.lanes = new LaneModel(this.config.laneKeys, this.config)
    this.input = new InputHandler(this.lanes)
    this.judge = new Judge(
      this.state,
      this.lanes,
      this.input,
      this.sheet,
      options.player ?? NULL_NOTE_PLAYER
    )
    this.scheduler = new TileScheduler(this.lanes, this.state, speed, options.random)
  }

  /**
   * Reset everything but the high score and start ticking
   */
  public restart(): void {
    this.tickSource.stop()

    this.state.reset()
    this.lanes.reset()
    this.input.reset()
    this.menuVisible = false

    this.scheduler.reset()

    this.logger.info({ highScore: this.state.highScore }, 'run started')
    this.tickSource.start(() => this.tick())
  }

  /**
   * End the current run. Calling it again only re-checks the high score.
   */
  public end(reason: EndReason = 'stopped'): void {
    const newHighScore = this.state.recordHighScore()
    if (!this.state.running) return

    this.state.running = false
    this.state.endReason = reason
    this.menuVisible = true
    this.tickSource.stop()

    const result: RunResult = {
      reason,
      score: this.state.score,
      highScore: this.state.highScore,
      newHighScore,
    }
    this.logger.info(result, 'run ended')
    this.onRunEnd?.(result)
  }

  /**
   * Handle a key press from the key event source
   */
  public keyDown(key: string): PressOutcome {
    const outcome = this.judge.keyDown(key)

    if (outcome.kind === 'hit') {
      this.logger.debug({ lane: outcome.lane, score: outcome.score }, 'hit')
    } else if (outcome.kind === 'mismatch') {
      this.logger.debug({ lane: outcome.lane, expected: outcome.expected }, 'wrong lane')
      this.end('input-mismatch')
    }

    return outcome
  }

  /**
   * Handle a key release from the key event source
   * @returns Note index played, or null
   */
  public keyUp(key: string): number | null {
    return this.judge.keyUp(key)
  }

  /**
   * Load a sheet from raw file content. A failed load clears any previous sheet.
   */
  public loadSheet(data: Uint8Array, fileName: string): boolean {
    return this.applySheet(loadSheet(data, fileName, this.config.noteCount), fileName)
  }

  /**
   * Load a sheet from a ZIP sheet pack.
   * Resolves false without touching the sheet if another load or clear happened meanwhile.
   */
  public async loadSheetPack(data: Uint8Array, fileName: string): Promise<boolean> {
    const generation = ++this.sheetGeneration
    const result = await loadSheetPack(data, fileName, this.config.noteCount)

    if (generation !== this.sheetGeneration) {
      this.logger.debug({ file: fileName }, 'sheet pack load superseded')
      return false
    }
    return this.storeSheet(result, fileName)
  }

  /**
   * Apply a sheet load result obtained elsewhere (e.g. read from disk by the host)
   */
  public applySheet(result: SheetLoadResult, fileName: string): boolean {
    this.sheetGeneration++
    return this.storeSheet(result, fileName)
  }

  public clearSheet(): void {
    this.sheetGeneration++
    this.sheet.clear()
  }

  /**
   * Loaded sheet entries (empty when none is loaded)
   */
  public get sheetNotes(): number[] {
    return this.sheet.toArray()
  }

  public get running(): boolean {
    return this.state.running
  }

  /**
   * Immutable view of the session for renderers
   */
  public snapshot(): GameSnapshot {
    return {
      lanes: this.lanes.snapshot(),
      pending: this.state.pending.map(hit => ({ ...hit })),
      running: this.state.running,
      score: this.state.score,
      highScore: this.state.highScore,
      speedLevel: this.state.speedLevel,
      speed: this.scheduler.currentSpeed,
      activeLane: this.state.activeLane,
      endReason: this.state.endReason,
      menuVisible: this.menuVisible,
      sheetStatus: this.sheet.status,
    }
  }

  private storeSheet(result: SheetLoadResult, fileName: string): boolean {
    this.sheet.apply(result)
    if (result.ok) {
      this.logger.info({ file: fileName, notes: result.notes.length }, 'sheet loaded')
    } else {
      this.logger.warn({ file: fileName, error: result.error }, 'failed to parse sheet')
    }
    return result.ok
  }

  private tick(): void {
    if (!this.state.running) {
      this.tickSource.stop()
      return
    }

    const outcome = this.scheduler.tick()
    if (outcome.kind === 'missed') {
      this.logger.debug({ lane: outcome.lane }, 'tile missed')
      this.end('missed-tile')
      return
    }

    this.onFrame?.(this.snapshot())
  }
}
