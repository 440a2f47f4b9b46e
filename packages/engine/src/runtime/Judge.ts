/**
 * Judge system for key presses
 * Resolves the oldest pending tile on every accepted press
 */

import type { NotePlayer } from '../audio/NotePlayer.js'
import type { GameState } from '../game/GameState.js'
import type { NoteSheet } from '../loaders/NoteSheet.js'
import type { InputHandler } from './InputHandler.js'
import type { LaneModel } from './LaneModel.js'

/**
 * What a key press did
 */
export type PressOutcome =
  | { kind: 'repeat' }
  | { kind: 'ignored' }
  | { kind: 'hit'; lane: number; score: number }
  | { kind: 'mismatch'; lane: number; expected: number }

/**
 * Judge with FIFO matching: a press is compared against the oldest pending
 * hit regardless of which tile is closest to the bottom
 */
export class Judge {
  constructor(
    private readonly state: GameState,
    private readonly lanes: LaneModel,
    private readonly input: InputHandler,
    private readonly sheet: NoteSheet,
    private readonly player: NotePlayer
  ) {}

  /**
   * Judge a key press.
   * A mismatch consumes the pending hit; ending the run is up to the caller.
   */
  public keyDown(key: string): PressOutcome {
    // Accept only the leading edge until the key is released
    if (!this.input.press(key)) return { kind: 'repeat' }

    if (!this.state.hasPending()) return { kind: 'ignored' }

    const lane = this.input.laneFor(key)
    if (lane === undefined || !this.state.running) return { kind: 'ignored' }

    this.lanes.setGuide(lane, 'pressed')

    const hit = this.state.dequeue()
    if (!hit) return { kind: 'ignored' }

    if (hit.targetLane === lane) {
      this.lanes.park(hit.tileIndex)
      this.state.score++
      return { kind: 'hit', lane, score: this.state.score }
    }

    return { kind: 'mismatch', lane, expected: hit.targetLane }
  }

  /**
   * Handle a key release: restore or fail the key guide and play the sheet note
   * @returns Note index sent to the player, or null
   */
  public keyUp(key: string): number | null {
    this.input.release(key)

    const lane = this.input.laneFor(key)
    if (lane === undefined) return null
    if (this.state.guideLocked) return null

    if (this.state.running) {
      this.lanes.setGuide(lane, 'idle')
    } else {
      this.lanes.setGuide(lane, 'failed')
      this.state.guideLocked = true
    }

    const note = this.sheet.noteForScore(this.state.score)
    if (note === null) return null

    this.player.play(note)
    return note
  }
}
