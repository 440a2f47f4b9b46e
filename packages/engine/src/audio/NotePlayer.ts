/**
 * Note playback seam
 * The engine only issues "play note N"; hosts decide how it sounds
 */

import { NOTE_NAMES } from '@taptiles/shared'
import type { Logger } from '../logger.js'

/**
 * Audio collaborator. noteIndex is always within the validated sheet range.
 */
export interface NotePlayer {
  play(noteIndex: number): void
}

/**
 * Name of a catalogue note, or a placeholder for indices beyond it
 */
export function noteName(noteIndex: number): string {
  return NOTE_NAMES[noteIndex] ?? `note#${noteIndex}`
}

/**
 * Note player that writes each note to the log
 */
export class LoggingNotePlayer implements NotePlayer {
  constructor(private readonly logger: Logger) {}

  public play(noteIndex: number): void {
    this.logger.debug({ note: noteIndex, name: noteName(noteIndex) }, 'play note')
  }
}

/**
 * Note player that does nothing
 */
export const NULL_NOTE_PLAYER: NotePlayer = {
  play() {},
}
