/**
 * Loaded note sheet
 */

import { mod, SHEET_STATUS, type SheetLoadResult } from '@taptiles/shared'

/**
 * Holds at most one validated sheet. A failed load clears the current one.
 */
export class NoteSheet {
  private notes: number[] = []
  private name: string | null = null

  public get loaded(): boolean {
    return this.name !== null
  }

  public get length(): number {
    return this.notes.length
  }

  public get fileName(): string | null {
    return this.name
  }

  /**
   * Status line for the menu
   */
  public get status(): string {
    return this.name !== null ? SHEET_STATUS.LOADED_PREFIX + this.name : SHEET_STATUS.EMPTY
  }

  /**
   * Apply the outcome of a load: replace the sheet on success, clear it on failure
   */
  public apply(result: SheetLoadResult): void {
    if (result.ok) {
      this.notes = [...result.notes]
      this.name = result.name
    } else {
      this.clear()
    }
  }

  public clear(): void {
    this.notes = []
    this.name = null
  }

  /**
   * Note to play after reaching a score: entry (score - 1) mod length.
   * At score 0 this wraps to the last entry.
   */
  public noteForScore(score: number): number | null {
    if (!this.loaded || this.notes.length === 0) return null
    return this.notes[mod(score - 1, this.notes.length)]
  }

  public toArray(): number[] {
    return [...this.notes]
  }
}
