/**
 * Input handler for keyboard lanes
 * Tracks held keys so that only the leading edge of a press counts
 */

import type { LaneModel } from './LaneModel.js'

/**
 * Normalize a raw key identifier for lookup
 */
export function normalizeKey(key: string): string {
  return key.toUpperCase()
}

/**
 * Key activation tracking and key to lane lookup
 */
export class InputHandler {
  private active: Set<string> = new Set()

  constructor(private readonly lanes: LaneModel) {}

  /**
   * Register a key press.
   * @returns false for a repeat of a key that is already held
   */
  public press(key: string): boolean {
    const k = normalizeKey(key)
    if (this.active.has(k)) return false
    this.active.add(k)
    return true
  }

  /**
   * Register a key release
   */
  public release(key: string): void {
    this.active.delete(normalizeKey(key))
  }

  public isHeld(key: string): boolean {
    return this.active.has(normalizeKey(key))
  }

  /**
   * Lane bound to a key, or undefined for keys outside the alphabet
   */
  public laneFor(key: string): number | undefined {
    return this.lanes.laneForKey(normalizeKey(key))
  }

  /**
   * Forget all held keys
   */
  public reset(): void {
    this.active.clear()
  }
}
