/**
 * Lane model: per-lane tile position and key guide state
 */

import type { GuideState, Lane } from '@taptiles/shared'

export interface LaneGeometry {
  viewportHeight: number
  tileWidth: number
  tileHeight: number
}

/**
 * Owns the lanes of a session. A lane carries at most one tile; it is occupied
 * whenever its offset is above the parked offset.
 */
export class LaneModel {
  public readonly lanes: Lane[]
  public readonly parkedOffset: number

  constructor(
    keys: readonly string[],
    private readonly geometry: LaneGeometry
  ) {
    this.parkedOffset = -geometry.tileHeight
    this.lanes = keys.map((key, index): Lane => ({
      index,
      key,
      offset: this.parkedOffset,
      x: 0,
      guide: 'idle',
    }))
  }

  public get count(): number {
    return this.lanes.length
  }

  /**
   * Park every lane at x = 0 and clear the key guides
   */
  public reset(): void {
    for (const lane of this.lanes) {
      lane.offset = this.parkedOffset
      lane.x = 0
      lane.guide = 'idle'
    }
  }

  /**
   * Move a lane's tile back above the visible band
   */
  public park(index: number): void {
    this.lane(index).offset = this.parkedOffset
  }

  /**
   * Place a lane's tile over the column of its target lane
   */
  public placeOver(index: number, targetLane: number): void {
    this.lane(index).x = targetLane * this.geometry.tileWidth
  }

  public advance(index: number, px: number): void {
    this.lane(index).offset += px
  }

  public setGuide(index: number, guide: GuideState): void {
    this.lane(index).guide = guide
  }

  public isIdle(index: number): boolean {
    return this.lane(index).offset <= this.parkedOffset
  }

  public isDescending(index: number): boolean {
    const offset = this.lane(index).offset
    return offset > this.parkedOffset && offset < this.geometry.viewportHeight
  }

  /**
   * Tile has reached the bottom of the playfield unresolved
   */
  public isPast(index: number): boolean {
    return this.lane(index).offset >= this.geometry.viewportHeight
  }

  /**
   * Index of the lane bound to a (normalized) key, or undefined
   */
  public laneForKey(key: string): number | undefined {
    const lane = this.lanes.find(l => l.key === key)
    return lane?.index
  }

  public snapshot(): Readonly<Lane>[] {
    return this.lanes.map(lane => ({ ...lane }))
  }

  private lane(index: number): Lane {
    const lane = this.lanes[index]
    if (!lane) {
      throw new Error(`LaneModel: no lane at index ${index}`)
    }
    return lane
  }
}
