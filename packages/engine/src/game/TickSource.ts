/**
 * Frame tick sources
 */

import { nowMs } from '@taptiles/shared'

/**
 * Called once per frame with the milliseconds since the previous frame
 */
export type TickHandler = (deltaMs: number) => void

/**
 * Anything that can drive a session frame by frame.
 * Stopping is the only way to cancel; no ticks arrive after stop().
 */
export interface TickSource {
  start(handler: TickHandler): void
  stop(): void
  readonly active: boolean
}

/**
 * Tick source backed by setInterval
 */
export class IntervalTickSource implements TickSource {
  private timer: ReturnType<typeof setInterval> | null = null
  private lastMs: number = 0

  constructor(private readonly fps: number = 60) {
    if (!(fps > 0)) {
      throw new Error(`IntervalTickSource: fps must be positive (got ${fps})`)
    }
  }

  public get active(): boolean {
    return this.timer !== null
  }

  public start(handler: TickHandler): void {
    this.stop()
    this.lastMs = nowMs()
    this.timer = setInterval(() => {
      const now = nowMs()
      const delta = now - this.lastMs
      this.lastMs = now
      handler(delta)
    }, 1000 / this.fps)
  }

  public stop(): void {
    if (this.timer !== null) {
      clearInterval(this.timer)
      this.timer = null
    }
  }
}

/**
 * Tick source that only advances when step() is called
 */
export class ManualTickSource implements TickSource {
  private handler: TickHandler | null = null

  constructor(private readonly frameMs: number = 1000 / 60) {}

  public get active(): boolean {
    return this.handler !== null
  }

  public start(handler: TickHandler): void {
    this.handler = handler
  }

  public stop(): void {
    this.handler = null
  }

  /**
   * Deliver up to n ticks, stopping early if the source is stopped
   * @returns Number of ticks delivered
   */
  public step(n: number = 1): number {
    let delivered = 0
    for (let i = 0; i < n; i++) {
      const handler = this.handler
      if (!handler) break
      handler(this.frameMs)
      delivered++
    }
    return delivered
  }
}
