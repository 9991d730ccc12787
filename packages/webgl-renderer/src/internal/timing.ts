const FPS_WINDOW_MS = 1000

export interface FrameTiming {
  readonly frameTimeMs: number
  readonly fps: number
}

/**
 * Frame time is per frame; the rate is frames counted over windows of at
 * least one second, so it only changes once per window.
 */
export class FrameTimer {
  private lastFrameAt: number | null = null
  private windowStart: number | null = null
  private framesInWindow = 0
  private fps = 0

  tick(now: number): FrameTiming {
    const frameTimeMs = this.lastFrameAt === null ? 0 : Math.max(0, now - this.lastFrameAt)
    this.lastFrameAt = now

    if (this.windowStart === null) {
      this.windowStart = now
    }
    this.framesInWindow += 1
    const windowElapsed = now - this.windowStart
    if (windowElapsed >= FPS_WINDOW_MS) {
      this.fps = Math.round((this.framesInWindow * 1000) / windowElapsed)
      this.framesInWindow = 0
      this.windowStart = now
    }
    return { frameTimeMs, fps: this.fps }
  }
}
