import type { WindowPlatform } from '../types'

type FrameCallback = (timestamp: number) => void

type SchedulingHandle = { cancel(): void }

type ScheduleFrame = (callback: FrameCallback) => SchedulingHandle

export interface FrameSchedulerOptions {
  /** Wait for the display's next refresh when the platform supports it. */
  readonly vsync: boolean
  /** Delay between frames when not vsync-paced. */
  readonly frameIntervalMs: number
}

const createTimeoutScheduler = (
  platform: WindowPlatform,
  delayMs: number,
): ScheduleFrame => {
  return (callback) => {
    const id = setTimeout(() => {
      callback(platform.now())
    }, delayMs)
    return {
      cancel: () => clearTimeout(id),
    }
  }
}

const createRafScheduler = (
  platform: WindowPlatform,
  options: FrameSchedulerOptions,
): ScheduleFrame => {
  const request = platform.requestAnimationFrame
  const cancel = platform.cancelAnimationFrame
  if (!options.vsync || !request) {
    return createTimeoutScheduler(platform, options.frameIntervalMs)
  }
  return (callback) => {
    const handle = request.call(platform, (timestamp) => {
      callback(timestamp)
    })
    return {
      cancel: () => cancel?.call(platform, handle),
    }
  }
}

/**
 * Coalesces frame requests: at most one frame is pending, and the most recent
 * callback is the one that runs.
 */
export class FrameScheduler {
  private readonly scheduleFrame: ScheduleFrame
  private pendingHandle: SchedulingHandle | null = null
  private pendingCallback: FrameCallback | null = null

  constructor(platform: WindowPlatform, options: FrameSchedulerOptions) {
    this.scheduleFrame = createRafScheduler(platform, options)
  }

  get pending(): boolean {
    return this.pendingHandle !== null
  }

  request(callback: FrameCallback): void {
    this.pendingCallback = callback
    if (this.pendingHandle) {
      return
    }
    this.pendingHandle = this.scheduleFrame((timestamp) => {
      this.pendingHandle = null
      const cb = this.pendingCallback
      this.pendingCallback = null
      if (cb) {
        cb(timestamp)
      }
    })
  }

  cancel(): void {
    if (this.pendingHandle) {
      this.pendingHandle.cancel()
      this.pendingHandle = null
      this.pendingCallback = null
    }
  }
}
