import { BLACK, lerpRgb, type RGB } from '@glyphgrid/core'

/** Milliseconds for the glow to cover ~63% of the distance to its target. */
export const SCREEN_BURN_TIME_CONSTANT_MS = 250

/**
 * Phosphor glow tracked on the CPU and handed to the scanline pass as a
 * uniform. Moves toward the burn color while enabled, back to black otherwise.
 */
export class ScreenBurn {
  private current: RGB = BLACK

  get color(): RGB {
    return this.current
  }

  update(elapsedMs: number, enabled: boolean, target: RGB): RGB {
    const goal = enabled ? target : BLACK
    if (!Number.isFinite(elapsedMs) || elapsedMs <= 0) {
      return this.current
    }
    const amount = 1 - Math.exp(-elapsedMs / SCREEN_BURN_TIME_CONSTANT_MS)
    this.current = lerpRgb(this.current, goal, amount)
    return this.current
  }
}
