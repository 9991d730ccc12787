import { consoleLogger } from '@glyphgrid/core'
import type { InitHints, PixelSize } from '../types'

export const DEFAULT_INIT_HINTS: InitHints = Object.freeze({
  allowResize: true,
  vsync: true,
  fullscreen: false,
  centered: false,
  srgb: false,
  icon: null,
  frameSleepTime: null,
  resizeScaling: false,
  contextAttributes: Object.freeze({}),
  inputIntervalMs: 0,
  logger: consoleLogger,
})

const isPositiveFinite = (value: number): boolean =>
  Number.isFinite(value) && value > 0

export const resolveInitHints = (overrides: Partial<InitHints> = {}): InitHints => {
  const hints: InitHints = Object.freeze({
    ...DEFAULT_INIT_HINTS,
    ...overrides,
    contextAttributes: Object.freeze({
      ...DEFAULT_INIT_HINTS.contextAttributes,
      ...overrides.contextAttributes,
    }),
  })

  if (hints.frameSleepTime !== null && !isPositiveFinite(hints.frameSleepTime)) {
    throw new RangeError(
      `frameSleepTime must be a positive frame rate or null, got ${hints.frameSleepTime}`,
    )
  }
  if (!Number.isFinite(hints.inputIntervalMs) || hints.inputIntervalMs < 0) {
    throw new RangeError(
      `inputIntervalMs must be >= 0, got ${hints.inputIntervalMs}`,
    )
  }
  if (
    hints.icon &&
    (!Number.isInteger(hints.icon.width) ||
      !Number.isInteger(hints.icon.height) ||
      hints.icon.width <= 0 ||
      hints.icon.height <= 0)
  ) {
    throw new RangeError(
      `Icon dimensions must be positive integers, got ${hints.icon.width}x${hints.icon.height}`,
    )
  }
  return hints
}

/** Milliseconds to wait between frames for a target rate, or null to not wait. */
export const convertFpsToWait = (fps: number | null): number | null => {
  if (fps === null || !isPositiveFinite(fps)) {
    return null
  }
  return Math.floor(1000 / fps)
}

const clampPositive = (value: number, fallback: number): number =>
  Number.isFinite(value) && value > 0 ? value : fallback

export const toDevicePixels = (
  logical: PixelSize,
  scaleFactor: number,
): PixelSize => {
  const scale = clampPositive(scaleFactor, 1)
  return {
    width: Math.max(1, Math.round(logical.width * scale)),
    height: Math.max(1, Math.round(logical.height * scale)),
  }
}
