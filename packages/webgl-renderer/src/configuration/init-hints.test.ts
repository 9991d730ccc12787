import { consoleLogger } from '@glyphgrid/core'
import { describe, expect, it } from 'vitest'
import {
  convertFpsToWait,
  DEFAULT_INIT_HINTS,
  resolveInitHints,
  toDevicePixels,
} from './init-hints'

describe('resolveInitHints', () => {
  it('returns the defaults when nothing is overridden', () => {
    const hints = resolveInitHints()
    expect(hints).toEqual(DEFAULT_INIT_HINTS)
    expect(hints.vsync).toBe(true)
    expect(hints.frameSleepTime).toBeNull()
    expect(hints.logger).toBe(consoleLogger)
  })

  it('merges context attributes over the defaults', () => {
    const hints = resolveInitHints({ contextAttributes: { antialias: true } })
    expect(hints.contextAttributes).toEqual({ antialias: true })
    expect(Object.isFrozen(hints)).toBe(true)
  })

  it('rejects invalid frame rates and input intervals', () => {
    expect(() => resolveInitHints({ frameSleepTime: 0 })).toThrow(RangeError)
    expect(() => resolveInitHints({ frameSleepTime: Number.POSITIVE_INFINITY })).toThrow(
      RangeError,
    )
    expect(() => resolveInitHints({ inputIntervalMs: -5 })).toThrow(RangeError)
  })

  it('rejects icons without a usable size', () => {
    expect(() =>
      resolveInitHints({ icon: { pixels: new Uint8Array(0), width: 0, height: 4 } }),
    ).toThrow('Icon dimensions must be positive integers, got 0x4')
  })
})

describe('convertFpsToWait', () => {
  it('converts a frame rate into a whole number of milliseconds', () => {
    expect(convertFpsToWait(60)).toBe(16)
    expect(convertFpsToWait(30)).toBe(33)
  })

  it('returns null when no rate is set', () => {
    expect(convertFpsToWait(null)).toBeNull()
    expect(convertFpsToWait(-1)).toBeNull()
  })
})

describe('toDevicePixels', () => {
  it('rounds scaled sizes and never returns zero', () => {
    expect(toDevicePixels({ width: 640, height: 400 }, 1.5)).toEqual({
      width: 960,
      height: 600,
    })
    expect(toDevicePixels({ width: 0.2, height: 0.2 }, 1)).toEqual({ width: 1, height: 1 })
  })

  it('treats unusable scale factors as 1', () => {
    expect(toDevicePixels({ width: 10, height: 20 }, 0)).toEqual({ width: 10, height: 20 })
  })
})
