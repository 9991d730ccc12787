import { BLACK, CYAN, WHITE } from '@glyphgrid/core'
import { describe, expect, it } from 'vitest'
import { SCREEN_BURN_TIME_CONSTANT_MS, ScreenBurn } from './screen-burn'

describe('ScreenBurn', () => {
  it('starts black', () => {
    expect(new ScreenBurn().color).toEqual(BLACK)
  })

  it('covers 1 - 1/e of the distance per time constant', () => {
    const burn = new ScreenBurn()
    const color = burn.update(SCREEN_BURN_TIME_CONSTANT_MS, true, WHITE)
    expect(color.r).toBeCloseTo(1 - Math.exp(-1), 6)
  })

  it('converges on the burn color while enabled', () => {
    const burn = new ScreenBurn()
    for (let frame = 0; frame < 300; frame += 1) {
      burn.update(16, true, CYAN)
    }
    expect(burn.color.r).toBe(0)
    expect(burn.color.g).toBeCloseTo(1, 3)
    expect(burn.color.b).toBeCloseTo(1, 3)
  })

  it('decays to black once disabled', () => {
    const burn = new ScreenBurn()
    burn.update(10_000, true, WHITE)
    for (let frame = 0; frame < 300; frame += 1) {
      burn.update(16, false, WHITE)
    }
    expect(burn.color.r).toBeCloseTo(0, 3)
  })

  it('ignores frames without elapsed time', () => {
    const burn = new ScreenBurn()
    expect(burn.update(0, true, WHITE)).toEqual(BLACK)
    expect(burn.update(Number.NaN, true, WHITE)).toEqual(BLACK)
  })
})
