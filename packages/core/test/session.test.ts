import { describe, expect, it } from 'vitest'
import { createCell, glyphForChar, isBlankGlyph } from '../src/cell'
import { CYAN, lerpRgb, rgbFromHex, rgbFromU8 } from '../src/color'
import {
  DenseConsole,
  FancyConsole,
  isBridgeableConsole,
  SparseConsole,
  SpriteConsole,
} from '../src/console'
import { InitializationError, NoMonitorFoundError } from '../src/errors'
import { createFontDescriptor } from '../src/font'
import { InputCollector } from '../src/input'
import { TerminalSession } from '../src/session'
import { createSpriteSheet } from '../src/sprite-console'

const createSession = (): TerminalSession =>
  new TerminalSession({ widthPixels: 640, heightPixels: 400 })

describe('TerminalSession', () => {
  it('starts with the defaults applications expect', () => {
    const session = createSession()
    expect(session.originalWidthPixels).toBe(640)
    expect(session.getActiveConsole()).toBe(0)
    expect(session.activeConsole).toBeUndefined()
    expect(session.quitting).toBe(false)
    expect(session.screenBurnColor).toEqual(CYAN)
    expect(session.input.key).toBeNull()
  })

  it('adds consoles against registered fonts', () => {
    const session = createSession()
    const font = session.addFont(createFontDescriptor('terminal8x8.png', 8, 8))
    const dense = new DenseConsole(80, 50)
    const sparse = new SparseConsole(80, 50)

    expect(session.addConsole(dense, font)).toBe(0)
    expect(session.addConsole(sparse, font)).toBe(1)

    session.setActiveConsole(1)
    expect(session.getActiveConsole()).toBe(1)
    expect(session.activeConsole).toBe(sparse)
  })

  it('rejects consoles bound to fonts that do not exist', () => {
    const session = createSession()
    expect(() => session.addConsole(new DenseConsole(1, 1), 0)).toThrow(
      InitializationError,
    )
  })

  it('binds sprite consoles to registered sprite sheets', () => {
    const session = createSession()
    const font = session.addFont(createFontDescriptor('terminal8x8.png', 8, 8))
    expect(() => session.addConsole(new SpriteConsole(64, 64, 0), font)).toThrow(
      '[console] Console refers to unknown sprite sheet index 0',
    )

    const sheet = session.addSpriteSheet(
      createSpriteSheet('sprites.png', [{ x: 0, y: 0, width: 16, height: 16 }]),
    )
    expect(session.addConsole(new SpriteConsole(64, 64, sheet), font)).toBe(0)
    expect(session.spriteSheets).toHaveLength(1)
  })

  it('rejects selecting a console that does not exist', () => {
    const session = createSession()
    expect(() => session.setActiveConsole(0)).toThrow(RangeError)
  })

  it('replaces the input snapshot wholesale', () => {
    const session = createSession()
    const collector = new InputCollector()
    collector.push({ type: 'key-down', code: 'Enter', shift: false, control: true, alt: false })
    session.applyInput(collector.capture(16))
    expect(session.input.key).toBe('Enter')
    expect(session.input.control).toBe(true)
  })

  it('sets quitting through quit()', () => {
    const session = createSession()
    session.quit()
    expect(session.quitting).toBe(true)
  })

  it('rejects non-positive pixel sizes', () => {
    expect(() => new TerminalSession({ widthPixels: 0, heightPixels: 10 })).toThrow(
      RangeError,
    )
  })
})

describe('console helpers', () => {
  it('only treats dense consoles as bridgeable', () => {
    expect(isBridgeableConsole(new DenseConsole(2, 2))).toBe(true)
    expect(isBridgeableConsole(new SparseConsole(2, 2))).toBe(false)
    expect(isBridgeableConsole(new FancyConsole(2, 2))).toBe(false)
    expect(isBridgeableConsole(new SpriteConsole(2, 2, 0))).toBe(false)
  })

  it('rejects glyph indices outside the atlas', () => {
    expect(createCell(255).glyph).toBe(255)
    for (const glyph of [256, 321, -1, 64.7, Number.NaN, Number.POSITIVE_INFINITY]) {
      expect(() => createCell(glyph)).toThrow(RangeError)
    }
    expect(() => createCell(321)).toThrow('Glyph must be an integer in 0..255, got 321')
  })

  it('treats NUL and space as blank glyphs', () => {
    expect(isBlankGlyph(0)).toBe(true)
    expect(isBlankGlyph(32)).toBe(true)
    expect(isBlankGlyph(glyphForChar('@'))).toBe(false)
  })

  it('parses and interpolates colors', () => {
    expect(rgbFromHex('#ff0000')).toEqual({ r: 1, g: 0, b: 0 })
    expect(rgbFromU8(0, 51, 255)).toEqual({ r: 0, g: 0.2, b: 1 })
    expect(lerpRgb(rgbFromHex('000000'), rgbFromHex('ffffff'), 0.5)).toEqual({
      r: 0.5,
      g: 0.5,
      b: 0.5,
    })
    expect(() => rgbFromHex('red')).toThrow(RangeError)
  })

  it('names the failed resource in initialization errors', () => {
    const error = new NoMonitorFoundError()
    expect(error).toBeInstanceOf(InitializationError)
    expect(error.resource).toBe('monitor')
    expect(error.name).toBe('NoMonitorFoundError')
    expect(error.message).toBe('[monitor] No available monitor found for fullscreen mode')
  })

  it('validates font tile sizes', () => {
    expect(() => createFontDescriptor('font.png', 0, 8)).toThrow(RangeError)
    expect(createFontDescriptor('font.png', 8, 16).tileSize).toEqual({
      width: 8,
      height: 16,
    })
  })
})
