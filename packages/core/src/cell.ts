import { BLACK, type RGB, WHITE } from './color'

export interface Cell {
  /** Atlas tile index, 0..255 (code page 437 layout). */
  readonly glyph: number
  readonly foreground: RGB
  readonly background: RGB
}

export interface CharSize {
  readonly width: number
  readonly height: number
}

export const GLYPH_COUNT = 256
export const SPACE_GLYPH = 32
export const QUESTION_GLYPH = 63

export const DEFAULT_CELL: Cell = Object.freeze({
  glyph: SPACE_GLYPH,
  foreground: WHITE,
  background: BLACK,
})

const assertGlyph = (glyph: number): number => {
  if (!Number.isInteger(glyph) || glyph < 0 || glyph >= GLYPH_COUNT) {
    throw new RangeError(
      `Glyph must be an integer in 0..${GLYPH_COUNT - 1}, got ${glyph}`,
    )
  }
  return glyph
}

export const createCell = (
  glyph: number,
  foreground: RGB = WHITE,
  background: RGB = BLACK,
): Cell =>
  Object.freeze({
    glyph: assertGlyph(glyph),
    foreground: Object.freeze({ ...foreground }),
    background: Object.freeze({ ...background }),
  })

/**
 * Consoles keep their own frozen copy so callers cannot mutate a stored cell
 * through the object they passed to `set`. Throws `RangeError` for glyphs
 * outside the atlas.
 */
export const freezeCell = (cell: Cell): Cell => {
  assertGlyph(cell.glyph)
  return Object.isFrozen(cell) &&
    Object.isFrozen(cell.foreground) &&
    Object.isFrozen(cell.background)
    ? cell
    : createCell(cell.glyph, cell.foreground, cell.background)
}

export const isBlankGlyph = (glyph: number): boolean =>
  glyph === 0 || glyph === SPACE_GLYPH

/**
 * Printable ASCII shares its code points with code page 437; anything else
 * renders as `?`.
 */
export const glyphForChar = (char: string): number => {
  const code = char.codePointAt(0)
  if (code === undefined || code < 0x20 || code > 0x7e) {
    return QUESTION_GLYPH
  }
  return code
}
