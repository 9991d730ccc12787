import {
  BLACK,
  BLUE,
  createCell,
  createSpriteSheet,
  DenseConsole,
  FancyConsole,
  GREEN,
  isBlankGlyph,
  RED,
  SparseConsole,
  SpriteConsole,
  WHITE,
} from '@glyphgrid/core'
import fc from 'fast-check'
import { describe, expect, it } from 'vitest'
import {
  buildConsoleGeometry,
  buildDenseGeometry,
  buildFancyGeometry,
  buildSparseGeometry,
  buildSpriteGeometry,
  geometryBatches,
  SOLID_TILE,
  toRenderRow,
} from './console-geometry'

const instance = (data: Float32Array, index: number): number[] =>
  Array.from(data.subarray(index * 6, index * 6 + 6))

describe('buildDenseGeometry', () => {
  it('draws only backgrounds for a blank console', () => {
    const geometry = buildDenseGeometry(new DenseConsole(80, 25))
    expect(geometry.glyphs.count).toBe(0)
    expect(geometry.glyphs.data.length).toBe(0)
    expect(geometry.background.count).toBe(2000)
    expect(geometry.background.data.length).toBe(2000 * 6)
  })

  it('places row 0 on the top render row', () => {
    const console = new DenseConsole(80, 25)
    console.set(0, 0, createCell(64, RED, BLACK))
    const geometry = buildDenseGeometry(console)

    expect(geometry.glyphs.count).toBe(1)
    expect(instance(geometry.glyphs.data, 0)).toEqual([0, 24, 1, 0, 0, 64])
    expect(instance(geometry.background.data, 0)).toEqual([0, 24, 0, 0, 0, SOLID_TILE])
  })

  it('walks cells row by row from the top', () => {
    const console = new DenseConsole(2, 2)
    console.set(1, 1, createCell(65, GREEN, BLUE))
    const { background, glyphs } = buildDenseGeometry(console)

    expect(instance(background.data, 3)).toEqual([1, 0, 0, 0, 1, SOLID_TILE])
    expect(instance(glyphs.data, 0)).toEqual([1, 0, 0, 1, 0, 65])
  })

  it('skips backgrounds for consoles that do not draw them', () => {
    const console = new DenseConsole(4, 4, { drawBackground: false })
    console.print(0, 0, 'hi')
    const geometry = buildDenseGeometry(console)
    expect(geometry.background.count).toBe(0)
    expect(geometry.glyphs.count).toBe(2)
  })

  it('emits one glyph quad per non-blank cell', () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.record({
            x: fc.integer({ min: 0, max: 9 }),
            y: fc.integer({ min: 0, max: 5 }),
            glyph: fc.integer({ min: 0, max: 255 }),
          }),
          { maxLength: 40 },
        ),
        (writes) => {
          const console = new DenseConsole(10, 6)
          for (const { x, y, glyph } of writes) {
            console.set(x, y, createCell(glyph, WHITE, BLACK))
          }
          const expected = console
            .snapshotGrid()
            .tiles.filter((cell) => !isBlankGlyph(cell.glyph)).length
          const geometry = buildDenseGeometry(console)
          expect(geometry.glyphs.count).toBe(expected)
          expect(geometry.background.count).toBe(60)
        },
      ),
    )
  })
})

describe('buildSparseGeometry', () => {
  it('only emits quads for stored entries', () => {
    const console = new SparseConsole(10, 5)
    console.set(2, 1, createCell(65, GREEN, BLUE))
    console.set(3, 1, createCell(32))
    const { background, glyphs } = buildSparseGeometry(console)

    expect(background.count).toBe(2)
    expect(glyphs.count).toBe(1)
    expect(instance(glyphs.data, 0)).toEqual([2, 3, 0, 1, 0, 65])
    expect(instance(background.data, 1)).toEqual([3, 3, 0, 0, 0, SOLID_TILE])
  })

  it('emits nothing for an empty console', () => {
    const geometry = buildSparseGeometry(new SparseConsole(80, 25))
    expect(geometry.background.count).toBe(0)
    expect(geometry.glyphs.count).toBe(0)
  })
})

describe('buildConsoleGeometry', () => {
  it('dispatches on the console kind', () => {
    const sparse = new SparseConsole(3, 3)
    sparse.set(0, 0, createCell(1))
    const sprites = new SpriteConsole(64, 64, 0)
    sprites.renderSprite({
      destination: { x: 0, y: 0, width: 8, height: 8 },
      zOrder: 0,
      tint: WHITE,
      index: 0,
    })
    const sheet = createSpriteSheet('sprites.png', [{ x: 0, y: 0, width: 8, height: 8 }])
    const counts = (geometry: ReturnType<typeof buildConsoleGeometry>): number[] =>
      geometryBatches(geometry).map((batch) => batch.count)

    expect(counts(buildConsoleGeometry(new DenseConsole(3, 3)))).toEqual([9, 0])
    expect(counts(buildConsoleGeometry(sparse))).toEqual([1, 1])
    expect(counts(buildConsoleGeometry(new FancyConsole(3, 3)))).toEqual([0])
    expect(counts(buildConsoleGeometry(sprites, [sheet]))).toEqual([1])
  })

  it('refuses a sprite console whose sheet is not registered', () => {
    expect(() => buildConsoleGeometry(new SpriteConsole(64, 64, 2), [])).toThrow(
      'Sprite sheet 2 is not registered',
    )
  })

  it('flips rows into render space', () => {
    expect(toRenderRow(0, 25)).toBe(24)
    expect(toRenderRow(24, 25)).toBe(0)
  })
})

describe('buildFancyGeometry', () => {
  const fancyInstance = (data: Float32Array, index: number): number[] =>
    Array.from(data.subarray(index * 12, index * 12 + 12))

  it('centers tiles on their cell and keeps rotation and scale', () => {
    const console = new FancyConsole(4, 3)
    console.setFancy({
      position: { x: 1, y: 0.5 },
      cell: createCell(65, RED, BLUE),
      zOrder: 2,
      rotation: 0.5,
      scale: { x: 2, y: 1 },
    })
    const { tiles } = buildFancyGeometry(console)

    expect(tiles.count).toBe(1)
    expect(fancyInstance(tiles.data, 0)).toEqual([1.5, 2, 0.5, 2, 1, 1, 0, 0, 0, 0, 1, 65])
  })

  it('draws in ascending z-order', () => {
    const console = new FancyConsole(4, 3)
    console.setFancy({ position: { x: 0, y: 0 }, cell: createCell(66), zOrder: 5 })
    console.setFancy({ position: { x: 0, y: 0 }, cell: createCell(67), zOrder: -1 })
    const { tiles } = buildFancyGeometry(console)

    expect(fancyInstance(tiles.data, 0)[11]).toBe(67)
    expect(fancyInstance(tiles.data, 1)[11]).toBe(66)
  })

  it('fills blank tiles with their background only when backgrounds are drawn', () => {
    const withBackground = new FancyConsole(2, 2)
    withBackground.set(0, 0, createCell(32, WHITE, GREEN))
    const withoutBackground = new FancyConsole(2, 2, { drawBackground: false })
    withoutBackground.set(0, 0, createCell(32, WHITE, GREEN))

    const drawn = buildFancyGeometry(withBackground).tiles
    expect(drawn.count).toBe(1)
    expect(fancyInstance(drawn.data, 0)[11]).toBe(SOLID_TILE)
    expect(buildFancyGeometry(withoutBackground).tiles.count).toBe(0)
  })
})

describe('buildSpriteGeometry', () => {
  const sheet = createSpriteSheet('sprites.png', [
    { x: 0, y: 0, width: 16, height: 16 },
    { x: 16, y: 0, width: 16, height: 32 },
  ])

  it('flips destinations to a bottom-left origin and keeps sheet regions', () => {
    const console = new SpriteConsole(320, 200, 0)
    console.renderSprite({
      destination: { x: 10, y: 20, width: 32, height: 64 },
      zOrder: 0,
      tint: RED,
      index: 1,
    })
    const { sprites } = buildSpriteGeometry(console, sheet)

    expect(sprites.count).toBe(1)
    expect(Array.from(sprites.data)).toEqual([10, 116, 32, 64, 16, 0, 16, 32, 1, 0, 0])
  })

  it('refuses sprite indices the sheet does not have', () => {
    const console = new SpriteConsole(320, 200, 0)
    console.renderSprite({
      destination: { x: 0, y: 0, width: 8, height: 8 },
      zOrder: 0,
      tint: WHITE,
      index: 7,
    })
    expect(() => buildSpriteGeometry(console, sheet)).toThrow(
      'Sprite 7 is not in sheet "sprites.png" (2 sprites)',
    )
  })
})
