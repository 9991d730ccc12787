import {
  assertNever,
  type Cell,
  type Console,
  type DenseConsole,
  type FancyConsole,
  InitializationError,
  isBlankGlyph,
  type RGB,
  type SparseConsole,
  type SpriteConsole,
  type SpriteSheetDescriptor,
} from '@glyphgrid/core'
import {
  CELL_LAYOUT,
  FANCY_LAYOUT,
  type InstanceLayout,
  SPRITE_LAYOUT,
} from '../shaders/sources'

/** Tile value that tells the console shaders to fill the quad with its color. */
export const SOLID_TILE = -1

export interface InstanceBatch {
  /** `count * layout.floatsPerInstance` floats. */
  readonly data: Float32Array
  readonly count: number
}

export interface CellGeometry {
  readonly kind: 'cells'
  readonly layout: InstanceLayout
  readonly background: InstanceBatch
  readonly glyphs: InstanceBatch
}

export interface FancyGeometry {
  readonly kind: 'fancy'
  readonly layout: InstanceLayout
  readonly tiles: InstanceBatch
}

export interface SpriteGeometry {
  readonly kind: 'sprites'
  readonly layout: InstanceLayout
  readonly sprites: InstanceBatch
}

export type ConsoleGeometry = CellGeometry | FancyGeometry | SpriteGeometry

export const EMPTY_BATCH: InstanceBatch = Object.freeze({
  data: new Float32Array(0),
  count: 0,
})

class BatchWriter {
  private readonly data: Float32Array
  private offset = 0

  constructor(
    readonly count: number,
    private readonly stride: number,
  ) {
    this.data = new Float32Array(count * stride)
  }

  /** Values in the layout's attribute order. */
  write(...values: number[]): void {
    this.data.set(values, this.offset)
    this.offset += this.stride
  }

  finish(): InstanceBatch {
    return this.count === 0 ? EMPTY_BATCH : { data: this.data, count: this.count }
  }
}

const writeCell = (
  writer: BatchWriter,
  x: number,
  y: number,
  color: RGB,
  tile: number,
): void => writer.write(x, y, color.r, color.g, color.b, tile)

/** Console rows grow downward; render rows grow upward from the bottom edge. */
export const toRenderRow = (y: number, height: number): number => height - 1 - y

export const buildDenseGeometry = (console: DenseConsole): CellGeometry => {
  const { width, height } = console
  const total = width * height
  const stride = CELL_LAYOUT.floatsPerInstance

  let glyphCount = 0
  for (let index = 0; index < total; index += 1) {
    if (!isBlankGlyph(console.cellAt(index).glyph)) {
      glyphCount += 1
    }
  }

  const background = new BatchWriter(console.drawBackground ? total : 0, stride)
  const glyphs = new BatchWriter(glyphCount, stride)
  for (let y = 0; y < height; y += 1) {
    const renderY = toRenderRow(y, height)
    for (let x = 0; x < width; x += 1) {
      const cell = console.cellAt(y * width + x)
      if (console.drawBackground) {
        writeCell(background, x, renderY, cell.background, SOLID_TILE)
      }
      if (!isBlankGlyph(cell.glyph)) {
        writeCell(glyphs, x, renderY, cell.foreground, cell.glyph)
      }
    }
  }
  return {
    kind: 'cells',
    layout: CELL_LAYOUT,
    background: background.finish(),
    glyphs: glyphs.finish(),
  }
}

export const buildSparseGeometry = (console: SparseConsole): CellGeometry => {
  const entries = console.entries()
  const visible = (cell: Cell): boolean => !isBlankGlyph(cell.glyph)
  const stride = CELL_LAYOUT.floatsPerInstance

  const background = new BatchWriter(console.drawBackground ? entries.length : 0, stride)
  const glyphs = new BatchWriter(entries.filter((entry) => visible(entry.cell)).length, stride)
  for (const { x, y, cell } of entries) {
    const renderY = toRenderRow(y, console.height)
    if (console.drawBackground) {
      writeCell(background, x, renderY, cell.background, SOLID_TILE)
    }
    if (visible(cell)) {
      writeCell(glyphs, x, renderY, cell.foreground, cell.glyph)
    }
  }
  return {
    kind: 'cells',
    layout: CELL_LAYOUT,
    background: background.finish(),
    glyphs: glyphs.finish(),
  }
}

/**
 * One instance per tile, centered on its cell, in z-order. Tiles with a blank
 * glyph only draw when the console draws backgrounds.
 */
export const buildFancyGeometry = (console: FancyConsole): FancyGeometry => {
  const tiles = console
    .tiles()
    .filter((tile) => console.drawBackground || !isBlankGlyph(tile.cell.glyph))
  const writer = new BatchWriter(tiles.length, FANCY_LAYOUT.floatsPerInstance)
  for (const { position, rotation, scale, cell } of tiles) {
    const { foreground, background } = cell
    writer.write(
      position.x + 0.5,
      console.height - position.y - 0.5,
      rotation,
      scale.x,
      scale.y,
      foreground.r,
      foreground.g,
      foreground.b,
      background.r,
      background.g,
      background.b,
      isBlankGlyph(cell.glyph) ? SOLID_TILE : cell.glyph,
    )
  }
  return { kind: 'fancy', layout: FANCY_LAYOUT, tiles: writer.finish() }
}

/** Destinations are flipped to a bottom-left origin; sheet regions are not. */
export const buildSpriteGeometry = (
  console: SpriteConsole,
  sheet: SpriteSheetDescriptor,
): SpriteGeometry => {
  const sprites = console.sprites()
  const writer = new BatchWriter(sprites.length, SPRITE_LAYOUT.floatsPerInstance)
  for (const { destination, tint, index } of sprites) {
    const source = sheet.sprites[index]
    if (!source) {
      throw new RangeError(
        `Sprite ${index} is not in sheet "${sheet.filename}" (${sheet.sprites.length} sprites)`,
      )
    }
    writer.write(
      destination.x,
      console.height - destination.y - destination.height,
      destination.width,
      destination.height,
      source.x,
      source.y,
      source.width,
      source.height,
      tint.r,
      tint.g,
      tint.b,
    )
  }
  return { kind: 'sprites', layout: SPRITE_LAYOUT, sprites: writer.finish() }
}

export const buildConsoleGeometry = (
  console: Console,
  spriteSheets: readonly SpriteSheetDescriptor[] = [],
): ConsoleGeometry => {
  switch (console.kind) {
    case 'dense':
      return buildDenseGeometry(console)
    case 'sparse':
      return buildSparseGeometry(console)
    case 'fancy':
      return buildFancyGeometry(console)
    case 'sprite': {
      const sheet = spriteSheets[console.spriteSheetIndex]
      if (!sheet) {
        throw new InitializationError(
          'console',
          `Sprite sheet ${console.spriteSheetIndex} is not registered`,
        )
      }
      return buildSpriteGeometry(console, sheet)
    }
    default:
      return assertNever(console, 'console kind')
  }
}

/** Batches in draw order. */
export const geometryBatches = (geometry: ConsoleGeometry): readonly InstanceBatch[] => {
  switch (geometry.kind) {
    case 'cells':
      return [geometry.background, geometry.glyphs]
    case 'fancy':
      return [geometry.tiles]
    case 'sprites':
      return [geometry.sprites]
    default:
      return assertNever(geometry, 'geometry kind')
  }
}
