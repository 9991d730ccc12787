import {
  type Cell,
  type CharSize,
  DEFAULT_CELL,
  freezeCell,
  glyphForChar,
} from './cell'
import type { RGB } from './color'
import { assertDimension, type ConsoleOptions } from './dense-console'

export interface PointF {
  readonly x: number
  readonly y: number
}

export interface FancyTile {
  /** Console cells from the top-left corner; fractions place a tile between cells. */
  readonly position: PointF
  readonly zOrder: number
  /** Radians, clockwise, about the tile's center. */
  readonly rotation: number
  readonly scale: PointF
  readonly cell: Cell
}

export interface FancyTileInit {
  readonly position: PointF
  readonly cell: Cell
  readonly zOrder?: number
  readonly rotation?: number
  readonly scale?: PointF
}

const UNIT_SCALE: PointF = Object.freeze({ x: 1, y: 1 })

const isFinitePoint = (point: PointF): boolean =>
  Number.isFinite(point.x) && Number.isFinite(point.y)

/**
 * Tiles at free positions with their own rotation, scale and draw order.
 * Integer writes through `set` behave like a sparse console; `setFancy`
 * places tiles anywhere.
 */
export class FancyConsole {
  readonly kind = 'fancy' as const
  readonly width: number
  readonly height: number
  readonly drawBackground: boolean

  private readonly items: FancyTile[] = []
  private dirty = true

  constructor(width: number, height: number, options: ConsoleOptions = {}) {
    assertDimension(width, 'width')
    assertDimension(height, 'height')
    this.width = width
    this.height = height
    this.drawBackground = options.drawBackground ?? true
  }

  get isDirty(): boolean {
    return this.dirty
  }

  get size(): number {
    return this.items.length
  }

  markClean(): void {
    this.dirty = false
  }

  getCharSize(): CharSize {
    return { width: this.width, height: this.height }
  }

  /** Ignores tiles with a non-finite position, rotation, scale or z-order. */
  setFancy(init: FancyTileInit): void {
    const zOrder = init.zOrder ?? 0
    const rotation = init.rotation ?? 0
    const scale = init.scale ?? UNIT_SCALE
    if (
      !isFinitePoint(init.position) ||
      !isFinitePoint(scale) ||
      !Number.isFinite(zOrder) ||
      !Number.isFinite(rotation)
    ) {
      return
    }
    this.items.push(
      Object.freeze({
        position: Object.freeze({ x: init.position.x, y: init.position.y }),
        zOrder,
        rotation,
        scale: Object.freeze({ x: scale.x, y: scale.y }),
        cell: freezeCell(init.cell),
      }),
    )
    this.dirty = true
  }

  set(x: number, y: number, cell: Cell): void {
    if (
      !Number.isInteger(x) ||
      !Number.isInteger(y) ||
      x < 0 ||
      y < 0 ||
      x >= this.width ||
      y >= this.height
    ) {
      return
    }
    const tile: FancyTile = Object.freeze({
      position: Object.freeze({ x, y }),
      zOrder: 0,
      rotation: 0,
      scale: UNIT_SCALE,
      cell: freezeCell(cell),
    })
    const existing = this.items.findIndex(
      (item) => item.position.x === x && item.position.y === y,
    )
    if (existing >= 0) {
      this.items[existing] = tile
    } else {
      this.items.push(tile)
    }
    this.dirty = true
  }

  /** The most recent tile placed exactly at `(x, y)`. */
  get(x: number, y: number): Cell | undefined {
    for (let index = this.items.length - 1; index >= 0; index -= 1) {
      const item = this.items[index]
      if (item && item.position.x === x && item.position.y === y) {
        return item.cell
      }
    }
    return undefined
  }

  /** Tiles in draw order: ascending z-order, insertion order within a z-order. */
  tiles(): readonly FancyTile[] {
    return [...this.items].sort((a, b) => a.zOrder - b.zOrder)
  }

  clear(): void {
    if (this.items.length === 0) {
      return
    }
    this.items.length = 0
    this.dirty = true
  }

  print(
    x: number,
    y: number,
    text: string,
    foreground: RGB = DEFAULT_CELL.foreground,
    background: RGB = DEFAULT_CELL.background,
  ): void {
    let column = x
    for (const char of text) {
      this.set(column, y, {
        glyph: glyphForChar(char),
        foreground,
        background,
      })
      column += 1
    }
  }
}
