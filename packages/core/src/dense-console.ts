import {
  type Cell,
  type CharSize,
  DEFAULT_CELL,
  freezeCell,
  glyphForChar,
} from './cell'
import type { RGB } from './color'

export interface ConsoleGridSnapshot {
  readonly width: number
  readonly height: number
  /** Row-major, `y * width + x`, row 0 at the top. */
  readonly tiles: readonly Cell[]
}

/**
 * Implemented by consoles a host engine can mirror as a single tile map.
 */
export interface BridgeableConsole {
  getCharSize(): CharSize
  snapshotGrid(): ConsoleGridSnapshot
}

export interface ConsoleOptions {
  /** When false the console only draws glyphs over the layers beneath it. */
  readonly drawBackground?: boolean
}

export const assertDimension = (value: number, label: string): void => {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`Console ${label} must be a positive integer, got ${value}`)
  }
}

export class DenseConsole implements BridgeableConsole {
  readonly kind = 'dense' as const
  readonly width: number
  readonly height: number
  readonly drawBackground: boolean

  private readonly tiles: Cell[]
  private dirty = true

  constructor(width: number, height: number, options: ConsoleOptions = {}) {
    assertDimension(width, 'width')
    assertDimension(height, 'height')
    this.width = width
    this.height = height
    this.drawBackground = options.drawBackground ?? true
    this.tiles = Array.from({ length: width * height }, () => DEFAULT_CELL)
    Object.seal(this.tiles)
  }

  get isDirty(): boolean {
    return this.dirty
  }

  markClean(): void {
    this.dirty = false
  }

  getCharSize(): CharSize {
    return { width: this.width, height: this.height }
  }

  /** Returns -1 for coordinates outside the grid. */
  indexOf(x: number, y: number): number {
    if (
      !Number.isInteger(x) ||
      !Number.isInteger(y) ||
      x < 0 ||
      y < 0 ||
      x >= this.width ||
      y >= this.height
    ) {
      return -1
    }
    return y * this.width + x
  }

  set(x: number, y: number, cell: Cell): void {
    const index = this.indexOf(x, y)
    if (index < 0) {
      return
    }
    this.tiles[index] = freezeCell(cell)
    this.dirty = true
  }

  get(x: number, y: number): Cell | undefined {
    const index = this.indexOf(x, y)
    return index < 0 ? undefined : this.tiles[index]
  }

  cellAt(index: number): Cell {
    return this.tiles[index] ?? DEFAULT_CELL
  }

  clear(): void {
    this.tiles.fill(DEFAULT_CELL)
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

  snapshotGrid(): ConsoleGridSnapshot {
    return Object.freeze({
      width: this.width,
      height: this.height,
      tiles: Object.freeze([...this.tiles]),
    })
  }
}
