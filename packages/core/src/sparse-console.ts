import {
  type Cell,
  type CharSize,
  DEFAULT_CELL,
  freezeCell,
  glyphForChar,
} from './cell'
import type { RGB } from './color'
import type { ConsoleOptions } from './dense-console'

export interface SparseEntry {
  readonly x: number
  readonly y: number
  readonly cell: Cell
}

/**
 * Stores only occupied cells. Positions without an entry are transparent, so
 * layers beneath show through.
 */
export class SparseConsole {
  readonly kind = 'sparse' as const
  readonly width: number
  readonly height: number
  readonly drawBackground: boolean

  private readonly items: SparseEntry[] = []
  private dirty = true

  constructor(width: number, height: number, options: ConsoleOptions = {}) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new RangeError(`Console width must be a positive integer, got ${width}`)
    }
    if (!Number.isInteger(height) || height <= 0) {
      throw new RangeError(
        `Console height must be a positive integer, got ${height}`,
      )
    }
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

  private inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this.width &&
      y < this.height
    )
  }

  set(x: number, y: number, cell: Cell): void {
    if (!this.inBounds(x, y)) {
      return
    }
    const entry: SparseEntry = Object.freeze({ x, y, cell: freezeCell(cell) })
    const existing = this.items.findIndex((item) => item.x === x && item.y === y)
    if (existing >= 0) {
      this.items[existing] = entry
    } else {
      this.items.push(entry)
    }
    this.dirty = true
  }

  get(x: number, y: number): Cell | undefined {
    return this.items.find((item) => item.x === x && item.y === y)?.cell
  }

  /** Removes the entry at `(x, y)`, making the position transparent again. */
  unset(x: number, y: number): void {
    const existing = this.items.findIndex((item) => item.x === x && item.y === y)
    if (existing < 0) {
      return
    }
    this.items.splice(existing, 1)
    this.dirty = true
  }

  entries(): readonly SparseEntry[] {
    return this.items
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
