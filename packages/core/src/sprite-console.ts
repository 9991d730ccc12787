import type { Cell, CharSize } from './cell'
import type { RGB } from './color'
import { assertDimension } from './dense-console'

/** Pixels from the top-left corner. */
export interface PixelRect {
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

export interface SpriteSheetDescriptor {
  readonly filename: string
  /** Regions of the sheet image; a sprite's index points into this list. */
  readonly sprites: readonly PixelRect[]
}

export interface RenderSprite {
  /** Console pixels from the top-left corner. */
  readonly destination: PixelRect
  readonly zOrder: number
  readonly tint: RGB
  readonly index: number
}

const isValidRect = (rect: PixelRect): boolean =>
  Number.isFinite(rect.x) &&
  Number.isFinite(rect.y) &&
  Number.isFinite(rect.width) &&
  Number.isFinite(rect.height) &&
  rect.width > 0 &&
  rect.height > 0

const freezeRect = (rect: PixelRect): PixelRect =>
  Object.freeze({ x: rect.x, y: rect.y, width: rect.width, height: rect.height })

export const createSpriteSheet = (
  filename: string,
  sprites: readonly PixelRect[],
): SpriteSheetDescriptor => {
  if (filename.trim().length === 0) {
    throw new RangeError('Sprite sheet filename must not be empty')
  }
  sprites.forEach((sprite, index) => {
    if (!isValidRect(sprite)) {
      throw new RangeError(
        `Sprite ${index} of "${filename}" needs a finite position and a positive size`,
      )
    }
  })
  return Object.freeze({
    filename,
    sprites: Object.freeze(sprites.map(freezeRect)),
  })
}

/**
 * Draws whole images from a sprite sheet instead of glyphs. There is no
 * character grid: its size is in pixels, and cell writes are ignored.
 */
export class SpriteConsole {
  readonly kind = 'sprite' as const
  readonly width: number
  readonly height: number
  readonly spriteSheetIndex: number
  readonly drawBackground = false

  private readonly items: RenderSprite[] = []
  private dirty = true

  constructor(widthPixels: number, heightPixels: number, spriteSheetIndex: number) {
    assertDimension(widthPixels, 'width')
    assertDimension(heightPixels, 'height')
    if (!Number.isInteger(spriteSheetIndex) || spriteSheetIndex < 0) {
      throw new RangeError(
        `Sprite sheet index must be a non-negative integer, got ${spriteSheetIndex}`,
      )
    }
    this.width = widthPixels
    this.height = heightPixels
    this.spriteSheetIndex = spriteSheetIndex
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

  renderSprite(sprite: RenderSprite): void {
    if (!Number.isInteger(sprite.index) || sprite.index < 0) {
      throw new RangeError(`Sprite index must be a non-negative integer, got ${sprite.index}`)
    }
    if (!isValidRect(sprite.destination) || !Number.isFinite(sprite.zOrder)) {
      return
    }
    this.items.push(
      Object.freeze({
        destination: freezeRect(sprite.destination),
        zOrder: sprite.zOrder,
        tint: Object.freeze({ ...sprite.tint }),
        index: sprite.index,
      }),
    )
    this.dirty = true
  }

  /** Sprites in draw order: ascending z-order, insertion order within a z-order. */
  sprites(): readonly RenderSprite[] {
    return [...this.items].sort((a, b) => a.zOrder - b.zOrder)
  }

  set(_x: number, _y: number, _cell: Cell): void {}

  get(_x: number, _y: number): Cell | undefined {
    return undefined
  }

  print(
    _x: number,
    _y: number,
    _text: string,
    _foreground?: RGB,
    _background?: RGB,
  ): void {}

  clear(): void {
    if (this.items.length === 0) {
      return
    }
    this.items.length = 0
    this.dirty = true
  }
}
