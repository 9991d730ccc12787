import type { Cell, ConsoleGridSnapshot, RGB } from '@glyphgrid/core'

/** Sprite drawn under every cell so its tint shows as the background. */
export const BACKGROUND_SPRITE = 254

/** Tile coordinates as host tile maps report them: row 0 at the bottom. */
export interface TilePoint {
  readonly x: number
  readonly y: number
}

export interface Tint extends RGB {
  readonly a: number
}

const cellAt = (snapshot: ConsoleGridSnapshot, point: TilePoint): Cell | undefined => {
  const { width, height } = snapshot
  if (
    !Number.isInteger(point.x) ||
    !Number.isInteger(point.y) ||
    point.x < 0 ||
    point.y < 0 ||
    point.x >= width ||
    point.y >= height
  ) {
    return undefined
  }
  const row = height - 1 - point.y
  return snapshot.tiles[row * width + point.x]
}

const opaque = (color: RGB): Tint => ({ r: color.r, g: color.g, b: color.b, a: 1 })

export const tileSprite = (snapshot: ConsoleGridSnapshot, point: TilePoint): number | null =>
  cellAt(snapshot, point)?.glyph ?? null

export const tileTint = (snapshot: ConsoleGridSnapshot, point: TilePoint): Tint | null => {
  const cell = cellAt(snapshot, point)
  return cell ? opaque(cell.foreground) : null
}

export const backgroundSprite = (): number => BACKGROUND_SPRITE

export const backgroundTint = (
  snapshot: ConsoleGridSnapshot,
  point: TilePoint,
): Tint | null => {
  const cell = cellAt(snapshot, point)
  return cell ? opaque(cell.background) : null
}
