/** Glyph sheets are always a 16×16 grid of equally sized tiles. */
export const ATLAS_TILES_PER_ROW = 16

export interface TileSize {
  readonly width: number
  readonly height: number
}

export interface FontDescriptor {
  readonly filename: string
  readonly tileSize: TileSize
}

export const createFontDescriptor = (
  filename: string,
  width: number,
  height: number,
): FontDescriptor => {
  if (filename.trim().length === 0) {
    throw new RangeError('Font filename must not be empty')
  }
  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw new RangeError(
      `Font tile size must be positive integers, got ${width}x${height}`,
    )
  }
  return Object.freeze({
    filename,
    tileSize: Object.freeze({ width, height }),
  })
}

export const atlasPixelSize = (tileSize: TileSize): TileSize => ({
  width: tileSize.width * ATLAS_TILES_PER_ROW,
  height: tileSize.height * ATLAS_TILES_PER_ROW,
})
