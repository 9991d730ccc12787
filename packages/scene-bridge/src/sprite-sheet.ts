import { ATLAS_TILES_PER_ROW, atlasPixelSize, type TileSize } from '@glyphgrid/core'

export interface SpriteRegion {
  /** Pixel origin of the tile inside the atlas, top-left. */
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
  /** Draw offset that centers the sprite on its tile position. */
  readonly offset: readonly [number, number]
}

export interface SpriteSheet {
  readonly textureSize: TileSize
  /** Indexed by glyph, 256 entries. */
  readonly sprites: readonly SpriteRegion[]
}

export const buildSpriteSheet = (tileSize: TileSize): SpriteSheet => {
  const offset = Object.freeze([-tileSize.width / 2, -tileSize.height / 2] as const)
  const sprites: SpriteRegion[] = []
  for (let row = 0; row < ATLAS_TILES_PER_ROW; row += 1) {
    for (let column = 0; column < ATLAS_TILES_PER_ROW; column += 1) {
      sprites.push(
        Object.freeze({
          x: column * tileSize.width,
          y: row * tileSize.height,
          width: tileSize.width,
          height: tileSize.height,
          offset,
        }),
      )
    }
  }
  return Object.freeze({
    textureSize: atlasPixelSize(tileSize),
    sprites: Object.freeze(sprites),
  })
}
