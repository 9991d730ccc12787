import type { TerminalSession, TileSize } from '@glyphgrid/core'

export interface Transform {
  readonly translation: { readonly x: number; readonly y: number; readonly z: number }
}

const translation = (x: number, y: number, z: number): Transform => ({
  translation: { x, y, z },
})

/** Centers a 2D camera on the terminal, one unit in front of the tiles. */
export const cameraTransform = (session: TerminalSession): Transform =>
  translation(session.widthPixels * 0.5, session.heightPixels * 0.5, 1)

/**
 * Positions a tile map so its cells line up with the terminal's pixel grid.
 * Maps are centered on their origin and sprites are centered on their cell,
 * hence the half-tile shift.
 */
export const consoleTransform = (session: TerminalSession, tileSize: TileSize): Transform =>
  translation(
    session.widthPixels * 0.5 + tileSize.width / 2,
    session.heightPixels * 0.5 - tileSize.height / 2,
    0,
  )
