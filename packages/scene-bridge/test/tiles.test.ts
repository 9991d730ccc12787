import {
  BLUE,
  createCell,
  createFontDescriptor,
  DenseConsole,
  RED,
  TerminalSession,
} from '@glyphgrid/core'
import { describe, expect, it } from 'vitest'
import { buildSpriteSheet } from '../src/sprite-sheet'
import {
  BACKGROUND_SPRITE,
  backgroundSprite,
  backgroundTint,
  tileSprite,
  tileTint,
} from '../src/tiles'
import { cameraTransform, consoleTransform } from '../src/transforms'

const createSnapshot = () => {
  const console = new DenseConsole(3, 2)
  console.set(0, 0, createCell(65, RED, BLUE))
  return console.snapshotGrid()
}

describe('tile lookups', () => {
  it('flips tile rows so the top console row is the highest tile row', () => {
    const snapshot = createSnapshot()
    expect(tileSprite(snapshot, { x: 0, y: 1 })).toBe(65)
    expect(tileSprite(snapshot, { x: 0, y: 0 })).toBe(32)
  })

  it('tints glyphs with the foreground and backgrounds with the background', () => {
    const snapshot = createSnapshot()
    expect(tileTint(snapshot, { x: 0, y: 1 })).toEqual({ r: 1, g: 0, b: 0, a: 1 })
    expect(backgroundTint(snapshot, { x: 0, y: 1 })).toEqual({ r: 0, g: 0, b: 1, a: 1 })
  })

  it('draws backgrounds with the solid block sprite', () => {
    expect(backgroundSprite()).toBe(BACKGROUND_SPRITE)
    expect(BACKGROUND_SPRITE).toBe(254)
  })

  it('returns null outside the grid', () => {
    const snapshot = createSnapshot()
    expect(tileSprite(snapshot, { x: 3, y: 0 })).toBeNull()
    expect(tileTint(snapshot, { x: 0, y: 2 })).toBeNull()
    expect(backgroundTint(snapshot, { x: -1, y: 0 })).toBeNull()
  })
})

describe('buildSpriteSheet', () => {
  it('lays out 256 tiles in a 16x16 grid', () => {
    const sheet = buildSpriteSheet(createFontDescriptor('font.png', 8, 12).tileSize)
    expect(sheet.textureSize).toEqual({ width: 128, height: 192 })
    expect(sheet.sprites).toHaveLength(256)
    expect(sheet.sprites[17]).toEqual({
      x: 8,
      y: 12,
      width: 8,
      height: 12,
      offset: [-4, -6],
    })
    expect(sheet.sprites[255]).toMatchObject({ x: 120, y: 180 })
  })
})

describe('transforms', () => {
  it('centers the camera and offsets tile maps by half a tile', () => {
    const session = new TerminalSession({ widthPixels: 640, heightPixels: 400 })
    expect(cameraTransform(session).translation).toEqual({ x: 320, y: 200, z: 1 })
    expect(consoleTransform(session, { width: 8, height: 8 }).translation).toEqual({
      x: 324,
      y: 196,
      z: 0,
    })
  })
})
