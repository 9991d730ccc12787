import type { TileSize } from '@glyphgrid/core'
import type { SpriteSheet } from './sprite-sheet'
import type { Transform } from './transforms'

/**
 * Typed handle for a world-global resource. The type parameter only exists at
 * compile time; hosts key their storage on the instance.
 */
export class ResourceKey<T> {
  private readonly valueType?: T

  constructor(readonly name: string) {}
}

export type HostEntity =
  | {
      readonly kind: 'camera'
      readonly transform: Transform
      /** Orthographic view size in pixels. */
      readonly view: TileSize
    }
  | {
      readonly kind: 'tile-map'
      readonly transform: Transform
      /** Map size in tiles. */
      readonly mapSize: TileSize
      readonly tileSize: TileSize
      readonly spriteSheet: SpriteSheet
      readonly resource: ResourceKey<unknown>
    }

/** The slice of a host engine's world the bridge writes to. */
export interface HostWorld {
  insertResource<T>(key: ResourceKey<T>, value: T): void
  spawn(entity: HostEntity): void
}

/** Write-only view of one world resource. */
export interface ResourceSlot<T> {
  insert(value: T): void
}

export const resourceSlot = <T>(world: HostWorld, key: ResourceKey<T>): ResourceSlot<T> => ({
  insert: (value) => world.insertResource(key, value),
})
