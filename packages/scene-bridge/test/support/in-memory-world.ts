import { vi } from 'vitest'
import type { HostEntity, HostWorld, ResourceKey } from '../../src/host-world'

/** Keeps resources and spawned entities in memory, as a host world would. */
export class InMemoryWorld implements HostWorld {
  readonly entities: HostEntity[] = []
  private readonly resources = new Map<ResourceKey<unknown>, unknown>()

  insertResource = vi.fn(<T>(key: ResourceKey<T>, value: T): void => {
    this.resources.set(key, value)
  })

  getResource<T>(key: ResourceKey<T>): T | undefined {
    return this.resources.get(key) as T | undefined
  }

  spawn(entity: HostEntity): void {
    this.entities.push(entity)
  }
}
