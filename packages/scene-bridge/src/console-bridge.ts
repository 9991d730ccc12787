import {
  type BridgeableConsole,
  type ConsoleGridSnapshot,
  ResourceLimitError,
} from '@glyphgrid/core'
import { ResourceKey, type ResourceSlot } from './host-world'

/** Host tile maps read a single grid resource, so only one console fits. */
export const MAX_BRIDGED_CONSOLES = 1

export const CONSOLE_GRID_RESOURCE = new ResourceKey<ConsoleGridSnapshot>(
  'glyphgrid.console-grid',
)

export interface BridgedConsole {
  readonly console: BridgeableConsole
  readonly fontIndex: number
}

/**
 * Mirrors one dense console into a host resource. The host's own render
 * plugins read the published snapshot; nothing here draws.
 */
export class ConsoleBridge {
  private current: BridgedConsole | null = null

  constructor(private readonly slot: ResourceSlot<ConsoleGridSnapshot>) {}

  get bridged(): BridgedConsole | null {
    return this.current
  }

  bridge(console: BridgeableConsole, fontIndex: number): void {
    if (this.current) {
      throw new ResourceLimitError(
        `The host engine bridge supports ${MAX_BRIDGED_CONSOLES} dense console; a second one was bridged`,
        MAX_BRIDGED_CONSOLES,
      )
    }
    this.current = Object.freeze({ console, fontIndex })
    this.publish()
  }

  /** Writes the bridged console's current grid. Returns false when nothing is bridged. */
  publish(): boolean {
    if (!this.current) {
      return false
    }
    this.slot.insert(this.current.console.snapshotGrid())
    return true
  }
}
