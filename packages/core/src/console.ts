import type { BridgeableConsole } from './dense-console'
import { DenseConsole } from './dense-console'
import { FancyConsole } from './fancy-console'
import { SparseConsole } from './sparse-console'
import { SpriteConsole } from './sprite-console'

export type Console = DenseConsole | SparseConsole | FancyConsole | SpriteConsole

export type ConsoleKind = Console['kind']

export interface ConsoleLayer {
  readonly console: Console
  /** Ignored by sprite consoles, which draw from their sprite sheet. */
  readonly fontIndex: number
}

export const isBridgeableConsole = (
  console: Console,
): console is Console & BridgeableConsole => console.kind === 'dense'

export const assertNever = (value: never, context: string): never => {
  throw new Error(`Unhandled ${context}: ${JSON.stringify(value)}`)
}

export { DenseConsole, FancyConsole, SparseConsole, SpriteConsole }
