import {
  consoleLogger,
  type InputSnapshot,
  isBridgeableConsole,
  type Logger,
  type PointerPosition,
  type TerminalSession,
  type TickCallback,
} from '@glyphgrid/core'
import { CONSOLE_GRID_RESOURCE, ConsoleBridge } from './console-bridge'
import { type HostWorld, resourceSlot } from './host-world'
import { buildSpriteSheet, type SpriteSheet } from './sprite-sheet'
import { cameraTransform, consoleTransform } from './transforms'

/** Host input is sampled at most this often; frames in between see no key. */
export const DEFAULT_KEY_DELAY_MS = 50

/** Input as the host engine's input system exposes it. */
export interface HostInputState {
  keysDown(): Iterable<string>
  mousePosition(): PointerPosition | null
  isLeftButtonDown(): boolean
}

export interface HostFrame {
  /** Milliseconds since the previous host update. */
  readonly deltaMs: number
  readonly input: HostInputState
}

export type HostTransition = 'continue' | 'quit'

export interface HostEngineAdapterOptions {
  readonly logger?: Logger
  readonly keyDelayMs?: number
}

const SHIFT_KEYS = ['ShiftLeft', 'ShiftRight']
const CONTROL_KEYS = ['ControlLeft', 'ControlRight']
const ALT_KEYS = ['AltLeft', 'AltRight']

const anyHeld = (held: ReadonlySet<string>, codes: readonly string[]): boolean =>
  codes.some((code) => held.has(code))

/**
 * Runs a terminal session inside a host engine's update loop. The host owns
 * the window and rendering; the adapter sets up a camera and one tile map and
 * publishes the bridged console's grid after every tick.
 */
export class HostEngineAdapter {
  private readonly logger: Logger
  private readonly keyDelayMs: number
  private bridge: ConsoleBridge | null = null
  private sinceInput = 0

  constructor(
    readonly session: TerminalSession,
    private readonly tick: TickCallback,
    options: HostEngineAdapterOptions = {},
  ) {
    this.logger = options.logger ?? consoleLogger
    this.keyDelayMs = options.keyDelayMs ?? DEFAULT_KEY_DELAY_MS
  }

  get started(): boolean {
    return this.bridge !== null
  }

  start(world: HostWorld): void {
    const { session } = this
    const bridge = new ConsoleBridge(resourceSlot(world, CONSOLE_GRID_RESOURCE))
    const sheets: SpriteSheet[] = session.fonts.map((font) => buildSpriteSheet(font.tileSize))

    world.spawn({
      kind: 'camera',
      transform: cameraTransform(session),
      view: { width: session.widthPixels, height: session.heightPixels },
    })

    session.consoles.forEach(({ console, fontIndex }, index) => {
      if (!isBridgeableConsole(console)) {
        this.logger.warn(`Console ${index} is ${console.kind}; the host engine bridge skips it`)
        return
      }
      const font = session.fonts[fontIndex]
      const spriteSheet = sheets[fontIndex]
      if (!font || !spriteSheet) {
        return
      }
      bridge.bridge(console, fontIndex)
      world.spawn({
        kind: 'tile-map',
        transform: consoleTransform(session, font.tileSize),
        mapSize: console.getCharSize(),
        tileSize: font.tileSize,
        spriteSheet,
        resource: CONSOLE_GRID_RESOURCE,
      })
    })
    this.bridge = bridge
    this.logger.info(
      `Host engine bridge started with ${bridge.bridged ? 1 : 0} bridged console`,
    )
  }

  update(frame: HostFrame): HostTransition {
    const { session } = this
    if (!this.bridge) {
      throw new Error('HostEngineAdapter.update called before start')
    }

    session.applyTiming(frame.deltaMs, frame.deltaMs > 0 ? 1000 / frame.deltaMs : 0)
    this.sinceInput += frame.deltaMs
    session.applyInput(this.sampleInput(frame.input))

    this.tick(session)
    if (session.quitting) {
      return 'quit'
    }
    this.bridge.publish()
    return 'continue'
  }

  private sampleInput(input: HostInputState): InputSnapshot {
    const previous = this.session.input
    if (this.sinceInput <= this.keyDelayMs) {
      return Object.freeze({
        key: null,
        keysDown: previous.keysDown,
        mousePosition: previous.mousePosition,
        leftClick: false,
        shift: false,
        control: false,
        alt: false,
      })
    }

    this.sinceInput = 0
    const held = new Set(input.keysDown())
    let key: string | null = null
    for (const code of held) {
      key = code
    }
    return Object.freeze({
      key,
      keysDown: Object.freeze(held),
      mousePosition: input.mousePosition() ?? previous.mousePosition,
      leftClick: input.isLeftButtonDown(),
      shift: anyHeld(held, SHIFT_KEYS),
      control: anyHeld(held, CONTROL_KEYS),
      alt: anyHeld(held, ALT_KEYS),
    })
  }
}
