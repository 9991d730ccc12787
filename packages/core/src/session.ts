import { CYAN, type RGB } from './color'
import type { Console, ConsoleLayer } from './console'
import { InitializationError } from './errors'
import type { FontDescriptor } from './font'
import { EMPTY_INPUT_SNAPSHOT, type InputSnapshot } from './input'
import type { SpriteSheetDescriptor } from './sprite-console'

/** Application code called once per frame. */
export type TickCallback = (session: TerminalSession) => void

export interface TerminalSessionInit {
  readonly widthPixels: number
  readonly heightPixels: number
}

/**
 * Everything application code touches from its tick callback. Backends own
 * the GPU side; the session only holds data.
 */
export class TerminalSession {
  widthPixels: number
  heightPixels: number
  readonly originalWidthPixels: number
  readonly originalHeightPixels: number

  fps = 0
  frameTimeMs = 0
  quitting = false

  postScanlines = false
  postScreenburn = false
  screenBurnColor: RGB = CYAN

  private activeIndex = 0
  private inputSnapshot: InputSnapshot = EMPTY_INPUT_SNAPSHOT
  private readonly fontList: FontDescriptor[] = []
  private readonly spriteSheetList: SpriteSheetDescriptor[] = []
  private readonly layers: ConsoleLayer[] = []

  constructor(init: TerminalSessionInit) {
    if (
      !Number.isFinite(init.widthPixels) ||
      !Number.isFinite(init.heightPixels) ||
      init.widthPixels <= 0 ||
      init.heightPixels <= 0
    ) {
      throw new RangeError(
        `Terminal size must be positive, got ${init.widthPixels}x${init.heightPixels}`,
      )
    }
    this.widthPixels = init.widthPixels
    this.heightPixels = init.heightPixels
    this.originalWidthPixels = init.widthPixels
    this.originalHeightPixels = init.heightPixels
  }

  get fonts(): readonly FontDescriptor[] {
    return this.fontList
  }

  get spriteSheets(): readonly SpriteSheetDescriptor[] {
    return this.spriteSheetList
  }

  get consoles(): readonly ConsoleLayer[] {
    return this.layers
  }

  get input(): InputSnapshot {
    return this.inputSnapshot
  }

  addFont(font: FontDescriptor): number {
    this.fontList.push(font)
    return this.fontList.length - 1
  }

  addSpriteSheet(sheet: SpriteSheetDescriptor): number {
    this.spriteSheetList.push(sheet)
    return this.spriteSheetList.length - 1
  }

  addConsole(console: Console, fontIndex: number): number {
    if (!Number.isInteger(fontIndex) || !this.fontList[fontIndex]) {
      throw new InitializationError(
        'console',
        `Console refers to unknown font index ${fontIndex}`,
      )
    }
    if (console.kind === 'sprite' && !this.spriteSheetList[console.spriteSheetIndex]) {
      throw new InitializationError(
        'console',
        `Console refers to unknown sprite sheet index ${console.spriteSheetIndex}`,
      )
    }
    this.layers.push(Object.freeze({ console, fontIndex }))
    return this.layers.length - 1
  }

  getActiveConsole(): number {
    return this.activeIndex
  }

  setActiveConsole(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.layers.length) {
      throw new RangeError(
        `Active console ${index} is out of range (0..${this.layers.length - 1})`,
      )
    }
    this.activeIndex = index
  }

  /** The console selected by `setActiveConsole`, if any consoles exist. */
  get activeConsole(): Console | undefined {
    return this.layers[this.activeIndex]?.console
  }

  quit(): void {
    this.quitting = true
  }

  applyInput(snapshot: InputSnapshot): void {
    this.inputSnapshot = snapshot
  }

  applyTiming(frameTimeMs: number, fps: number): void {
    this.frameTimeMs = frameTimeMs
    this.fps = fps
  }
}
