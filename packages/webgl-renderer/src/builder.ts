import {
  assertNever,
  type Console,
  type ConsoleOptions,
  createFontDescriptor,
  createSpriteSheet,
  DenseConsole,
  FancyConsole,
  type FontDescriptor,
  InitializationError,
  type PixelRect,
  SparseConsole,
  SpriteConsole,
  type SpriteSheetDescriptor,
} from '@glyphgrid/core'
import { init, type Terminal } from './init'
import type { InitHints, WindowPlatform } from './types'

export const DEFAULT_TITLE = 'Glyphgrid Terminal'
export const DEFAULT_FONT = 'terminal8x8.png'

type ConsoleRequest =
  | {
      readonly kind: 'dense' | 'sparse' | 'fancy'
      readonly width: number
      readonly height: number
      readonly font: string
      readonly drawBackground: boolean
    }
  | {
      readonly kind: 'sprite'
      /** Pixels. */
      readonly width: number
      readonly height: number
      readonly sheet: string
    }

type GlyphConsoleKind = Exclude<ConsoleRequest['kind'], 'sprite'>

const createGlyphConsole = (
  kind: GlyphConsoleKind,
  width: number,
  height: number,
  options: ConsoleOptions,
): Console => {
  switch (kind) {
    case 'dense':
      return new DenseConsole(width, height, options)
    case 'sparse':
      return new SparseConsole(width, height, options)
    case 'fancy':
      return new FancyConsole(width, height, options)
    default:
      return assertNever(kind, 'console kind')
  }
}

/**
 * Collects window, font and console settings and turns them into a running
 * terminal in one `build()` call.
 */
export class TerminalBuilder {
  private width = 80
  private height = 50
  private tileWidth = 8
  private tileHeight = 8
  private title: string | null = null
  private readonly fonts: FontDescriptor[] = []
  private readonly spriteSheets: SpriteSheetDescriptor[] = []
  private readonly consoles: ConsoleRequest[] = []
  private hints: Partial<InitHints> = {}

  constructor(private readonly platform: WindowPlatform) {}

  /** 80×50 cells of 8×8 pixels with a single background-drawing console. */
  static simple80x50(platform: WindowPlatform): TerminalBuilder {
    return TerminalBuilder.simple(platform, 80, 50)
  }

  static simple(platform: WindowPlatform, width: number, height: number): TerminalBuilder {
    return new TerminalBuilder(platform)
      .withDimensions(width, height)
      .withTileDimensions(8, 8)
      .withFont(DEFAULT_FONT, 8, 8)
      .withSimpleConsole(width, height, DEFAULT_FONT)
  }

  /** Window size in console cells. */
  withDimensions(width: number, height: number): this {
    this.width = width
    this.height = height
    return this
  }

  /** Pixel size of one cell; window pixels are cells × tile size. */
  withTileDimensions(width: number, height: number): this {
    this.tileWidth = width
    this.tileHeight = height
    return this
  }

  withTitle(title: string): this {
    this.title = title
    return this
  }

  withFont(filename: string, tileWidth: number, tileHeight: number): this {
    this.fonts.push(createFontDescriptor(filename, tileWidth, tileHeight))
    return this
  }

  withSimpleConsole(width: number, height: number, font: string): this {
    return this.addConsole('dense', width, height, font, true)
  }

  withSimpleConsoleNoBackground(width: number, height: number, font: string): this {
    return this.addConsole('dense', width, height, font, false)
  }

  withSparseConsole(width: number, height: number, font: string): this {
    return this.addConsole('sparse', width, height, font, true)
  }

  withSparseConsoleNoBackground(width: number, height: number, font: string): this {
    return this.addConsole('sparse', width, height, font, false)
  }

  /** Free-positioned tiles with rotation and scale. */
  withFancyConsole(width: number, height: number, font: string): this {
    return this.addConsole('fancy', width, height, font, true)
  }

  withFancyConsoleNoBackground(width: number, height: number, font: string): this {
    return this.addConsole('fancy', width, height, font, false)
  }

  withSpriteSheet(filename: string, sprites: readonly PixelRect[]): this {
    this.spriteSheets.push(createSpriteSheet(filename, sprites))
    return this
  }

  /** A sprite layer `width`×`height` pixels drawing from a registered sheet. */
  withSpriteConsole(width: number, height: number, sheet: string): this {
    this.consoles.push({ kind: 'sprite', width, height, sheet })
    return this
  }

  withVsync(vsync: boolean): this {
    return this.withHints({ vsync })
  }

  withFullscreen(fullscreen: boolean): this {
    return this.withHints({ fullscreen })
  }

  withFps(fps: number): this {
    return this.withHints({ frameSleepTime: fps })
  }

  withResizeScaling(resizeScaling: boolean): this {
    return this.withHints({ resizeScaling })
  }

  withHints(hints: Partial<InitHints>): this {
    this.hints = { ...this.hints, ...hints }
    return this
  }

  private addConsole(
    kind: GlyphConsoleKind,
    width: number,
    height: number,
    font: string,
    drawBackground: boolean,
  ): this {
    this.consoles.push({ kind, width, height, font, drawBackground })
    return this
  }

  private validate(): void {
    if (this.fonts.length === 0) {
      throw new InitializationError('atlas', 'At least one font is required')
    }
    if (this.consoles.length === 0) {
      throw new InitializationError('console', 'At least one console is required')
    }
    for (const request of this.consoles) {
      if (request.kind === 'sprite') {
        if (!this.spriteSheets.some((sheet) => sheet.filename === request.sheet)) {
          throw new InitializationError(
            'console',
            `Console uses unknown sprite sheet "${request.sheet}"`,
          )
        }
      } else if (!this.fonts.some((font) => font.filename === request.font)) {
        throw new InitializationError(
          'console',
          `Console uses unknown font "${request.font}"`,
        )
      }
    }
    for (const [label, value] of [
      ['width', this.width],
      ['height', this.height],
      ['tile width', this.tileWidth],
      ['tile height', this.tileHeight],
    ] as const) {
      if (!Number.isInteger(value) || value <= 0) {
        throw new RangeError(`Terminal ${label} must be a positive integer, got ${value}`)
      }
    }
  }

  async build(): Promise<Terminal> {
    this.validate()
    const terminal = init(
      this.platform,
      this.width * this.tileWidth,
      this.height * this.tileHeight,
      this.title ?? DEFAULT_TITLE,
      this.hints,
    )
    const { renderer, session } = terminal
    try {
      const fontIndex = new Map<string, number>()
      for (const font of this.fonts) {
        fontIndex.set(font.filename, session.addFont(font))
      }
      const sheetIndex = new Map<string, number>()
      for (const sheet of this.spriteSheets) {
        sheetIndex.set(sheet.filename, session.addSpriteSheet(sheet))
      }
      for (const request of this.consoles) {
        if (request.kind === 'sprite') {
          const sprites = new SpriteConsole(
            request.width,
            request.height,
            sheetIndex.get(request.sheet) ?? 0,
          )
          session.addConsole(sprites, 0)
          continue
        }
        const console = createGlyphConsole(request.kind, request.width, request.height, {
          drawBackground: request.drawBackground,
        })
        session.addConsole(console, fontIndex.get(request.font) ?? 0)
      }
      await renderer.loadAssets(session)
    } catch (error) {
      renderer.dispose()
      throw error
    }
    return terminal
  }
}
