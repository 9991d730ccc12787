import {
  type Console,
  DeviceLostError,
  type RGB,
  type TerminalSession,
} from '@glyphgrid/core'
import { TextureAtlas } from './atlas/texture-atlas'
import { toDevicePixels } from './configuration/init-hints'
import { ConsoleBuffers } from './geometry/console-buffers'
import { buildConsoleGeometry } from './geometry/console-geometry'
import type { ContextLease } from './gl/context'
import { type BackingFramebuffer, createBackingFramebuffer } from './gl/framebuffer'
import { createFullScreenQuad, type FullScreenQuad } from './gl/quad'
import {
  compileShaderRegistry,
  type Shader,
  type ShaderRegistry,
  uniformLocation,
} from './gl/shader-registry'
import { ScreenBurn } from './internal/screen-burn'
import { ShaderSlot } from './shaders/sources'
import type {
  InitHints,
  PixelSize,
  PlatformWindow,
  RendererDiagnostics,
  WindowPlatform,
} from './types'

export interface RendererInit {
  readonly lease: ContextLease
  readonly platform: WindowPlatform
  readonly hints: InitHints
  /** Logical size the session was created with. */
  readonly size: PixelSize
}

interface FrameCounters {
  drawCalls: number
  instances: number
}

const consoleSlot = (console: Console): ShaderSlot => {
  if (console.kind === 'fancy') {
    return ShaderSlot.FancyConsole
  }
  if (console.kind === 'sprite') {
    return ShaderSlot.SpriteConsole
  }
  return console.drawBackground
    ? ShaderSlot.ConsoleWithBackground
    : ShaderSlot.ConsoleNoBackground
}

/**
 * Owns every GPU resource of a terminal: shaders, the backing buffer, font
 * atlases and per-console instance buffers. Consoles render into the backing
 * buffer, which is then composited onto the window surface.
 */
export class Renderer {
  readonly gl: WebGL2RenderingContext
  readonly platform: WindowPlatform
  readonly hints: InitHints

  private readonly lease: ContextLease
  private readonly shaders: ShaderRegistry
  private readonly quad: FullScreenQuad
  private readonly originalLogical: PixelSize
  private readonly fonts: TextureAtlas[] = []
  private readonly sheets: TextureAtlas[] = []
  private readonly buffers = new Map<Console, ConsoleBuffers>()
  private readonly burn = new ScreenBurn()

  private backing: BackingFramebuffer
  private surface: PixelSize
  private scale: number
  private framebufferRebuilds = 0
  private lastFrame: FrameCounters = { drawCalls: 0, instances: 0 }
  private disposed = false

  private constructor(
    init: RendererInit,
    shaders: ShaderRegistry,
    quad: FullScreenQuad,
    backing: BackingFramebuffer,
    scale: number,
  ) {
    this.lease = init.lease
    this.gl = init.lease.gl
    this.platform = init.platform
    this.hints = init.hints
    this.originalLogical = init.size
    this.shaders = shaders
    this.quad = quad
    this.backing = backing
    this.scale = scale
    this.surface = toDevicePixels(init.lease.window.logicalSize(), scale)
  }

  /**
   * Builds every GPU resource or none: on failure whatever was created is
   * released before the error propagates.
   */
  static create(init: RendererInit): Renderer {
    const { gl, window } = init.lease
    const scale = window.scaleFactor()
    const device = toDevicePixels(init.size, scale)

    const shaders = compileShaderRegistry(gl)
    let quad: FullScreenQuad | null = null
    try {
      quad = createFullScreenQuad(gl)
      const backing = createBackingFramebuffer(gl, device.width, device.height, {
        srgb: init.hints.srgb,
      })
      gl.disable(gl.DEPTH_TEST)
      gl.enable(gl.BLEND)
      gl.blendFunc(gl.SRC_ALPHA, gl.ONE_MINUS_SRC_ALPHA)
      return new Renderer(init, shaders, quad, backing, scale)
    } catch (error) {
      quad?.dispose()
      shaders.dispose()
      throw error
    }
  }

  get window(): PlatformWindow {
    return this.lease.window
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  get backingSize(): PixelSize {
    return { width: this.backing.width, height: this.backing.height }
  }

  get surfaceSize(): PixelSize {
    return this.surface
  }

  get scaleFactor(): number {
    return this.scale
  }

  get fontCount(): number {
    return this.fonts.length
  }

  get spriteSheetCount(): number {
    return this.sheets.length
  }

  get screenBurnColor(): RGB {
    return this.burn.color
  }

  get diagnostics(): RendererDiagnostics {
    return {
      framebufferRebuilds: this.framebufferRebuilds,
      lastDrawCallCount: this.lastFrame.drawCalls,
      lastInstanceCount: this.lastFrame.instances,
    }
  }

  /** True while the session has fonts or sprite sheets without a loaded image. */
  hasPendingAssets(session: TerminalSession): boolean {
    return (
      session.fonts.length > this.fonts.length ||
      session.spriteSheets.length > this.sheets.length
    )
  }

  /** Loads every session font and sprite sheet that has no atlas yet. */
  async loadAssets(session: TerminalSession): Promise<void> {
    await this.loadInto(
      this.fonts,
      'font',
      session.fonts.map((font) => font.filename),
    )
    await this.loadInto(
      this.sheets,
      'sprite sheet',
      session.spriteSheets.map((sheet) => sheet.filename),
    )
  }

  private async loadInto(
    target: TextureAtlas[],
    kind: TextureAtlas['kind'],
    filenames: readonly string[],
  ): Promise<void> {
    for (const filename of filenames.slice(target.length)) {
      const atlas = await TextureAtlas.load(this.gl, this.platform, kind, filename)
      if (this.disposed) {
        atlas.dispose()
        return
      }
      target.push(atlas)
    }
  }

  /**
   * Applies a new window size. The backing buffer follows the window only
   * with `resizeScaling`; otherwise it keeps the original logical size and the
   * composite stretches it. Returns whether the backing buffer was replaced.
   */
  resize(logicalWidth: number, logicalHeight: number, scaleFactor: number): boolean {
    this.scale = scaleFactor
    this.surface = toDevicePixels({ width: logicalWidth, height: logicalHeight }, scaleFactor)

    const backingLogical = this.hints.resizeScaling
      ? { width: logicalWidth, height: logicalHeight }
      : this.originalLogical
    const device = toDevicePixels(backingLogical, scaleFactor)
    if (this.backing.matches(device)) {
      return false
    }

    const replacement = createBackingFramebuffer(this.gl, device.width, device.height, {
      srgb: this.hints.srgb,
    })
    this.backing.dispose()
    this.backing = replacement
    this.framebufferRebuilds += 1
    this.hints.logger.debug(
      `Rebuilt backing buffer at ${device.width}x${device.height}`,
    )
    return true
  }

  assertContext(): void {
    if (this.gl.isContextLost()) {
      throw new DeviceLostError('WebGL context was lost')
    }
  }

  /**
   * Re-uploads geometry for consoles that changed since the last frame and
   * for consoles seen for the first time. Returns how many were rebuilt.
   */
  rebuildDirty(session: TerminalSession): number {
    let rebuilt = 0
    const live = new Set<Console>()
    for (const { console } of session.consoles) {
      live.add(console)
      let buffers = this.buffers.get(console)
      if (buffers && !console.isDirty) {
        continue
      }
      const geometry = buildConsoleGeometry(console, session.spriteSheets)
      if (!buffers) {
        buffers = new ConsoleBuffers(this.gl, geometry)
        this.buffers.set(console, buffers)
      }
      buffers.upload(geometry)
      console.markClean()
      rebuilt += 1
    }
    for (const [console, buffers] of this.buffers) {
      if (!live.has(console)) {
        buffers.dispose()
        this.buffers.delete(console)
      }
    }
    return rebuilt
  }

  /**
   * Draws every console, first to last, into the backing buffer. A console
   * whose font or sprite sheet is still loading is left out of the frame.
   */
  renderConsoles(session: TerminalSession): void {
    const { gl } = this
    const counters: FrameCounters = { drawCalls: 0, instances: 0 }
    this.backing.bind()
    gl.clearColor(0, 0, 0, 1)
    gl.clear(gl.COLOR_BUFFER_BIT)

    for (const { console, fontIndex } of session.consoles) {
      const buffers = this.buffers.get(console)
      if (!buffers || !this.bindConsole(console, fontIndex)) {
        continue
      }
      for (const pass of buffers.passes) {
        if (pass.draw()) {
          counters.drawCalls += 1
          counters.instances += pass.count
        }
      }
    }
    this.lastFrame = counters
  }

  /** Selects the console's program and texture. False while the texture is loading. */
  private bindConsole(console: Console, fontIndex: number): boolean {
    const { gl } = this
    if (console.kind === 'sprite') {
      const sheet = this.sheets[console.spriteSheetIndex]
      if (!sheet) {
        return false
      }
      const shader = this.shaders.get(consoleSlot(console))
      gl.useProgram(shader.program)
      sheet.bind(0)
      gl.uniform1i(uniformLocation(shader, 'uSheet'), 0)
      gl.uniform2f(uniformLocation(shader, 'uSurfaceSize'), console.width, console.height)
      return true
    }

    const atlas = this.fonts[fontIndex]
    if (!atlas) {
      return false
    }
    const shader = this.shaders.get(consoleSlot(console))
    gl.useProgram(shader.program)
    atlas.bind(0)
    gl.uniform1i(uniformLocation(shader, 'uAtlas'), 0)
    gl.uniform2f(uniformLocation(shader, 'uGridSize'), console.width, console.height)
    if (console.kind === 'fancy') {
      gl.uniform1f(uniformLocation(shader, 'uDrawBackground'), console.drawBackground ? 1 : 0)
    }
    return true
  }

  /** Composites the backing buffer onto the window and presents it. */
  present(session: TerminalSession, elapsedMs: number): void {
    const { gl } = this
    const burnColor = this.burn.update(
      elapsedMs,
      session.postScreenburn,
      session.screenBurnColor,
    )
    const postProcess = session.postScanlines || session.postScreenburn
    const shader = this.shaders.get(postProcess ? ShaderSlot.Scanlines : ShaderSlot.Backing)

    gl.bindFramebuffer(gl.FRAMEBUFFER, null)
    gl.viewport(0, 0, this.surface.width, this.surface.height)
    gl.useProgram(shader.program)
    gl.activeTexture(gl.TEXTURE0)
    gl.bindTexture(gl.TEXTURE_2D, this.backing.texture)
    gl.uniform1i(uniformLocation(shader, 'uScreen'), 0)
    if (postProcess) {
      this.applyPostUniforms(shader, session, burnColor)
    }
    this.quad.draw()
    this.lastFrame = {
      drawCalls: this.lastFrame.drawCalls + 1,
      instances: this.lastFrame.instances,
    }
    this.window.present()
  }

  private applyPostUniforms(
    shader: Shader,
    session: TerminalSession,
    burn: RGB,
  ): void {
    const { gl } = this
    gl.uniform2f(
      uniformLocation(shader, 'uScreenSize'),
      this.surface.width,
      this.surface.height,
    )
    gl.uniform1f(uniformLocation(shader, 'uScanlines'), session.postScanlines ? 1 : 0)
    gl.uniform3f(uniformLocation(shader, 'uScreenBurn'), burn.r, burn.g, burn.b)
  }

  /** Releases GPU resources and the context lease. Safe to call twice. */
  dispose(): void {
    if (this.disposed) {
      return
    }
    this.disposed = true
    for (const buffers of this.buffers.values()) {
      buffers.dispose()
    }
    this.buffers.clear()
    for (const atlas of [...this.fonts, ...this.sheets]) {
      atlas.dispose()
    }
    this.fonts.length = 0
    this.sheets.length = 0
    this.backing.dispose()
    this.quad.dispose()
    this.shaders.dispose()
    this.lease.release()
  }
}
