import type { InputEvent, Logger } from '@glyphgrid/core'

export interface PixelSize {
  readonly width: number
  readonly height: number
}

export interface MonitorInfo {
  readonly name?: string
  /** Physical (device) pixels. */
  readonly size: PixelSize
}

export interface WindowIcon {
  /** RGBA, row-major, `width * height * 4` bytes. */
  readonly pixels: Uint8Array
  readonly width: number
  readonly height: number
}

/**
 * Decoded glyph sheet. Either something the GPU can sample directly or raw
 * RGBA pixels.
 */
export type AtlasImage =
  | TexImageSource
  | {
      readonly width: number
      readonly height: number
      readonly data: Uint8Array
    }

export type WindowEvent =
  | {
      readonly type: 'resize'
      /** Logical pixels. */
      readonly width: number
      readonly height: number
    }
  | { readonly type: 'scale-factor'; readonly scaleFactor: number }
  | { readonly type: 'close-requested' }
  | { readonly type: 'context-lost' }

export type PlatformEvent = InputEvent | WindowEvent

export interface WindowDescriptor {
  readonly title: string
  /** Logical pixels. */
  readonly size: PixelSize
  readonly resizable: boolean
  readonly vsync: boolean
  readonly contextAttributes: WebGLContextAttributes
}

/**
 * A window with a current WebGL2 context. Platforms create at most one per
 * process; see `acquireContext`.
 */
export interface PlatformWindow {
  readonly gl: WebGL2RenderingContext
  scaleFactor(): number
  logicalSize(): PixelSize
  outerSize(): PixelSize
  currentMonitor(): MonitorInfo | null
  setOuterPosition(x: number, y: number): void
  setFullscreen(monitor: MonitorInfo): void
  setIcon(icon: WindowIcon): void
  pollEvents(): readonly PlatformEvent[]
  present(): void
  close(): void
}

export interface WindowPlatform {
  availableMonitors(): readonly MonitorInfo[]
  createWindow(descriptor: WindowDescriptor): PlatformWindow
  loadImage(filename: string): Promise<AtlasImage>
  now(): number
  /**
   * Present when the platform can wait for the display's next refresh. Used
   * for pacing when vsync is enabled.
   */
  requestAnimationFrame?(callback: (timestamp: number) => void): number
  cancelAnimationFrame?(handle: number): void
}

export interface InitHints {
  readonly allowResize: boolean
  readonly vsync: boolean
  readonly fullscreen: boolean
  readonly centered: boolean
  readonly srgb: boolean
  readonly icon: WindowIcon | null
  /** Target frames per second when not paced by vsync; null renders flat out. */
  readonly frameSleepTime: number | null
  readonly resizeScaling: boolean
  /** Graphics feature selection passed to `getContext('webgl2', …)`. */
  readonly contextAttributes: WebGLContextAttributes
  /** Minimum time between full input captures. */
  readonly inputIntervalMs: number
  readonly logger: Logger
}

export interface RendererDiagnostics {
  readonly framebufferRebuilds: number
  readonly lastDrawCallCount: number
  readonly lastInstanceCount: number
}
