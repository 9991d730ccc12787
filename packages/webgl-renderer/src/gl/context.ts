import {
  describeError,
  InitializationError,
  NoMonitorFoundError,
} from '@glyphgrid/core'
import type {
  InitHints,
  PixelSize,
  PlatformWindow,
  WindowDescriptor,
  WindowIcon,
  WindowPlatform,
} from '../types'

export interface ContextLease {
  readonly window: PlatformWindow
  readonly gl: WebGL2RenderingContext
  readonly released: boolean
  release(): void
}

export interface AcquireContextOptions {
  readonly title: string
  /** Logical pixels. */
  readonly size: PixelSize
  readonly hints: InitHints
}

const DEFAULT_CONTEXT_ATTRIBUTES: WebGLContextAttributes = {
  alpha: false,
  antialias: false,
  depth: false,
  stencil: false,
  preserveDrawingBuffer: false,
}

let currentLease: ContextLease | null = null

export const isContextCurrent = (): boolean => currentLease !== null

/**
 * Runs `fn` with the lease and releases it if `fn` throws, so a failed
 * initialization never leaves a half-configured context current.
 */
export const withContextLease = <T>(
  lease: ContextLease,
  fn: (lease: ContextLease) => T,
): T => {
  try {
    return fn(lease)
  } catch (error) {
    lease.release()
    throw error
  }
}

const createLease = (window: PlatformWindow): ContextLease => {
  let released = false
  const lease: ContextLease = {
    window,
    gl: window.gl,
    get released() {
      return released
    },
    release() {
      if (released) {
        return
      }
      released = true
      if (currentLease === lease) {
        currentLease = null
      }
      window.close()
    },
  }
  return lease
}

const isIconValid = (icon: WindowIcon): boolean =>
  icon.pixels.length === icon.width * icon.height * 4

const centerWindow = (window: PlatformWindow): void => {
  const monitor = window.currentMonitor()
  if (!monitor) {
    return
  }
  const outer = window.outerSize()
  const x = Math.max(0, Math.floor((monitor.size.width - outer.width) / 2))
  const y = Math.max(0, Math.floor((monitor.size.height - outer.height) / 2))
  window.setOuterPosition(x, y)
}

/**
 * Creates the process's window and makes its context current. Fullscreen
 * requests are checked against the monitor list before anything is created.
 */
export const acquireContext = (
  platform: WindowPlatform,
  options: AcquireContextOptions,
): ContextLease => {
  if (currentLease) {
    throw new InitializationError(
      'context',
      'A GPU context is already current in this process',
    )
  }
  const { hints } = options

  const fullscreenMonitor = hints.fullscreen
    ? platform.availableMonitors()[0]
    : undefined
  if (hints.fullscreen && !fullscreenMonitor) {
    throw new NoMonitorFoundError()
  }

  const descriptor: WindowDescriptor = {
    title: options.title,
    size: options.size,
    resizable: hints.allowResize,
    vsync: hints.vsync,
    contextAttributes: {
      ...DEFAULT_CONTEXT_ATTRIBUTES,
      ...hints.contextAttributes,
    },
  }

  let window: PlatformWindow
  try {
    window = platform.createWindow(descriptor)
  } catch (error) {
    throw new InitializationError(
      'context',
      `Failed to create window: ${describeError(error)}`,
      { cause: error },
    )
  }

  const lease = createLease(window)
  currentLease = lease

  return withContextLease(lease, () => {
    if (fullscreenMonitor) {
      window.setFullscreen(fullscreenMonitor)
    } else if (hints.centered) {
      centerWindow(window)
    }

    if (hints.icon) {
      if (isIconValid(hints.icon)) {
        window.setIcon(hints.icon)
      } else {
        hints.logger.warn(
          `Ignoring window icon: expected ${hints.icon.width * hints.icon.height * 4} bytes, got ${hints.icon.pixels.length}`,
        )
      }
    }
    return lease
  })
}
