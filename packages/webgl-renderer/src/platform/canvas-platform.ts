import {
  consoleLogger,
  describeError,
  type Logger,
  type ModifierState,
  type PointerButton,
} from '@glyphgrid/core'
import type {
  AtlasImage,
  MonitorInfo,
  PixelSize,
  PlatformEvent,
  PlatformWindow,
  WindowDescriptor,
  WindowIcon,
  WindowPlatform,
} from '../types'

export interface CanvasPlatformOptions {
  readonly canvas: HTMLCanvasElement
  /** Resolves font filenames. Defaults to the document's base URI. */
  readonly baseUrl?: string
  readonly logger?: Logger
}

const mapPointerButton = (button: number): PointerButton | null => {
  switch (button) {
    case 0:
      return 'left'
    case 1:
      return 'middle'
    case 2:
      return 'right'
    default:
      return null
  }
}

const readModifiers = (
  event: Pick<KeyboardEvent, 'shiftKey' | 'ctrlKey' | 'altKey'>,
): ModifierState => ({
  shift: event.shiftKey,
  control: event.ctrlKey,
  alt: event.altKey,
})

const devicePixelRatio = (): number =>
  typeof window === 'undefined' ? 1 : window.devicePixelRatio || 1

const applyCanvasSize = (canvas: HTMLCanvasElement, logical: PixelSize): void => {
  const ratio = devicePixelRatio()
  canvas.width = Math.max(1, Math.round(logical.width * ratio))
  canvas.height = Math.max(1, Math.round(logical.height * ratio))
  canvas.style.width = `${logical.width}px`
  canvas.style.height = `${logical.height}px`
}

const applyIcon = (icon: WindowIcon): void => {
  const scratch = document.createElement('canvas')
  scratch.width = icon.width
  scratch.height = icon.height
  const context = scratch.getContext('2d')
  if (!context) {
    return
  }
  context.putImageData(
    new ImageData(new Uint8ClampedArray(icon.pixels), icon.width, icon.height),
    0,
    0,
  )
  let link = document.querySelector<HTMLLinkElement>('link[rel="icon"]')
  if (!link) {
    link = document.createElement('link')
    link.rel = 'icon'
    document.head.append(link)
  }
  link.href = scratch.toDataURL('image/png')
}

const createCanvasWindow = (
  canvas: HTMLCanvasElement,
  descriptor: WindowDescriptor,
  logger: Logger,
): PlatformWindow => {
  const gl = canvas.getContext('webgl2', descriptor.contextAttributes)
  if (!gl) {
    throw new Error('Unable to acquire WebGL2 context for terminal')
  }

  const queue: PlatformEvent[] = []
  let logical: PixelSize = descriptor.size
  let ratio = devicePixelRatio()
  applyCanvasSize(canvas, logical)
  document.title = descriptor.title
  if (canvas.tabIndex < 0) {
    canvas.tabIndex = 0
  }

  const relativePosition = (event: PointerEvent): { x: number; y: number } => {
    const rect = canvas.getBoundingClientRect()
    const x = event.clientX - rect.left
    const y = event.clientY - rect.top
    return {
      x: Number.isFinite(x) ? x : 0,
      y: Number.isFinite(y) ? y : 0,
    }
  }

  const handleKeyDown = (event: KeyboardEvent) => {
    event.preventDefault()
    queue.push({ type: 'key-down', code: event.code, ...readModifiers(event) })
  }
  const handleKeyUp = (event: KeyboardEvent) => {
    queue.push({ type: 'key-up', code: event.code, ...readModifiers(event) })
  }
  const handlePointerMove = (event: PointerEvent) => {
    queue.push({ type: 'pointer-move', ...relativePosition(event) })
  }
  const handlePointerButton =
    (type: 'pointer-down' | 'pointer-up') => (event: PointerEvent) => {
      const button = mapPointerButton(event.button)
      if (button) {
        queue.push({ type, button })
      }
    }
  const handlePointerDown = handlePointerButton('pointer-down')
  const handlePointerUp = handlePointerButton('pointer-up')
  const handleContextLost = (event: Event) => {
    event.preventDefault()
    queue.push({ type: 'context-lost' })
  }
  const handleUnload = () => {
    queue.push({ type: 'close-requested' })
  }

  const resizeObserver =
    descriptor.resizable && typeof ResizeObserver !== 'undefined' && canvas.parentElement
      ? new ResizeObserver((entries) => {
          const rect = entries[0]?.contentRect
          if (!rect || rect.width <= 0 || rect.height <= 0) {
            return
          }
          logical = { width: Math.round(rect.width), height: Math.round(rect.height) }
          applyCanvasSize(canvas, logical)
          queue.push({ type: 'resize', ...logical })
        })
      : null
  if (resizeObserver && canvas.parentElement) {
    resizeObserver.observe(canvas.parentElement)
  }

  let ratioQuery: MediaQueryList | null = null
  const handleRatioChange = () => {
    ratio = devicePixelRatio()
    applyCanvasSize(canvas, logical)
    queue.push({ type: 'scale-factor', scaleFactor: ratio })
    watchRatio()
  }
  const watchRatio = () => {
    ratioQuery?.removeEventListener('change', handleRatioChange)
    ratioQuery =
      typeof window.matchMedia === 'function'
        ? window.matchMedia(`(resolution: ${ratio}dppx)`)
        : null
    ratioQuery?.addEventListener('change', handleRatioChange)
  }
  watchRatio()

  canvas.addEventListener('keydown', handleKeyDown)
  canvas.addEventListener('keyup', handleKeyUp)
  canvas.addEventListener('pointermove', handlePointerMove)
  canvas.addEventListener('pointerdown', handlePointerDown)
  canvas.addEventListener('pointerup', handlePointerUp)
  canvas.addEventListener('webglcontextlost', handleContextLost)
  window.addEventListener('beforeunload', handleUnload)

  return {
    gl,
    scaleFactor: () => ratio,
    logicalSize: () => logical,
    outerSize: () => ({
      width: Math.round(window.outerWidth * ratio),
      height: Math.round(window.outerHeight * ratio),
    }),
    currentMonitor: () => screenMonitor(),
    // Pages cannot move the browser window.
    setOuterPosition: () => {},
    setFullscreen: () => {
      canvas.requestFullscreen().catch((error: unknown) => {
        logger.warn(`Fullscreen request was refused: ${describeError(error)}`)
      })
    },
    setIcon: applyIcon,
    pollEvents: () => queue.splice(0, queue.length),
    // The browser presents the drawing buffer when the frame task ends.
    present: () => {},
    close: () => {
      resizeObserver?.disconnect()
      ratioQuery?.removeEventListener('change', handleRatioChange)
      canvas.removeEventListener('keydown', handleKeyDown)
      canvas.removeEventListener('keyup', handleKeyUp)
      canvas.removeEventListener('pointermove', handlePointerMove)
      canvas.removeEventListener('pointerdown', handlePointerDown)
      canvas.removeEventListener('pointerup', handlePointerUp)
      canvas.removeEventListener('webglcontextlost', handleContextLost)
      window.removeEventListener('beforeunload', handleUnload)
      queue.length = 0
    },
  }
}

const screenMonitor = (): MonitorInfo | null => {
  if (typeof screen === 'undefined') {
    return null
  }
  const ratio = devicePixelRatio()
  return {
    size: {
      width: Math.round(screen.width * ratio),
      height: Math.round(screen.height * ratio),
    },
  }
}

/** Runs a terminal inside an existing `<canvas>` element. */
export const createCanvasPlatform = (options: CanvasPlatformOptions): WindowPlatform => {
  const { canvas } = options
  const logger = options.logger ?? consoleLogger

  return {
    availableMonitors: () => {
      const monitor = screenMonitor()
      return monitor ? [monitor] : []
    },
    createWindow: (descriptor) => createCanvasWindow(canvas, descriptor, logger),
    loadImage: async (filename): Promise<AtlasImage> => {
      const url = new URL(filename, options.baseUrl ?? document.baseURI)
      const response = await fetch(url)
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} loading ${url.href}`)
      }
      return createImageBitmap(await response.blob())
    },
    now: () => performance.now(),
    requestAnimationFrame: (callback) => window.requestAnimationFrame(callback),
    cancelAnimationFrame: (handle) => window.cancelAnimationFrame(handle),
  }
}
