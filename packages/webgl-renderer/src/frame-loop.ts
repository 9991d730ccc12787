import {
  DeviceLostError,
  describeError,
  InputCollector,
  type TerminalSession,
  type TickCallback,
} from '@glyphgrid/core'
import { convertFpsToWait } from './configuration/init-hints'
import { FrameScheduler } from './internal/frame-scheduler'
import { FrameTimer } from './internal/timing'
import type { Renderer } from './renderer'
import type { PlatformEvent } from './types'

type FrameOutcome = 'continue' | 'quit'

/**
 * Drives the terminal until the session quits. Resolves on quit and rejects
 * with the error that ended a frame; the renderer is disposed either way.
 * Frames run without suspending. Fonts and sprite sheets added by a tick are
 * loaded while waiting for the next frame, so the layers using them appear one
 * frame later.
 */
export const run = async (
  renderer: Renderer,
  session: TerminalSession,
  tick: TickCallback,
): Promise<void> => {
  const { platform, hints } = renderer
  const { logger } = hints
  const collector = new InputCollector({ intervalMs: hints.inputIntervalMs })
  const timer = new FrameTimer()
  const scheduler = new FrameScheduler(platform, {
    vsync: hints.vsync,
    frameIntervalMs: convertFpsToWait(hints.frameSleepTime) ?? 0,
  })

  const applyEvent = (event: PlatformEvent): void => {
    switch (event.type) {
      case 'resize':
        renderer.resize(event.width, event.height, renderer.scaleFactor)
        if (hints.resizeScaling) {
          session.widthPixels = event.width
          session.heightPixels = event.height
        }
        return
      case 'scale-factor': {
        const logical = renderer.window.logicalSize()
        renderer.resize(logical.width, logical.height, event.scaleFactor)
        return
      }
      case 'close-requested':
        session.quit()
        return
      case 'context-lost':
        throw new DeviceLostError('WebGL context was lost')
      default:
        collector.push(event)
    }
  }

  const runFrame = (): FrameOutcome => {
    renderer.assertContext()
    const timing = timer.tick(platform.now())
    session.applyTiming(timing.frameTimeMs, timing.fps)

    for (const event of renderer.window.pollEvents()) {
      applyEvent(event)
    }
    session.applyInput(collector.capture(timing.frameTimeMs))

    tick(session)
    if (session.quitting) {
      return 'quit'
    }

    renderer.rebuildDirty(session)
    renderer.renderConsoles(session)
    renderer.present(session, timing.frameTimeMs)
    return 'continue'
  }

  const nextFrame = (): Promise<number> =>
    new Promise((resolve) => {
      scheduler.request(resolve)
    })

  try {
    await renderer.loadAssets(session)
    while (runFrame() === 'continue') {
      await nextFrame()
      if (renderer.hasPendingAssets(session)) {
        await renderer.loadAssets(session)
      }
    }
    logger.debug('Terminal loop finished')
  } catch (error) {
    if (error instanceof DeviceLostError) {
      logger.error(`Device lost: ${error.message}`)
    } else {
      logger.error(`Frame failed: ${describeError(error)}`, error)
    }
    throw error
  } finally {
    scheduler.cancel()
    renderer.dispose()
  }
}
