import { TerminalSession } from '@glyphgrid/core'
import { resolveInitHints } from './configuration/init-hints'
import { acquireContext, withContextLease } from './gl/context'
import { Renderer } from './renderer'
import type { InitHints, WindowPlatform } from './types'

export interface Terminal {
  readonly renderer: Renderer
  readonly session: TerminalSession
}

/**
 * Opens a window of `widthPixels × heightPixels` logical pixels and builds
 * the renderer for it. Either everything is created or nothing is left
 * behind: a failure releases the window and any GPU objects already built.
 */
export const init = (
  platform: WindowPlatform,
  widthPixels: number,
  heightPixels: number,
  title: string,
  overrides: Partial<InitHints> = {},
): Terminal => {
  const hints = resolveInitHints(overrides)
  const session = new TerminalSession({ widthPixels, heightPixels })
  const size = { width: widthPixels, height: heightPixels }

  const lease = acquireContext(platform, { title, size, hints })
  return withContextLease(lease, () => {
    const renderer = Renderer.create({ lease, platform, hints, size })
    const backing = renderer.backingSize
    hints.logger.info(
      `Initialized "${title}" at ${widthPixels}x${heightPixels} (backing ${backing.width}x${backing.height}, scale ${renderer.scaleFactor})`,
    )
    return { renderer, session }
  })
}
