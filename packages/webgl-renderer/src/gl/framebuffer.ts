import { describeError, InitializationError } from '@glyphgrid/core'
import {
  attachColorTexture,
  createRenderTexture,
  disposeFramebuffer,
  disposeTexture,
} from '../internal/gl-utils'
import type { PixelSize } from '../types'

export interface BackingFramebufferOptions {
  readonly srgb?: boolean
}

/**
 * Off-screen target every console layer renders into. Sized in device pixels
 * and replaced, never resized, when those change.
 */
export class BackingFramebuffer {
  readonly width: number
  readonly height: number
  readonly texture: WebGLTexture
  readonly framebuffer: WebGLFramebuffer
  private disposed = false

  private constructor(
    private readonly gl: WebGL2RenderingContext,
    size: PixelSize,
    texture: WebGLTexture,
    framebuffer: WebGLFramebuffer,
  ) {
    this.width = size.width
    this.height = size.height
    this.texture = texture
    this.framebuffer = framebuffer
  }

  static build(
    gl: WebGL2RenderingContext,
    width: number,
    height: number,
    options: BackingFramebufferOptions = {},
  ): BackingFramebuffer {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InitializationError(
        'framebuffer',
        `Invalid backing buffer size ${width}x${height}`,
      )
    }
    let texture: WebGLTexture | null = null
    let framebuffer: WebGLFramebuffer | null = null
    try {
      texture = createRenderTexture(gl, width, height, {
        internalFormat: options.srgb ? gl.SRGB8_ALPHA8 : gl.RGBA8,
        format: gl.RGBA,
        type: gl.UNSIGNED_BYTE,
        filter: gl.LINEAR,
      })
      framebuffer = gl.createFramebuffer()
      if (!framebuffer) {
        throw new Error('Failed to allocate framebuffer')
      }
      attachColorTexture(gl, framebuffer, texture)
      return new BackingFramebuffer(gl, { width, height }, texture, framebuffer)
    } catch (error) {
      disposeFramebuffer(gl, framebuffer)
      disposeTexture(gl, texture)
      throw new InitializationError(
        'framebuffer',
        `Failed to build ${width}x${height} backing buffer: ${describeError(error)}`,
        { cause: error },
      )
    }
  }

  matches(size: PixelSize): boolean {
    return this.width === size.width && this.height === size.height
  }

  bind(): void {
    this.gl.bindFramebuffer(this.gl.FRAMEBUFFER, this.framebuffer)
    this.gl.viewport(0, 0, this.width, this.height)
  }

  dispose(): void {
    if (this.disposed) {
      return
    }
    this.disposed = true
    disposeFramebuffer(this.gl, this.framebuffer)
    disposeTexture(this.gl, this.texture)
  }
}

export const createBackingFramebuffer = (
  gl: WebGL2RenderingContext,
  width: number,
  height: number,
  options: BackingFramebufferOptions = {},
): BackingFramebuffer => BackingFramebuffer.build(gl, width, height, options)
