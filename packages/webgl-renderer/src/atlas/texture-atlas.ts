import { describeError, InitializationError } from '@glyphgrid/core'
import { createImageTexture, disposeTexture } from '../internal/gl-utils'
import type { AtlasImage, WindowPlatform } from '../types'

export type AtlasKind = 'font' | 'sprite sheet'

/**
 * A decoded glyph sheet or sprite sheet. The texture is created on first bind
 * so images can be loaded before the first frame without touching GPU state.
 */
export class TextureAtlas {
  private texture: WebGLTexture | null = null
  private disposed = false

  constructor(
    private readonly gl: WebGL2RenderingContext,
    readonly kind: AtlasKind,
    readonly filename: string,
    private readonly image: AtlasImage,
  ) {}

  static async load(
    gl: WebGL2RenderingContext,
    platform: WindowPlatform,
    kind: AtlasKind,
    filename: string,
  ): Promise<TextureAtlas> {
    let image: AtlasImage
    try {
      image = await platform.loadImage(filename)
    } catch (error) {
      throw new InitializationError(
        'atlas',
        `Failed to load ${kind} "${filename}": ${describeError(error)}`,
        { cause: error },
      )
    }
    return new TextureAtlas(gl, kind, filename, image)
  }

  bind(unit = 0): void {
    if (this.disposed) {
      throw new InitializationError('atlas', `The ${this.kind} "${this.filename}" was disposed`)
    }
    if (!this.texture) {
      try {
        this.texture = createImageTexture(this.gl, this.image)
      } catch (error) {
        throw new InitializationError(
          'atlas',
          `Failed to upload ${this.kind} "${this.filename}": ${describeError(error)}`,
          { cause: error },
        )
      }
    }
    this.gl.activeTexture(this.gl.TEXTURE0 + unit)
    this.gl.bindTexture(this.gl.TEXTURE_2D, this.texture)
  }

  dispose(): void {
    if (this.disposed) {
      return
    }
    this.disposed = true
    disposeTexture(this.gl, this.texture)
    this.texture = null
  }
}
