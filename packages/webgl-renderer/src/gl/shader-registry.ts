import { describeError, InitializationError } from '@glyphgrid/core'
import { createProgram, resolveUniforms } from '../internal/gl-utils'
import { SHADER_TABLE, type ShaderSlot, type ShaderSource } from '../shaders/sources'

export interface Shader {
  readonly name: string
  readonly program: WebGLProgram
  readonly uniforms: ReadonlyMap<string, WebGLUniformLocation | null>
}

export interface ShaderRegistry {
  readonly shaders: readonly Shader[]
  get(slot: ShaderSlot): Shader
  dispose(): void
}

/**
 * Compiles every program in `table`. A failure deletes whatever was already
 * built, so callers never hold a partial registry.
 */
export const compileShaderRegistry = (
  gl: WebGL2RenderingContext,
  table: readonly ShaderSource[] = SHADER_TABLE,
): ShaderRegistry => {
  const shaders: Shader[] = []
  for (const source of table) {
    try {
      const program = createProgram(gl, source.vertex, source.fragment)
      shaders.push(
        Object.freeze({
          name: source.name,
          program,
          uniforms: resolveUniforms(gl, program, source.uniforms),
        }),
      )
    } catch (error) {
      for (const shader of shaders) {
        gl.deleteProgram(shader.program)
      }
      throw new InitializationError(
        'shader',
        `Failed to build shader "${source.name}": ${describeError(error)}`,
        { cause: error },
      )
    }
  }

  let disposed = false
  return {
    shaders,
    get(slot) {
      const shader = shaders[slot]
      if (!shader) {
        throw new RangeError(`No shader compiled in slot ${slot}`)
      }
      return shader
    },
    dispose() {
      if (disposed) {
        return
      }
      disposed = true
      for (const shader of shaders) {
        gl.deleteProgram(shader.program)
      }
    },
  }
}

export const uniformLocation = (
  shader: Shader,
  name: string,
): WebGLUniformLocation | null => shader.uniforms.get(name) ?? null
