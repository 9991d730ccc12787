import { InitializationError } from '@glyphgrid/core'
import { disposeBuffer, disposeVertexArray } from '../internal/gl-utils'

const QUAD_VERTICES = new Float32Array([
  -1, -1,
  1, -1,
  -1, 1,
  -1, 1,
  1, -1,
  1, 1,
])

export interface FullScreenQuad {
  draw(): void
  dispose(): void
}

/** Two triangles covering clip space; used to composite the backing buffer. */
export const createFullScreenQuad = (
  gl: WebGL2RenderingContext,
): FullScreenQuad => {
  const vao = gl.createVertexArray()
  if (!vao) {
    throw new InitializationError('context', 'Failed to create quad vertex array')
  }
  const vertexBuffer = gl.createBuffer()
  if (!vertexBuffer) {
    gl.deleteVertexArray(vao)
    throw new InitializationError('context', 'Failed to create quad vertex buffer')
  }

  gl.bindVertexArray(vao)
  gl.bindBuffer(gl.ARRAY_BUFFER, vertexBuffer)
  gl.bufferData(gl.ARRAY_BUFFER, QUAD_VERTICES, gl.STATIC_DRAW)
  gl.enableVertexAttribArray(0)
  gl.vertexAttribPointer(0, 2, gl.FLOAT, false, 0, 0)
  gl.bindVertexArray(null)
  gl.bindBuffer(gl.ARRAY_BUFFER, null)

  return {
    draw() {
      gl.bindVertexArray(vao)
      gl.drawArrays(gl.TRIANGLES, 0, QUAD_VERTICES.length / 2)
      gl.bindVertexArray(null)
    },
    dispose() {
      disposeVertexArray(gl, vao)
      disposeBuffer(gl, vertexBuffer)
    },
  }
}
