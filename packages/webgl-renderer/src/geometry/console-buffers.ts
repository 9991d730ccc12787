import { InitializationError } from '@glyphgrid/core'
import { disposeBuffer, disposeVertexArray } from '../internal/gl-utils'
import { type InstanceLayout, VERTICES_PER_QUAD } from '../shaders/sources'
import {
  type ConsoleGeometry,
  geometryBatches,
  type InstanceBatch,
} from './console-geometry'

const FLOAT_BYTES = 4

/** One instanced quad batch on the GPU. Corners come from `gl_VertexID`. */
export class InstanceBuffer {
  private readonly vao: WebGLVertexArrayObject
  private readonly buffer: WebGLBuffer
  private instanceCount = 0

  constructor(
    private readonly gl: WebGL2RenderingContext,
    layout: InstanceLayout,
  ) {
    const vao = gl.createVertexArray()
    const buffer = gl.createBuffer()
    if (!vao || !buffer) {
      disposeVertexArray(gl, vao)
      disposeBuffer(gl, buffer)
      throw new InitializationError('context', 'Failed to allocate console buffers')
    }
    this.vao = vao
    this.buffer = buffer

    const stride = layout.floatsPerInstance * FLOAT_BYTES
    gl.bindVertexArray(vao)
    gl.bindBuffer(gl.ARRAY_BUFFER, buffer)
    for (const attribute of layout.attributes) {
      gl.enableVertexAttribArray(attribute.location)
      gl.vertexAttribPointer(
        attribute.location,
        attribute.size,
        gl.FLOAT,
        false,
        stride,
        attribute.offset * FLOAT_BYTES,
      )
      gl.vertexAttribDivisor(attribute.location, 1)
    }
    gl.bindVertexArray(null)
    gl.bindBuffer(gl.ARRAY_BUFFER, null)
  }

  get count(): number {
    return this.instanceCount
  }

  upload(batch: InstanceBatch): void {
    const { gl } = this
    gl.bindBuffer(gl.ARRAY_BUFFER, this.buffer)
    gl.bufferData(gl.ARRAY_BUFFER, batch.data, gl.DYNAMIC_DRAW)
    gl.bindBuffer(gl.ARRAY_BUFFER, null)
    this.instanceCount = batch.count
  }

  /** Returns false when there was nothing to draw. */
  draw(): boolean {
    if (this.instanceCount === 0) {
      return false
    }
    const { gl } = this
    gl.bindVertexArray(this.vao)
    gl.drawArraysInstanced(gl.TRIANGLES, 0, VERTICES_PER_QUAD, this.instanceCount)
    gl.bindVertexArray(null)
    return true
  }

  dispose(): void {
    disposeVertexArray(this.gl, this.vao)
    disposeBuffer(this.gl, this.buffer)
    this.instanceCount = 0
  }
}

/** The GPU side of one console: a buffer per batch of its geometry. */
export class ConsoleBuffers {
  readonly passes: readonly InstanceBuffer[]

  constructor(gl: WebGL2RenderingContext, geometry: ConsoleGeometry) {
    const passes: InstanceBuffer[] = []
    const count = geometryBatches(geometry).length
    try {
      for (let index = 0; index < count; index += 1) {
        passes.push(new InstanceBuffer(gl, geometry.layout))
      }
    } catch (error) {
      for (const pass of passes) {
        pass.dispose()
      }
      throw error
    }
    this.passes = passes
  }

  upload(geometry: ConsoleGeometry): void {
    geometryBatches(geometry).forEach((batch, index) => {
      this.passes[index]?.upload(batch)
    })
  }

  dispose(): void {
    for (const pass of this.passes) {
      pass.dispose()
    }
  }
}
