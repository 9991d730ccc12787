import { InitializationError } from '@glyphgrid/core'
import { describe, expect, it, vi } from 'vitest'
import {
  BACKING,
  CONSOLE_WITH_BACKGROUND,
  SHADER_TABLE,
  ShaderSlot,
  type ShaderSource,
} from '../shaders/sources'
import { createWebglStub } from '../testing/webgl-stub'
import { compileShaderRegistry, uniformLocation } from './shader-registry'

describe('compileShaderRegistry', () => {
  it('compiles the table into stable slots', () => {
    const gl = createWebglStub()
    const registry = compileShaderRegistry(gl)

    expect(registry.shaders).toHaveLength(SHADER_TABLE.length)
    expect(registry.get(ShaderSlot.ConsoleWithBackground).name).toBe(
      'console-with-background',
    )
    expect(registry.get(ShaderSlot.ConsoleNoBackground).name).toBe(
      'console-no-background',
    )
    expect(registry.get(ShaderSlot.Backing).name).toBe('backing')
    expect(registry.get(ShaderSlot.Scanlines).name).toBe('scanlines')
    expect(registry.get(ShaderSlot.FancyConsole).name).toBe('fancy-console')
    expect(registry.get(ShaderSlot.SpriteConsole).name).toBe('sprite-console')
    expect(uniformLocation(registry.get(ShaderSlot.SpriteConsole), 'uSheet')).not.toBeNull()
    expect(uniformLocation(registry.get(ShaderSlot.Scanlines), 'uScreenBurn')).not.toBeNull()
    expect(uniformLocation(registry.get(ShaderSlot.Backing), 'uMissing')).toBeNull()
  })

  it('deletes already built programs when a later one fails', () => {
    const gl = createWebglStub({ failingSource: 'BROKEN' })
    const table: ShaderSource[] = [
      CONSOLE_WITH_BACKGROUND,
      BACKING,
      { name: 'broken', vertex: BACKING.vertex, fragment: 'BROKEN', uniforms: [] },
    ]

    let caught: unknown
    try {
      compileShaderRegistry(gl, table)
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(InitializationError)
    const error = caught as InitializationError
    expect(error.resource).toBe('shader')
    expect(error.message).toBe(
      '[shader] Failed to build shader "broken": fragment shader compilation failed: syntax error',
    )
    const built = vi.mocked(gl.createProgram).mock.results.map((result) => result.value)
    expect(built).toHaveLength(2)
    expect(vi.mocked(gl.deleteProgram).mock.calls.map(([program]) => program)).toEqual(built)
  })

  it('deletes every program once on dispose', () => {
    const gl = createWebglStub()
    const registry = compileShaderRegistry(gl)
    registry.dispose()
    registry.dispose()
    expect(gl.deleteProgram).toHaveBeenCalledTimes(6)
  })

  it('rejects unknown slots', () => {
    const registry = compileShaderRegistry(createWebglStub(), [BACKING])
    expect(() => registry.get(ShaderSlot.Scanlines)).toThrow(RangeError)
  })
})
