import { vi } from 'vitest'

export interface WebglStubOptions {
  /** Shaders whose source contains this text fail to compile. */
  readonly failingSource?: string
  readonly framebufferStatus?: number
}

const FRAMEBUFFER_COMPLETE = 0x8cd5

export const GL = {
  VERTEX_SHADER: 0x8b31,
  FRAGMENT_SHADER: 0x8b30,
  COMPILE_STATUS: 0x8b81,
  LINK_STATUS: 0x8b82,
  TEXTURE_2D: 0x0de1,
  TEXTURE0: 0x84c0,
  RGBA: 0x1908,
  RGBA8: 0x8058,
  SRGB8_ALPHA8: 0x8c43,
  UNSIGNED_BYTE: 0x1401,
  FLOAT: 0x1406,
  NEAREST: 0x2600,
  LINEAR: 0x2601,
  TEXTURE_MIN_FILTER: 0x2801,
  TEXTURE_MAG_FILTER: 0x2800,
  TEXTURE_WRAP_S: 0x2802,
  TEXTURE_WRAP_T: 0x2803,
  CLAMP_TO_EDGE: 0x812f,
  UNPACK_ALIGNMENT: 0x0cf5,
  UNPACK_FLIP_Y_WEBGL: 0x9240,
  FRAMEBUFFER: 0x8d40,
  COLOR_ATTACHMENT0: 0x8ce0,
  FRAMEBUFFER_COMPLETE,
  ARRAY_BUFFER: 0x8892,
  STATIC_DRAW: 0x88e4,
  DYNAMIC_DRAW: 0x88e8,
  TRIANGLES: 0x0004,
  DEPTH_TEST: 0x0b71,
  BLEND: 0x0be2,
  SRC_ALPHA: 0x0302,
  ONE_MINUS_SRC_ALPHA: 0x0303,
  COLOR_BUFFER_BIT: 0x4000,
} as const

export const createWebglStub = (
  options: WebglStubOptions = {},
): WebGL2RenderingContext => {
  const sources = new Map<object, string>()
  const gl = {
    ...GL,
    createShader: vi.fn(() => ({}) as WebGLShader),
    shaderSource: vi.fn((shader: object, source: string) => {
      sources.set(shader, source)
    }),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn((shader: object) => {
      const source = sources.get(shader) ?? ''
      return !(options.failingSource && source.includes(options.failingSource))
    }),
    getShaderInfoLog: vi.fn(() => 'syntax error'),
    deleteShader: vi.fn(),
    createProgram: vi.fn(() => ({}) as WebGLProgram),
    attachShader: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => true),
    getProgramInfoLog: vi.fn(() => null),
    deleteProgram: vi.fn(),
    useProgram: vi.fn(),
    getUniformLocation: vi.fn(() => ({}) as WebGLUniformLocation),
    uniform1i: vi.fn(),
    uniform1f: vi.fn(),
    uniform2f: vi.fn(),
    uniform3f: vi.fn(),
    createTexture: vi.fn(() => ({}) as WebGLTexture),
    bindTexture: vi.fn(),
    activeTexture: vi.fn(),
    texImage2D: vi.fn(),
    texParameteri: vi.fn(),
    pixelStorei: vi.fn(),
    deleteTexture: vi.fn(),
    createFramebuffer: vi.fn(() => ({}) as WebGLFramebuffer),
    bindFramebuffer: vi.fn(),
    framebufferTexture2D: vi.fn(),
    checkFramebufferStatus: vi.fn(
      () => options.framebufferStatus ?? FRAMEBUFFER_COMPLETE,
    ),
    deleteFramebuffer: vi.fn(),
    createVertexArray: vi.fn(() => ({}) as WebGLVertexArrayObject),
    bindVertexArray: vi.fn(),
    deleteVertexArray: vi.fn(),
    createBuffer: vi.fn(() => ({}) as WebGLBuffer),
    bindBuffer: vi.fn(),
    bufferData: vi.fn(),
    deleteBuffer: vi.fn(),
    enableVertexAttribArray: vi.fn(),
    vertexAttribPointer: vi.fn(),
    vertexAttribDivisor: vi.fn(),
    drawArrays: vi.fn(),
    drawArraysInstanced: vi.fn(),
    viewport: vi.fn(),
    clear: vi.fn(),
    clearColor: vi.fn(),
    enable: vi.fn(),
    disable: vi.fn(),
    blendFunc: vi.fn(),
    isContextLost: vi.fn(() => false),
  } as unknown as WebGL2RenderingContext
  return gl
}
