import type { AtlasImage } from '../types'

export class WebglError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WebglError'
  }
}

export const createShader = (
  gl: WebGL2RenderingContext,
  type: GLenum,
  source: string,
): WebGLShader => {
  const shader = gl.createShader(type)
  if (!shader) {
    throw new WebglError('Failed to allocate shader')
  }
  gl.shaderSource(shader, source)
  gl.compileShader(shader)
  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const info = gl.getShaderInfoLog(shader)
    gl.deleteShader(shader)
    const stage = type === gl.VERTEX_SHADER ? 'vertex' : 'fragment'
    throw new WebglError(
      `${stage} shader compilation failed: ${info ?? 'unknown error'}`,
    )
  }
  return shader
}

export const createProgram = (
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string,
): WebGLProgram => {
  const vertexShader = createShader(gl, gl.VERTEX_SHADER, vertexSource)
  let fragmentShader: WebGLShader
  try {
    fragmentShader = createShader(gl, gl.FRAGMENT_SHADER, fragmentSource)
  } catch (error) {
    gl.deleteShader(vertexShader)
    throw error
  }

  const program = gl.createProgram()
  if (!program) {
    gl.deleteShader(vertexShader)
    gl.deleteShader(fragmentShader)
    throw new WebglError('Failed to allocate program')
  }

  gl.attachShader(program, vertexShader)
  gl.attachShader(program, fragmentShader)
  gl.linkProgram(program)
  gl.deleteShader(vertexShader)
  gl.deleteShader(fragmentShader)

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const info = gl.getProgramInfoLog(program)
    gl.deleteProgram(program)
    throw new WebglError(`Program link failed: ${info ?? 'unknown error'}`)
  }
  return program
}

export const resolveUniforms = (
  gl: WebGL2RenderingContext,
  program: WebGLProgram,
  names: readonly string[],
): ReadonlyMap<string, WebGLUniformLocation | null> =>
  new Map(names.map((name) => [name, gl.getUniformLocation(program, name)]))

export interface RenderTextureOptions {
  readonly internalFormat: GLenum
  readonly format: GLenum
  readonly type: GLenum
  readonly filter?: GLenum
}

export const createRenderTexture = (
  gl: WebGL2RenderingContext,
  width: number,
  height: number,
  options: RenderTextureOptions,
): WebGLTexture => {
  const texture = gl.createTexture()
  if (!texture) {
    throw new WebglError('Failed to allocate texture')
  }
  gl.bindTexture(gl.TEXTURE_2D, texture)
  gl.texImage2D(
    gl.TEXTURE_2D,
    0,
    options.internalFormat,
    width,
    height,
    0,
    options.format,
    options.type,
    null,
  )
  applySampling(gl, options.filter ?? gl.NEAREST)
  gl.bindTexture(gl.TEXTURE_2D, null)
  return texture
}

const isRawImage = (
  image: AtlasImage,
): image is { readonly width: number; readonly height: number; readonly data: Uint8Array } =>
  'data' in image && image.data instanceof Uint8Array

export const createImageTexture = (
  gl: WebGL2RenderingContext,
  image: AtlasImage,
): WebGLTexture => {
  const texture = gl.createTexture()
  if (!texture) {
    throw new WebglError('Failed to allocate texture')
  }
  gl.bindTexture(gl.TEXTURE_2D, texture)
  gl.pixelStorei(gl.UNPACK_ALIGNMENT, 1)
  gl.pixelStorei(gl.UNPACK_FLIP_Y_WEBGL, false)
  if (isRawImage(image)) {
    gl.texImage2D(
      gl.TEXTURE_2D,
      0,
      gl.RGBA8,
      image.width,
      image.height,
      0,
      gl.RGBA,
      gl.UNSIGNED_BYTE,
      image.data,
    )
  } else {
    gl.texImage2D(gl.TEXTURE_2D, 0, gl.RGBA8, gl.RGBA, gl.UNSIGNED_BYTE, image)
  }
  applySampling(gl, gl.NEAREST)
  gl.bindTexture(gl.TEXTURE_2D, null)
  return texture
}

const applySampling = (gl: WebGL2RenderingContext, filter: GLenum): void => {
  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, filter)
  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, filter)
  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_S, gl.CLAMP_TO_EDGE)
  gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_WRAP_T, gl.CLAMP_TO_EDGE)
}

export const attachColorTexture = (
  gl: WebGL2RenderingContext,
  framebuffer: WebGLFramebuffer,
  texture: WebGLTexture,
): void => {
  gl.bindFramebuffer(gl.FRAMEBUFFER, framebuffer)
  gl.framebufferTexture2D(
    gl.FRAMEBUFFER,
    gl.COLOR_ATTACHMENT0,
    gl.TEXTURE_2D,
    texture,
    0,
  )
  const status = gl.checkFramebufferStatus(gl.FRAMEBUFFER)
  gl.bindFramebuffer(gl.FRAMEBUFFER, null)
  if (status !== gl.FRAMEBUFFER_COMPLETE) {
    throw new WebglError(`Framebuffer incomplete: 0x${status.toString(16)}`)
  }
}

export const disposeTexture = (
  gl: WebGL2RenderingContext,
  texture: WebGLTexture | null,
): void => {
  if (texture) {
    gl.deleteTexture(texture)
  }
}

export const disposeFramebuffer = (
  gl: WebGL2RenderingContext,
  framebuffer: WebGLFramebuffer | null,
): void => {
  if (framebuffer) {
    gl.deleteFramebuffer(framebuffer)
  }
}

export const disposeBuffer = (
  gl: WebGL2RenderingContext,
  buffer: WebGLBuffer | null,
): void => {
  if (buffer) {
    gl.deleteBuffer(buffer)
  }
}

export const disposeVertexArray = (
  gl: WebGL2RenderingContext,
  vao: WebGLVertexArrayObject | null,
): void => {
  if (vao) {
    gl.deleteVertexArray(vao)
  }
}
