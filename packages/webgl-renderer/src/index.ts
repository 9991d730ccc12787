export { type AtlasKind, TextureAtlas } from './atlas/texture-atlas'
export { DEFAULT_FONT, DEFAULT_TITLE, TerminalBuilder } from './builder'
export {
  convertFpsToWait,
  DEFAULT_INIT_HINTS,
  resolveInitHints,
  toDevicePixels,
} from './configuration/init-hints'
export { run } from './frame-loop'
export { ConsoleBuffers, InstanceBuffer } from './geometry/console-buffers'
export {
  buildConsoleGeometry,
  buildDenseGeometry,
  buildFancyGeometry,
  buildSparseGeometry,
  buildSpriteGeometry,
  type CellGeometry,
  type ConsoleGeometry,
  type FancyGeometry,
  geometryBatches,
  type InstanceBatch,
  SOLID_TILE,
  type SpriteGeometry,
  toRenderRow,
} from './geometry/console-geometry'
export {
  type AcquireContextOptions,
  acquireContext,
  type ContextLease,
  isContextCurrent,
  withContextLease,
} from './gl/context'
export {
  BackingFramebuffer,
  type BackingFramebufferOptions,
  createBackingFramebuffer,
} from './gl/framebuffer'
export {
  compileShaderRegistry,
  type Shader,
  type ShaderRegistry,
} from './gl/shader-registry'
export { init, type Terminal } from './init'
export { ScreenBurn, SCREEN_BURN_TIME_CONSTANT_MS } from './internal/screen-burn'
export {
  type CanvasPlatformOptions,
  createCanvasPlatform,
} from './platform/canvas-platform'
export { Renderer, type RendererInit } from './renderer'
export {
  CELL_LAYOUT,
  FANCY_LAYOUT,
  type InstanceAttribute,
  type InstanceLayout,
  SHADER_TABLE,
  SHADER_TABLE_VERSION,
  ShaderSlot,
  type ShaderSource,
  SPRITE_LAYOUT,
} from './shaders/sources'
export type * from './types'
