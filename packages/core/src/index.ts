export {
  BLACK,
  BLUE,
  CYAN,
  GREEN,
  GREY,
  lerpRgb,
  MAGENTA,
  RED,
  type RGB,
  rgb,
  rgbFromHex,
  rgbFromU8,
  WHITE,
  YELLOW,
} from './color'
export {
  type Cell,
  type CharSize,
  createCell,
  DEFAULT_CELL,
  freezeCell,
  GLYPH_COUNT,
  glyphForChar,
  isBlankGlyph,
  QUESTION_GLYPH,
  SPACE_GLYPH,
} from './cell'
export {
  assertNever,
  type Console,
  type ConsoleKind,
  type ConsoleLayer,
  DenseConsole,
  FancyConsole,
  isBridgeableConsole,
  SparseConsole,
  SpriteConsole,
} from './console'
export type {
  BridgeableConsole,
  ConsoleGridSnapshot,
  ConsoleOptions,
} from './dense-console'
export type { FancyTile, FancyTileInit, PointF } from './fancy-console'
export type { SparseEntry } from './sparse-console'
export {
  createSpriteSheet,
  type PixelRect,
  type RenderSprite,
  type SpriteSheetDescriptor,
} from './sprite-console'
export {
  describeError,
  DeviceLostError,
  GlyphgridError,
  InitializationError,
  type InitializationResource,
  NoMonitorFoundError,
  ResourceLimitError,
} from './errors'
export {
  ATLAS_TILES_PER_ROW,
  atlasPixelSize,
  createFontDescriptor,
  type FontDescriptor,
  type TileSize,
} from './font'
export {
  EMPTY_INPUT_SNAPSHOT,
  InputCollector,
  type InputCollectorOptions,
  type InputEvent,
  type InputSnapshot,
  isInputEvent,
  type ModifierState,
  type PointerButton,
  type PointerPosition,
} from './input'
export { consoleLogger, type Logger, silentLogger } from './logger'
export {
  type TerminalSessionInit,
  TerminalSession,
  type TickCallback,
} from './session'
