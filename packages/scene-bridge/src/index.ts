export {
  type BridgedConsole,
  CONSOLE_GRID_RESOURCE,
  ConsoleBridge,
  MAX_BRIDGED_CONSOLES,
} from './console-bridge'
export {
  DEFAULT_KEY_DELAY_MS,
  HostEngineAdapter,
  type HostEngineAdapterOptions,
  type HostFrame,
  type HostInputState,
  type HostTransition,
} from './host-adapter'
export {
  type HostEntity,
  type HostWorld,
  ResourceKey,
  type ResourceSlot,
  resourceSlot,
} from './host-world'
export { buildSpriteSheet, type SpriteRegion, type SpriteSheet } from './sprite-sheet'
export {
  BACKGROUND_SPRITE,
  backgroundSprite,
  backgroundTint,
  type Tint,
  type TilePoint,
  tileSprite,
  tileTint,
} from './tiles'
export { cameraTransform, consoleTransform, type Transform } from './transforms'
