/**
 * Bumped whenever a program's inputs change, so hosts caching compiled
 * binaries can invalidate them.
 */
export const SHADER_TABLE_VERSION = 2

export interface ShaderSource {
  readonly name: string
  readonly vertex: string
  readonly fragment: string
  readonly uniforms: readonly string[]
}

export interface InstanceAttribute {
  readonly location: number
  readonly size: number
  /** In floats from the start of the instance. */
  readonly offset: number
}

/** How one instance's floats map onto a program's per-instance attributes. */
export interface InstanceLayout {
  readonly floatsPerInstance: number
  readonly attributes: readonly InstanceAttribute[]
}

/** cell x, cell y, r, g, b, atlas tile (-1 = solid fill). */
export const CELL_LAYOUT: InstanceLayout = Object.freeze({
  floatsPerInstance: 6,
  attributes: Object.freeze([
    { location: 0, size: 2, offset: 0 },
    { location: 1, size: 3, offset: 2 },
    { location: 2, size: 1, offset: 5 },
  ]),
})

/**
 * center x, center y, rotation, scale x, scale y, foreground rgb,
 * background rgb, atlas tile (-1 = background only).
 */
export const FANCY_LAYOUT: InstanceLayout = Object.freeze({
  floatsPerInstance: 12,
  attributes: Object.freeze([
    { location: 0, size: 2, offset: 0 },
    { location: 1, size: 1, offset: 2 },
    { location: 2, size: 2, offset: 3 },
    { location: 3, size: 3, offset: 5 },
    { location: 4, size: 3, offset: 8 },
    { location: 5, size: 1, offset: 11 },
  ]),
})

/** destination x, y, w, h; sheet region x, y, w, h; tint rgb. */
export const SPRITE_LAYOUT: InstanceLayout = Object.freeze({
  floatsPerInstance: 11,
  attributes: Object.freeze([
    { location: 0, size: 4, offset: 0 },
    { location: 1, size: 4, offset: 4 },
    { location: 2, size: 3, offset: 8 },
  ]),
})

export const VERTICES_PER_QUAD = 6

const QUAD_CORNER = `vec2 quadCorner(int vertexId) {
  switch (vertexId) {
    case 0: return vec2(0.0, 0.0);
    case 1: return vec2(1.0, 0.0);
    case 2: return vec2(0.0, 1.0);
    case 3: return vec2(0.0, 1.0);
    case 4: return vec2(1.0, 0.0);
    default: return vec2(1.0, 1.0);
  }
}`

const CONSOLE_VERTEX = `#version 300 es
layout(location = 0) in vec2 aCell;
layout(location = 1) in vec3 aColor;
layout(location = 2) in float aTile;

uniform vec2 uGridSize;

out vec2 vUv;
out vec3 vColor;
flat out float vTile;

${QUAD_CORNER}

void main() {
  vec2 unit = quadCorner(gl_VertexID);
  vec2 position = (aCell + unit) / uGridSize;
  gl_Position = vec4(position * 2.0 - 1.0, 0.0, 1.0);

  float tile = max(aTile, 0.0);
  vec2 tileOrigin = vec2(mod(tile, 16.0), floor(tile / 16.0));
  vUv = (tileOrigin + vec2(unit.x, 1.0 - unit.y)) / 16.0;
  vColor = aColor;
  vTile = aTile;
}
`

const FULL_SCREEN_VERTEX = `#version 300 es
layout(location = 0) in vec2 aPosition;

out vec2 vUv;

void main() {
  vUv = (aPosition * 0.5) + 0.5;
  gl_Position = vec4(aPosition, 0.0, 1.0);
}
`

export const CONSOLE_WITH_BACKGROUND: ShaderSource = {
  name: 'console-with-background',
  vertex: CONSOLE_VERTEX,
  fragment: `#version 300 es
precision mediump float;

uniform sampler2D uAtlas;

in vec2 vUv;
in vec3 vColor;
flat in float vTile;

out vec4 outColor;

void main() {
  if (vTile < 0.0) {
    outColor = vec4(vColor, 1.0);
    return;
  }
  vec4 texel = texture(uAtlas, vUv);
  if (texel.a < 0.1 || (texel.r + texel.g + texel.b) < 0.1) {
    discard;
  }
  outColor = vec4(texel.rgb * vColor, 1.0);
}
`,
  uniforms: ['uGridSize', 'uAtlas'],
}

export const CONSOLE_NO_BACKGROUND: ShaderSource = {
  name: 'console-no-background',
  vertex: CONSOLE_VERTEX,
  fragment: `#version 300 es
precision mediump float;

uniform sampler2D uAtlas;

in vec2 vUv;
in vec3 vColor;
flat in float vTile;

out vec4 outColor;

void main() {
  if (vTile < 0.0) {
    discard;
  }
  vec4 texel = texture(uAtlas, vUv);
  if (texel.a < 0.1 || (texel.r + texel.g + texel.b) < 0.1) {
    discard;
  }
  outColor = vec4(texel.rgb * vColor, texel.a);
}
`,
  uniforms: ['uGridSize', 'uAtlas'],
}

export const BACKING: ShaderSource = {
  name: 'backing',
  vertex: FULL_SCREEN_VERTEX,
  fragment: `#version 300 es
precision mediump float;

uniform sampler2D uScreen;

in vec2 vUv;

out vec4 outColor;

void main() {
  outColor = texture(uScreen, vUv);
}
`,
  uniforms: ['uScreen'],
}

export const SCANLINES: ShaderSource = {
  name: 'scanlines',
  vertex: FULL_SCREEN_VERTEX,
  fragment: `#version 300 es
precision mediump float;

uniform sampler2D uScreen;
uniform vec2 uScreenSize;
uniform float uScanlines;
uniform vec3 uScreenBurn;

in vec2 vUv;

out vec4 outColor;

void main() {
  vec3 color = texture(uScreen, vUv).rgb;
  if (uScanlines > 0.5) {
    float line = mod(floor(vUv.y * uScreenSize.y), 2.0);
    color *= line < 1.0 ? 0.7 : 1.0;
  }
  float vignette = 1.0 - distance(vUv, vec2(0.5)) * 1.4;
  color += uScreenBurn * clamp(vignette, 0.0, 1.0) * 0.12;
  outColor = vec4(color, 1.0);
}
`,
  uniforms: ['uScreen', 'uScreenSize', 'uScanlines', 'uScreenBurn'],
}

export const FANCY_CONSOLE: ShaderSource = {
  name: 'fancy-console',
  vertex: `#version 300 es
layout(location = 0) in vec2 aCenter;
layout(location = 1) in float aRotation;
layout(location = 2) in vec2 aScale;
layout(location = 3) in vec3 aForeground;
layout(location = 4) in vec3 aBackground;
layout(location = 5) in float aTile;

uniform vec2 uGridSize;

out vec2 vUv;
out vec3 vForeground;
out vec3 vBackground;
flat out float vTile;

${QUAD_CORNER}

void main() {
  vec2 unit = quadCorner(gl_VertexID);
  vec2 local = (unit - 0.5) * aScale;
  float c = cos(aRotation);
  float s = sin(aRotation);
  vec2 rotated = vec2(local.x * c + local.y * s, local.y * c - local.x * s);
  vec2 position = (aCenter + rotated) / uGridSize;
  gl_Position = vec4(position * 2.0 - 1.0, 0.0, 1.0);

  float tile = max(aTile, 0.0);
  vec2 tileOrigin = vec2(mod(tile, 16.0), floor(tile / 16.0));
  vUv = (tileOrigin + vec2(unit.x, 1.0 - unit.y)) / 16.0;
  vForeground = aForeground;
  vBackground = aBackground;
  vTile = aTile;
}
`,
  fragment: `#version 300 es
precision mediump float;

uniform sampler2D uAtlas;
uniform float uDrawBackground;

in vec2 vUv;
in vec3 vForeground;
in vec3 vBackground;
flat in float vTile;

out vec4 outColor;

void main() {
  vec4 texel = texture(uAtlas, vUv);
  bool ink = vTile >= 0.0 && texel.a >= 0.1 && (texel.r + texel.g + texel.b) >= 0.1;
  if (ink) {
    outColor = vec4(texel.rgb * vForeground, 1.0);
    return;
  }
  if (uDrawBackground < 0.5) {
    discard;
  }
  outColor = vec4(vBackground, 1.0);
}
`,
  uniforms: ['uGridSize', 'uAtlas', 'uDrawBackground'],
}

export const SPRITE_CONSOLE: ShaderSource = {
  name: 'sprite-console',
  vertex: `#version 300 es
layout(location = 0) in vec4 aDestination;
layout(location = 1) in vec4 aSource;
layout(location = 2) in vec3 aTint;

uniform vec2 uSurfaceSize;
uniform sampler2D uSheet;

out vec2 vUv;
out vec3 vTint;

${QUAD_CORNER}

void main() {
  vec2 unit = quadCorner(gl_VertexID);
  vec2 position = (aDestination.xy + unit * aDestination.zw) / uSurfaceSize;
  gl_Position = vec4(position * 2.0 - 1.0, 0.0, 1.0);

  vec2 sheetSize = vec2(textureSize(uSheet, 0));
  vUv = (aSource.xy + vec2(unit.x, 1.0 - unit.y) * aSource.zw) / sheetSize;
  vTint = aTint;
}
`,
  fragment: `#version 300 es
precision mediump float;

uniform sampler2D uSheet;

in vec2 vUv;
in vec3 vTint;

out vec4 outColor;

void main() {
  vec4 texel = texture(uSheet, vUv);
  if (texel.a < 0.01) {
    discard;
  }
  outColor = vec4(texel.rgb * vTint, texel.a);
}
`,
  uniforms: ['uSurfaceSize', 'uSheet'],
}

/** Compiled in this order; `ShaderSlot` indexes into it. */
export const SHADER_TABLE: readonly ShaderSource[] = Object.freeze([
  CONSOLE_WITH_BACKGROUND,
  CONSOLE_NO_BACKGROUND,
  BACKING,
  SCANLINES,
  FANCY_CONSOLE,
  SPRITE_CONSOLE,
])

export const ShaderSlot = {
  ConsoleWithBackground: 0,
  ConsoleNoBackground: 1,
  Backing: 2,
  Scanlines: 3,
  FancyConsole: 4,
  SpriteConsole: 5,
} as const

export type ShaderSlot = (typeof ShaderSlot)[keyof typeof ShaderSlot]
