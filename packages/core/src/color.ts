/**
 * Linear color with channels in the 0..1 range. Consoles store these directly
 * so vertex builders can copy channels into float buffers without conversion.
 */
export interface RGB {
  readonly r: number
  readonly g: number
  readonly b: number
}

const clampChannel = (value: number): number => {
  if (!Number.isFinite(value)) {
    return 0
  }
  return Math.min(1, Math.max(0, value))
}

export const rgb = (r: number, g: number, b: number): RGB =>
  Object.freeze({ r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) })

export const rgbFromU8 = (r: number, g: number, b: number): RGB =>
  rgb(r / 255, g / 255, b / 255)

const HEX_PATTERN = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i

export const rgbFromHex = (value: string): RGB => {
  const match = HEX_PATTERN.exec(value.trim())
  if (!match) {
    throw new RangeError(`Invalid hex color: ${value}`)
  }
  const [, r = '00', g = '00', b = '00'] = match
  return rgbFromU8(
    Number.parseInt(r, 16),
    Number.parseInt(g, 16),
    Number.parseInt(b, 16),
  )
}

export const lerpRgb = (from: RGB, to: RGB, t: number): RGB => {
  const amount = clampChannel(t)
  return rgb(
    from.r + (to.r - from.r) * amount,
    from.g + (to.g - from.g) * amount,
    from.b + (to.b - from.b) * amount,
  )
}

export const BLACK = rgb(0, 0, 0)
export const WHITE = rgb(1, 1, 1)
export const RED = rgb(1, 0, 0)
export const GREEN = rgb(0, 1, 0)
export const BLUE = rgb(0, 0, 1)
export const CYAN = rgb(0, 1, 1)
export const MAGENTA = rgb(1, 0, 1)
export const YELLOW = rgb(1, 1, 0)
export const GREY = rgb(0.5, 0.5, 0.5)
