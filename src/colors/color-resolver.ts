import { InvalidColorError } from '../errors'

/**
 * An sRGB colour with an 8-bit alpha channel (0 = transparent, 255 = opaque)
 */
export interface Rgba {
  readonly r: number
  readonly g: number
  readonly b: number
  readonly a: number
}

/**
 * How to fill in alpha when a colour is given as `#RRGGBB`.
 * - `opaque`: full opacity, used by every layer except zones
 * - `zone`: 30 % opacity, so zones never hide the series behind them
 */
export type AlphaPolicy = 'opaque' | 'zone'

export const OPAQUE_ALPHA = 255
export const ZONE_DEFAULT_ALPHA = Math.round((OPAQUE_ALPHA * 3) / 10)

const HEX_COLOR = /^#?([0-9a-f]{6}|[0-9a-f]{8})$/i

export function rgba(r: number, g: number, b: number, a: number = OPAQUE_ALPHA): Rgba {
  return { r, g, b, a }
}

export const WHITE = rgba(255, 255, 255)
export const BLACK = rgba(0, 0, 0)
export const NEUTRAL_GRAY = rgba(128, 128, 128)
export const VOLUME_GRAY = rgba(130, 130, 130)

/**
 * Parses `#RRGGBB` or `#RRGGBBAA` (hex digits in any case, leading `#` optional).
 * An explicit alpha byte is always kept as given; the policy only applies when it is omitted.
 *
 * @throws InvalidColorError when the value is not a 6 or 8 digit hex string
 */
export function parseHexColor(value: string, policy: AlphaPolicy = 'opaque'): Rgba {
  const match = HEX_COLOR.exec(value.trim())
  if (!match || match[1] === undefined) {
    throw new InvalidColorError(value)
  }

  const hex = match[1]
  const channel = (offset: number): number => parseInt(hex.slice(offset, offset + 2), 16)
  const alpha = hex.length === 8
    ? channel(6)
    : policy === 'zone' ? ZONE_DEFAULT_ALPHA : OPAQUE_ALPHA

  return rgba(channel(0), channel(2), channel(4), alpha)
}

export function isHexColor(value: string): boolean {
  return HEX_COLOR.test(value.trim())
}

/**
 * Rendering-time variant of {@link parseHexColor}: a missing or unparseable value
 * resolves to `fallback` instead of failing the request.
 */
export function resolveColorOr(
  value: string | undefined,
  fallback: Rgba,
  policy: AlphaPolicy = 'opaque'
): Rgba {
  if (value === undefined || !isHexColor(value)) {
    return fallback
  }
  return parseHexColor(value, policy)
}

/**
 * Scales the alpha channel, e.g. `withOpacity(c, 0.8)` for translucent volume bars
 */
export function withOpacity(color: Rgba, factor: number): Rgba {
  const a = Math.round(Math.min(1, Math.max(0, factor)) * color.a)
  return rgba(color.r, color.g, color.b, a)
}

/**
 * CSS colour string understood by 2D canvas contexts
 */
export function toCssColor(color: Rgba): string {
  if (color.a === OPAQUE_ALPHA) {
    return `rgb(${color.r}, ${color.g}, ${color.b})`
  }
  const alpha = Number((color.a / OPAQUE_ALPHA).toFixed(3))
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${alpha})`
}
