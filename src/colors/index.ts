export {
  BLACK,
  isHexColor,
  NEUTRAL_GRAY,
  OPAQUE_ALPHA,
  parseHexColor,
  resolveColorOr,
  rgba,
  toCssColor,
  VOLUME_GRAY,
  WHITE,
  withOpacity,
  ZONE_DEFAULT_ALPHA
} from './color-resolver'
export type { AlphaPolicy, Rgba } from './color-resolver'
