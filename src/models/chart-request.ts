/**
 * One OHLCV bar together with the colours the caller assigned to it
 */
export interface Candle {
  /** Unix timestamp in milliseconds (UTC) */
  readonly timestamp: number
  readonly open: number
  readonly high: number
  readonly low: number
  readonly close: number
  readonly volume: number
  /** Body colour, `#RRGGBB` or `#RRGGBBAA` */
  readonly color: string
  /** Volume bar colour; gray is used when absent */
  readonly volumeColor?: string
}

export type MarkerPosition = 'above' | 'below'

/**
 * Signal triangle attached to the candle whose timestamp equals `time`.
 * `above` draws a downward triangle over the high, `below` an upward one under the low.
 */
export interface MarkerOverlay {
  readonly kind: 'marker'
  readonly time: number
  readonly position: MarkerPosition
  readonly color: string
  readonly text?: string
  /** Relative size, 1 by default */
  readonly size: number
}

/**
 * Translucent time/price rectangle; corners may be given in any order
 */
export interface ZoneOverlay {
  readonly kind: 'zone'
  readonly x1: number
  readonly x2: number
  readonly y1: number
  readonly y2: number
  /** Alpha defaults to 30 % when omitted */
  readonly color: string
}

/**
 * Full-height vertical stroke at a candle timestamp
 */
export interface VLineOverlay {
  readonly kind: 'vline'
  readonly time: number
  readonly color: string
}

export type Overlay = MarkerOverlay | ZoneOverlay | VLineOverlay

export type OverlayKind = Overlay['kind']

/**
 * Validated chart request. Built once per message and never mutated afterwards.
 */
export interface ChartRequest {
  readonly title: string
  readonly ticker: string
  readonly timeframe: string
  /** Column names of the raw data rows as sent by the caller */
  readonly columns: readonly string[]
  /** Sorted by timestamp ascending */
  readonly candles: readonly Candle[]
  readonly overlays: readonly Overlay[]
  readonly description: string
  readonly chatId?: number
  readonly subscriberList?: string
  /** Overrides the `{ticker}_{timeframe}.png` file name */
  readonly imageFilename?: string
}

/**
 * Decoded `[channel, command, request]` message envelope
 */
export interface ChartEnvelope {
  readonly channel: string
  readonly command: string
  readonly request: ChartRequest
}

export function overlaysOfKind<K extends OverlayKind>(
  overlays: readonly Overlay[],
  kind: K
): Extract<Overlay, { kind: K }>[] {
  return overlays.filter((overlay): overlay is Extract<Overlay, { kind: K }> => overlay.kind === kind)
}
