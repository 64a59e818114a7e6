import { EmptySeriesError } from '../errors'
import type { Candle } from '../models'

export type PriceDirection = 'up' | 'down'

/**
 * Figures shown in the statistics table and used to style the price line
 */
export interface SessionStats {
  readonly currentPrice: number
  /** Close of the candle before the last one; the last open for a single candle */
  readonly referencePrice: number
  readonly sessionHigh: number
  readonly sessionLow: number
  /** (high - current) / high · 100 */
  readonly percentFromHigh: number
  readonly direction: PriceDirection
  readonly maxVolume: number
}

/**
 * @throws EmptySeriesError when there are no candles
 */
export function computeSessionStats(candles: readonly Candle[]): SessionStats {
  const last = candles[candles.length - 1]
  if (last === undefined) {
    throw new EmptySeriesError()
  }
  const previous = candles[candles.length - 2]

  let sessionHigh = Number.NEGATIVE_INFINITY
  let sessionLow = Number.POSITIVE_INFINITY
  let maxVolume = 0
  for (const candle of candles) {
    sessionHigh = Math.max(sessionHigh, candle.high)
    sessionLow = Math.min(sessionLow, candle.low)
    maxVolume = Math.max(maxVolume, candle.volume)
  }

  const currentPrice = last.close
  const referencePrice = previous ? previous.close : last.open
  const percentFromHigh = sessionHigh > 0 ? ((sessionHigh - currentPrice) / sessionHigh) * 100 : 0

  return {
    currentPrice,
    referencePrice,
    sessionHigh,
    sessionLow,
    percentFromHigh,
    direction: currentPrice >= referencePrice ? 'up' : 'down',
    maxVolume
  }
}
