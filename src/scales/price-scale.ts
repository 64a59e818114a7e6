import { EmptySeriesError } from '../errors'
import type { Candle } from '../models'

/** Prices at or below zero are clamped here before taking the logarithm */
export const MIN_LOG_PRICE = 1e-12

/** Relative padding around a flat series (every low equals every high) */
export const FLAT_SERIES_PADDING = 0.01

/**
 * Logarithmic price axis. `maxHigh` lands on `top`, `minLow` on `bottom`, and y grows
 * downwards as price falls.
 *
 * y = top + (bottom - top) · (ln(max) - ln(p)) / (ln(max) - ln(min))
 */
export class PriceScale {
  readonly min: number
  readonly max: number
  private readonly logMin: number
  private readonly logMax: number

  constructor(
    minLow: number,
    maxHigh: number,
    readonly top: number,
    readonly bottom: number
  ) {
    let min = Math.max(minLow, MIN_LOG_PRICE)
    let max = Math.max(maxHigh, MIN_LOG_PRICE)
    if (max <= min) {
      const center = max
      min = center * (1 - FLAT_SERIES_PADDING)
      max = center * (1 + FLAT_SERIES_PADDING)
    }
    this.min = min
    this.max = max
    this.logMin = Math.log(min)
    this.logMax = Math.log(max)
  }

  /**
   * Scale spanning the lowest low and the highest high of the series
   * @throws EmptySeriesError when there are no candles
   */
  static fromCandles(candles: readonly Candle[], top: number, bottom: number): PriceScale {
    if (candles.length === 0) {
      throw new EmptySeriesError()
    }
    let minLow = Number.POSITIVE_INFINITY
    let maxHigh = Number.NEGATIVE_INFINITY
    for (const candle of candles) {
      minLow = Math.min(minLow, candle.low)
      maxHigh = Math.max(maxHigh, candle.high)
    }
    return new PriceScale(minLow, maxHigh, top, bottom)
  }

  toPixel(price: number): number {
    const logPrice = Math.log(Math.max(price, MIN_LOG_PRICE))
    return this.top + ((this.bottom - this.top) * (this.logMax - logPrice)) / (this.logMax - this.logMin)
  }

  /**
   * Inverse of {@link toPixel}
   */
  fromPixel(y: number): number {
    const ratio = (y - this.top) / (this.bottom - this.top)
    return Math.exp(this.logMax - ratio * (this.logMax - this.logMin))
  }

  /**
   * `count` prices spaced evenly in log space from min to max, both included
   */
  ticks(count: number): number[] {
    if (count < 2) {
      return [this.max]
    }
    const step = (this.logMax - this.logMin) / (count - 1)
    return Array.from({ length: count }, (_, i) => Math.exp(this.logMin + i * step))
  }
}
