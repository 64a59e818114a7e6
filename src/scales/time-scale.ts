import { EmptySeriesError } from '../errors'

/** Share of a candle's band covered by its body */
export const CANDLE_WIDTH_RATIO = 0.8
/** Share of the body width covered by the wick */
export const WICK_WIDTH_RATIO = 0.15

/**
 * Uniform time axis: candle i owns the band [left + i·w, left + (i+1)·w) with w = width / N.
 * Lookups by timestamp only hit exact candle timestamps.
 */
export class TimeScale {
  readonly bandWidth: number
  readonly candleWidth: number
  readonly wickWidth: number
  private readonly timestamps: readonly number[]
  private readonly indexByTimestamp: ReadonlyMap<number, number>

  constructor(
    timestamps: readonly number[],
    readonly left: number,
    readonly width: number
  ) {
    if (timestamps.length === 0) {
      throw new EmptySeriesError()
    }
    this.timestamps = timestamps
    this.bandWidth = width / timestamps.length
    this.candleWidth = this.bandWidth * CANDLE_WIDTH_RATIO
    this.wickWidth = this.candleWidth * WICK_WIDTH_RATIO

    const index = new Map<number, number>()
    timestamps.forEach((timestamp, i) => {
      if (!index.has(timestamp)) {
        index.set(timestamp, i)
      }
    })
    this.indexByTimestamp = index
  }

  get count(): number {
    return this.timestamps.length
  }

  get right(): number {
    return this.left + this.width
  }

  bandStart(index: number): number {
    return this.left + index * this.bandWidth
  }

  center(index: number): number {
    return this.bandStart(index) + this.bandWidth / 2
  }

  timestampAt(index: number): number | undefined {
    return this.timestamps[index]
  }

  indexOf(timestamp: number): number | undefined {
    return this.indexByTimestamp.get(timestamp)
  }

  /**
   * Centre of the candle with exactly this timestamp, or undefined
   */
  xForTimestamp(timestamp: number): number | undefined {
    const index = this.indexOf(timestamp)
    return index === undefined ? undefined : this.center(index)
  }

  /**
   * Continuous position for arbitrary timestamps (zone edges): linear between the
   * centres of neighbouring candles, clamped to the axis outside the series.
   */
  interpolate(timestamp: number): number {
    const exact = this.xForTimestamp(timestamp)
    if (exact !== undefined) {
      return exact
    }

    const first = this.timestamps[0]
    const last = this.timestamps[this.timestamps.length - 1]
    if (first === undefined || last === undefined || timestamp < first) {
      return this.left
    }
    if (timestamp > last) {
      return this.right
    }

    for (let i = 0; i < this.timestamps.length - 1; i++) {
      const from = this.timestamps[i]
      const to = this.timestamps[i + 1]
      if (from === undefined || to === undefined) {
        break
      }
      if (timestamp > from && timestamp < to) {
        return this.center(i) + ((timestamp - from) / (to - from)) * this.bandWidth
      }
    }
    return this.right
  }
}
