import type { ChartRequest } from '../../src/models'
import { toChartRequest } from '../../src/models'

export const HOUR = 3_600_000
/** 2024-01-01T00:00:00Z */
export const T0 = Date.UTC(2024, 0, 1)

/**
 * Three hourly candles closing lower than the previous close
 *
 * low 90, high 110, last close 100, previous close 102, max volume 1500
 */
export function sampleChartData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    title: 'BTCUSDT 1h',
    ticker: 'BTCUSDT',
    timeframe: '1h',
    cols: ['timestamp', 'open', 'high', 'low', 'close', 'volume'],
    data: [
      [T0, 100, 110, 95, 105, 1000],
      [T0 + HOUR, 105, 108, 100, 102, 1500],
      [T0 + 2 * HOUR, 102, 104, 90, 100, 500]
    ],
    candle_colors: ['#00FF00', '#FF0000', '#FF0000'],
    plots: {},
    desc: 'BTCUSDT closed at 100',
    ...overrides
  }
}

export function sampleEnvelope(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify(['chart', 'request', sampleChartData(overrides)])
}

export function sampleRequest(overrides: Record<string, unknown> = {}): ChartRequest {
  return toChartRequest(sampleChartData(overrides))
}

/**
 * Multi-part message as a dealer socket receives it
 */
export function messageFrames(payload: string): Buffer[] {
  return [Buffer.from(''), Buffer.from(payload)]
}

export function assertClose(actual: number, expected: number, tolerance = 1e-9): void {
  if (Math.abs(actual - expected) > tolerance) {
    throw new Error(`Expected ${actual} to be within ${tolerance} of ${expected}`)
  }
}
