import assert from 'node:assert'
import { describe, it } from 'node:test'
import { EmptySeriesError } from '../../../src/errors'
import { TimeScale } from '../../../src/scales'
import { assertClose } from '../../helpers/fixtures'

describe('TimeScale', () => {
  const scale = new TimeScale([0, 1000, 2000, 3000], 10, 400)

  it('should split the width into equal bands', () => {
    assert.strictEqual(scale.count, 4)
    assert.strictEqual(scale.bandWidth, 100)
    assert.strictEqual(scale.candleWidth, 80)
    assertClose(scale.wickWidth, 12)
    assert.strictEqual(scale.right, 410)
  })

  it('should centre candles in their bands', () => {
    assert.strictEqual(scale.center(0), 60)
    assert.strictEqual(scale.center(3), 360)
    assert.strictEqual(scale.bandStart(2), 210)
  })

  it('should only resolve exact timestamps', () => {
    assert.strictEqual(scale.xForTimestamp(1000), 160)
    assert.strictEqual(scale.xForTimestamp(1500), undefined)
    assert.strictEqual(scale.indexOf(3000), 3)
    assert.strictEqual(scale.timestampAt(9), undefined)
  })

  it('should interpolate between candle centres', () => {
    assert.strictEqual(scale.interpolate(1500), 210)
    assert.strictEqual(scale.interpolate(2000), 260)
  })

  it('should clamp interpolation outside the series', () => {
    assert.strictEqual(scale.interpolate(-5), 10)
    assert.strictEqual(scale.interpolate(9999), 410)
  })

  it('should resolve duplicate timestamps to the first candle', () => {
    assert.strictEqual(new TimeScale([0, 0, 1000], 0, 300).indexOf(0), 0)
  })

  it('should refuse an empty series', () => {
    assert.throws(() => new TimeScale([], 0, 100), EmptySeriesError)
  })
})
