import assert from 'node:assert'
import { describe, it } from 'node:test'
import { EmptySeriesError } from '../../../src/errors'
import {
  buildChartLayout,
  RENDER_ORDER,
  RenderLayer,
  tableRows,
  timeLabelIndexes,
  type Primitive
} from '../../../src/layout'
import { assertClose, HOUR, sampleRequest, T0 } from '../../helpers/fixtures'

function ofKind<K extends Primitive['kind']>(primitives: readonly Primitive[], kind: K): Extract<Primitive, { kind: K }>[] {
  return primitives.filter((primitive): primitive is Extract<Primitive, { kind: K }> => primitive.kind === kind)
}

describe('Layer builder', () => {
  it('should composite in a fixed back-to-front order', () => {
    assert.deepStrictEqual(RENDER_ORDER, [
      'background',
      'grid',
      'zones',
      'vlines',
      'volume',
      'wicks',
      'bodies',
      'markers',
      'price-line',
      'table'
    ])
  })

  it('should be deterministic', () => {
    const request = sampleRequest()
    assert.deepStrictEqual(buildChartLayout(request).layers, buildChartLayout(request).layers)
  })

  it('should refuse an empty series', () => {
    assert.throws(() => buildChartLayout(sampleRequest({ data: [], candle_colors: [] })), EmptySeriesError)
  })

  describe('background and grid', () => {
    const { layers } = buildChartLayout(sampleRequest())

    it('should clear the canvas to white and centre the title', () => {
      const [clear] = ofKind(layers[RenderLayer.Background], 'rect')
      assert.deepStrictEqual(clear, {
        kind: 'rect',
        x: 0,
        y: 0,
        width: 1280,
        height: 960,
        fill: { r: 255, g: 255, b: 255, a: 255 }
      })
      const [title] = ofKind(layers[RenderLayer.Background], 'text')
      assert.strictEqual(title?.text, 'BTCUSDT 1h')
      assert.strictEqual(title?.x, 600)
      assert.strictEqual(title?.y, 20)
    })

    it('should draw grid lines and axis labels', () => {
      const grid = layers[RenderLayer.Grid]
      assert.strictEqual(ofKind(grid, 'line').length, 17 + 6 + 1)

      const texts = ofKind(grid, 'text').map((text) => text.text)
      assert.strictEqual(texts.filter((text) => text.startsWith('$')).length, 8)
      assert.ok(texts.includes('Price'))
      assert.deepStrictEqual(
        texts.filter((text) => /^\d{2}-\d{2} /.test(text)),
        ['01-01 00:00', '01-01 01:00', '01-01 02:00']
      )
    })

    it('should pick at most sixteen evenly spread time labels', () => {
      assert.deepStrictEqual(timeLabelIndexes(3), [0, 1, 2])
      assert.deepStrictEqual(
        timeLabelIndexes(31),
        [0, 2, 4, 6, 8, 10, 12, 14, 16, 18, 20, 22, 24, 26, 28, 30]
      )
    })
  })

  describe('overlays', () => {
    it('should leave overlay layers empty without plots', () => {
      const { layers } = buildChartLayout(sampleRequest())
      assert.deepStrictEqual(layers[RenderLayer.Zones], [])
      assert.deepStrictEqual(layers[RenderLayer.VLines], [])
      assert.deepStrictEqual(layers[RenderLayer.Markers], [])
    })

    it('should draw an above marker pointing down over the high', () => {
      const layout = buildChartLayout(
        sampleRequest({
          plots: { marks: [{ time: T0 + HOUR, position: 'above', color: '#0000FF', text: 'buy' }] }
        })
      )
      const markers = layout.layers[RenderLayer.Markers]
      const [triangle] = ofKind(markers, 'triangle')
      const [label] = ofKind(markers, 'text')
      assert.ok(triangle)
      assert.ok(label)

      const [tip, left, right] = triangle.points
      assertClose(tip.x, layout.timeScale.center(1))
      assert.ok(tip.y > left.y)
      assert.strictEqual(left.y, right.y)
      assert.ok(tip.y < layout.priceScale.toPixel(108))
      assert.deepStrictEqual(triangle.fill, { r: 0, g: 0, b: 255, a: 255 })

      assert.strictEqual(label.text, 'buy')
      assert.strictEqual(label.size, 12)
      assert.ok(label.y < left.y)
    })

    it('should draw a below marker pointing up under the low', () => {
      const layout = buildChartLayout(
        sampleRequest({ plots: { marks: [{ time: T0, position: 'below', color: '#0000FF', size: 2 }] } })
      )
      const markers = layout.layers[RenderLayer.Markers]
      assert.strictEqual(markers.length, 1)
      const [triangle] = ofKind(markers, 'triangle')
      assert.ok(triangle)

      const [tip, left] = triangle.points
      assert.ok(tip.y < left.y)
      assert.ok(tip.y > layout.priceScale.toPixel(95))
    })

    it('should skip markers whose time matches no candle', () => {
      const { layers } = buildChartLayout(
        sampleRequest({ plots: { marks: [{ time: T0 + 1, position: 'above', color: '#0000FF' }] } })
      )
      assert.deepStrictEqual(layers[RenderLayer.Markers], [])
    })

    it('should fill zones translucently between interpolated edges', () => {
      const layout = buildChartLayout(
        sampleRequest({
          plots: { zones: [{ x1: T0 + 2 * HOUR, x2: T0, y1: 95, y2: 105, color: '#00FF00' }] }
        })
      )
      const [zone] = ofKind(layout.layers[RenderLayer.Zones], 'rect')
      assert.ok(zone)
      assert.deepStrictEqual(zone.fill, { r: 0, g: 255, b: 0, a: 77 })
      assertClose(zone.x, layout.timeScale.center(0))
      assertClose(zone.width, layout.timeScale.center(2) - layout.timeScale.center(0))
      assertClose(zone.y, layout.priceScale.toPixel(105))
      assertClose(zone.height, layout.priceScale.toPixel(95) - layout.priceScale.toPixel(105))
    })

    it('should clip zones to the price pane', () => {
      const { layers } = buildChartLayout(
        sampleRequest({
          plots: {
            zones: [
              { x1: T0, x2: T0 + 2 * HOUR, y1: 50, y2: 200, color: '#00FF00' },
              { x1: T0, x2: T0 + 2 * HOUR, y1: 1000, y2: 2000, color: '#00FF00' }
            ]
          }
        })
      )
      const zones = ofKind(layers[RenderLayer.Zones], 'rect')
      assert.strictEqual(zones.length, 1)
      assert.strictEqual(zones[0]?.y, 150)
      assert.strictEqual(zones[0]?.height, 640)
    })

    it('should draw vertical lines only at candle timestamps', () => {
      const layout = buildChartLayout(
        sampleRequest({
          plots: {
            vlines: [
              { time: T0 + 2 * HOUR, color: '#123456' },
              { time: T0 + 1, color: '#123456' }
            ]
          }
        })
      )
      const lines = ofKind(layout.layers[RenderLayer.VLines], 'line')
      assert.strictEqual(lines.length, 1)
      const x = layout.timeScale.center(2)
      assert.deepStrictEqual(lines[0], {
        kind: 'line',
        from: { x, y: 150 },
        to: { x, y: 920 },
        stroke: { r: 18, g: 52, b: 86, a: 255 },
        width: 1
      })
    })
  })

  describe('candles and volume', () => {
    it('should scale volume bars to the largest volume', () => {
      const bars = ofKind(buildChartLayout(sampleRequest()).layers[RenderLayer.Volume], 'rect')
      assert.strictEqual(bars.length, 3)
      assert.strictEqual(bars[1]?.height, 120)
      assert.strictEqual(bars[1]?.y, 800)
      assert.deepStrictEqual(bars[1]?.fill, { r: 130, g: 130, b: 130, a: 204 })
    })

    it('should use per-candle volume colours', () => {
      const bars = ofKind(
        buildChartLayout(sampleRequest({ volume_colors: ['#FF0000'] })).layers[RenderLayer.Volume],
        'rect'
      )
      assert.deepStrictEqual(bars[0]?.fill, { r: 255, g: 0, b: 0, a: 204 })
      assert.deepStrictEqual(bars[1]?.fill, { r: 130, g: 130, b: 130, a: 204 })
    })

    it('should skip the volume pane when every volume is zero', () => {
      const request = sampleRequest({
        data: [
          [T0, 1, 2, 0.5, 1.5, 0],
          [T0 + HOUR, 1.5, 2, 1, 1.2, 0]
        ]
      })
      assert.deepStrictEqual(buildChartLayout(request).layers[RenderLayer.Volume], [])
    })

    it('should colour bodies per candle', () => {
      const bodies = ofKind(buildChartLayout(sampleRequest()).layers[RenderLayer.Bodies], 'rect')
      assert.strictEqual(bodies.length, 3)
      assert.deepStrictEqual(bodies[0]?.fill, { r: 0, g: 255, b: 0, a: 255 })
      assert.deepStrictEqual(bodies[2]?.fill, { r: 255, g: 0, b: 0, a: 255 })
    })

    it('should give flat candles a visible body', () => {
      const request = sampleRequest({
        data: [
          [T0, 100, 110, 90, 100, 10],
          [T0 + HOUR, 100, 105, 95, 101, 10]
        ]
      })
      const [doji] = ofKind(buildChartLayout(request).layers[RenderLayer.Bodies], 'rect')
      assert.strictEqual(doji?.height, 1)
    })

    it('should centre wicks on their candle', () => {
      const layout = buildChartLayout(sampleRequest())
      const wicks = ofKind(layout.layers[RenderLayer.Wicks], 'rect')
      assert.strictEqual(wicks.length, 3)
      const wick = wicks[0]
      assert.ok(wick)
      assertClose(wick.x + wick.width / 2, layout.timeScale.center(0))
      assertClose(wick.y, layout.priceScale.toPixel(110))
      assertClose(wick.y + wick.height, layout.priceScale.toPixel(95))
    })
  })

  describe('price line and table', () => {
    const { layers, stats } = buildChartLayout(sampleRequest())
    const down = { r: 180, g: 0, b: 0, a: 255 }

    it('should mark the current price in the direction colour', () => {
      const [line] = ofKind(layers[RenderLayer.PriceLine], 'line')
      const [tag] = ofKind(layers[RenderLayer.PriceLine], 'text')
      assert.deepStrictEqual(line?.stroke, down)
      assert.strictEqual(tag?.text, '100')
      assert.strictEqual(tag?.bold, true)
      assert.deepStrictEqual(tag?.color, { r: 255, g: 255, b: 255, a: 255 })
    })

    it('should list current price, high and distance from high', () => {
      assert.deepStrictEqual(tableRows(stats), [
        ['Current Price', '$100'],
        ['High (in plot)', '$110'],
        ['% from High', '9.09%']
      ])

      const texts = ofKind(layers[RenderLayer.Table], 'text')
      assert.deepStrictEqual(
        texts.map((text) => text.text),
        ['Current Price', '$100', 'High (in plot)', '$110', '% from High', '9.09%']
      )
      assert.deepStrictEqual(texts[0]?.color, down)
      assert.deepStrictEqual(texts[2]?.color, { r: 0, g: 0, b: 0, a: 255 })
    })

    it('should show current price, high and distance for a two-candle request', () => {
      const layout = buildChartLayout(
        sampleRequest({
          data: [
            [T0, 100, 110, 90, 105, 10],
            [T0 + HOUR, 105, 108, 95, 100, 20]
          ],
          candle_colors: ['#FF0000', '#00FF00']
        })
      )

      const texts = ofKind(layout.layers[RenderLayer.Table], 'text')
      assert.deepStrictEqual(
        texts.map((text) => text.text),
        ['Current Price', '$100', 'High (in plot)', '$110', '% from High', '9.09%']
      )
      assert.strictEqual(layout.stats.direction, 'down')
      assert.deepStrictEqual(texts[0]?.color, down)
      assert.deepStrictEqual(
        ofKind(layout.layers[RenderLayer.Bodies], 'rect').map((body) => body.fill),
        [
          { r: 255, g: 0, b: 0, a: 255 },
          { r: 0, g: 255, b: 0, a: 255 }
        ]
      )
    })

    it('should place table cells in two columns under the title', () => {
      const cells = ofKind(layers[RenderLayer.Table], 'rect')
      assert.strictEqual(cells.length, 6)
      assert.deepStrictEqual(
        cells.map((cell) => [cell.x, cell.y, cell.width, cell.height]),
        [
          [197, 45, 438, 22],
          [645, 45, 438, 22],
          [197, 76, 438, 22],
          [645, 76, 438, 22],
          [197, 107, 438, 22],
          [645, 107, 438, 22]
        ]
      )
    })
  })
})
