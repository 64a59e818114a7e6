import {
  BLACK,
  NEUTRAL_GRAY,
  resolveColorOr,
  VOLUME_GRAY,
  withOpacity,
  type Rgba
} from '../colors'
import type { ChartRequest } from '../models'
import { overlaysOfKind } from '../models'
import {
  computeChartFrame,
  intersectRect,
  PriceScale,
  rectBottom,
  rectRight,
  TABLE_HEIGHT,
  TimeScale,
  type ChartFrame,
  type Rect
} from '../scales'
import { formatAxisPrice, formatAxisTime, formatPercent, formatPrice } from './formatters'
import {
  AXIS_LINE,
  AXIS_TEXT,
  BACKGROUND,
  DOWN,
  GRID_MAJOR,
  GRID_MINOR,
  GRID_VERTICAL,
  PRICE_LABEL_TEXT,
  TABLE_CELL,
  TEXT,
  UP,
  VOLUME_OPACITY,
  WICK
} from './palette'
import { emptyLayerSet, RenderLayer, type LayerSet, type Primitive, type RectPrimitive } from './primitives'
import { computeSessionStats, type SessionStats } from './session-stats'

export const GRID_HORIZONTAL_LINES = 17
export const GRID_VERTICAL_LINES = 6
export const PRICE_LABEL_COUNT = 8
export const TIME_LABEL_COUNT = 16
/** Marker distance from the candle extreme, as a share of the price pane height per size unit */
export const MARKER_OFFSET_RATIO = 0.02
export const TITLE_FONT_SIZE = 24
export const TABLE_FONT_SIZE = 14

const TABLE_ROWS = 3
const TABLE_CELL_PADDING = 5
const TABLE_ROW_BOTTOM_PADDING = 6
const PRICE_TAG_HEIGHT = 20

/**
 * Everything a compositor needs for one request
 */
export interface ChartLayout {
  readonly frame: ChartFrame
  readonly priceScale: PriceScale
  readonly timeScale: TimeScale
  readonly stats: SessionStats
  readonly layers: LayerSet
}

/**
 * Inputs shared by every layer builder
 */
export interface LayoutContext {
  readonly request: ChartRequest
  readonly frame: ChartFrame
  readonly price: PriceScale
  readonly time: TimeScale
  readonly stats: SessionStats
}

/**
 * Computes the primitives of every layer. Pure: the same request always yields the same layout.
 *
 * @throws EmptySeriesError when the request has no candles
 */
export function buildChartLayout(request: ChartRequest, frame: ChartFrame = computeChartFrame()): ChartLayout {
  const stats = computeSessionStats(request.candles)
  const price = PriceScale.fromCandles(request.candles, frame.price.y, rectBottom(frame.price))
  const time = new TimeScale(
    request.candles.map((candle) => candle.timestamp),
    frame.price.x,
    frame.price.width
  )
  const context: LayoutContext = { request, frame, price, time, stats }

  const layers = emptyLayerSet()
  layers[RenderLayer.Background] = buildBackground(context)
  layers[RenderLayer.Grid] = buildGrid(context)
  layers[RenderLayer.Zones] = buildZones(context)
  layers[RenderLayer.VLines] = buildVLines(context)
  layers[RenderLayer.Volume] = buildVolume(context)
  layers[RenderLayer.Wicks] = buildWicks(context)
  layers[RenderLayer.Bodies] = buildBodies(context)
  layers[RenderLayer.Markers] = buildMarkers(context)
  layers[RenderLayer.PriceLine] = buildPriceLine(context)
  layers[RenderLayer.Table] = buildTable(context)

  return { frame, priceScale: price, timeScale: time, stats, layers }
}

/** Bottom edge of the whole plot (price pane + volume pane) */
function plotBottom(frame: ChartFrame): number {
  return rectBottom(frame.volume)
}

function directionColor(stats: SessionStats): Rgba {
  return stats.direction === 'up' ? UP : DOWN
}

export function buildBackground({ request, frame }: LayoutContext): Primitive[] {
  return [
    { kind: 'rect', x: 0, y: 0, width: frame.width, height: frame.height, fill: BACKGROUND },
    {
      kind: 'text',
      text: request.title,
      x: frame.price.x + frame.price.width / 2,
      y: frame.title.y + frame.title.height / 2,
      size: TITLE_FONT_SIZE,
      color: TEXT,
      align: 'center'
    }
  ]
}

export function buildGrid({ frame, price, time }: LayoutContext): Primitive[] {
  const primitives: Primitive[] = []
  const pane = frame.price
  const right = rectRight(pane)
  const bottom = plotBottom(frame)

  const rowStep = pane.height / (GRID_HORIZONTAL_LINES - 1)
  for (let k = 0; k < GRID_HORIZONTAL_LINES; k++) {
    const y = pane.y + k * rowStep
    primitives.push({
      kind: 'line',
      from: { x: pane.x, y },
      to: { x: right, y },
      stroke: k % 2 === 0 ? GRID_MAJOR : GRID_MINOR,
      width: 1
    })
  }

  const columnStep = pane.width / (GRID_VERTICAL_LINES - 1)
  for (let k = 0; k < GRID_VERTICAL_LINES; k++) {
    const x = pane.x + k * columnStep
    primitives.push({ kind: 'line', from: { x, y: pane.y }, to: { x, y: bottom }, stroke: GRID_VERTICAL, width: 1 })
  }

  primitives.push({ kind: 'line', from: { x: right, y: pane.y }, to: { x: right, y: bottom }, stroke: AXIS_LINE, width: 1 })

  for (const tick of price.ticks(PRICE_LABEL_COUNT)) {
    primitives.push({
      kind: 'text',
      text: formatAxisPrice(tick),
      x: frame.priceLabels.x + 8,
      y: price.toPixel(tick),
      size: 15,
      color: AXIS_TEXT,
      align: 'left'
    })
  }
  primitives.push({
    kind: 'text',
    text: 'Price',
    x: frame.priceLabels.x + frame.priceLabels.width / 2,
    y: pane.y - 5,
    size: 12,
    color: AXIS_TEXT,
    align: 'center'
  })

  for (const index of timeLabelIndexes(time.count)) {
    const timestamp = time.timestampAt(index)
    if (timestamp === undefined) continue
    primitives.push({
      kind: 'text',
      text: formatAxisTime(timestamp),
      x: time.center(index),
      y: frame.timeLabels.y + 14,
      size: 12,
      color: AXIS_TEXT,
      align: 'center'
    })
  }

  return primitives
}

/**
 * Candle indexes that get a time label: all of them for short series, otherwise
 * {@link TIME_LABEL_COUNT} spread evenly from the first to the last
 */
export function timeLabelIndexes(count: number): number[] {
  if (count <= TIME_LABEL_COUNT) {
    return Array.from({ length: count }, (_, i) => i)
  }
  const indexes = new Set<number>()
  for (let k = 0; k < TIME_LABEL_COUNT; k++) {
    indexes.add(Math.round((k * (count - 1)) / (TIME_LABEL_COUNT - 1)))
  }
  return [...indexes]
}

export function buildZones({ request, frame, price, time }: LayoutContext): Primitive[] {
  const primitives: Primitive[] = []
  for (const zone of overlaysOfKind(request.overlays, 'zone')) {
    const xa = time.interpolate(zone.x1)
    const xb = time.interpolate(zone.x2)
    const ya = price.toPixel(zone.y1)
    const yb = price.toPixel(zone.y2)
    const rect: Rect = {
      x: Math.min(xa, xb),
      y: Math.min(ya, yb),
      width: Math.abs(xb - xa),
      height: Math.abs(yb - ya)
    }
    const visible = intersectRect(rect, frame.price)
    if (!visible) continue
    primitives.push({ kind: 'rect', ...visible, fill: resolveColorOr(zone.color, NEUTRAL_GRAY, 'zone') })
  }
  return primitives
}

export function buildVLines({ request, frame, time }: LayoutContext): Primitive[] {
  const primitives: Primitive[] = []
  for (const vline of overlaysOfKind(request.overlays, 'vline')) {
    const x = time.xForTimestamp(vline.time)
    if (x === undefined) continue
    primitives.push({
      kind: 'line',
      from: { x, y: frame.price.y },
      to: { x, y: plotBottom(frame) },
      stroke: resolveColorOr(vline.color, NEUTRAL_GRAY),
      width: 1
    })
  }
  return primitives
}

export function buildVolume({ request, frame, time, stats }: LayoutContext): Primitive[] {
  if (stats.maxVolume <= 0) {
    return []
  }
  const pane = frame.volume
  const bottom = rectBottom(pane)
  const primitives: Primitive[] = []

  request.candles.forEach((candle, i) => {
    const height = (Math.max(0, candle.volume) / stats.maxVolume) * pane.height
    if (height <= 0) return
    primitives.push({
      kind: 'rect',
      x: time.center(i) - time.candleWidth / 2,
      y: bottom - height,
      width: time.candleWidth,
      height,
      fill: withOpacity(resolveColorOr(candle.volumeColor, VOLUME_GRAY), VOLUME_OPACITY)
    })
  })
  return primitives
}

export function buildWicks({ request, price, time }: LayoutContext): Primitive[] {
  const width = Math.max(1, time.wickWidth)
  return request.candles.map((candle, i): RectPrimitive => {
    const yHigh = price.toPixel(candle.high)
    const yLow = price.toPixel(candle.low)
    return {
      kind: 'rect',
      x: time.center(i) - width / 2,
      y: Math.min(yHigh, yLow),
      width,
      height: Math.max(1, Math.abs(yLow - yHigh)),
      fill: WICK
    }
  })
}

export function buildBodies({ request, price, time }: LayoutContext): Primitive[] {
  return request.candles.map((candle, i): RectPrimitive => {
    const yOpen = price.toPixel(candle.open)
    const yClose = price.toPixel(candle.close)
    return {
      kind: 'rect',
      x: time.center(i) - time.candleWidth / 2,
      y: Math.min(yOpen, yClose),
      width: time.candleWidth,
      height: Math.max(1, Math.abs(yClose - yOpen)),
      fill: resolveColorOr(candle.color, BLACK)
    }
  })
}

/**
 * `above` markers point down at the high, `below` markers point up at the low
 */
export function buildMarkers({ request, frame, price, time }: LayoutContext): Primitive[] {
  const primitives: Primitive[] = []

  for (const marker of overlaysOfKind(request.overlays, 'marker')) {
    const index = time.indexOf(marker.time)
    const candle = index === undefined ? undefined : request.candles[index]
    if (index === undefined || candle === undefined) continue

    const x = time.center(index)
    const offset = frame.price.height * MARKER_OFFSET_RATIO * marker.size
    const halfHeight = offset / 2
    const halfWidth = (time.candleWidth / 3) * marker.size
    const color = resolveColorOr(marker.color, NEUTRAL_GRAY)
    const above = marker.position === 'above'

    const y = above ? price.toPixel(candle.high) - offset : price.toPixel(candle.low) + offset
    const tip = above ? y + halfHeight : y - halfHeight
    const base = above ? y - halfHeight : y + halfHeight

    primitives.push({
      kind: 'triangle',
      points: [
        { x, y: tip },
        { x: x - halfWidth, y: base },
        { x: x + halfWidth, y: base }
      ],
      fill: color
    })

    if (marker.text !== undefined) {
      primitives.push({
        kind: 'text',
        text: marker.text,
        x,
        y: above ? y - offset * 1.2 : y + offset * 1.2,
        size: Math.max(8, Math.floor(12 * marker.size)),
        color,
        align: 'center'
      })
    }
  }

  return primitives
}

export function buildPriceLine({ frame, price, stats }: LayoutContext): Primitive[] {
  const y = price.toPixel(stats.currentPrice)
  const color = directionColor(stats)
  const labels = frame.priceLabels

  return [
    { kind: 'line', from: { x: frame.price.x, y }, to: { x: rectRight(frame.price), y }, stroke: color, width: 1 },
    { kind: 'rect', x: labels.x, y: y - PRICE_TAG_HEIGHT / 2, width: labels.width, height: PRICE_TAG_HEIGHT, fill: color },
    {
      kind: 'text',
      text: formatPrice(stats.currentPrice),
      x: labels.x + labels.width / 2,
      y,
      size: 13,
      color: PRICE_LABEL_TEXT,
      align: 'center',
      bold: true
    }
  ]
}

/**
 * Rows of the statistics table, label and value
 */
export function tableRows(stats: SessionStats): Array<[string, string]> {
  return [
    ['Current Price', `$${formatPrice(stats.currentPrice)}`],
    ['High (in plot)', `$${formatPrice(stats.sessionHigh)}`],
    ['% from High', formatPercent(stats.percentFromHigh)]
  ]
}

export function buildTable({ frame, stats }: LayoutContext): Primitive[] {
  const table = frame.table
  const cellHeight = TABLE_HEIGHT / (TABLE_ROWS + 1)
  const rowSpacing = Math.floor(cellHeight * 0.15)
  const rowHeight = Math.floor(cellHeight) - rowSpacing
  const middle = table.x + Math.floor(table.width / 2)
  const right = rectRight(table)
  const primitives: Primitive[] = []

  tableRows(stats).forEach(([label, value], row) => {
    const top = table.y + row * (rowHeight + rowSpacing + TABLE_ROW_BOTTOM_PADDING) + TABLE_CELL_PADDING
    const textY = top + rowHeight / 2
    const color = row === 0 ? directionColor(stats) : TEXT

    primitives.push(
      {
        kind: 'rect',
        x: table.x + TABLE_CELL_PADDING,
        y: top,
        width: middle - TABLE_CELL_PADDING - (table.x + TABLE_CELL_PADDING),
        height: rowHeight,
        fill: TABLE_CELL
      },
      {
        kind: 'rect',
        x: middle + TABLE_CELL_PADDING,
        y: top,
        width: right - TABLE_CELL_PADDING - (middle + TABLE_CELL_PADDING),
        height: rowHeight,
        fill: TABLE_CELL
      },
      { kind: 'text', text: label, x: table.x + TABLE_CELL_PADDING * 4, y: textY, size: TABLE_FONT_SIZE, color, align: 'left' },
      { kind: 'text', text: value, x: middle + TABLE_CELL_PADDING * 4, y: textY, size: TABLE_FONT_SIZE, color, align: 'left' }
    )
  })

  return primitives
}
