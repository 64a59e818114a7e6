/**
 * Fixed pixel layout of the 1280×960 chart image.
 *
 * ```
 * ┌──────────────────── title (40) ───────────────────┐
 * │        statistics table (100, inset 15 %)         │
 * ├──────────────────────────────────────────┬────────┤
 * │ price pane                               │ price  │
 * │                                          │ labels │
 * ├──────────────────────────────────────────┤  (80)  │
 * │ volume pane (120)                        │        │
 * ├──────────────────────────────────────────┴────────┤
 * │ time labels (40)                                  │
 * └───────────────────────────────────────────────────┘
 * ```
 */

export const CANVAS_WIDTH = 1280
export const CANVAS_HEIGHT = 960

export const TITLE_HEIGHT = 40
export const TABLE_HEIGHT = 100
export const TABLE_INSET_RATIO = 0.15
export const PLOT_MARGIN = 10
export const PRICE_LABEL_WIDTH = 80
export const TIME_LABEL_HEIGHT = 40
export const VOLUME_PANE_HEIGHT = 120
export const PANE_GAP = 10

export interface Point {
  readonly x: number
  readonly y: number
}

export interface Rect {
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

export interface ChartFrame {
  readonly width: number
  readonly height: number
  readonly title: Rect
  readonly table: Rect
  readonly price: Rect
  readonly volume: Rect
  readonly priceLabels: Rect
  readonly timeLabels: Rect
}

export function rectRight(rect: Rect): number {
  return rect.x + rect.width
}

export function rectBottom(rect: Rect): number {
  return rect.y + rect.height
}

/**
 * Intersection of two rectangles, or undefined when they do not overlap
 */
export function intersectRect(a: Rect, b: Rect): Rect | undefined {
  const x = Math.max(a.x, b.x)
  const y = Math.max(a.y, b.y)
  const right = Math.min(rectRight(a), rectRight(b))
  const bottom = Math.min(rectBottom(a), rectBottom(b))
  if (right <= x || bottom <= y) {
    return undefined
  }
  return { x, y, width: right - x, height: bottom - y }
}

export function computeChartFrame(width: number = CANVAS_WIDTH, height: number = CANVAS_HEIGHT): ChartFrame {
  const headerHeight = TITLE_HEIGHT + TABLE_HEIGHT
  const inset = Math.floor(width * TABLE_INSET_RATIO)

  const plotLeft = PLOT_MARGIN
  const plotRight = width - PLOT_MARGIN - PRICE_LABEL_WIDTH
  const plotTop = headerHeight + PLOT_MARGIN
  const plotBottom = height - TIME_LABEL_HEIGHT

  const volumeTop = plotBottom - VOLUME_PANE_HEIGHT
  const priceBottom = volumeTop - PANE_GAP

  return {
    width,
    height,
    title: { x: 0, y: 0, width, height: TITLE_HEIGHT },
    table: { x: inset, y: TITLE_HEIGHT, width: width - 2 * inset, height: TABLE_HEIGHT },
    price: { x: plotLeft, y: plotTop, width: plotRight - plotLeft, height: priceBottom - plotTop },
    volume: { x: plotLeft, y: volumeTop, width: plotRight - plotLeft, height: VOLUME_PANE_HEIGHT },
    priceLabels: { x: plotRight, y: plotTop, width: PRICE_LABEL_WIDTH, height: plotBottom - plotTop },
    timeLabels: { x: plotLeft, y: plotBottom, width: plotRight - plotLeft, height: TIME_LABEL_HEIGHT }
  }
}
