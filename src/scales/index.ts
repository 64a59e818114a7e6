export {
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  computeChartFrame,
  intersectRect,
  PANE_GAP,
  PLOT_MARGIN,
  PRICE_LABEL_WIDTH,
  rectBottom,
  rectRight,
  TABLE_HEIGHT,
  TABLE_INSET_RATIO,
  TIME_LABEL_HEIGHT,
  TITLE_HEIGHT,
  VOLUME_PANE_HEIGHT
} from './chart-geometry'
export type { ChartFrame, Point, Rect } from './chart-geometry'
export { FLAT_SERIES_PADDING, MIN_LOG_PRICE, PriceScale } from './price-scale'
export { CANDLE_WIDTH_RATIO, TimeScale, WICK_WIDTH_RATIO } from './time-scale'
