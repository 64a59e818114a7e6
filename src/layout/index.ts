export {
  buildBackground,
  buildBodies,
  buildChartLayout,
  buildGrid,
  buildMarkers,
  buildPriceLine,
  buildTable,
  buildVLines,
  buildVolume,
  buildWicks,
  buildZones,
  GRID_HORIZONTAL_LINES,
  GRID_VERTICAL_LINES,
  MARKER_OFFSET_RATIO,
  PRICE_LABEL_COUNT,
  tableRows,
  TIME_LABEL_COUNT,
  timeLabelIndexes
} from './layer-builder'
export type { ChartLayout, LayoutContext } from './layer-builder'
export { formatAxisPrice, formatAxisTime, formatPercent, formatPrice, groupThousands, roundAxisPrice } from './formatters'
export * as palette from './palette'
export { emptyLayerSet, RENDER_ORDER, RenderLayer } from './primitives'
export type { LayerSet, LinePrimitive, Primitive, RectPrimitive, TextAlign, TextPrimitive, TrianglePrimitive } from './primitives'
export { computeSessionStats } from './session-stats'
export type { PriceDirection, SessionStats } from './session-stats'
