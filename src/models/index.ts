export { overlaysOfKind } from './chart-request'
export type {
  Candle,
  ChartEnvelope,
  ChartRequest,
  MarkerOverlay,
  MarkerPosition,
  Overlay,
  OverlayKind,
  VLineOverlay,
  ZoneOverlay
} from './chart-request'
export {
  chartDataSchema,
  chartEnvelopeSchema,
  isPlainFilename,
  markSchema,
  plotsSchema,
  vlineSchema,
  zoneSchema
} from './chart-request.schema'
export type { ChartData, MarkData } from './chart-request.schema'
export {
  decodeChartEnvelope,
  DEFAULT_CANDLE_COLOR,
  parseChartDocument,
  parseChartRequest,
  resolveColumnIndexes,
  toChartRequest
} from './request-parser'
export type { ColumnIndexes } from './request-parser'
