export {
  ChartError,
  EmptySeriesError,
  InvalidColorError,
  IoError,
  isChartError,
  MalformedRequestError,
  SchemaError,
  toError,
  TransportError
} from './chart-errors'
