import type { ZodError } from 'zod'
import { isHexColor } from '../colors'
import { InvalidColorError, MalformedRequestError, SchemaError, toError } from '../errors'
import type { Candle, ChartEnvelope, ChartRequest, Overlay } from './chart-request'
import { chartDataSchema, chartEnvelopeSchema, type ChartData } from './chart-request.schema'

/** Colour given to candles that have no entry in `candle_colors` */
export const DEFAULT_CANDLE_COLOR = '#000000'

export interface ColumnIndexes {
  readonly timestamp: number
  readonly open: number
  readonly high: number
  readonly low: number
  readonly close: number
  readonly volume: number
}

/** `[timestamp, open, high, low, close, volume]` */
const DEFAULT_INDEXES: ColumnIndexes = { timestamp: 0, open: 1, high: 2, low: 3, close: 4, volume: 5 }

/**
 * Decodes the final message frame `["chart", "request", {...}]` into a validated request.
 *
 * @throws MalformedRequestError when the bytes are not UTF-8 JSON
 * @throws SchemaError when the envelope or a required field is missing or mistyped
 * @throws InvalidColorError when any supplied colour string cannot be parsed
 */
export function decodeChartEnvelope(raw: Uint8Array | string): ChartEnvelope {
  const decoded = decodeJson(raw)
  const envelope = chartEnvelopeSchema.safeParse(decoded)
  if (!envelope.success) {
    throw toSchemaError('Chart message must be a [channel, command, request] array', envelope.error)
  }

  const [channel, command, payload] = envelope.data
  return { channel, command, request: toChartRequest(payload) }
}

export function parseChartRequest(raw: Uint8Array | string): ChartRequest {
  return decodeChartEnvelope(raw).request
}

/**
 * Accepts either a full envelope or a bare request object (request files on disk)
 */
export function parseChartDocument(raw: Uint8Array | string): ChartRequest {
  const decoded = decodeJson(raw)
  return Array.isArray(decoded) ? decodeChartEnvelope(raw).request : toChartRequest(decoded)
}

/**
 * Validates an already decoded request object
 */
export function toChartRequest(value: unknown): ChartRequest {
  const parsed = chartDataSchema.safeParse(value)
  if (!parsed.success) {
    throw toSchemaError('Invalid chart request', parsed.error)
  }

  const data = parsed.data
  validateColors(data)

  const candles = buildCandles(data)
  const overlays = buildOverlays(data)

  return {
    title: data.title,
    ticker: data.ticker,
    timeframe: data.timeframe,
    columns: data.cols,
    candles,
    overlays,
    description: data.desc,
    ...(data.chat_id != null ? { chatId: data.chat_id } : {}),
    ...(data.subscriber_list != null ? { subscriberList: data.subscriber_list } : {}),
    ...(data.image_filename != null ? { imageFilename: data.image_filename } : {})
  }
}

function decodeJson(raw: Uint8Array | string): unknown {
  let text: string
  try {
    text = typeof raw === 'string' ? raw : new TextDecoder('utf-8', { fatal: true }).decode(raw)
  } catch (error) {
    throw new MalformedRequestError('Chart payload is not valid UTF-8', toError(error))
  }

  try {
    return JSON.parse(text)
  } catch (error) {
    throw new MalformedRequestError(
      `Failed to parse chart payload: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      toError(error)
    )
  }
}

function toSchemaError(prefix: string, error: ZodError): SchemaError {
  const fields = error.issues.map((issue) => (issue.path.length > 0 ? issue.path.join('.') : '<root>'))
  const details = error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ')
  return new SchemaError(`${prefix}: ${details}`, fields)
}

function checkColor(value: string, field: string): void {
  if (!isHexColor(value)) {
    throw new InvalidColorError(value, field)
  }
}

function validateColors(data: ChartData): void {
  data.candle_colors.forEach((color, i) => checkColor(color, `candle_colors.${i}`))
  data.volume_colors?.forEach((color, i) => checkColor(color, `volume_colors.${i}`))
  data.plots.marks?.forEach((mark, i) => checkColor(mark.color, `plots.marks.${i}.color`))
  data.plots.zones?.forEach((zone, i) => checkColor(zone.color, `plots.zones.${i}.color`))
  data.plots.vlines?.forEach((vline, i) => checkColor(vline.color, `plots.vlines.${i}.color`))
}

/**
 * Maps column names to row positions. Falls back to the default order unless
 * `cols` names all of timestamp, open, high, low and close.
 */
export function resolveColumnIndexes(columns: readonly string[]): ColumnIndexes {
  const names = columns.map((column) => column.trim().toLowerCase())
  const find = (...aliases: string[]): number => names.findIndex((name) => aliases.includes(name))

  const timestamp = find('timestamp', 'time', 'ts')
  const open = find('open', 'o')
  const high = find('high', 'h')
  const low = find('low', 'l')
  const close = find('close', 'c')
  const volume = find('volume', 'vol', 'v')

  if ([timestamp, open, high, low, close].some((index) => index < 0)) {
    return DEFAULT_INDEXES
  }
  return { timestamp, open, high, low, close, volume }
}

function buildCandles(data: ChartData): Candle[] {
  const indexes = resolveColumnIndexes(data.cols)
  const column = (row: readonly number[], index: number): number => (index >= 0 ? row[index] ?? 0 : 0)

  const candles = data.data.map((row, i): Candle => {
    const volumeColor = data.volume_colors?.[i]
    return {
      timestamp: Math.trunc(column(row, indexes.timestamp)),
      open: column(row, indexes.open),
      high: column(row, indexes.high),
      low: column(row, indexes.low),
      close: column(row, indexes.close),
      volume: column(row, indexes.volume),
      color: data.candle_colors[i] ?? DEFAULT_CANDLE_COLOR,
      ...(volumeColor !== undefined ? { volumeColor } : {})
    }
  })

  // Array#sort is stable, so equal timestamps keep the caller's order
  return candles.sort((a, b) => a.timestamp - b.timestamp)
}

function buildOverlays(data: ChartData): Overlay[] {
  const overlays: Overlay[] = []

  for (const zone of data.plots.zones ?? []) {
    overlays.push({ kind: 'zone', x1: zone.x1, x2: zone.x2, y1: zone.y1, y2: zone.y2, color: zone.color })
  }
  for (const vline of data.plots.vlines ?? []) {
    overlays.push({ kind: 'vline', time: vline.time, color: vline.color })
  }
  for (const mark of data.plots.marks ?? []) {
    overlays.push({
      kind: 'marker',
      time: mark.time,
      position: mark.position,
      color: mark.color,
      size: mark.size ?? 1,
      ...(mark.text != null && mark.text !== '' ? { text: mark.text } : {})
    })
  }

  return overlays
}
