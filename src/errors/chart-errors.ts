/**
 * Base class for every failure raised while turning a chart request into an artifact.
 * A ChartError aborts the request it belongs to and nothing else.
 */
export class ChartError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'ChartError'
  }
}

/**
 * The payload could not be decoded (not UTF-8 JSON, or no payload frame at all)
 */
export class MalformedRequestError extends ChartError {
  constructor(message: string, cause?: Error) {
    super(message, 'MALFORMED_REQUEST', cause)
    this.name = 'MalformedRequestError'
  }
}

/**
 * The payload decoded but a required field is missing or has the wrong shape
 */
export class SchemaError extends ChartError {
  constructor(
    message: string,
    public readonly fields: readonly string[] = []
  ) {
    super(message, 'SCHEMA_ERROR')
    this.name = 'SchemaError'
  }
}

/**
 * A colour string is not `#RRGGBB` or `#RRGGBBAA`
 */
export class InvalidColorError extends ChartError {
  constructor(
    public readonly value: string,
    public readonly field?: string
  ) {
    super(
      field ? `Invalid color ${JSON.stringify(value)} in ${field}` : `Invalid color ${JSON.stringify(value)}`,
      'INVALID_COLOR'
    )
    this.name = 'InvalidColorError'
  }
}

/**
 * The request carries no candles, so there is nothing to scale or draw
 */
export class EmptySeriesError extends ChartError {
  constructor(message = 'Chart request contains no candles') {
    super(message, 'EMPTY_SERIES')
    this.name = 'EmptySeriesError'
  }
}

/**
 * Writing the artifact failed
 */
export class IoError extends ChartError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: Error
  ) {
    super(message, 'IO_ERROR', cause)
    this.name = 'IoError'
  }
}

/**
 * Socket level failure outside of any single request
 */
export class TransportError extends ChartError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSPORT_ERROR', cause)
    this.name = 'TransportError'
  }
}

export function isChartError(value: unknown): value is ChartError {
  return value instanceof ChartError
}

/**
 * Normalises anything thrown into an Error so it can be attached as a cause
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
