import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
  ChartError,
  EmptySeriesError,
  InvalidColorError,
  IoError,
  isChartError,
  MalformedRequestError,
  SchemaError,
  toError,
  TransportError
} from '../../../src/errors'

describe('Chart errors', () => {
  it('should keep the underlying cause', () => {
    const cause = new Error('EACCES')
    const error = new IoError('Failed to write chart', '/charts/a.png', cause)

    assert.strictEqual(error.cause, cause)
    assert.strictEqual(error.code, 'IO_ERROR')
    assert.strictEqual(error.path, '/charts/a.png')
    assert.strictEqual(new TransportError('send failed', cause).cause, cause)
    assert.strictEqual(new MalformedRequestError('bad payload').cause, undefined)
  })

  it('should carry a code per failure kind', () => {
    assert.deepStrictEqual(
      [
        new MalformedRequestError('x'),
        new SchemaError('x', ['title']),
        new InvalidColorError('red', 'candle_colors.0'),
        new EmptySeriesError(),
        new IoError('x', '/p'),
        new TransportError('x')
      ].map((error) => [error.name, error.code]),
      [
        ['MalformedRequestError', 'MALFORMED_REQUEST'],
        ['SchemaError', 'SCHEMA_ERROR'],
        ['InvalidColorError', 'INVALID_COLOR'],
        ['EmptySeriesError', 'EMPTY_SERIES'],
        ['IoError', 'IO_ERROR'],
        ['TransportError', 'TRANSPORT_ERROR']
      ]
    )
  })

  it('should describe invalid colours with their field', () => {
    assert.strictEqual(new InvalidColorError('red', 'candle_colors.0').message, 'Invalid color "red" in candle_colors.0')
    assert.strictEqual(new InvalidColorError('red').message, 'Invalid color "red"')
  })

  it('should recognise chart errors', () => {
    assert.strictEqual(isChartError(new EmptySeriesError()), true)
    assert.strictEqual(isChartError(new ChartError('x', 'CUSTOM')), true)
    assert.strictEqual(isChartError(new Error('x')), false)
  })

  it('should wrap thrown non-errors', () => {
    const original = new Error('kept')
    assert.strictEqual(toError(original), original)
    assert.strictEqual(toError('text').message, 'text')
  })
})
