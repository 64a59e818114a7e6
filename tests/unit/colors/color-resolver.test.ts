import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
  BLACK,
  NEUTRAL_GRAY,
  parseHexColor,
  resolveColorOr,
  rgba,
  toCssColor,
  withOpacity,
  ZONE_DEFAULT_ALPHA
} from '../../../src/colors'
import { InvalidColorError } from '../../../src/errors'

describe('Color resolver', () => {
  describe('parseHexColor', () => {
    it('should parse #RRGGBB as opaque', () => {
      assert.deepStrictEqual(parseHexColor('#FF8000'), { r: 255, g: 128, b: 0, a: 255 })
    })

    it('should keep an explicit alpha byte', () => {
      assert.deepStrictEqual(parseHexColor('#ff800080'), { r: 255, g: 128, b: 0, a: 128 })
      assert.deepStrictEqual(parseHexColor('#00FF0040', 'zone'), { r: 0, g: 255, b: 0, a: 64 })
    })

    it('should default zone colours to 30% alpha', () => {
      assert.strictEqual(ZONE_DEFAULT_ALPHA, 77)
      assert.deepStrictEqual(parseHexColor('#00FF00', 'zone'), { r: 0, g: 255, b: 0, a: 77 })
    })

    it('should accept a missing leading #', () => {
      assert.deepStrictEqual(parseHexColor('0000ff'), { r: 0, g: 0, b: 255, a: 255 })
    })

    it('should reject anything that is not 6 or 8 hex digits', () => {
      for (const value of ['#FFF', 'red', '#GG0000', '', '#1234567']) {
        assert.throws(() => parseHexColor(value), InvalidColorError, value)
      }
    })
  })

  describe('resolveColorOr', () => {
    it('should return the fallback for missing or unparseable values', () => {
      assert.deepStrictEqual(resolveColorOr(undefined, NEUTRAL_GRAY), NEUTRAL_GRAY)
      assert.deepStrictEqual(resolveColorOr('bogus', BLACK), BLACK)
    })

    it('should apply the alpha policy to valid values', () => {
      assert.deepStrictEqual(resolveColorOr('#102030', BLACK, 'zone'), { r: 16, g: 32, b: 48, a: 77 })
    })
  })

  it('should scale alpha with withOpacity', () => {
    assert.deepStrictEqual(withOpacity(rgba(1, 2, 3), 0.8), { r: 1, g: 2, b: 3, a: 204 })
    assert.deepStrictEqual(withOpacity(rgba(1, 2, 3, 100), 2), { r: 1, g: 2, b: 3, a: 100 })
  })

  it('should format CSS colours', () => {
    assert.strictEqual(toCssColor(rgba(1, 2, 3)), 'rgb(1, 2, 3)')
    assert.strictEqual(toCssColor(rgba(0, 255, 0, 77)), 'rgba(0, 255, 0, 0.302)')
    assert.strictEqual(toCssColor(rgba(0, 0, 0, 0)), 'rgba(0, 0, 0, 0)')
  })
})
