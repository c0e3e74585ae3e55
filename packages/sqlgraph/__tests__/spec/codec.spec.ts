/**
 * Property Codec Specification Tests
 */

import { describe, it, expect } from 'vitest'
import {
  applyPatch,
  cloneProperties,
  createPropertyMap,
  decodeProperties,
  decodeValue,
  encodePatch,
  encodeProperties,
  encodeValue,
  ownProperty,
  parseStoredProperty,
} from '../../src/codec'
import { PropertyTypeError, StorageError } from '../../src/errors'

describe('Property Codec', () => {
  // ===========================================================================
  // ENCODE
  // ===========================================================================

  describe('encodeValue()', () => {
    it('tags each supported type', () => {
      expect(encodeValue('s', 'hello')).toEqual({ key: 's', value: 'hello', valueType: 'text' })
      expect(encodeValue('i', 42)).toEqual({ key: 'i', value: 42, valueType: 'integer' })
      expect(encodeValue('r', 2.5)).toEqual({ key: 'r', value: 2.5, valueType: 'real' })
      expect(encodeValue('t', true)).toEqual({ key: 't', value: 1, valueType: 'boolean' })
      expect(encodeValue('f', false)).toEqual({ key: 'f', value: 0, valueType: 'boolean' })
    })

    it('stores blobs as a copy', () => {
      const bytes = new Uint8Array([1, 2, 3])
      const row = encodeValue('b', bytes)

      expect(row.valueType).toBe('blob')
      expect(row.value).toEqual(new Uint8Array([1, 2, 3]))
      expect(row.value).not.toBe(bytes)
    })

    it('keeps negative zero as a real', () => {
      const row = encodeValue('z', -0)

      expect(row.valueType).toBe('real')
      expect(Object.is(decodeValue(row), -0)).toBe(true)
    })

    it('keeps the empty string as text', () => {
      expect(encodeValue('e', '')).toEqual({ key: 'e', value: '', valueType: 'text' })
    })

    it.each([
      ['undefined', undefined],
      ['null', null],
      ['NaN', Number.NaN],
      ['Infinity', Number.POSITIVE_INFINITY],
      ['-Infinity', Number.NEGATIVE_INFINITY],
      ['unsafe integer', 2 ** 53],
      ['bigint', 10n],
      ['object', { nested: true }],
      ['array', [1, 2]],
      ['Date', new Date(0)],
      ['function', () => 1],
      ['symbol', Symbol('s')],
    ])('rejects %s', (_name, value) => {
      expect(() => encodeValue('key', value)).toThrow(PropertyTypeError)
    })

    it('reports the offending key and value', () => {
      try {
        encodeValue('when', Number.NaN)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(PropertyTypeError)
        if (error instanceof PropertyTypeError) {
          expect(error.key).toBe('when')
          expect(error.received).toBeNaN()
        }
      }
    })

    it('rejects empty keys', () => {
      expect(() => encodeValue('', 'x')).toThrow(PropertyTypeError)
    })
  })

  describe('encodeProperties()', () => {
    it('encodes every entry in insertion order', () => {
      expect(encodeProperties({ name: 'Ada', age: 36 })).toEqual([
        { key: 'name', value: 'Ada', valueType: 'text' },
        { key: 'age', value: 36, valueType: 'integer' },
      ])
    })

    it('fails on the first unsupported value', () => {
      expect(() => encodeProperties({ ok: 1, bad: undefined })).toThrow("Property 'bad'")
    })
  })

  describe('encodePatch()', () => {
    it('splits writes from removals', () => {
      expect(encodePatch({ name: 'Ada', old: null })).toEqual({
        set: [{ key: 'name', value: 'Ada', valueType: 'text' }],
        remove: ['old'],
      })
    })

    it('rejects the whole patch when one value is unsupported', () => {
      expect(() => encodePatch({ fine: 'yes', bad: Number.NaN })).toThrow(PropertyTypeError)
    })
  })

  // ===========================================================================
  // DECODE
  // ===========================================================================

  describe('decodeValue()', () => {
    it('inverts encodeValue for every supported type', () => {
      const values = ['text', '', 0, -17, 9007199254740991, 0.125, -1e-9, true, false]

      for (const value of values) {
        expect(decodeValue(encodeValue('k', value))).toBe(value)
      }
    })

    it('returns blobs as fresh Uint8Arrays', () => {
      const stored = new Uint8Array([9, 8, 7])
      const decoded = decodeValue({ key: 'b', value: stored, valueType: 'blob' })

      expect(decoded).toEqual(new Uint8Array([9, 8, 7]))
      expect(decoded).not.toBe(stored)
    })

    it('fails when the value does not match its tag', () => {
      expect(() => decodeValue({ key: 'k', value: 'x', valueType: 'integer' })).toThrow(StorageError)
      expect(() => decodeValue({ key: 'k', value: 2, valueType: 'boolean' })).toThrow(StorageError)
    })
  })

  describe('decodeProperties()', () => {
    it('builds a mapping from rows', () => {
      const rows = encodeProperties({ a: 'x', b: 1, c: false })

      expect(decodeProperties(rows)).toEqual({ a: 'x', b: 1, c: false })
    })

    it('builds a mapping without inherited members', () => {
      const properties = decodeProperties(encodeProperties({ a: 'x' }))

      expect(Object.getPrototypeOf(properties)).toBeNull()
      expect(ownProperty(properties, 'toString')).toBeUndefined()
    })

    it('decodes a __proto__ key as an own property', () => {
      const properties = decodeProperties([{ key: '__proto__', value: 'x', valueType: 'text' }])

      expect(Object.keys(properties)).toEqual(['__proto__'])
      expect(ownProperty(properties, '__proto__')).toBe('x')
    })
  })

  describe('parseStoredProperty()', () => {
    it('maps raw columns to a row', () => {
      expect(parseStoredProperty({ key: 'n', value: 3, value_type: 'integer' })).toEqual({
        key: 'n',
        value: 3,
        valueType: 'integer',
      })
    })

    it('rejects unknown tags', () => {
      expect(() => parseStoredProperty({ key: 'n', value: 3, value_type: 'decimal' })).toThrow(StorageError)
    })

    it('rejects a non-integer under the integer tag', () => {
      expect(() => parseStoredProperty({ key: 'n', value: 3.5, value_type: 'integer' })).toThrow(StorageError)
    })
  })

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  describe('applyPatch()', () => {
    it('writes values and removes null keys in place', () => {
      const target = { keep: 1, drop: 'x', change: true }

      applyPatch(target, { drop: null, change: false, added: 'new' })

      expect(target).toEqual({ keep: 1, change: false, added: 'new' })
    })

    it('writes __proto__ as an own key', () => {
      const target = createPropertyMap()

      applyPatch(target, { ['__proto__']: 'x' })
      expect(Object.keys(target)).toEqual(['__proto__'])

      applyPatch(target, { ['__proto__']: null })
      expect(Object.keys(target)).toEqual([])
    })
  })

  describe('cloneProperties()', () => {
    it('copies blob buffers', () => {
      const original = { bytes: new Uint8Array([1]) }
      const copy = cloneProperties(original)

      expect(copy.bytes).toEqual(original.bytes)
      expect(copy.bytes).not.toBe(original.bytes)
    })
  })
})
