/**
 * Configuration Specification Tests
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { LOG_LEVEL_ENV, parseOptions, resolveGraphOptions } from '../../src/config'
import { ConfigurationError } from '../../src/errors'
import { silentLogger } from '../../src/logger'

describe('Graph options', () => {
  it('defaults to no cascade, change tracking and a silent log level', () => {
    expect(resolveGraphOptions({}, {})).toEqual({
      defaultCascade: false,
      trackChanges: true,
      logLevel: 'silent',
      logger: undefined,
    })
  })

  it('takes the log level from the environment when none is given', () => {
    expect(resolveGraphOptions({}, { [LOG_LEVEL_ENV]: 'warn' }).logLevel).toBe('warn')
  })

  it('prefers the explicit log level over the environment', () => {
    expect(resolveGraphOptions({ logLevel: 'debug' }, { [LOG_LEVEL_ENV]: 'warn' }).logLevel).toBe('debug')
  })

  it('passes a custom logger through untouched', () => {
    expect(resolveGraphOptions({ logger: silentLogger }, {}).logger).toBe(silentLogger)
  })

  it('rejects an unknown log level from the environment', () => {
    expect(() => resolveGraphOptions({}, { [LOG_LEVEL_ENV]: 'loud' })).toThrow(ConfigurationError)
  })

  it('rejects wrongly typed options', () => {
    expect(() => resolveGraphOptions(JSON.parse('{"defaultCascade":"yes"}'), {})).toThrow(
      /^Invalid graph options: defaultCascade: /,
    )
  })

  it('rejects unknown keys', () => {
    expect(() => resolveGraphOptions(JSON.parse('{"cascade":true}'), {})).toThrow(ConfigurationError)
  })
})

describe('parseOptions()', () => {
  const schema = z.object({ size: z.number().int(), name: z.string() })

  it('returns the parsed value', () => {
    expect(parseOptions(schema, { size: 2, name: 'a' }, 'thing')).toEqual({ size: 2, name: 'a' })
  })

  it('collects every issue with its path', () => {
    try {
      parseOptions(schema, { size: 1.5 }, 'thing')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.issues).toHaveLength(2)
        expect(error.issues[0]).toMatch(/^size: /)
        expect(error.issues[1]).toBe('name: Required')
      }
    }
  })
})
