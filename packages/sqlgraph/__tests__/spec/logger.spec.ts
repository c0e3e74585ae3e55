/**
 * Logger Specification Tests
 */

import { describe, it, expect } from 'vitest'
import { ConsoleLogger, createLogger, silentLogger, type LogLevel } from '../../src/logger'

function capture(level: LogLevel) {
  const lines: string[] = []
  const logger = createLogger('graph', { level, sink: (_level, line) => lines.push(line) })
  return { logger, lines }
}

describe('Logger', () => {
  it('formats level, context, message and data', () => {
    const { logger, lines } = capture('debug')

    logger.info('Created node', { id: 1 })

    expect(lines).toEqual(['[info] (graph) Created node {"id":1}'])
  })

  it('drops messages below the configured level', () => {
    const { logger, lines } = capture('warn')

    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')
    logger.error('shown too')

    expect(lines).toEqual(['[warn] (graph) shown', '[error] (graph) shown too'])
  })

  it('nests contexts in children', () => {
    const { logger, lines } = capture('info')

    logger.child('schema').info('ready')

    expect(lines).toEqual(['[info] (graph:schema) ready'])
  })

  it('defaults to the info level', () => {
    const lines: string[] = []
    const logger = new ConsoleLogger('x', { sink: (_level, line) => lines.push(line) })

    logger.debug('no')
    logger.info('yes')

    expect(lines).toEqual(['[info] (x) yes'])
  })

  it('returns the shared silent logger for the silent level', () => {
    expect(createLogger('graph', { level: 'silent' })).toBe(silentLogger)
    expect(silentLogger.child('any')).toBe(silentLogger)
  })
})
