/**
 * Atomicity Tests
 *
 * Storage failures in the middle of multi-row operations must leave both
 * the database and the object cache as they were.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { Graph, StorageError } from 'sqlgraph'
import { FaultyDriver } from './fixtures/faulty-driver'
import { MemoryLogger } from './fixtures/memory-logger'

describe('Atomicity', () => {
  let driver: FaultyDriver
  let logger: MemoryLogger
  let graph: Graph

  beforeEach(() => {
    driver = new FaultyDriver()
    logger = new MemoryLogger()
    graph = new Graph(driver, { logger })
  })

  afterEach(() => {
    graph.close()
  })

  it('undoes a cascade delete that fails halfway', () => {
    const hub = graph.createNode({ name: 'hub' })
    const left = graph.createNode()
    const right = graph.createNode()
    const edges = [graph.createEdge(hub, left), graph.createEdge(hub, right), graph.createEdge(right, hub)]

    driver.failOn('DELETE FROM edges', 2)

    expect(() => graph.deleteNode(hub, { cascade: true })).toThrow(StorageError)

    expect(hub.isDeleted).toBe(false)
    expect(graph.getNode(hub.id)).toBe(hub)
    for (const edge of edges) {
      expect(edge.isDeleted).toBe(false)
      expect(graph.getEdge(edge.id)).toBe(edge)
    }
    expect(graph.edgesOf(hub)).toEqual(edges)
    expect(graph.stats()).toMatchObject({ nodes: 3, edges: 3 })
  })

  it('keeps properties when a multi-key update fails', () => {
    const node = graph.createNode({ a: 0 })
    driver.failOn('INSERT INTO properties', 2)

    expect(() => node.update({ a: 1, b: 2 })).toThrow(StorageError)

    expect(node.properties).toEqual({ a: 0 })
    graph.invalidateCache()
    expect(graph.getNode(node.id).properties).toEqual({ a: 0 })
  })

  it('leaves no trace of an edge whose insert fails', () => {
    const a = graph.createNode()
    const b = graph.createNode()
    const cached = graph.stats().cache.size
    driver.failOn('INSERT INTO edges')

    expect(() => graph.createEdge(a, b, 'x', { w: 1 })).toThrow(StorageError)

    expect(graph.findEdges()).toEqual([])
    expect(graph.stats().cache.size).toBe(cached)
  })

  it('drops entities created before a failing property write', () => {
    driver.failOn('INSERT INTO properties', 2)

    expect(() => graph.createNode({ first: 1, second: 2 })).toThrow(StorageError)

    expect(graph.nodes()).toEqual([])
    expect(graph.stats().cache.size).toBe(0)
  })

  it('logs the rollback and the failing statement', () => {
    const node = graph.createNode()
    driver.failOn('DELETE FROM nodes')

    expect(() => node.delete()).toThrow('Storage operation failed: injected fault')

    expect(logger.messages('error')).toEqual(['Storage operation failed'])
    expect(logger.messages('warn')).toContain('Transaction rolled back')
    expect(node.isDeleted).toBe(false)
  })
})
