/**
 * Object Cache Specification Tests
 */

import { describe, it, expect, vi } from 'vitest'
import { ObjectCache, type Identified } from '../../src/cache'
import { GraphError } from '../../src/errors'

interface Item extends Identified {
  name: string
}

const nodeItem = (id: number, name = `n${id}`): Item => ({ id, entityKind: 'node', name })
const edgeItem = (id: number): Item => ({ id, entityKind: 'edge', name: `e${id}` })

type NodeItem = Item & { entityKind: 'node' }
const isNodeItem = (item: Item): item is NodeItem => item.entityKind === 'node'

describe('ObjectCache', () => {
  it('loads once and returns the same instance afterwards', () => {
    const cache = new ObjectCache<Item>()
    const load = vi.fn(() => nodeItem(1))

    const first = cache.getOrLoad(1, isNodeItem, () => {
      const item = load()
      return isNodeItem(item) ? item : undefined
    })
    const second = cache.getOrLoad(1, isNodeItem, () => undefined)

    expect(first).toBeDefined()
    expect(second).toBe(first)
    expect(load).toHaveBeenCalledTimes(1)
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 1, loads: 1, evictions: 0 })
  })

  it('does not register misses that load nothing', () => {
    const cache = new ObjectCache<Item>()

    expect(cache.getOrLoad(5, isNodeItem, () => undefined)).toBeUndefined()
    expect(cache.has(5)).toBe(false)
  })

  it('returns undefined when the cached entry is of the other kind', () => {
    const cache = new ObjectCache<Item>()
    cache.register(edgeItem(3))

    expect(cache.getOrLoad(3, isNodeItem, () => undefined)).toBeUndefined()
    expect(cache.peek(3)?.entityKind).toBe('edge')
  })

  it('refuses a second instance for the same id', () => {
    const cache = new ObjectCache<Item>()
    const item = nodeItem(1)
    cache.register(item)

    expect(() => cache.register(item)).not.toThrow()
    expect(() => cache.register(nodeItem(1, 'other'))).toThrow(GraphError)
  })

  it('evicts single entries', () => {
    const cache = new ObjectCache<Item>()
    const item = nodeItem(2)
    cache.register(item)

    expect(cache.evict(2)).toBe(item)
    expect(cache.evict(2)).toBeUndefined()
    expect(cache.size).toBe(0)
    expect(cache.stats().evictions).toBe(1)
  })

  it('drops everything on invalidateAll and hands back what it held', () => {
    const cache = new ObjectCache<Item>()
    cache.register(nodeItem(1))
    cache.register(edgeItem(2))

    const dropped = cache.invalidateAll()

    expect(dropped.map((item) => item.id)).toEqual([1, 2])
    expect(cache.size).toBe(0)
  })
})
