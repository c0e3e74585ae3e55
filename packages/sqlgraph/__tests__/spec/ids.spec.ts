/**
 * Identity Allocator Specification Tests
 */

import { describe, it, expect } from 'vitest'
import { IdAllocator, assertEntityId, isEntityId, type IdWatermarkStore } from '../../src/ids'
import { NotFoundError } from '../../src/errors'

class MemoryWatermarks implements IdWatermarkStore {
  highWater = 0
  recorded: number[] = []

  constructor(private readonly live: number = 0) {}

  maxPersistedId(): number {
    return Math.max(this.live, this.highWater)
  }

  recordHighWater(id: number): void {
    this.recorded.push(id)
    this.highWater = Math.max(this.highWater, id)
  }
}

describe('IdAllocator', () => {
  it('starts at 1 on an empty store', () => {
    const allocator = new IdAllocator(new MemoryWatermarks())

    expect(allocator.allocate()).toBe(1)
    expect(allocator.allocate()).toBe(2)
  })

  it('resumes after the largest persisted id', () => {
    const allocator = new IdAllocator(new MemoryWatermarks(41))

    expect(allocator.peek()).toBe(42)
    expect(allocator.allocate()).toBe(42)
  })

  it('resumes after retired ids even when no row holds them', () => {
    const store = new MemoryWatermarks(3)
    const first = new IdAllocator(store)
    const ids = [first.allocate(), first.allocate()]
    first.retire(ids[1])

    const reopened = new IdAllocator(store)

    expect(ids).toEqual([4, 5])
    expect(store.recorded).toEqual([5])
    expect(reopened.allocate()).toBe(6)
  })

  it('never moves backwards when observing smaller ids', () => {
    const allocator = new IdAllocator(new MemoryWatermarks(10))

    allocator.observe(3)
    expect(allocator.peek()).toBe(11)

    allocator.observe(20)
    expect(allocator.allocate()).toBe(21)
  })
})

describe('isEntityId()', () => {
  it('accepts positive safe integers', () => {
    expect(isEntityId(1)).toBe(true)
    expect(isEntityId(Number.MAX_SAFE_INTEGER)).toBe(true)
  })

  it.each([0, -1, 1.5, Number.NaN, 2 ** 53, '1', null, undefined, 1n])('rejects %s', (value) => {
    expect(isEntityId(value)).toBe(false)
  })
})

describe('assertEntityId()', () => {
  it('reports malformed ids as not found', () => {
    expect(() => assertEntityId(-4, 'node')).toThrow(NotFoundError)
    expect(() => assertEntityId('abc', 'edge')).toThrow('Edge not found with id abc')
  })

  it('passes valid ids through', () => {
    expect(() => assertEntityId(7)).not.toThrow()
  })
})
