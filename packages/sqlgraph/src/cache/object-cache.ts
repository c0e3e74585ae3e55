/**
 * Object Cache
 *
 * Identity map from entity identifier to the one live object that
 * represents it. Rows stay authoritative; the cache only guarantees that
 * every lookup of an identifier yields the same instance, so in-place
 * mutation is visible to every holder.
 */

import { GraphError } from "../errors"
import type { EntityId, EntityKind } from "../types"

/**
 * Anything the cache can hold.
 */
export interface Identified {
  readonly id: EntityId
  readonly entityKind: EntityKind
}

/**
 * Counters for observing cache effectiveness.
 */
export interface CacheStats {
  size: number
  hits: number
  misses: number
  loads: number
  evictions: number
}

export class ObjectCache<T extends Identified> {
  private readonly entries = new Map<EntityId, T>()
  private hits = 0
  private misses = 0
  private loads = 0
  private evictions = 0

  /**
   * Return the live instance for `id`, loading and registering it on a miss.
   * Returns undefined when nothing exists, or when the cached instance fails
   * `is` (the identifier belongs to the other entity kind).
   */
  getOrLoad<U extends T>(id: EntityId, is: (entity: T) => entity is U, load: () => U | undefined): U | undefined {
    const cached = this.entries.get(id)
    if (cached !== undefined) {
      this.hits++
      return is(cached) ? cached : undefined
    }

    this.misses++
    const loaded = load()
    if (loaded === undefined) return undefined

    this.loads++
    this.entries.set(id, loaded)
    return loaded
  }

  /**
   * Cached instance, without loading.
   */
  peek(id: EntityId): T | undefined {
    return this.entries.get(id)
  }

  has(id: EntityId): boolean {
    return this.entries.has(id)
  }

  /**
   * Register a freshly materialized instance. Registering a second,
   * different instance under the same identifier is a bug.
   */
  register(entity: T): void {
    const existing = this.entries.get(entity.id)
    if (existing !== undefined && existing !== entity) {
      throw new GraphError(`Object cache already holds a different instance for ${entity.entityKind} ${entity.id}`)
    }
    this.entries.set(entity.id, entity)
  }

  /**
   * Remove an entry. Returns the evicted instance, if any.
   */
  evict(id: EntityId): T | undefined {
    const entity = this.entries.get(id)
    if (entity !== undefined) {
      this.entries.delete(id)
      this.evictions++
    }
    return entity
  }

  /**
   * Drop every entry. Returns the instances that were held.
   */
  invalidateAll(): T[] {
    const dropped = Array.from(this.entries.values())
    this.evictions += dropped.length
    this.entries.clear()
    return dropped
  }

  get size(): number {
    return this.entries.size
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      loads: this.loads,
      evictions: this.evictions,
    }
  }
}
