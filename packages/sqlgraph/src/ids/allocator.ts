/**
 * Identity Allocator
 *
 * Hands out entity identifiers from a single sequence shared by nodes and
 * edges. The sequence resumes after the largest identifier ever persisted,
 * including ones whose entities were since deleted, so identifiers are
 * never reissued within a database's lifetime.
 */

import { NotFoundError } from "../errors"
import type { EntityId, EntityKind } from "../types"

/**
 * Persistence needed by the allocator.
 */
export interface IdWatermarkStore {
  /** Largest identifier in use or retired, 0 for an empty database */
  maxPersistedId(): EntityId
  /** Remember that `id` has been used, even after its rows are gone */
  recordHighWater(id: EntityId): void
}

/**
 * Generates entity identifiers.
 */
export interface IdGenerator {
  allocate(): EntityId
}

export class IdAllocator implements IdGenerator {
  private next: EntityId

  constructor(private readonly store: IdWatermarkStore) {
    this.next = store.maxPersistedId() + 1
  }

  /**
   * Allocate the next identifier. The counter never moves backwards, even
   * when the transaction that used an identifier rolls back.
   */
  allocate(): EntityId {
    const id = this.next
    this.next += 1
    return id
  }

  /**
   * Mark an identifier as permanently used. Called when its entity is
   * deleted.
   */
  retire(id: EntityId): void {
    this.store.recordHighWater(id)
  }

  /**
   * Make sure identifiers written from outside the allocator (imports) are
   * never handed out again.
   */
  observe(id: EntityId): void {
    if (id >= this.next) {
      this.next = id + 1
    }
  }

  /** The identifier the next allocate() call returns */
  peek(): EntityId {
    return this.next
  }
}

/**
 * Whether a value is a well-formed entity identifier.
 */
export function isEntityId(value: unknown): value is EntityId {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0
}

/**
 * Narrow a caller-supplied identifier. A malformed identifier can never
 * name an entity, so it is reported as not found.
 */
export function assertEntityId(value: unknown, kind?: EntityKind): asserts value is EntityId {
  if (!isEntityId(value)) {
    throw new NotFoundError(kind, value)
  }
}
