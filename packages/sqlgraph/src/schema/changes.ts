/**
 * Change Log Types
 *
 * Every mutation made through a Graph is logged as one entry. Entries
 * written by the same outermost transaction share a batch, and undo
 * reverses a whole batch at a time.
 */

import type { EntityId, EntityKind, PropertyPatch } from "../types"
import type { EdgeRecord, NodeRecord } from "./rows"

export type ChangeAction = "create" | "delete" | "update"

/**
 * Full state of a node or edge at the time it was created or deleted.
 */
export type EntitySnapshot = ({ entityKind: "node" } & NodeRecord) | ({ entityKind: "edge" } & EdgeRecord)

/**
 * A created or deleted entity.
 */
export interface LifecycleChange {
  action: "create" | "delete"
  entity: EntitySnapshot
}

/**
 * Property edits on one entity. `before` and `after` hold the changed keys
 * only, with `null` for an absent key.
 */
export interface PropertyChange {
  action: "update"
  entityKind: EntityKind
  id: EntityId
  before: PropertyPatch
  after: PropertyPatch
  /** `updatedAt` of the entity before the edit */
  previousUpdatedAt: number
}

export type ChangeEntry = LifecycleChange | PropertyChange

/**
 * A change as read back from the log.
 */
export type LoggedChange = ChangeEntry & {
  changeId: number
  batch: number
  recordedAt: number
}
