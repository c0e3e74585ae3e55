/**
 * Schema Module
 *
 * Fixed relational layout and the row operations over it.
 */

export { SchemaManager } from "./manager"
export type { SchemaManagerOptions, PropertyFilter, Timestamps } from "./manager"
export type { ChangeAction, ChangeEntry, EntitySnapshot, LifecycleChange, LoggedChange, PropertyChange } from "./changes"

export {
  NodeRowSchema,
  EdgeRowSchema,
  parseRow,
} from "./rows"
export type { NodeRow, EdgeRow, NodeRecord, EdgeRecord, EdgeFilter } from "./rows"

export { SCHEMA_VERSION, SETTING_ID_HIGH_WATER, SETTING_SCHEMA_VERSION } from "./statements"
