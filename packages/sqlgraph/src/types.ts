/**
 * Core Type Definitions
 *
 * Types shared by every layer of the engine.
 */

/**
 * Identifier of a node or edge. Positive safe integer, drawn from one
 * sequence shared by both kinds.
 */
export type EntityId = number

export type EntityKind = "node" | "edge"

/**
 * A value the property codec can store and read back unchanged.
 */
export type PropertyValue = string | number | boolean | Uint8Array

/**
 * Flat property mapping attached to a node or edge.
 */
export type PropertyMap = Record<string, PropertyValue>

/**
 * Merge patch: keys set to `null` are removed, other keys are written,
 * keys not mentioned are left untouched.
 */
export type PropertyPatch = Record<string, PropertyValue | null>

/**
 * Direction of an adjacency query relative to the anchor node.
 */
export type Direction = "outgoing" | "incoming" | "both"

/**
 * A value that survives a JSON round trip. Used by the settings store.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }
