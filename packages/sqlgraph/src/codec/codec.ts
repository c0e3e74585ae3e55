/**
 * Property Codec
 *
 * Converts property mappings to and from the flat rows of the
 * `properties` table. Every supported value survives a round trip
 * unchanged (`-0` included); everything else is rejected at encode time.
 *
 * Decoded mappings have no prototype, so any non-empty string is a usable
 * key and absent keys never resolve to inherited members.
 */

import { z } from "zod"
import { PropertyTypeError, StorageError } from "../errors"
import type { SqlValue } from "../driver"
import type { PropertyMap, PropertyPatch, PropertyValue } from "../types"

// =============================================================================
// ROW TYPES
// =============================================================================

/**
 * Storage tag kept beside each value so the exact JS type comes back.
 */
export type ValueType = "text" | "integer" | "real" | "boolean" | "blob"

export const VALUE_TYPES: readonly ValueType[] = ["text", "integer", "real", "boolean", "blob"]

/**
 * One property as stored: key, column value and type tag.
 */
export interface PropertyRow {
  key: string
  value: SqlValue
  valueType: ValueType
}

/**
 * Raw property columns read back from the store.
 */
const StoredPropertySchema = z.discriminatedUnion("value_type", [
  z.object({ key: z.string().min(1), value_type: z.literal("text"), value: z.string() }),
  z.object({ key: z.string().min(1), value_type: z.literal("integer"), value: z.number().int() }),
  z.object({ key: z.string().min(1), value_type: z.literal("real"), value: z.number() }),
  z.object({ key: z.string().min(1), value_type: z.literal("boolean"), value: z.union([z.literal(0), z.literal(1)]) }),
  z.object({ key: z.string().min(1), value_type: z.literal("blob"), value: z.instanceof(Uint8Array) }),
])

// =============================================================================
// ENCODE
// =============================================================================

/**
 * Check a property key.
 */
export function assertPropertyKey(key: unknown): asserts key is string {
  if (typeof key !== "string" || key.length === 0) {
    throw new PropertyTypeError(`Property keys must be non-empty strings, got ${describe(key)}`, undefined, key)
  }
}

/**
 * Encode a single value, or throw PropertyTypeError.
 */
export function encodeValue(key: string, value: unknown): PropertyRow {
  assertPropertyKey(key)

  switch (typeof value) {
    case "string":
      return { key, value, valueType: "text" }

    case "boolean":
      return { key, value: value ? 1 : 0, valueType: "boolean" }

    case "number": {
      if (!Number.isFinite(value)) {
        throw new PropertyTypeError(`Property '${key}' must be a finite number, got ${value}`, key, value)
      }
      if (Number.isInteger(value)) {
        if (!Number.isSafeInteger(value)) {
          throw new PropertyTypeError(`Property '${key}' is outside the safe integer range`, key, value)
        }
        // -0 is not an integer to SQLite
        if (Object.is(value, -0)) return { key, value, valueType: "real" }
        return { key, value, valueType: "integer" }
      }
      return { key, value, valueType: "real" }
    }

    case "object":
      if (value instanceof Uint8Array) {
        return { key, value: Uint8Array.from(value), valueType: "blob" }
      }
      break
  }

  throw new PropertyTypeError(
    `Property '${key}' has unsupported type ${describe(value)}; expected string, number, boolean or Uint8Array`,
    key,
    value,
  )
}

/**
 * Encode a whole property mapping.
 */
export function encodeProperties(properties: Readonly<Record<string, unknown>>): PropertyRow[] {
  return Object.entries(properties).map(([key, value]) => encodeValue(key, value))
}

/**
 * Split a merge patch into rows to write and keys to remove.
 * Every value is validated before anything is returned, so a bad patch
 * is rejected as a whole.
 */
export function encodePatch(patch: Readonly<Record<string, unknown>>): { set: PropertyRow[]; remove: string[] } {
  const set: PropertyRow[] = []
  const remove: string[] = []

  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      assertPropertyKey(key)
      remove.push(key)
    } else {
      set.push(encodeValue(key, value))
    }
  }

  return { set, remove }
}

// =============================================================================
// DECODE
// =============================================================================

/**
 * Decode a row back into its value.
 */
export function decodeValue(row: PropertyRow): PropertyValue {
  switch (row.valueType) {
    case "text":
      if (typeof row.value === "string") return row.value
      break
    case "integer":
    case "real":
      if (typeof row.value === "number") return row.value
      break
    case "boolean":
      if (row.value === 0 || row.value === 1) return row.value === 1
      break
    case "blob":
      if (row.value instanceof Uint8Array) return Uint8Array.from(row.value)
      break
  }

  throw new StorageError(`Stored property '${row.key}' does not match its type tag '${row.valueType}'`)
}

/**
 * Decode a list of rows into a property mapping.
 */
export function decodeProperties(rows: readonly PropertyRow[]): PropertyMap {
  const properties = createPropertyMap()
  for (const row of rows) {
    properties[row.key] = decodeValue(row)
  }
  return properties
}

/**
 * Validate a raw `properties` row read from the store.
 */
export function parseStoredProperty(raw: unknown): PropertyRow {
  const result = StoredPropertySchema.safeParse(raw)
  if (!result.success) {
    throw new StorageError(`Malformed property row: ${result.error.issues.map((i) => i.message).join("; ")}`)
  }
  const { key, value, value_type } = result.data
  return { key, value, valueType: value_type }
}

/**
 * An empty, prototype-free property mapping.
 */
export function createPropertyMap(): PropertyMap {
  const properties: PropertyMap = Object.create(null)
  return properties
}

/**
 * An empty, prototype-free merge patch.
 */
export function createPropertyPatch(): PropertyPatch {
  const patch: PropertyPatch = Object.create(null)
  return patch
}

/**
 * Whether two property values are the same, comparing blobs by content.
 */
export function sameValue(a: PropertyValue | undefined, b: PropertyValue | undefined): boolean {
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((byte, index) => byte === b[index])
  }
  return Object.is(a, b)
}

/**
 * Own value of `key`, ignoring anything inherited.
 */
export function ownProperty(properties: Readonly<PropertyMap>, key: string): PropertyValue | undefined {
  return Object.prototype.hasOwnProperty.call(properties, key) ? properties[key] : undefined
}

/**
 * Apply a merge patch to a mapping in place.
 */
export function applyPatch(target: PropertyMap, patch: Readonly<PropertyPatch>): void {
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete target[key]
    } else {
      Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true })
    }
  }
}

/**
 * Copy a property mapping, duplicating blob buffers.
 */
export function cloneProperties(properties: Readonly<PropertyMap>): PropertyMap {
  const copy = createPropertyMap()
  for (const [key, value] of Object.entries(properties)) {
    copy[key] = value instanceof Uint8Array ? Uint8Array.from(value) : value
  }
  return copy
}

function describe(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (value instanceof Date) return "Date"
  return typeof value
}
