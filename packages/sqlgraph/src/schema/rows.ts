/**
 * Row Types
 *
 * Shapes of the rows read from the fixed tables, validated with zod as
 * they leave the driver.
 */

import { z } from "zod"
import { StorageError } from "../errors"
import type { EntityId, PropertyMap } from "../types"

const IdSchema = z.number().int().positive()

export const NodeRowSchema = z
  .object({
    id: IdSchema,
    kind: z.string().nullable(),
    created_at: z.number(),
    updated_at: z.number(),
  })
  .transform((row) => ({
    id: row.id,
    kind: row.kind,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }))

export const EdgeRowSchema = z
  .object({
    id: IdSchema,
    src: IdSchema,
    dst: IdSchema,
    label: z.string().nullable(),
    created_at: z.number(),
    updated_at: z.number(),
  })
  .transform((row) => ({
    id: row.id,
    src: row.src,
    dst: row.dst,
    label: row.label,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }))

export const ChangeRowSchema = z
  .object({
    id: IdSchema,
    batch: IdSchema,
    action: z.enum(["create", "delete", "update"]),
    entity_id: IdSchema,
    entity_kind: z.enum(["node", "edge"]),
    name: z.string().nullable(),
    src: IdSchema.nullable(),
    dst: IdSchema.nullable(),
    created_at: z.number().nullable(),
    updated_at: z.number(),
    recorded_at: z.number(),
  })
  .transform((row) => ({
    changeId: row.id,
    batch: row.batch,
    action: row.action,
    id: row.entity_id,
    entityKind: row.entity_kind,
    name: row.name,
    src: row.src,
    dst: row.dst,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    recordedAt: row.recorded_at,
  }))

export const ChangeValueRowSchema = z.object({
  side: z.enum(["before", "after"]),
  key: z.string().min(1),
  value: z.unknown(),
  value_type: z.string().nullable(),
})

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() })

export const GroupCountRowSchema = z.object({ name: z.string().nullable(), count: z.number().int().nonnegative() })

export const MaxIdRowSchema = z.object({ id: z.number().int().nonnegative() })

export const SettingRowSchema = z.object({ value: z.string() })

/**
 * A row of the `nodes` table.
 */
export type NodeRow = z.output<typeof NodeRowSchema>

/**
 * A row of the `edges` table.
 */
export type EdgeRow = z.output<typeof EdgeRowSchema>

/**
 * A row of the `changes` table.
 */
export type ChangeRow = z.output<typeof ChangeRowSchema>

/**
 * A node row together with its decoded properties.
 */
export interface NodeRecord extends NodeRow {
  properties: PropertyMap
}

/**
 * An edge row together with its decoded properties.
 */
export interface EdgeRecord extends EdgeRow {
  properties: PropertyMap
}

/**
 * Filter for the adjacency primitive. Omitted fields match anything;
 * `label: null` matches unlabeled edges only.
 */
export interface EdgeFilter {
  src?: EntityId
  dst?: EntityId
  label?: string | null
}

/**
 * Parse a raw row or fail with StorageError.
 */
export function parseRow<S extends z.ZodTypeAny>(schema: S, raw: unknown, table: string): z.output<S> {
  const result = schema.safeParse(raw)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "row"}: ${issue.message}`)
      .join("; ")
    throw new StorageError(`Malformed ${table} row: ${details}`)
  }
  return result.data
}
