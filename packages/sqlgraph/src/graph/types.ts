/**
 * Graph Store Types
 */

import { z } from "zod"
import type { CacheStats } from "../cache"
import type { ChangeAction } from "../schema"
import type { EntityId, EntityKind, PropertyMap } from "../types"
import type { Edge, GraphEntity, Node } from "./entities"

/** A node, or the identifier of one */
export type NodeRef = Node | EntityId

/** An edge, or the identifier of one */
export type EdgeRef = Edge | EntityId

/** A node or edge, or the identifier of either */
export type EntityRef = GraphEntity | EntityId

/**
 * One adjacency entry: the connecting edge and the node at its other end.
 * For a self-loop `node` is the anchor itself.
 */
export interface Neighbor {
  edge: Edge
  node: Node
}

export interface CreateNodeOptions {
  kind?: string | null
}

export interface DeleteNodeOptions {
  /** Delete incident edges first. Defaults to the graph's `defaultCascade` */
  cascade?: boolean
}

/**
 * Filter for Graph.findEdges. Omitted fields match anything.
 */
export interface EdgeQuery {
  src?: NodeRef
  dst?: NodeRef
  label?: string | null
}

export interface FindNodesOptions {
  kind?: string
}

export interface GraphStats {
  nodes: number
  edges: number
  kinds: Array<{ kind: string | null; count: number }>
  labels: Array<{ label: string | null; count: number }>
  cache: CacheStats
  /** Entries in the change log */
  changes: number
  schemaVersion: number | undefined
}

/**
 * One change reversed by Graph.undo. `action` is the change as it was
 * originally made.
 */
export interface UndoneChange {
  action: ChangeAction
  entityKind: EntityKind
  id: EntityId
}

// =============================================================================
// EXPORT FORMAT
// =============================================================================

const ExportIdSchema = z.number().int().positive().safe()

const ExportValueSchema = z.union([z.string(), z.number(), z.boolean(), z.instanceof(Uint8Array)])

// z.record drops a "__proto__" key, which is a legal property name here
const ExportPropertiesSchema = z
  .custom<Record<string, unknown>>(
    (value) => typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array),
    "Expected a property map",
  )
  .superRefine((properties, ctx) => {
    for (const [key, value] of Object.entries(properties)) {
      if (!ExportValueSchema.safeParse(value).success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `Unsupported value for property '${key}'` })
      }
    }
  })

export const GraphExportSchema = z.object({
  version: z.literal(1),
  nodes: z.array(
    z.object({
      id: ExportIdSchema,
      kind: z.string().nullable().default(null),
      properties: ExportPropertiesSchema.default({}),
    }),
  ),
  edges: z.array(
    z.object({
      id: ExportIdSchema,
      src: ExportIdSchema,
      dst: ExportIdSchema,
      label: z.string().nullable().default(null),
      properties: ExportPropertiesSchema.default({}),
    }),
  ),
})

/**
 * Whole-graph dump with identifiers preserved.
 */
export interface GraphExport {
  version: 1
  nodes: Array<{ id: EntityId; kind: string | null; properties: PropertyMap }>
  edges: Array<{ id: EntityId; src: EntityId; dst: EntityId; label: string | null; properties: PropertyMap }>
}

export interface ImportResult {
  nodes: number
  edges: number
}
