/**
 * SQLite Graph Configuration
 */

import { z } from "zod"
import { GraphOptionsSchema, type Logger } from "sqlgraph"

/**
 * Options for openGraph: the core graph options plus the connection.
 */
export const SqliteGraphOptionsSchema = GraphOptionsSchema.extend({
  /** Database file, or ":memory:" for a private in-memory database */
  path: z.string().min(1).default(":memory:"),
  /** Open without write access. The schema must already exist */
  readonly: z.boolean().default(false),
  /** Milliseconds to wait on a locked database */
  timeout: z.number().int().nonnegative().default(5000),
  /** Log every statement at debug level */
  verbose: z.boolean().default(false),
})

export type SqliteGraphOptionsInput = z.input<typeof SqliteGraphOptionsSchema>

export interface SqliteGraphOptions extends SqliteGraphOptionsInput {
  logger?: Logger
}
