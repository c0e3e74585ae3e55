/**
 * SQLite Graph
 *
 * Entry points that open a Graph over a better-sqlite3 database.
 */

import { Graph, createLogger, parseOptions, resolveGraphOptions } from "sqlgraph"
import { SqliteGraphOptionsSchema, type SqliteGraphOptions } from "./config"
import { BetterSqliteDriver } from "./driver"

/**
 * Open (creating if needed) a graph database.
 *
 * @example
 * ```typescript
 * const graph = openGraph({ path: "./people.db" })
 * const ada = graph.createNode({ name: "Ada" })
 * graph.close()
 * ```
 */
export function openGraph(options: SqliteGraphOptions = {}): Graph {
  const { logger: customLogger, ...plain } = options
  const { path, readonly, timeout, verbose, ...graphOptions } = parseOptions(
    SqliteGraphOptionsSchema,
    plain,
    "sqlite graph options",
  )

  const { logLevel } = resolveGraphOptions(graphOptions)
  const logger = customLogger ?? createLogger("sqlgraph", { level: logLevel })

  const driver = new BetterSqliteDriver({ path, readonly, timeout, verbose, logger: logger.child("sqlite") })
  try {
    return new Graph(driver, { ...graphOptions, logger })
  } catch (error) {
    driver.close()
    throw error
  }
}

/**
 * Open a graph, run `work` with it and close it again, whether `work`
 * returns or throws.
 */
export function withGraph<T>(options: SqliteGraphOptions, work: (graph: Graph) => T): T {
  const graph = openGraph(options)
  try {
    return work(graph)
  } finally {
    graph.close()
  }
}
