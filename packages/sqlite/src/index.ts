/**
 * sqlgraph-sqlite
 *
 * SQLite storage for sqlgraph through better-sqlite3.
 *
 * @example
 * ```typescript
 * import { withGraph } from 'sqlgraph-sqlite';
 *
 * const path = withGraph({ path: './family.db' }, (graph) => {
 *   const parent = graph.createNode({ name: 'Grace' }, { kind: 'person' });
 *   const child = graph.createNode({ name: 'Alan' }, { kind: 'person' });
 *   graph.createEdge(parent, child, 'parent_of');
 *   return graph.shortestPath(parent, child);
 * });
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { openGraph, withGraph } from "./graph"
export { SqliteGraphOptionsSchema } from "./config"
export type { SqliteGraphOptions, SqliteGraphOptionsInput } from "./config"

// =============================================================================
// DRIVER (for advanced use cases)
// =============================================================================

export { BetterSqliteDriver, createSqliteDriver } from "./driver"
export type { BetterSqliteDriverOptions } from "./driver"
