/**
 * sqlgraph - Embedded property graph stored in a relational schema
 *
 * Nodes and edges carry flat, dynamically typed property maps and are
 * persisted as rows through a synchronous SQL driver. Lookups, adjacency
 * and traversals run on indexed relational queries.
 *
 * @example
 * ```typescript
 * import { openGraph } from "sqlgraph-sqlite";
 *
 * const graph = openGraph({ path: ":memory:" });
 *
 * const ada = graph.createNode({ name: "Ada" }, { kind: "person" });
 * const paper = graph.createNode({ title: "Notes" }, { kind: "document" });
 * graph.createEdge(ada, paper, "wrote", { year: 1843 });
 *
 * for (const node of graph.bfs(ada)) {
 *   console.log(node.toString());
 * }
 *
 * graph.close();
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPH STORE
// =============================================================================

export { Graph, GraphEntity, Node, Edge, isNode, isEdge, GraphExportSchema } from "./graph"
export type {
  NodeRef,
  EdgeRef,
  EntityRef,
  Neighbor,
  CreateNodeOptions,
  DeleteNodeOptions,
  EdgeQuery,
  FindNodesOptions,
  GraphStats,
  GraphExport,
  ImportResult,
  UndoneChange,
} from "./graph"

// =============================================================================
// TRAVERSAL
// =============================================================================

export { bfs, dfs, bfsPaths, dfsPaths, shortestPath, reachable } from "./traversal"
export type { Path, PathOptions, TraversalOptions, TraversalStep } from "./traversal"

// =============================================================================
// BUILDING BLOCKS
// =============================================================================

export { SchemaManager, SCHEMA_VERSION } from "./schema"
export type {
  SchemaManagerOptions,
  PropertyFilter,
  Timestamps,
  NodeRow,
  EdgeRow,
  NodeRecord,
  EdgeRecord,
  EdgeFilter,
  ChangeAction,
  ChangeEntry,
  EntitySnapshot,
  LifecycleChange,
  LoggedChange,
  PropertyChange,
} from "./schema"

export { ObjectCache } from "./cache"
export type { CacheStats, Identified } from "./cache"

export { IdAllocator, isEntityId, assertEntityId } from "./ids"
export type { IdGenerator, IdWatermarkStore } from "./ids"

export {
  VALUE_TYPES,
  encodeValue,
  encodeProperties,
  encodePatch,
  decodeValue,
  decodeProperties,
  createPropertyMap,
} from "./codec"
export type { PropertyRow, ValueType } from "./codec"

// =============================================================================
// DRIVER CONTRACT
// =============================================================================

export type { SqlDriverProvider, SqlDriverFactory, SqlValue, SqlRow, RunResult } from "./driver"

// =============================================================================
// CONFIGURATION & LOGGING
// =============================================================================

export { GraphOptionsSchema, LogLevelSchema, LOG_LEVEL_ENV, parseOptions, resolveGraphOptions } from "./config"
export type { GraphOptions, GraphOptionsInput, ResolvedGraphOptions } from "./config"

export { ConsoleLogger, createLogger, silentLogger } from "./logger"
export type { Logger, LoggerOptions, LogLevel, LogData, LogSink } from "./logger"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphError,
  NotFoundError,
  DanglingReferenceError,
  ReferentialIntegrityError,
  PropertyTypeError,
  StorageError,
  StaleEntityError,
  GraphClosedError,
  ConfigurationError,
  toError,
} from "./errors"

// =============================================================================
// TYPES
// =============================================================================

export type { EntityId, EntityKind, PropertyValue, PropertyMap, PropertyPatch, Direction, JsonValue } from "./types"
