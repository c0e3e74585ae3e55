/**
 * Graph Module
 */

export { Graph } from "./graph"
export { GraphEntity, Node, Edge, isNode, isEdge } from "./entities"
export { GraphExportSchema } from "./types"
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
} from "./types"
