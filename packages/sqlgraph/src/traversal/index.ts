/**
 * Traversal Module
 */

export { bfs, dfs, bfsPaths, dfsPaths, shortestPath, reachable } from "./traversal"
export type { Path, PathOptions, TraversalOptions, TraversalStep } from "./traversal"
