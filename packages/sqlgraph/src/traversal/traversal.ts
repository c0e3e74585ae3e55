/**
 * Traversal Engine
 *
 * Breadth- and depth-first walks plus unweighted shortest paths, built on
 * Graph.neighbors alone. Every walk is a lazy generator with its own
 * visited set: calling again starts over, and abandoning one early leaves
 * nothing behind.
 */

import type { Edge, Graph, Node, NodeRef } from "../graph"
import type { Direction, EntityId } from "../types"

/**
 * Nodes and edges from the start of a walk to its current node.
 * `nodes` always has one more entry than `edges`.
 */
export interface Path {
  nodes: Node[]
  edges: Edge[]
  /** Number of edges */
  length: number
}

export interface TraversalStep {
  node: Node
  path: Path
  depth: number
}

export interface TraversalOptions {
  /** Which edges to follow. Defaults to outgoing */
  direction?: Direction
  /** Only follow edges with this label; `null` follows unlabeled edges */
  label?: string | null
  /**
   * Called for each node before it is yielded, start node included.
   * Returning false skips the node and everything only reachable through
   * it. A skipped node still counts as visited.
   */
  visit?: (step: TraversalStep) => boolean
  /** Do not expand nodes at this depth */
  maxDepth?: number
}

export type PathOptions = Omit<TraversalOptions, "visit">

/**
 * Breadth-first walk yielding a step per reachable node.
 */
export function* bfsPaths(graph: Graph, start: NodeRef, options: TraversalOptions = {}): Generator<TraversalStep> {
  const { direction = "outgoing", label, visit, maxDepth = Infinity } = options
  const first = origin(graph, start)

  const visited = new Set<EntityId>([first.node.id])
  const queue: TraversalStep[] = [first]

  for (let head = 0; head < queue.length; head++) {
    const step = queue[head]
    if (visit && !visit(step)) continue
    yield step
    if (step.depth >= maxDepth) continue

    for (const { edge, node } of graph.neighbors(step.node, direction, label)) {
      if (visited.has(node.id)) continue
      visited.add(node.id)
      queue.push(extend(step, edge, node))
    }
  }
}

/**
 * Depth-first (preorder) walk yielding a step per reachable node.
 * Neighbors are explored in Graph.neighbors order.
 */
export function* dfsPaths(graph: Graph, start: NodeRef, options: TraversalOptions = {}): Generator<TraversalStep> {
  const { direction = "outgoing", label, visit, maxDepth = Infinity } = options

  const visited = new Set<EntityId>()
  const stack: TraversalStep[] = [origin(graph, start)]

  let step: TraversalStep | undefined
  while ((step = stack.pop()) !== undefined) {
    if (visited.has(step.node.id)) continue
    visited.add(step.node.id)

    if (visit && !visit(step)) continue
    yield step
    if (step.depth >= maxDepth) continue

    const next = graph.neighbors(step.node, direction, label)
    // reversed so the first neighbor is popped first
    for (let i = next.length - 1; i >= 0; i--) {
      const { edge, node } = next[i]
      if (!visited.has(node.id)) stack.push(extend(step, edge, node))
    }
  }
}

export function* bfs(graph: Graph, start: NodeRef, options: TraversalOptions = {}): Generator<Node> {
  for (const step of bfsPaths(graph, start, options)) yield step.node
}

export function* dfs(graph: Graph, start: NodeRef, options: TraversalOptions = {}): Generator<Node> {
  for (const step of dfsPaths(graph, start, options)) yield step.node
}

/**
 * Fewest-edges path from `from` to `to`, or null when unreachable.
 *
 * Among equally short paths the one discovered first wins: neighbors are
 * expanded in edge identifier order, so the result depends on creation
 * order rather than on any property of the paths themselves.
 */
export function shortestPath(graph: Graph, from: NodeRef, to: NodeRef, options: PathOptions = {}): Path | null {
  const { direction = "outgoing", label, maxDepth = Infinity } = options
  const source = graph.getNode(refId(from))
  const target = graph.getNode(refId(to))

  if (source.id === target.id) {
    return { nodes: [source], edges: [], length: 0 }
  }

  const parents = new Map<EntityId, { edge: Edge; node: Node }>()
  const visited = new Set<EntityId>([source.id])
  let frontier: Node[] = [source]

  for (let depth = 0; frontier.length > 0 && depth < maxDepth; depth++) {
    const next: Node[] = []

    for (const current of frontier) {
      for (const { edge, node } of graph.neighbors(current, direction, label)) {
        if (visited.has(node.id)) continue
        visited.add(node.id)
        parents.set(node.id, { edge, node: current })

        if (node.id === target.id) {
          return unwind(parents, source, target)
        }
        next.push(node)
      }
    }

    frontier = next
  }

  return null
}

/**
 * Whether any path leads from `from` to `to`.
 */
export function reachable(graph: Graph, from: NodeRef, to: NodeRef, options: PathOptions = {}): boolean {
  return shortestPath(graph, from, to, options) !== null
}

// =============================================================================
// HELPERS
// =============================================================================

function refId(ref: NodeRef): EntityId {
  return typeof ref === "number" ? ref : ref.id
}

function origin(graph: Graph, start: NodeRef): TraversalStep {
  const node = graph.getNode(refId(start))
  return { node, path: { nodes: [node], edges: [], length: 0 }, depth: 0 }
}

function extend(step: TraversalStep, edge: Edge, node: Node): TraversalStep {
  const nodes = [...step.path.nodes, node]
  const edges = [...step.path.edges, edge]
  return { node, path: { nodes, edges, length: edges.length }, depth: step.depth + 1 }
}

function unwind(parents: Map<EntityId, { edge: Edge; node: Node }>, source: Node, target: Node): Path {
  const nodes: Node[] = [target]
  const edges: Edge[] = []

  let cursor = target
  while (cursor.id !== source.id) {
    const parent = parents.get(cursor.id)
    if (!parent) break
    edges.unshift(parent.edge)
    nodes.unshift(parent.node)
    cursor = parent.node
  }

  return { nodes, edges, length: edges.length }
}
