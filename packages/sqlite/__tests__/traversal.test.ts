/**
 * Traversal Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { bfs, bfsPaths, dfs, shortestPath, type Graph, type Node } from 'sqlgraph'
import { openGraph } from '../src'

function names(nodes: Iterable<Node>): unknown[] {
  return Array.from(nodes, (node) => node.get('name'))
}

describe('Traversal', () => {
  let graph: Graph
  const node = (name: string): Node => graph.createNode({ name })

  beforeEach(() => {
    graph = openGraph()
  })

  afterEach(() => {
    graph.close()
  })

  // ===========================================================================
  // CYCLES
  // ===========================================================================

  describe('on a cycle A -> B -> C -> A', () => {
    let a: Node

    beforeEach(() => {
      a = node('A')
      const b = node('B')
      const c = node('C')
      graph.createEdge(a, b)
      graph.createEdge(b, c)
      graph.createEdge(c, a)
    })

    it('visits each node once breadth-first', () => {
      expect(names(graph.bfs(a))).toEqual(['A', 'B', 'C'])
    })

    it('visits each node once depth-first', () => {
      expect(names(graph.dfs(a))).toEqual(['A', 'B', 'C'])
    })

    it('walks backwards along incoming edges', () => {
      expect(names(bfs(graph, a, { direction: 'incoming' }))).toEqual(['A', 'C', 'B'])
    })
  })

  // ===========================================================================
  // ORDER
  // ===========================================================================

  describe('on a tree A -> {B -> D, C -> E}', () => {
    let a: Node
    let b: Node

    beforeEach(() => {
      a = node('A')
      b = node('B')
      const c = node('C')
      graph.createEdge(a, b, 'child')
      graph.createEdge(a, c, 'child')
      graph.createEdge(b, node('D'), 'child')
      graph.createEdge(c, node('E'), 'other')
    })

    it('goes level by level breadth-first', () => {
      expect(names(bfs(graph, a))).toEqual(['A', 'B', 'C', 'D', 'E'])
    })

    it('goes branch by branch depth-first', () => {
      expect(names(dfs(graph, a.id))).toEqual(['A', 'B', 'D', 'C', 'E'])
    })

    it('reports the path and depth of each step', () => {
      const steps = Array.from(bfsPaths(graph, a))
      const d = steps[3]

      expect(steps.map((step) => step.depth)).toEqual([0, 1, 1, 2, 2])
      expect(names(d.path.nodes)).toEqual(['A', 'B', 'D'])
      expect(d.path.edges.map((edge) => [edge.src, edge.dst])).toEqual([
        [a.id, b.id],
        [b.id, d.node.id],
      ])
      expect(d.path.length).toBe(2)
    })

    it('prunes below nodes the visitor rejects', () => {
      const seen: unknown[] = []
      const kept = bfs(graph, a, {
        visit: (step) => {
          seen.push(step.node.get('name'))
          return step.node !== b
        },
      })

      expect(names(kept)).toEqual(['A', 'C', 'E'])
      expect(seen).toEqual(['A', 'B', 'C', 'E'])
    })

    it('can reject the start node', () => {
      expect(names(graph.dfs(a, { visit: () => false }))).toEqual([])
    })

    it('stops expanding at maxDepth', () => {
      expect(names(graph.bfs(a, { maxDepth: 1 }))).toEqual(['A', 'B', 'C'])
      expect(names(graph.dfs(a, { maxDepth: 0 }))).toEqual(['A'])
    })

    it('follows only the given label', () => {
      expect(names(graph.bfs(a, { label: 'child' }))).toEqual(['A', 'B', 'C', 'D'])
    })

    it('is lazy and restartable', () => {
      const walk = graph.bfs(a)
      expect(walk.next().value?.get('name')).toBe('A')
      walk.return(undefined)

      expect(names(graph.bfs(a))).toEqual(['A', 'B', 'C', 'D', 'E'])
    })
  })

  describe('on a diamond A -> {B, C} -> D', () => {
    it('yields a shared descendant once in depth-first preorder', () => {
      const a = node('A')
      const b = node('B')
      const c = node('C')
      const d = node('D')
      graph.createEdge(a, b)
      graph.createEdge(a, c)
      graph.createEdge(b, d)
      graph.createEdge(c, d)

      expect(names(graph.dfs(a))).toEqual(['A', 'B', 'D', 'C'])
    })
  })

  // ===========================================================================
  // SHORTEST PATH
  // ===========================================================================

  describe('shortestPath()', () => {
    it('prefers the path discovered first among equals', () => {
      const a = node('A')
      const b = node('B')
      const c = node('C')
      const d = node('D')
      graph.createEdge(a, b)
      graph.createEdge(b, d)
      graph.createEdge(a, c)
      graph.createEdge(c, d)

      const path = graph.shortestPath(a, d)

      expect(path?.length).toBe(2)
      expect(names(path?.nodes ?? [])).toEqual(['A', 'B', 'D'])
      expect(path?.edges.map((edge) => edge.dst)).toEqual([b.id, d.id])
    })

    it('finds the fewest hops over a longer detour', () => {
      const a = node('A')
      const b = node('B')
      const c = node('C')
      const d = node('D')
      graph.createEdge(a, b)
      graph.createEdge(b, c)
      graph.createEdge(c, d)
      graph.createEdge(a, d)

      expect(names(shortestPath(graph, a, d)?.nodes ?? [])).toEqual(['A', 'D'])
    })

    it('returns a zero-length path from a node to itself', () => {
      const a = node('A')

      expect(graph.shortestPath(a, a)).toEqual({ nodes: [a], edges: [], length: 0 })
    })

    it('returns null when the target is unreachable in the given direction', () => {
      const a = node('A')
      const b = node('B')
      graph.createEdge(b, a)

      expect(graph.shortestPath(a, b)).toBeNull()
      expect(graph.reachable(a, b)).toBe(false)
      expect(graph.reachable(a, b, { direction: 'both' })).toBe(true)
    })

    it('gives up beyond maxDepth', () => {
      const a = node('A')
      const b = node('B')
      const c = node('C')
      graph.createEdge(a, b)
      graph.createEdge(b, c)

      expect(graph.shortestPath(a, c, { maxDepth: 1 })).toBeNull()
      expect(graph.shortestPath(a, c, { maxDepth: 2 })?.length).toBe(2)
    })
  })
})
