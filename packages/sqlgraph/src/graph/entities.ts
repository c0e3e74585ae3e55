/**
 * Live Entities
 *
 * Node and Edge objects handed out by a Graph. Each identifier has at most
 * one live object per open graph; property writes go straight through to
 * the backing rows.
 */

import { applyPatch, cloneProperties, ownProperty } from "../codec"
import type { EdgeRecord, NodeRecord } from "../schema"
import type { Direction, EntityId, EntityKind, PropertyMap, PropertyPatch, PropertyValue } from "../types"
import type { Graph } from "./graph"
import type { DeleteNodeOptions, Neighbor } from "./types"

/**
 * Common behaviour of nodes and edges.
 */
export abstract class GraphEntity {
  abstract readonly entityKind: EntityKind

  readonly id: EntityId
  private data: PropertyMap
  private created: number
  private updated: number
  private detached = false

  protected constructor(
    protected readonly graph: Graph,
    record: NodeRecord | EdgeRecord,
  ) {
    this.id = record.id
    this.data = record.properties
    this.created = record.createdAt
    this.updated = record.updatedAt
  }

  // ===========================================================================
  // PROPERTIES
  // ===========================================================================

  /**
   * Current value of a property, or undefined. Blobs are returned as copies.
   */
  get(key: string): PropertyValue | undefined {
    const value = ownProperty(this.data, key)
    return value instanceof Uint8Array ? Uint8Array.from(value) : value
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data, key)
  }

  keys(): string[] {
    return Object.keys(this.data)
  }

  /**
   * Snapshot of all properties.
   */
  get properties(): PropertyMap {
    return cloneProperties(this.data)
  }

  /**
   * Write a property through to storage.
   */
  set(key: string, value: PropertyValue): this {
    this.graph.setProperty(this, key, value)
    return this
  }

  /**
   * Remove a property. Removing a missing key is a no-op.
   */
  remove(key: string): this {
    this.graph.removeProperty(this, key)
    return this
  }

  /**
   * Merge several properties at once; `null` removes a key.
   */
  update(patch: PropertyPatch): this {
    this.graph.updateProperties(this, patch)
    return this
  }

  get createdAt(): Date {
    return new Date(this.created)
  }

  get updatedAt(): Date {
    return new Date(this.updated)
  }

  /**
   * True once the entity has been deleted (or its creation rolled back).
   * A deleted entity keeps its last properties for reading.
   */
  get isDeleted(): boolean {
    return this.detached
  }

  /**
   * Whether this object was handed out by `graph`.
   */
  belongsTo(graph: Graph): boolean {
    return this.graph === graph
  }

  // ===========================================================================
  // STATE SYNC (used by Graph)
  // ===========================================================================

  /** @internal */
  applyChanges(patch: PropertyPatch, updatedAt: number): void {
    applyPatch(this.data, patch)
    this.updated = updatedAt
  }

  /** @internal */
  restore(record: NodeRecord | EdgeRecord): void {
    this.data = record.properties
    this.created = record.createdAt
    this.updated = record.updatedAt
    this.detached = false
  }

  /** @internal */
  detach(): void {
    this.detached = true
  }
}

/**
 * A graph vertex.
 */
export class Node extends GraphEntity {
  readonly entityKind = "node" as const
  readonly kind: string | null

  /** @internal */
  constructor(graph: Graph, record: NodeRecord) {
    super(graph, record)
    this.kind = record.kind
  }

  /**
   * Adjacent nodes together with the connecting edges.
   */
  neighbors(direction: Direction = "both", label?: string | null): Neighbor[] {
    return this.graph.neighbors(this, direction, label)
  }

  /**
   * Incident edges in the given direction.
   */
  edges(direction: Direction = "both", label?: string | null): Edge[] {
    return this.graph.edgesOf(this, direction, label)
  }

  outgoing(label?: string | null): Edge[] {
    return this.edges("outgoing", label)
  }

  incoming(label?: string | null): Edge[] {
    return this.edges("incoming", label)
  }

  delete(options?: DeleteNodeOptions): void {
    this.graph.deleteNode(this, options)
  }

  toJSON(): { id: EntityId; kind: string | null; properties: PropertyMap } {
    return { id: this.id, kind: this.kind, properties: this.properties }
  }

  override toString(): string {
    return this.kind ? `(${this.id}:${this.kind})` : `(${this.id})`
  }
}

/**
 * A directed, identified relation between two nodes.
 */
export class Edge extends GraphEntity {
  readonly entityKind = "edge" as const
  readonly src: EntityId
  readonly dst: EntityId
  readonly label: string | null

  /** @internal */
  constructor(graph: Graph, record: EdgeRecord) {
    super(graph, record)
    this.src = record.src
    this.dst = record.dst
    this.label = record.label
  }

  /** Node at the start of the edge */
  source(): Node {
    return this.graph.getNode(this.src)
  }

  /** Node at the end of the edge */
  target(): Node {
    return this.graph.getNode(this.dst)
  }

  /**
   * The endpoint opposite `nodeId`. For a self-loop that is the node itself.
   */
  other(nodeId: EntityId): EntityId {
    return nodeId === this.src ? this.dst : this.src
  }

  delete(): void {
    this.graph.deleteEdge(this)
  }

  toJSON(): { id: EntityId; src: EntityId; dst: EntityId; label: string | null; properties: PropertyMap } {
    return { id: this.id, src: this.src, dst: this.dst, label: this.label, properties: this.properties }
  }

  override toString(): string {
    return `(${this.src})-[${this.id}${this.label ? `:${this.label}` : ""}]->(${this.dst})`
  }
}

export function isNode(entity: GraphEntity): entity is Node {
  return entity instanceof Node
}

export function isEdge(entity: GraphEntity): entity is Edge {
  return entity instanceof Edge
}
