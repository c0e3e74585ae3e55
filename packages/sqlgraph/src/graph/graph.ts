/**
 * Graph Store
 *
 * Public API over one open driver. Composes the schema manager, the
 * identifier allocator and the object cache, and keeps cached entities
 * consistent with the rows when a transaction rolls back.
 */

import type { z } from "zod"
import { ObjectCache } from "../cache"
import { createPropertyMap, createPropertyPatch, encodeValue, sameValue } from "../codec"
import { resolveGraphOptions, type GraphOptions, type ResolvedGraphOptions } from "../config"
import type { SqlDriverProvider } from "../driver"
import {
  DanglingReferenceError,
  GraphClosedError,
  GraphError,
  NotFoundError,
  ReferentialIntegrityError,
  StaleEntityError,
  StorageError,
  toError,
} from "../errors"
import { IdAllocator, assertEntityId, isEntityId } from "../ids"
import { createLogger, type Logger } from "../logger"
import * as traversal from "../traversal/traversal"
import type { Path, PathOptions, TraversalOptions, TraversalStep } from "../traversal/traversal"
import {
  SchemaManager,
  type ChangeEntry,
  type EdgeRecord,
  type EdgeRow,
  type LoggedChange,
  type NodeRecord,
  type NodeRow,
} from "../schema"
import type { Direction, EntityId, JsonValue, PropertyMap, PropertyPatch, PropertyValue } from "../types"
import { Edge, GraphEntity, Node, isEdge, isNode } from "./entities"
import {
  GraphExportSchema,
  type CreateNodeOptions,
  type DeleteNodeOptions,
  type EdgeQuery,
  type EdgeRef,
  type EntityRef,
  type FindNodesOptions,
  type GraphExport,
  type GraphStats,
  type ImportResult,
  type Neighbor,
  type NodeRef,
  type UndoneChange,
} from "./types"

/** Settings under this prefix belong to the engine */
const RESERVED_SETTING_PREFIX = "sqlgraph."

export class Graph {
  private readonly options: ResolvedGraphOptions
  private readonly logger: Logger
  private readonly schema: SchemaManager
  private readonly allocator: IdAllocator
  private readonly cache = new ObjectCache<GraphEntity>()
  /** Entities touched by each open transaction, innermost last */
  private readonly frames: Array<Set<GraphEntity>> = []
  /** Change log batch of the open outermost transaction, once it has written one */
  private changeBatch: number | undefined
  private closed = false

  constructor(
    private readonly driver: SqlDriverProvider,
    options: GraphOptions = {},
  ) {
    this.options = resolveGraphOptions(options)
    this.logger = this.options.logger ?? createLogger("sqlgraph", { level: this.options.logLevel })
    this.schema = new SchemaManager(driver, { logger: this.logger.child("schema") })

    this.driver.transaction(() => this.schema.ensureSchema())
    this.allocator = new IdAllocator(this.schema)

    this.logger.debug("Opened graph", { driver: driver.name, nextId: this.allocator.peek() })
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Close the underlying driver. Idempotent. Every cached entity becomes
   * unusable for writes.
   */
  close(): void {
    if (this.closed) return
    if (this.frames.length > 0) {
      throw new GraphError("Cannot close a graph inside a transaction")
    }
    this.cache.invalidateAll()
    this.driver.close()
    this.closed = true
    this.logger.debug("Closed graph")
  }

  get isOpen(): boolean {
    return !this.closed && this.driver.isOpen()
  }

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  /**
   * Run `work` atomically. Nested calls become savepoints. When `work`
   * throws, its writes are rolled back, every entity it touched is
   * re-synchronized from its rows, and the error is rethrown.
   */
  transaction<T>(work: (graph: this) => T): T {
    this.assertOpen()

    const frame = new Set<GraphEntity>()
    const outcome = { workFailed: false }
    this.frames.push(frame)

    try {
      const result = this.driver.transaction(() => {
        try {
          return work(this)
        } catch (error) {
          outcome.workFailed = true
          throw error
        }
      })
      this.frames.pop()
      this.mergeIntoParent(frame)
      this.endBatch()
      return result
    } catch (error) {
      this.frames.pop()
      this.endBatch()
      this.logger.warn("Transaction rolled back", { touched: frame.size, error: toError(error).message })
      this.resync(frame)
      this.mergeIntoParent(frame)

      if (outcome.workFailed || error instanceof GraphError) throw error
      const cause = toError(error)
      throw new StorageError(`Transaction failed: ${cause.message}`, undefined, cause)
    }
  }

  // ===========================================================================
  // NODES
  // ===========================================================================

  createNode(properties: Readonly<Record<string, PropertyValue>> = {}, options: CreateNodeOptions = {}): Node {
    const kind = options.kind ?? null

    return this.transaction(() => {
      const id = this.allocator.allocate()
      const record = this.schema.insertNode(id, properties, kind)
      const node = new Node(this, record)
      this.cache.register(node)
      this.touch(node)
      this.record({ action: "create", entity: { entityKind: "node", ...record } })
      this.logger.debug("Created node", { id, kind })
      return node
    })
  }

  /**
   * The live node for `id`.
   * @throws NotFoundError when no node has that identifier
   */
  getNode(id: EntityId): Node {
    this.assertOpen()
    assertEntityId(id, "node")

    const node = this.cache.getOrLoad(id, isNode, () => {
      const record = this.schema.getNodeRecord(id)
      return record ? new Node(this, record) : undefined
    })
    if (!node) throw new NotFoundError("node", id)
    return node
  }

  hasNode(id: EntityId): boolean {
    this.assertOpen()
    return isEntityId(id) && this.schema.getNodeRow(id) !== undefined
  }

  /**
   * Delete a node. Without cascade, a node with incident edges is left
   * alone and ReferentialIntegrityError is thrown.
   */
  deleteNode(ref: NodeRef, options: DeleteNodeOptions = {}): void {
    const cascade = options.cascade ?? this.options.defaultCascade

    this.transaction(() => {
      const node = this.resolveNode(ref)
      const incident = this.schema.countIncidentEdges(node.id)

      if (incident > 0 && !cascade) {
        throw new ReferentialIntegrityError(node.id, incident)
      }
      for (const edge of incident > 0 ? this.edgesOf(node, "both") : []) {
        this.removeEdge(edge)
      }

      this.touch(node)
      this.recordDeletion(node)
      this.schema.deleteNode(node.id)
      this.retire(node)
      this.logger.debug("Deleted node", { id: node.id, edges: incident })
    })
  }

  /**
   * All nodes in identifier order.
   */
  nodes(): Node[] {
    this.assertOpen()
    return this.schema.allNodes().map((row) => this.nodeFromRow(row))
  }

  /**
   * Nodes whose properties equal every entry of `filters`. Type matters:
   * `1` matches neither `true` nor `"1"`.
   */
  findNodes(filters: Readonly<Record<string, PropertyValue>> = {}, options: FindNodesOptions = {}): Node[] {
    this.assertOpen()
    const entries = Object.entries(filters).map(([key, value]) => ({ key, value }))
    return this.schema.findNodes(entries, options).map((row) => this.nodeFromRow(row))
  }

  findByProperty(key: string, value: PropertyValue): Node[] {
    return this.findNodes({ [key]: value })
  }

  // ===========================================================================
  // EDGES
  // ===========================================================================

  /**
   * Create a directed edge. Both endpoints must exist.
   * @throws DanglingReferenceError when an endpoint is missing or deleted
   */
  createEdge(
    src: NodeRef,
    dst: NodeRef,
    label: string | null = null,
    properties: Readonly<Record<string, PropertyValue>> = {},
  ): Edge {
    return this.transaction(() => {
      const srcId = this.endpointId(src, "src")
      const dstId = this.endpointId(dst, "dst")

      const id = this.allocator.allocate()
      const record = this.schema.insertEdge(id, srcId, dstId, label, properties)
      const edge = new Edge(this, record)
      this.cache.register(edge)
      this.touch(edge)
      this.record({ action: "create", entity: { entityKind: "edge", ...record } })
      this.logger.debug("Created edge", { id, src: srcId, dst: dstId, label })
      return edge
    })
  }

  getEdge(id: EntityId): Edge {
    this.assertOpen()
    assertEntityId(id, "edge")

    const edge = this.cache.getOrLoad(id, isEdge, () => {
      const record = this.schema.getEdgeRecord(id)
      return record ? new Edge(this, record) : undefined
    })
    if (!edge) throw new NotFoundError("edge", id)
    return edge
  }

  hasEdge(id: EntityId): boolean {
    this.assertOpen()
    return isEntityId(id) && this.schema.getEdgeRow(id) !== undefined
  }

  /**
   * Delete an edge. Its endpoints are untouched.
   */
  deleteEdge(ref: EdgeRef): void {
    this.transaction(() => {
      this.removeEdge(this.resolveEdge(ref))
    })
  }

  /**
   * Edges matching the filter, in identifier order.
   */
  findEdges(query: EdgeQuery = {}): Edge[] {
    this.assertOpen()
    const rows = this.schema.findEdges({
      src: query.src === undefined ? undefined : refId(query.src),
      dst: query.dst === undefined ? undefined : refId(query.dst),
      label: query.label,
    })
    return rows.map((row) => this.edgeFromRow(row))
  }

  /**
   * All edges in identifier order.
   */
  edges(): Edge[] {
    return this.findEdges()
  }

  // ===========================================================================
  // EITHER KIND
  // ===========================================================================

  /**
   * The node or edge with this identifier.
   */
  get(id: EntityId): Node | Edge {
    this.assertOpen()
    assertEntityId(id)

    const cached = this.cache.peek(id)
    if (cached && isNode(cached)) return cached
    if (cached && isEdge(cached)) return cached

    if (this.schema.getNodeRow(id)) return this.getNode(id)
    if (this.schema.getEdgeRow(id)) return this.getEdge(id)
    throw new NotFoundError(undefined, id)
  }

  exists(id: EntityId): boolean {
    return this.hasNode(id) || this.hasEdge(id)
  }

  // ===========================================================================
  // PROPERTIES
  // ===========================================================================

  getProperty(ref: EntityRef, key: string): PropertyValue | undefined {
    const entity = typeof ref === "number" ? this.get(ref) : ref
    return entity.get(key)
  }

  setProperty(ref: EntityRef, key: string, value: PropertyValue): void {
    // null is a removal in a patch, never a value
    encodeValue(key, value)
    this.updateProperties(ref, { [key]: value })
  }

  removeProperty(ref: EntityRef, key: string): void {
    this.updateProperties(ref, { [key]: null })
  }

  /**
   * Merge `patch` into the entity's properties. `null` removes a key.
   */
  updateProperties(ref: EntityRef, patch: Readonly<PropertyPatch>): void {
    this.transaction(() => {
      const entity = this.resolve(ref)
      this.touch(entity)
      const previousUpdatedAt = entity.updatedAt.getTime()

      const { set, removed, updatedAt } = this.schema.updateProperties(
        { id: entity.id, kind: entity.entityKind },
        patch,
      )

      const before = createPropertyPatch()
      const after = createPropertyPatch()
      for (const [key, value] of Object.entries(set)) {
        const old = entity.get(key)
        if (sameValue(old, value)) continue
        before[key] = old ?? null
        after[key] = value
      }
      for (const key of removed) {
        const old = entity.get(key)
        if (old === undefined) continue
        before[key] = old
        after[key] = null
      }

      const applied: PropertyPatch = Object.assign(createPropertyMap(), set)
      for (const key of removed) applied[key] = null
      entity.applyChanges(applied, updatedAt)

      if (Object.keys(after).length > 0) {
        this.record({ action: "update", entityKind: entity.entityKind, id: entity.id, before, after, previousUpdatedAt })
      }
    })
  }

  // ===========================================================================
  // ADJACENCY
  // ===========================================================================

  /**
   * Incident edges of a node. With `both`, outgoing edges come first and a
   * self-loop is reported once.
   */
  edgesOf(ref: NodeRef, direction: Direction = "both", label?: string | null): Edge[] {
    const node = this.resolveNode(ref)
    const outgoing = direction === "incoming" ? [] : this.schema.findEdges({ src: node.id, label })
    const incoming =
      direction === "outgoing"
        ? []
        : this.schema
            .findEdges({ dst: node.id, label })
            .filter((row) => direction === "incoming" || row.src !== node.id)

    return [...outgoing, ...incoming].map((row) => this.edgeFromRow(row))
  }

  /**
   * Adjacent nodes with their connecting edges, in edgesOf order.
   */
  neighbors(ref: NodeRef, direction: Direction = "both", label?: string | null): Neighbor[] {
    const node = this.resolveNode(ref)
    return this.edgesOf(node, direction, label).map((edge) => ({
      edge,
      node: this.getNode(edge.other(node.id)),
    }))
  }

  // ===========================================================================
  // TRAVERSAL
  // ===========================================================================

  bfs(start: NodeRef, options?: TraversalOptions): Generator<Node> {
    return traversal.bfs(this, start, options)
  }

  dfs(start: NodeRef, options?: TraversalOptions): Generator<Node> {
    return traversal.dfs(this, start, options)
  }

  bfsPaths(start: NodeRef, options?: TraversalOptions): Generator<TraversalStep> {
    return traversal.bfsPaths(this, start, options)
  }

  dfsPaths(start: NodeRef, options?: TraversalOptions): Generator<TraversalStep> {
    return traversal.dfsPaths(this, start, options)
  }

  shortestPath(from: NodeRef, to: NodeRef, options?: PathOptions): Path | null {
    return traversal.shortestPath(this, from, to, options)
  }

  reachable(from: NodeRef, to: NodeRef, options?: PathOptions): boolean {
    return traversal.reachable(this, from, to, options)
  }

  // ===========================================================================
  // CACHE
  // ===========================================================================

  /**
   * Discard local state and re-read the entity from its rows.
   * @throws NotFoundError when the rows are gone
   */
  reload<E extends GraphEntity>(entity: E): E {
    this.assertOpen()
    this.assertOwned(entity)

    const cached = this.cache.peek(entity.id)
    if (cached !== undefined && cached !== entity) {
      throw new StaleEntityError(entity.entityKind, entity.id)
    }

    const record = this.readRecord(entity)
    if (!record) {
      this.cache.evict(entity.id)
      entity.detach()
      throw new NotFoundError(entity.entityKind, entity.id)
    }

    entity.restore(record)
    if (cached === undefined) this.cache.register(entity)
    return entity
  }

  /**
   * Drop every cached entity. Held references stay usable until another
   * instance for the same identifier is loaded.
   */
  invalidateCache(): void {
    this.assertOpen()
    const dropped = this.cache.invalidateAll()
    this.logger.debug("Invalidated cache", { dropped: dropped.length })
  }

  // ===========================================================================
  // SETTINGS
  // ===========================================================================

  /**
   * Read a JSON setting. With a schema the stored value is validated and
   * `defaultValue` is returned when the key is unset.
   */
  getSetting(key: string): unknown
  getSetting<T>(key: string, schema: z.ZodType<T>, defaultValue: T): T
  getSetting<T>(key: string, schema?: z.ZodType<T>, defaultValue?: T): unknown {
    this.assertOpen()
    const raw = this.schema.getSetting(key)
    if (raw === undefined) return defaultValue

    let value: unknown
    try {
      value = JSON.parse(raw)
    } catch (error) {
      const cause = toError(error)
      throw new StorageError(`Setting '${key}' is not valid JSON: ${cause.message}`, undefined, cause)
    }
    if (!schema) return value

    const parsed = schema.safeParse(value)
    if (!parsed.success) {
      throw new StorageError(`Setting '${key}' does not match the expected shape: ${parsed.error.message}`)
    }
    return parsed.data
  }

  saveSetting(key: string, value: JsonValue): void {
    this.assertOpen()
    if (key.length === 0 || key.startsWith(RESERVED_SETTING_PREFIX)) {
      throw new GraphError(`Setting key '${key}' is empty or reserved`)
    }
    this.schema.putSetting(key, JSON.stringify(value))
  }

  // ===========================================================================
  // WHOLE GRAPH
  // ===========================================================================

  stats(): GraphStats {
    this.assertOpen()
    return {
      nodes: this.schema.countNodes(),
      edges: this.schema.countEdges(),
      kinds: Array.from(this.schema.kindCounts(), ([kind, count]) => ({ kind, count })),
      labels: Array.from(this.schema.labelCounts(), ([label, count]) => ({ label, count })),
      cache: this.cache.stats(),
      changes: this.schema.countChanges(),
      schemaVersion: this.schema.schemaVersion(),
    }
  }

  /**
   * Dump the graph as plain data with identifiers preserved.
   */
  export(): GraphExport {
    this.assertOpen()
    return {
      version: 1,
      nodes: this.schema.allNodes().map((row) => ({
        id: row.id,
        kind: row.kind,
        properties: this.schema.loadProperties(row.id),
      })),
      edges: this.schema.findEdges().map((row) => ({
        id: row.id,
        src: row.src,
        dst: row.dst,
        label: row.label,
        properties: this.schema.loadProperties(row.id),
      })),
    }
  }

  /**
   * Load an export into this graph, keeping its identifiers. All or
   * nothing: any clash or dangling edge rolls the whole import back.
   */
  import(data: unknown): ImportResult {
    const parsed = GraphExportSchema.safeParse(data)
    if (!parsed.success) {
      throw new GraphError(`Invalid graph export: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`)
    }
    const { nodes, edges } = parsed.data

    return this.transaction(() => {
      for (const node of nodes) {
        this.assertUnused(node.id)
        const record = this.schema.insertNode(node.id, node.properties, node.kind)
        this.allocator.observe(node.id)
        this.record({ action: "create", entity: { entityKind: "node", ...record } })
      }
      for (const edge of edges) {
        this.assertUnused(edge.id)
        if (!this.schema.getNodeRow(edge.src)) throw new DanglingReferenceError("src", edge.src)
        if (!this.schema.getNodeRow(edge.dst)) throw new DanglingReferenceError("dst", edge.dst)
        const record = this.schema.insertEdge(edge.id, edge.src, edge.dst, edge.label, edge.properties)
        this.allocator.observe(edge.id)
        this.record({ action: "create", entity: { entityKind: "edge", ...record } })
      }

      this.logger.info("Imported graph", { nodes: nodes.length, edges: edges.length })
      return { nodes: nodes.length, edges: edges.length }
    })
  }

  /**
   * Delete every node and edge and empty the change log. Identifiers stay
   * retired.
   */
  clear(): void {
    this.transaction(() => {
      for (const entity of this.cache.invalidateAll()) {
        this.touch(entity)
        entity.detach()
      }
      this.schema.clear()
      this.schema.clearChanges()
      this.logger.info("Cleared graph")
    })
  }

  // ===========================================================================
  // CHANGE LOG
  // ===========================================================================

  /**
   * Reverse the most recent batch of changes and remove it from the log.
   * Returns the reversed changes, latest first; an empty log undoes nothing.
   * The undo itself is not logged.
   */
  undo(): UndoneChange[] {
    return this.transaction(() => {
      const batch = this.schema.lastChangeBatch()
      const [first] = batch
      if (!first) return []

      const affected = new Set<GraphEntity>()
      const undone = batch.reverse().map((change) => this.revert(change, affected))
      this.schema.deleteChangeBatch(first.batch)
      this.resync(affected)

      this.logger.debug("Undid changes", { batch: first.batch, changes: undone.length })
      return undone
    })
  }

  /**
   * Entries of the most recent batch, in the order they were made.
   */
  lastChanges(): LoggedChange[] {
    this.assertOpen()
    return this.schema.lastChangeBatch()
  }

  countChanges(): number {
    this.assertOpen()
    return this.schema.countChanges()
  }

  /**
   * Empty the change log. Nothing recorded so far can be undone afterwards.
   */
  clearChanges(): void {
    this.transaction(() => {
      this.schema.clearChanges()
      this.logger.info("Cleared change log")
    })
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private assertOpen(): void {
    if (this.closed || !this.driver.isOpen()) {
      throw new GraphClosedError()
    }
  }

  private assertOwned(entity: GraphEntity): void {
    if (!entity.belongsTo(this)) {
      throw new GraphError(`${entity.entityKind} ${entity.id} belongs to a different graph`)
    }
  }

  private assertUnused(id: EntityId): void {
    if (this.schema.getNodeRow(id) || this.schema.getEdgeRow(id)) {
      throw new GraphError(`Identifier ${id} is already in use`)
    }
  }

  private resolveNode(ref: NodeRef): Node {
    return typeof ref === "number" ? this.getNode(ref) : this.adopt(ref)
  }

  private resolveEdge(ref: EdgeRef): Edge {
    return typeof ref === "number" ? this.getEdge(ref) : this.adopt(ref)
  }

  private resolve(ref: EntityRef): GraphEntity {
    return typeof ref === "number" ? this.get(ref) : this.adopt(ref)
  }

  /**
   * Check that a caller-held entity is the live instance for its id. An
   * entity dropped by invalidateCache is re-registered if nothing newer
   * replaced it.
   */
  private adopt<E extends GraphEntity>(entity: E): E {
    this.assertOpen()
    this.assertOwned(entity)
    if (entity.isDeleted) {
      throw new NotFoundError(entity.entityKind, entity.id)
    }

    const cached = this.cache.peek(entity.id)
    if (cached === entity) return entity
    if (cached !== undefined) {
      throw new StaleEntityError(entity.entityKind, entity.id)
    }
    return this.reload(entity)
  }

  private endpointId(ref: NodeRef, endpoint: "src" | "dst"): EntityId {
    const id = refId(ref)
    if (typeof ref !== "number" && (!ref.belongsTo(this) || ref.isDeleted)) {
      throw new DanglingReferenceError(endpoint, id)
    }
    if (!isEntityId(id) || !this.schema.getNodeRow(id)) {
      throw new DanglingReferenceError(endpoint, id)
    }
    return id
  }

  private nodeFromRow(row: NodeRow): Node {
    const node = this.cache.getOrLoad(row.id, isNode, () => new Node(this, this.withProperties(row)))
    if (!node) throw new NotFoundError("node", row.id)
    return node
  }

  private edgeFromRow(row: EdgeRow): Edge {
    const edge = this.cache.getOrLoad(row.id, isEdge, () => new Edge(this, this.withProperties(row)))
    if (!edge) throw new NotFoundError("edge", row.id)
    return edge
  }

  private withProperties<R extends NodeRow | EdgeRow>(row: R): R & { properties: PropertyMap } {
    return { ...row, properties: this.schema.loadProperties(row.id) }
  }

  private readRecord(entity: GraphEntity): NodeRecord | EdgeRecord | undefined {
    return entity.entityKind === "node" ? this.schema.getNodeRecord(entity.id) : this.schema.getEdgeRecord(entity.id)
  }

  private removeEdge(edge: Edge): void {
    this.touch(edge)
    this.recordDeletion(edge)
    this.schema.deleteEdge(edge.id)
    this.retire(edge)
    this.logger.debug("Deleted edge", { id: edge.id })
  }

  private record(change: ChangeEntry): void {
    if (!this.options.trackChanges) return
    if (this.changeBatch === undefined) {
      this.changeBatch = this.schema.nextChangeBatch()
    }
    this.schema.recordChange(this.changeBatch, change)
  }

  private recordDeletion(entity: GraphEntity): void {
    if (!this.options.trackChanges) return
    if (isNode(entity)) {
      const record = this.schema.getNodeRecord(entity.id)
      if (record) this.record({ action: "delete", entity: { entityKind: "node", ...record } })
    } else {
      const record = this.schema.getEdgeRecord(entity.id)
      if (record) this.record({ action: "delete", entity: { entityKind: "edge", ...record } })
    }
  }

  private endBatch(): void {
    if (this.frames.length === 0) this.changeBatch = undefined
  }

  /**
   * Reverse one logged change on the rows. Cached entities it affects are
   * collected in `affected` for the caller to resync.
   */
  private revert(change: LoggedChange, affected: Set<GraphEntity>): UndoneChange {
    const id = change.action === "update" ? change.id : change.entity.id
    const entityKind = change.action === "update" ? change.entityKind : change.entity.entityKind

    const cached = this.cache.peek(id)
    if (cached) {
      this.touch(cached)
      affected.add(cached)
    }

    if (change.action === "update") {
      const exists = entityKind === "node" ? this.schema.getNodeRow(id) : this.schema.getEdgeRow(id)
      if (!exists) throw new NotFoundError(entityKind, id)
      this.schema.updateProperties({ id, kind: entityKind }, change.before, change.previousUpdatedAt)
    } else if (change.action === "create") {
      if (entityKind === "node") {
        const incident = this.schema.countIncidentEdges(id)
        if (incident > 0) throw new ReferentialIntegrityError(id, incident)
      }
      const removed = entityKind === "node" ? this.schema.deleteNode(id) : this.schema.deleteEdge(id)
      if (!removed) throw new NotFoundError(entityKind, id)
      this.allocator.retire(id)
    } else {
      const { entity } = change
      this.assertUnused(id)
      const timestamps = { createdAt: entity.createdAt, updatedAt: entity.updatedAt }
      if (entity.entityKind === "node") {
        this.schema.insertNode(id, entity.properties, entity.kind, timestamps)
      } else {
        if (!this.schema.getNodeRow(entity.src)) throw new DanglingReferenceError("src", entity.src)
        if (!this.schema.getNodeRow(entity.dst)) throw new DanglingReferenceError("dst", entity.dst)
        this.schema.insertEdge(id, entity.src, entity.dst, entity.label, entity.properties, timestamps)
      }
    }

    return { action: change.action, entityKind, id }
  }

  private retire(entity: GraphEntity): void {
    this.allocator.retire(entity.id)
    this.cache.evict(entity.id)
    entity.detach()
  }

  private currentFrame(): Set<GraphEntity> | undefined {
    return this.frames[this.frames.length - 1]
  }

  private touch(entity: GraphEntity): void {
    this.currentFrame()?.add(entity)
  }

  private mergeIntoParent(frame: Set<GraphEntity>): void {
    const parent = this.currentFrame()
    if (parent) frame.forEach((entity) => parent.add(entity))
  }

  /**
   * Bring touched entities back in line with the rows after a rollback.
   * Surviving rows are reloaded in place; entities whose rows are gone are
   * evicted and detached.
   */
  private resync(entities: Iterable<GraphEntity>): void {
    for (const entity of entities) {
      let record: NodeRecord | EdgeRecord | undefined
      try {
        record = this.readRecord(entity)
      } catch (error) {
        this.logger.error("Could not resync entity after rollback", {
          id: entity.id,
          error: toError(error).message,
        })
        if (this.cache.peek(entity.id) === entity) this.cache.evict(entity.id)
        continue
      }

      const cached = this.cache.peek(entity.id)
      if (record) {
        entity.restore(record)
        if (cached === undefined) this.cache.register(entity)
      } else {
        if (cached === entity) this.cache.evict(entity.id)
        entity.detach()
      }
    }
  }
}

function refId(ref: NodeRef): EntityId {
  return typeof ref === "number" ? ref : ref.id
}
