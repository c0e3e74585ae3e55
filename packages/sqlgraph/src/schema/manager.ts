/**
 * Relational Schema Manager
 *
 * Owns the fixed tables that hold the graph and issues every primitive row
 * operation the rest of the engine composes. Nothing above this layer
 * writes SQL.
 */

import {
  createPropertyMap,
  createPropertyPatch,
  decodeProperties,
  decodeValue,
  encodePatch,
  encodeProperties,
  encodeValue,
  parseStoredProperty,
} from "../codec"
import type { PropertyRow } from "../codec"
import type { SqlDriverProvider, SqlRow, SqlValue, RunResult } from "../driver"
import { GraphError, StorageError, toError } from "../errors"
import type { IdWatermarkStore } from "../ids"
import { silentLogger, type Logger } from "../logger"
import type { EntityId, PropertyMap, PropertyPatch } from "../types"
import type { ChangeEntry, EntitySnapshot, LoggedChange } from "./changes"
import {
  ChangeRowSchema,
  ChangeValueRowSchema,
  CountRowSchema,
  EdgeRowSchema,
  GroupCountRowSchema,
  MaxIdRowSchema,
  NodeRowSchema,
  SettingRowSchema,
  parseRow,
  type EdgeFilter,
  type ChangeRow,
  type EdgeRecord,
  type EdgeRow,
  type NodeRecord,
  type NodeRow,
} from "./rows"
import * as sql from "./statements"

/**
 * Options for SchemaManager.
 */
export interface SchemaManagerOptions {
  logger?: Logger
  /** Clock for timestamps, milliseconds since the epoch */
  clock?: () => number
}

/**
 * Equality filter on one property.
 */
export interface PropertyFilter {
  key: string
  value: unknown
}

/**
 * Creation and modification times to write instead of the clock's.
 */
export interface Timestamps {
  createdAt: number
  updatedAt: number
}

/**
 * Issues row operations against the backing engine.
 */
export class SchemaManager implements IdWatermarkStore {
  private readonly logger: Logger
  private readonly clock: () => number

  constructor(
    private readonly driver: SqlDriverProvider,
    options: SchemaManagerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger
    this.clock = options.clock ?? Date.now
  }

  // ===========================================================================
  // SCHEMA
  // ===========================================================================

  /**
   * Create the tables and indexes if they are missing. Idempotent, and
   * issues no writes against a database that already has the schema.
   */
  ensureSchema(): void {
    if (this.count(sql.COUNT_SCHEMA_TABLES) < sql.SCHEMA_TABLES.length) {
      this.guard(sql.CREATE_SCHEMA, () => this.driver.exec(sql.CREATE_SCHEMA))
    }

    if (this.getSetting(sql.SETTING_SCHEMA_VERSION) === undefined) {
      this.putSetting(sql.SETTING_SCHEMA_VERSION, JSON.stringify(sql.SCHEMA_VERSION))
      this.logger.info("Created graph schema", { version: sql.SCHEMA_VERSION })
    }
  }

  /**
   * Schema version recorded in the database, if any.
   */
  schemaVersion(): number | undefined {
    const raw = this.getSetting(sql.SETTING_SCHEMA_VERSION)
    return raw === undefined ? undefined : Number(raw)
  }

  // ===========================================================================
  // NODES
  // ===========================================================================

  /**
   * Insert a node row and its properties.
   */
  insertNode(
    id: EntityId,
    properties: Readonly<Record<string, unknown>>,
    kind: string | null = null,
    timestamps: Timestamps = this.now(),
  ): NodeRecord {
    const rows = encodeProperties(properties)
    const { createdAt, updatedAt } = timestamps

    this.run(sql.INSERT_NODE, [id, kind, createdAt, updatedAt])
    this.writeProperties(id, rows)

    return { id, kind, createdAt, updatedAt, properties: decodeProperties(rows) }
  }

  getNodeRow(id: EntityId): NodeRow | undefined {
    const raw = this.one(sql.SELECT_NODE, [id])
    return raw ? parseRow(NodeRowSchema, raw, "nodes") : undefined
  }

  /**
   * Node row with its properties, or undefined.
   */
  getNodeRecord(id: EntityId): NodeRecord | undefined {
    const row = this.getNodeRow(id)
    return row ? { ...row, properties: this.loadProperties(id) } : undefined
  }

  /**
   * Delete a node row and its properties. Incident edges must already be
   * gone; the foreign keys reject the delete otherwise.
   */
  deleteNode(id: EntityId): boolean {
    this.run(sql.DELETE_PROPERTIES, [id])
    return this.run(sql.DELETE_NODE, [id]).changes > 0
  }

  /**
   * Nodes matching every filter (AND). Values must match in type as well
   * as value, so `1` never matches `true`. Empty filters match all nodes.
   */
  findNodes(filters: readonly PropertyFilter[], options: { kind?: string } = {}): NodeRow[] {
    const params: SqlValue[] = []
    const where: string[] = []
    let query: string

    const [head, ...rest] = filters.map((filter) => encodeValue(filter.key, filter.value))

    if (head) {
      query = sql.SELECT_NODES_BY_PROPERTY
      where.push(sql.PROPERTY_FILTER_HEAD)
      params.push(head.key, head.valueType, head.value)
    } else {
      query = `SELECT ${sql.NODE_COLUMNS} FROM nodes n`
    }

    for (const row of rest) {
      where.push(sql.PROPERTY_FILTER_EXISTS)
      params.push(row.key, row.valueType, row.value)
    }

    if (options.kind !== undefined) {
      where.push("n.kind = ?")
      params.push(options.kind)
    }

    if (where.length > 0) {
      query += ` WHERE ${where.join(" AND ")}`
    }
    query += " ORDER BY n.id"

    return this.all(query, params).map((raw) => parseRow(NodeRowSchema, raw, "nodes"))
  }

  allNodes(): NodeRow[] {
    return this.all(sql.SELECT_ALL_NODES).map((raw) => parseRow(NodeRowSchema, raw, "nodes"))
  }

  countNodes(): number {
    return this.count(sql.COUNT_NODES)
  }

  /**
   * Node counts per kind; unkinded nodes are counted under `null`.
   */
  kindCounts(): Map<string | null, number> {
    return this.groupCounts(sql.COUNT_NODES_BY_KIND)
  }

  // ===========================================================================
  // EDGES
  // ===========================================================================

  /**
   * Insert an edge row and its properties. Endpoint existence is the
   * caller's responsibility; the foreign keys back it up.
   */
  insertEdge(
    id: EntityId,
    src: EntityId,
    dst: EntityId,
    label: string | null,
    properties: Readonly<Record<string, unknown>>,
    timestamps: Timestamps = this.now(),
  ): EdgeRecord {
    const rows = encodeProperties(properties)
    const { createdAt, updatedAt } = timestamps

    this.run(sql.INSERT_EDGE, [id, src, dst, label, createdAt, updatedAt])
    this.writeProperties(id, rows)

    return { id, src, dst, label, createdAt, updatedAt, properties: decodeProperties(rows) }
  }

  getEdgeRow(id: EntityId): EdgeRow | undefined {
    const raw = this.one(sql.SELECT_EDGE, [id])
    return raw ? parseRow(EdgeRowSchema, raw, "edges") : undefined
  }

  getEdgeRecord(id: EntityId): EdgeRecord | undefined {
    const row = this.getEdgeRow(id)
    return row ? { ...row, properties: this.loadProperties(id) } : undefined
  }

  deleteEdge(id: EntityId): boolean {
    this.run(sql.DELETE_PROPERTIES, [id])
    return this.run(sql.DELETE_EDGE, [id]).changes > 0
  }

  /**
   * The adjacency primitive. Omitted filters are wildcards. Rows come back
   * in ascending edge id order.
   */
  findEdges(filter: EdgeFilter = {}): EdgeRow[] {
    const where: string[] = []
    const params: SqlValue[] = []

    if (filter.src !== undefined) {
      where.push("e.src = ?")
      params.push(filter.src)
    }
    if (filter.dst !== undefined) {
      where.push("e.dst = ?")
      params.push(filter.dst)
    }
    if (filter.label === null) {
      where.push("e.label IS NULL")
    } else if (filter.label !== undefined) {
      where.push("e.label = ?")
      params.push(filter.label)
    }

    let query = sql.SELECT_EDGES
    if (where.length > 0) {
      query += ` WHERE ${where.join(" AND ")}`
    }
    query += " ORDER BY e.id"

    return this.all(query, params).map((raw) => parseRow(EdgeRowSchema, raw, "edges"))
  }

  /**
   * Number of edges with `id` as source or target. A self-loop counts once.
   */
  countIncidentEdges(id: EntityId): number {
    return this.count(sql.COUNT_INCIDENT_EDGES, [id, id])
  }

  countEdges(): number {
    return this.count(sql.COUNT_EDGES)
  }

  labelCounts(): Map<string | null, number> {
    return this.groupCounts(sql.COUNT_EDGES_BY_LABEL)
  }

  // ===========================================================================
  // PROPERTIES
  // ===========================================================================

  /**
   * Decoded properties of a node or edge.
   */
  loadProperties(ownerId: EntityId): PropertyMap {
    const rows = this.all(sql.SELECT_PROPERTIES, [ownerId]).map(parseStoredProperty)
    return decodeProperties(rows)
  }

  /**
   * Merge a patch into the owner's properties: keys with `null` are removed,
   * other keys written, the rest untouched. Returns the decoded values that
   * were written, keyed like the patch.
   */
  updateProperties(
    owner: { id: EntityId; kind: "node" | "edge" },
    patch: Readonly<Record<string, unknown>>,
    now: number = this.clock(),
  ): { set: PropertyMap; removed: string[]; updatedAt: number } {
    const { set, remove } = encodePatch(patch)

    this.writeProperties(owner.id, set)
    for (const key of remove) {
      this.run(sql.DELETE_PROPERTY, [owner.id, key])
    }
    this.run(owner.kind === "node" ? sql.TOUCH_NODE : sql.TOUCH_EDGE, [now, owner.id])

    return { set: decodeProperties(set), removed: remove, updatedAt: now }
  }

  private writeProperties(ownerId: EntityId, rows: readonly PropertyRow[]): void {
    for (const row of rows) {
      this.run(sql.UPSERT_PROPERTY, [ownerId, row.key, row.value, row.valueType])
    }
  }

  /**
   * Delete every node, edge and property row. Settings survive, and the
   * identifier high-water mark is raised first so cleared ids stay retired.
   */
  clear(): void {
    const highest = this.maxPersistedId()
    if (highest > 0) this.recordHighWater(highest)

    this.run(sql.DELETE_ALL_PROPERTIES)
    this.run(sql.DELETE_ALL_EDGES)
    this.run(sql.DELETE_ALL_NODES)
  }

  // ===========================================================================
  // CHANGE LOG
  // ===========================================================================

  /**
   * Batch number for the next group of changes.
   */
  nextChangeBatch(): number {
    return this.count(sql.SELECT_NEXT_BATCH)
  }

  /**
   * Append one entry to the change log.
   */
  recordChange(batch: number, change: ChangeEntry): void {
    const now = this.clock()

    if (change.action === "update") {
      const changeId = this.insertChange([
        batch,
        change.action,
        change.id,
        change.entityKind,
        null,
        null,
        null,
        null,
        change.previousUpdatedAt,
        now,
      ])
      this.writeChangeValues(changeId, "before", change.before)
      this.writeChangeValues(changeId, "after", change.after)
      return
    }

    const { entity } = change
    const changeId = this.insertChange([
      batch,
      change.action,
      entity.id,
      entity.entityKind,
      entity.entityKind === "edge" ? entity.label : entity.kind,
      entity.entityKind === "edge" ? entity.src : null,
      entity.entityKind === "edge" ? entity.dst : null,
      entity.createdAt,
      entity.updatedAt,
      now,
    ])
    this.writeChangeValues(changeId, change.action === "create" ? "after" : "before", entity.properties)
  }

  /**
   * Entries of the most recent batch in the order they were recorded.
   */
  lastChangeBatch(): LoggedChange[] {
    return this.all(sql.SELECT_LAST_BATCH).map((raw) => this.readChange(parseRow(ChangeRowSchema, raw, "changes")))
  }

  deleteChangeBatch(batch: number): void {
    this.run(sql.DELETE_BATCH_VALUES, [batch])
    this.run(sql.DELETE_BATCH, [batch])
  }

  countChanges(): number {
    return this.count(sql.COUNT_CHANGES)
  }

  clearChanges(): void {
    this.run(sql.DELETE_ALL_CHANGE_VALUES)
    this.run(sql.DELETE_ALL_CHANGES)
  }

  private insertChange(params: readonly SqlValue[]): number {
    return Number(this.run(sql.INSERT_CHANGE, params).lastInsertRowid)
  }

  private writeChangeValues(changeId: number, side: "before" | "after", values: Readonly<PropertyPatch>): void {
    for (const [key, value] of Object.entries(values)) {
      if (value === null) {
        this.run(sql.INSERT_CHANGE_VALUE, [changeId, side, key, null, null])
      } else {
        const row = encodeValue(key, value)
        this.run(sql.INSERT_CHANGE_VALUE, [changeId, side, key, row.value, row.valueType])
      }
    }
  }

  private readChange(row: ChangeRow): LoggedChange {
    const before = createPropertyPatch()
    const after = createPropertyPatch()

    for (const raw of this.all(sql.SELECT_CHANGE_VALUES, [row.changeId])) {
      const value = parseRow(ChangeValueRowSchema, raw, "change_values")
      const target = value.side === "before" ? before : after
      target[value.key] =
        value.value_type === null
          ? null
          : decodeValue(parseStoredProperty({ key: value.key, value: value.value, value_type: value.value_type }))
    }

    const logged = { changeId: row.changeId, batch: row.batch, recordedAt: row.recordedAt }
    if (row.action === "update") {
      return {
        ...logged,
        action: row.action,
        entityKind: row.entityKind,
        id: row.id,
        before,
        after,
        previousUpdatedAt: row.updatedAt,
      }
    }
    return { ...logged, action: row.action, entity: snapshotOf(row, row.action === "create" ? after : before) }
  }

  // ===========================================================================
  // SETTINGS & IDENTITY
  // ===========================================================================

  getSetting(key: string): string | undefined {
    const raw = this.one(sql.SELECT_SETTING, [key])
    return raw ? parseRow(SettingRowSchema, raw, "settings").value : undefined
  }

  putSetting(key: string, value: string): void {
    this.run(sql.UPSERT_SETTING, [key, value])
  }

  /**
   * Largest identifier persisted in either table or retired.
   */
  maxPersistedId(): EntityId {
    const live = parseRow(MaxIdRowSchema, this.one(sql.SELECT_MAX_ENTITY_ID), "identity").id
    const retired = Number(this.getSetting(sql.SETTING_ID_HIGH_WATER) ?? 0)
    return Math.max(live, Number.isSafeInteger(retired) ? retired : 0)
  }

  recordHighWater(id: EntityId): void {
    this.run(sql.RAISE_SETTING, [sql.SETTING_ID_HIGH_WATER, String(id)])
  }

  // ===========================================================================
  // DRIVER ACCESS
  // ===========================================================================

  private now(): Timestamps {
    const now = this.clock()
    return { createdAt: now, updatedAt: now }
  }

  private run(statement: string, params: readonly SqlValue[] = []): RunResult {
    return this.guard(statement, () => this.driver.execute(statement, params))
  }

  private all(statement: string, params: readonly SqlValue[] = []): SqlRow[] {
    return this.guard(statement, () => this.driver.query(statement, params))
  }

  private one(statement: string, params: readonly SqlValue[] = []): SqlRow | undefined {
    return this.guard(statement, () => this.driver.queryOne(statement, params))
  }

  private count(statement: string, params: readonly SqlValue[] = []): number {
    return parseRow(CountRowSchema, this.one(statement, params), "count").count
  }

  private groupCounts(statement: string): Map<string | null, number> {
    const counts = new Map<string | null, number>()
    for (const raw of this.all(statement)) {
      const row = parseRow(GroupCountRowSchema, raw, "count")
      counts.set(row.name, row.count)
    }
    return counts
  }

  /**
   * Run a driver call, wrapping foreign failures in StorageError.
   */
  private guard<T>(statement: string, work: () => T): T {
    try {
      return work()
    } catch (error) {
      if (error instanceof GraphError) throw error
      const cause = toError(error)
      this.logger.error("Storage operation failed", { sql: statement.trim(), error: cause.message })
      throw new StorageError(`Storage operation failed: ${cause.message}`, statement.trim(), cause)
    }
  }
}

function snapshotOf(row: ChangeRow, values: Readonly<PropertyPatch>): EntitySnapshot {
  const properties = createPropertyMap()
  for (const [key, value] of Object.entries(values)) {
    if (value === null) throw new StorageError(`Malformed changes row: snapshot property '${key}' has no value`)
    properties[key] = value
  }
  if (row.createdAt === null) {
    throw new StorageError(`Malformed changes row: ${row.action} of ${row.id} has no creation time`)
  }

  const base = { id: row.id, createdAt: row.createdAt, updatedAt: row.updatedAt, properties }
  if (row.entityKind === "node") {
    return { entityKind: "node", kind: row.name, ...base }
  }
  if (row.src === null || row.dst === null) {
    throw new StorageError(`Malformed changes row: edge ${row.id} has no endpoints`)
  }
  return { entityKind: "edge", src: row.src, dst: row.dst, label: row.name, ...base }
}
