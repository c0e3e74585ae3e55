/**
 * SQL Statements
 *
 * Every statement the engine issues, in the SQLite dialect. Values are
 * always bound as positional parameters; only fixed fragments from this
 * file are ever concatenated.
 */

/** Version of the table layout below, stored in `settings` */
export const SCHEMA_VERSION = 1

export const SETTING_SCHEMA_VERSION = "sqlgraph.schema.version"
export const SETTING_ID_HIGH_WATER = "sqlgraph.id.highWater"

// =============================================================================
// DDL
// =============================================================================

/** Tables created by CREATE_SCHEMA */
export const SCHEMA_TABLES = ["nodes", "edges", "properties", "settings", "changes", "change_values"] as const

export const COUNT_SCHEMA_TABLES = `SELECT COUNT(*) AS count FROM sqlite_master WHERE type = 'table' AND name IN (${SCHEMA_TABLES.map(
  (name) => `'${name}'`,
).join(", ")})`

export const CREATE_SCHEMA = `
CREATE TABLE IF NOT EXISTS nodes (
  id INTEGER PRIMARY KEY,
  kind TEXT,
  created_at REAL NOT NULL,
  updated_at REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS edges (
  id INTEGER PRIMARY KEY,
  src INTEGER NOT NULL REFERENCES nodes(id),
  dst INTEGER NOT NULL REFERENCES nodes(id),
  label TEXT,
  created_at REAL NOT NULL,
  updated_at REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS properties (
  owner_id INTEGER NOT NULL,
  key TEXT NOT NULL,
  value,
  value_type TEXT NOT NULL CHECK (value_type IN ('text', 'integer', 'real', 'boolean', 'blob')),
  PRIMARY KEY (owner_id, key)
);

CREATE TABLE IF NOT EXISTS settings (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS changes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  batch INTEGER NOT NULL,
  action TEXT NOT NULL CHECK (action IN ('create', 'delete', 'update')),
  entity_id INTEGER NOT NULL,
  entity_kind TEXT NOT NULL CHECK (entity_kind IN ('node', 'edge')),
  name TEXT,
  src INTEGER,
  dst INTEGER,
  created_at REAL,
  updated_at REAL NOT NULL,
  recorded_at REAL NOT NULL
);

CREATE TABLE IF NOT EXISTS change_values (
  change_id INTEGER NOT NULL,
  side TEXT NOT NULL CHECK (side IN ('before', 'after')),
  key TEXT NOT NULL,
  value,
  value_type TEXT CHECK (value_type IN ('text', 'integer', 'real', 'boolean', 'blob')),
  PRIMARY KEY (change_id, side, key)
);

CREATE INDEX IF NOT EXISTS idx_edges_src ON edges(src);
CREATE INDEX IF NOT EXISTS idx_edges_dst ON edges(dst);
CREATE INDEX IF NOT EXISTS idx_edges_label ON edges(label);
CREATE INDEX IF NOT EXISTS idx_nodes_kind ON nodes(kind);
CREATE INDEX IF NOT EXISTS idx_properties_lookup ON properties(key, value_type, value);
CREATE INDEX IF NOT EXISTS idx_changes_batch ON changes(batch);
`

// =============================================================================
// NODES
// =============================================================================

export const NODE_COLUMNS = "n.id, n.kind, n.created_at, n.updated_at"

export const INSERT_NODE = "INSERT INTO nodes (id, kind, created_at, updated_at) VALUES (?, ?, ?, ?)"
export const SELECT_NODE = `SELECT ${NODE_COLUMNS} FROM nodes n WHERE n.id = ?`
export const SELECT_ALL_NODES = `SELECT ${NODE_COLUMNS} FROM nodes n ORDER BY n.id`
export const TOUCH_NODE = "UPDATE nodes SET updated_at = ? WHERE id = ?"
export const DELETE_NODE = "DELETE FROM nodes WHERE id = ?"
export const COUNT_NODES = "SELECT COUNT(*) AS count FROM nodes"
export const COUNT_NODES_BY_KIND = "SELECT kind AS name, COUNT(*) AS count FROM nodes GROUP BY kind ORDER BY kind"

// =============================================================================
// EDGES
// =============================================================================

export const EDGE_COLUMNS = "e.id, e.src, e.dst, e.label, e.created_at, e.updated_at"

export const INSERT_EDGE =
  "INSERT INTO edges (id, src, dst, label, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)"
export const SELECT_EDGE = `SELECT ${EDGE_COLUMNS} FROM edges e WHERE e.id = ?`
export const SELECT_EDGES = `SELECT ${EDGE_COLUMNS} FROM edges e`
export const TOUCH_EDGE = "UPDATE edges SET updated_at = ? WHERE id = ?"
export const DELETE_EDGE = "DELETE FROM edges WHERE id = ?"
export const COUNT_EDGES = "SELECT COUNT(*) AS count FROM edges"
export const COUNT_EDGES_BY_LABEL = "SELECT label AS name, COUNT(*) AS count FROM edges GROUP BY label ORDER BY label"
export const COUNT_INCIDENT_EDGES = "SELECT COUNT(*) AS count FROM edges WHERE src = ? OR dst = ?"

// =============================================================================
// PROPERTIES
// =============================================================================

export const SELECT_PROPERTIES = "SELECT key, value, value_type FROM properties WHERE owner_id = ? ORDER BY rowid"
export const UPSERT_PROPERTY = `
INSERT INTO properties (owner_id, key, value, value_type) VALUES (?, ?, ?, ?)
ON CONFLICT (owner_id, key) DO UPDATE SET value = excluded.value, value_type = excluded.value_type
`
export const DELETE_PROPERTY = "DELETE FROM properties WHERE owner_id = ? AND key = ?"
export const DELETE_PROPERTIES = "DELETE FROM properties WHERE owner_id = ?"
export const DELETE_ALL_PROPERTIES = "DELETE FROM properties"
export const DELETE_ALL_EDGES = "DELETE FROM edges"
export const DELETE_ALL_NODES = "DELETE FROM nodes"

/** Node lookup driven by the first property filter through idx_properties_lookup */
export const SELECT_NODES_BY_PROPERTY = `SELECT ${NODE_COLUMNS} FROM properties p0 JOIN nodes n ON n.id = p0.owner_id`
export const PROPERTY_FILTER_HEAD = "p0.key = ? AND p0.value_type = ? AND p0.value = ?"
export const PROPERTY_FILTER_EXISTS =
  "EXISTS (SELECT 1 FROM properties p WHERE p.owner_id = n.id AND p.key = ? AND p.value_type = ? AND p.value = ?)"

// =============================================================================
// SETTINGS & IDENTITY
// =============================================================================

export const SELECT_SETTING = "SELECT value FROM settings WHERE key = ?"
export const UPSERT_SETTING = `
INSERT INTO settings (key, value) VALUES (?, ?)
ON CONFLICT (key) DO UPDATE SET value = excluded.value
`
export const RAISE_SETTING = `
INSERT INTO settings (key, value) VALUES (?, ?)
ON CONFLICT (key) DO UPDATE SET
  value = CAST(max(CAST(settings.value AS INTEGER), CAST(excluded.value AS INTEGER)) AS TEXT)
`
export const SELECT_MAX_ENTITY_ID = `
SELECT max(
  coalesce((SELECT max(id) FROM nodes), 0),
  coalesce((SELECT max(id) FROM edges), 0)
) AS id
`

// =============================================================================
// CHANGE LOG
// =============================================================================

export const INSERT_CHANGE = `
INSERT INTO changes (batch, action, entity_id, entity_kind, name, src, dst, created_at, updated_at, recorded_at)
VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
`
export const INSERT_CHANGE_VALUE =
  "INSERT INTO change_values (change_id, side, key, value, value_type) VALUES (?, ?, ?, ?, ?)"
export const SELECT_NEXT_BATCH = "SELECT coalesce(max(batch), 0) + 1 AS count FROM changes"
export const SELECT_LAST_BATCH = `
SELECT id, batch, action, entity_id, entity_kind, name, src, dst, created_at, updated_at, recorded_at
FROM changes WHERE batch = (SELECT max(batch) FROM changes) ORDER BY id
`
export const SELECT_CHANGE_VALUES =
  "SELECT side, key, value, value_type FROM change_values WHERE change_id = ? ORDER BY rowid"
export const DELETE_BATCH_VALUES =
  "DELETE FROM change_values WHERE change_id IN (SELECT id FROM changes WHERE batch = ?)"
export const DELETE_BATCH = "DELETE FROM changes WHERE batch = ?"
export const COUNT_CHANGES = "SELECT COUNT(*) AS count FROM changes"
export const DELETE_ALL_CHANGE_VALUES = "DELETE FROM change_values"
export const DELETE_ALL_CHANGES = "DELETE FROM changes"
