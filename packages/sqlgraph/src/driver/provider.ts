/**
 * SQL Driver Provider Interface
 *
 * Abstraction layer over the backing relational engine.
 * The engine only ever talks to storage through this contract, so any
 * synchronous SQLite binding can be plugged in.
 */

// =============================================================================
// VALUES
// =============================================================================

/**
 * A value that can be bound to a statement parameter or read from a column.
 */
export type SqlValue = string | number | bigint | Uint8Array | null

/**
 * A row as returned by the driver: column name to raw column value.
 */
export type SqlRow = Record<string, unknown>

// =============================================================================
// DRIVER PROVIDER INTERFACE
// =============================================================================

/**
 * Interface for SQL driver providers.
 * Implement this to support a different SQLite binding.
 */
export interface SqlDriverProvider {
  /** Unique name for this driver (e.g., 'better-sqlite3') */
  readonly name: string

  /** Execute a mutating statement with positional parameters */
  execute(sql: string, params?: readonly SqlValue[]): RunResult

  /** Execute a query and return all rows */
  query(sql: string, params?: readonly SqlValue[]): SqlRow[]

  /** Execute a query and return the first row, if any */
  queryOne(sql: string, params?: readonly SqlValue[]): SqlRow | undefined

  /** Execute a script of one or more statements without parameters */
  exec(script: string): void

  /**
   * Run `work` inside a transaction. Commits when it returns, rolls back
   * when it throws. Calls made while a transaction is open nest as
   * savepoints.
   */
  transaction<T>(work: () => T): T

  /** Whether a transaction is currently open */
  inTransaction(): boolean

  /** Whether the connection is open */
  isOpen(): boolean

  /** Close the connection */
  close(): void
}

/**
 * Outcome of a mutating statement.
 */
export interface RunResult {
  /** Rows inserted, updated or deleted */
  changes: number
  /** Row id of the last inserted row */
  lastInsertRowid: number | bigint
}

/**
 * Factory function type for creating driver instances.
 */
export type SqlDriverFactory<C> = (config: C) => SqlDriverProvider
