/**
 * better-sqlite3 Driver
 *
 * Implements SqlDriverProvider over a synchronous better-sqlite3
 * connection. Prepared statements are cached per SQL text.
 */

import Database from "better-sqlite3"
import {
  StorageError,
  silentLogger,
  toError,
  type Logger,
  type RunResult,
  type SqlDriverFactory,
  type SqlDriverProvider,
  type SqlRow,
  type SqlValue,
} from "sqlgraph"

export interface BetterSqliteDriverOptions {
  /** Database file, or ":memory:" (the default) */
  path?: string
  readonly?: boolean
  /** Busy timeout in milliseconds */
  timeout?: number
  /** Log each executed statement at debug level */
  verbose?: boolean
  logger?: Logger
}

const MEMORY_PATH = ":memory:"

/**
 * SQLite driver backed by better-sqlite3.
 */
export class BetterSqliteDriver implements SqlDriverProvider {
  readonly name = "better-sqlite3"
  readonly path: string
  private readonly db: Database.Database
  private readonly statements = new Map<string, Database.Statement>()

  constructor(options: BetterSqliteDriverOptions = {}) {
    const logger = options.logger ?? silentLogger
    this.path = options.path ?? MEMORY_PATH
    this.db = openDatabase(this.path, options, logger)

    this.db.pragma("foreign_keys = ON")
    logger.debug("Opened database", { path: this.path, readonly: options.readonly ?? false })
  }

  execute(sql: string, params: readonly SqlValue[] = []): RunResult {
    const result = this.prepare(sql).run(...params.map(bindable))
    return { changes: result.changes, lastInsertRowid: result.lastInsertRowid }
  }

  query(sql: string, params: readonly SqlValue[] = []): SqlRow[] {
    return this.prepare(sql).all(...params.map(bindable)).filter(isRow)
  }

  queryOne(sql: string, params: readonly SqlValue[] = []): SqlRow | undefined {
    const row = this.prepare(sql).get(...params.map(bindable))
    return isRow(row) ? row : undefined
  }

  exec(script: string): void {
    this.db.exec(script)
  }

  transaction<T>(work: () => T): T {
    // better-sqlite3 turns nested transactions into savepoints
    return this.db.transaction(work)()
  }

  inTransaction(): boolean {
    return this.db.inTransaction
  }

  isOpen(): boolean {
    return this.db.open
  }

  close(): void {
    if (!this.db.open) return
    this.statements.clear()
    this.db.close()
  }

  private prepare(sql: string): Database.Statement {
    let statement = this.statements.get(sql)
    if (!statement) {
      statement = this.db.prepare(sql)
      this.statements.set(sql, statement)
    }
    return statement
  }
}

/**
 * Create a better-sqlite3 driver.
 */
export const createSqliteDriver: SqlDriverFactory<BetterSqliteDriverOptions> = (config) =>
  new BetterSqliteDriver(config)

function openDatabase(path: string, options: BetterSqliteDriverOptions, logger: Logger): Database.Database {
  try {
    return new Database(path, {
      readonly: options.readonly ?? false,
      fileMustExist: options.readonly ?? false,
      timeout: options.timeout,
      verbose: options.verbose ? (message?: unknown) => logger.debug("SQL", { sql: String(message) }) : undefined,
    })
  } catch (error) {
    const cause = toError(error)
    throw new StorageError(`Could not open database at ${path}: ${cause.message}`, undefined, cause)
  }
}

/**
 * better-sqlite3 binds blobs from Buffers only.
 */
function bindable(value: SqlValue): SqlValue | Buffer {
  if (value instanceof Uint8Array && !Buffer.isBuffer(value)) {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }
  return value
}

function isRow(value: unknown): value is SqlRow {
  return typeof value === "object" && value !== null
}
