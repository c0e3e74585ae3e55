/**
 * Recording Driver Fixture
 *
 * SqlDriverProvider that records every call and answers queries from
 * canned rows, for testing the SQL the engine issues without a database.
 */

import type { RunResult, SqlDriverProvider, SqlRow, SqlValue } from '../../../src/driver'

export interface RecordedCall {
  method: 'execute' | 'query' | 'queryOne' | 'exec'
  sql: string
  params: readonly SqlValue[]
}

type Matcher = string | RegExp

function matches(matcher: Matcher, sql: string): boolean {
  return typeof matcher === 'string' ? sql.includes(matcher) : matcher.test(sql)
}

export class RecordingDriver implements SqlDriverProvider {
  readonly name = 'recording'
  readonly calls: RecordedCall[] = []
  private readonly responses: Array<{ matcher: Matcher; rows: SqlRow[] }> = []
  private failure: { matcher: Matcher; message: string } | undefined
  private depth = 0
  private open = true

  /** Answer queries whose SQL matches with `rows` */
  respond(matcher: Matcher, rows: SqlRow[]): this {
    this.responses.push({ matcher, rows })
    return this
  }

  /** Throw a plain Error from any call whose SQL matches */
  failOn(matcher: Matcher, message = 'disk I/O error'): this {
    this.failure = { matcher, message }
    return this
  }

  /** Calls of one method, most useful for `execute` */
  callsOf(method: RecordedCall['method']): RecordedCall[] {
    return this.calls.filter((call) => call.method === method)
  }

  execute(sql: string, params: readonly SqlValue[] = []): RunResult {
    this.record('execute', sql, params)
    return { changes: 1, lastInsertRowid: 0 }
  }

  query(sql: string, params: readonly SqlValue[] = []): SqlRow[] {
    this.record('query', sql, params)
    return this.rowsFor(sql)
  }

  queryOne(sql: string, params: readonly SqlValue[] = []): SqlRow | undefined {
    this.record('queryOne', sql, params)
    return this.rowsFor(sql)[0]
  }

  exec(script: string): void {
    this.record('exec', script, [])
  }

  transaction<T>(work: () => T): T {
    this.depth++
    try {
      return work()
    } finally {
      this.depth--
    }
  }

  inTransaction(): boolean {
    return this.depth > 0
  }

  isOpen(): boolean {
    return this.open
  }

  close(): void {
    this.open = false
  }

  private record(method: RecordedCall['method'], sql: string, params: readonly SqlValue[]): void {
    this.calls.push({ method, sql, params: [...params] })
    if (this.failure && matches(this.failure.matcher, sql)) {
      throw new Error(this.failure.message)
    }
  }

  private rowsFor(sql: string): SqlRow[] {
    return this.responses.find((response) => matches(response.matcher, sql))?.rows ?? []
  }
}
