/**
 * Driver Module
 *
 * Contract between the engine and the backing relational engine.
 */

export type { SqlDriverProvider, SqlDriverFactory, SqlValue, SqlRow, RunResult } from "./provider"
