/**
 * Custom Error Classes
 */

import type { EntityId, EntityKind } from "../types"

/**
 * Base error for all graph errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphError"
    this.cause = cause

    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Not found error.
 * Thrown when an identifier does not resolve to a live node or edge.
 */
export class NotFoundError extends GraphError {
  constructor(
    public readonly entityKind?: EntityKind,
    public readonly entityId?: unknown,
  ) {
    const what = entityKind === "edge" ? "Edge" : entityKind === "node" ? "Node" : "Entity"
    const details = entityId !== undefined ? ` with id ${String(entityId)}` : ""
    super(`${what} not found${details}`)
    this.name = "NotFoundError"
  }
}

/**
 * Dangling reference error.
 * Thrown when an edge endpoint does not reference an existing node.
 */
export class DanglingReferenceError extends GraphError {
  constructor(
    public readonly endpoint: "src" | "dst",
    public readonly nodeId: unknown,
  ) {
    const side = endpoint === "src" ? "Source" : "Target"
    super(`${side} node ${String(nodeId)} does not exist`)
    this.name = "DanglingReferenceError"
  }
}

/**
 * Referential integrity error.
 * Thrown when a non-cascading delete would orphan incident edges.
 */
export class ReferentialIntegrityError extends GraphError {
  constructor(
    public readonly nodeId: EntityId,
    public readonly edgeCount: number,
  ) {
    super(
      `Node ${nodeId} still has ${edgeCount} incident edge${edgeCount === 1 ? "" : "s"}; delete them first or pass cascade: true`,
    )
    this.name = "ReferentialIntegrityError"
  }
}

/**
 * Property type error.
 * Thrown when a property key or value cannot be stored losslessly.
 */
export class PropertyTypeError extends GraphError {
  constructor(
    message: string,
    public readonly key?: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = "PropertyTypeError"
  }
}

/**
 * Storage error.
 * Thrown when the backing engine fails. Wraps the underlying cause.
 */
export class StorageError extends GraphError {
  constructor(
    message: string,
    public readonly sql?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "StorageError"
  }
}

/**
 * Stale entity error.
 * Thrown when an object dropped from the cache is used after a newer
 * instance for the same identifier has been loaded.
 */
export class StaleEntityError extends GraphError {
  constructor(
    public readonly entityKind: EntityKind,
    public readonly entityId: EntityId,
  ) {
    super(`Stale ${entityKind} ${entityId}: fetch it again from the graph`)
    this.name = "StaleEntityError"
  }
}

/**
 * Thrown when a graph is used after close().
 */
export class GraphClosedError extends GraphError {
  constructor() {
    super("Graph is closed")
    this.name = "GraphClosedError"
  }
}

/**
 * Configuration error.
 * Thrown when options fail validation.
 */
export class ConfigurationError extends GraphError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message)
    this.name = "ConfigurationError"
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
