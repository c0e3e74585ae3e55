/**
 * Graph Configuration
 *
 * Options accepted when opening a graph, validated with zod.
 */

import { z } from "zod"
import { ConfigurationError } from "../errors"
import type { Logger } from "../logger"

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"])

/**
 * Plain (serializable) graph options.
 */
export const GraphOptionsSchema = z
  .object({
    /** Whether deleteNode cascades over incident edges when not told otherwise */
    defaultCascade: z.boolean().default(false),
    /** Record every mutation in the change log so it can be undone */
    trackChanges: z.boolean().default(true),
    /** Level for the built-in console logger; ignored when a logger is given */
    logLevel: LogLevelSchema.optional(),
  })
  .strict()

export type GraphOptionsInput = z.input<typeof GraphOptionsSchema>

/**
 * Options for constructing a Graph.
 */
export interface GraphOptions extends GraphOptionsInput {
  /** Custom logger. Defaults to a console logger at `logLevel`, or silent */
  logger?: Logger
}

export interface ResolvedGraphOptions {
  defaultCascade: boolean
  trackChanges: boolean
  logLevel: z.infer<typeof LogLevelSchema>
  logger?: Logger
}

/** Environment variable consulted when no log level is configured */
export const LOG_LEVEL_ENV = "SQLGRAPH_LOG_LEVEL"

/**
 * Validate a zod schema against input, raising ConfigurationError with
 * every issue on failure.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    throw new ConfigurationError(`Invalid ${what}`, issues)
  }
  return result.data
}

/**
 * Resolve graph options, applying defaults and the environment log level.
 */
export function resolveGraphOptions(
  options: GraphOptions = {},
  env: Record<string, string | undefined> = process.env,
): ResolvedGraphOptions {
  const { logger, ...plain } = options
  const parsed = parseOptions(GraphOptionsSchema, plain, "graph options")
  const level = parsed.logLevel ?? parseOptions(LogLevelSchema.default("silent"), env[LOG_LEVEL_ENV], LOG_LEVEL_ENV)

  return {
    defaultCascade: parsed.defaultCascade,
    trackChanges: parsed.trackChanges,
    logLevel: level,
    logger,
  }
}
