/**
 * Logger
 *
 * Leveled, structured logging for engine internals. Silent unless a level
 * is configured, so embedding applications see nothing by default.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export type LogData = Record<string, unknown>

/**
 * Logging contract. Pass your own implementation to route engine logs
 * into an application logger.
 */
export interface Logger {
  debug(message: string, data?: LogData): void
  info(message: string, data?: LogData): void
  warn(message: string, data?: LogData): void
  error(message: string, data?: LogData): void
  /** Derive a logger for a sub-context, e.g. "graph:schema" */
  child(context: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  /** Output sink, defaults to console */
  sink?: LogSink
}

/**
 * Receives formatted log lines.
 */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line)
  else if (level === "warn") console.warn(line)
  else console.log(line)
}

/**
 * Logger that writes `[level] (context) message {data}` lines to a sink.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel
  private readonly sink: LogSink

  constructor(
    private readonly context: string,
    options: LoggerOptions = {},
  ) {
    this.level = options.level ?? "info"
    this.sink = options.sink ?? consoleSink
  }

  debug(message: string, data?: LogData): void {
    this.write("debug", message, data)
  }

  info(message: string, data?: LogData): void {
    this.write("info", message, data)
  }

  warn(message: string, data?: LogData): void {
    this.write("warn", message, data)
  }

  error(message: string, data?: LogData): void {
    this.write("error", message, data)
  }

  child(context: string): Logger {
    return new ConsoleLogger(`${this.context}:${context}`, { level: this.level, sink: this.sink })
  }

  private write(level: Exclude<LogLevel, "silent">, message: string, data?: LogData): void {
    if (levelPriority[level] < levelPriority[this.level]) return
    const suffix = data ? ` ${JSON.stringify(data)}` : ""
    this.sink(level, `[${level}] (${this.context}) ${message}${suffix}`)
  }
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
}

/**
 * Create a logger for a context. Level "silent" returns the shared
 * silent logger.
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  if (options.level === "silent") return silentLogger
  return new ConsoleLogger(context, options)
}
