export { ConsoleLogger, createLogger, silentLogger } from "./logger"
export type { Logger, LoggerOptions, LogLevel, LogData, LogSink } from "./logger"
