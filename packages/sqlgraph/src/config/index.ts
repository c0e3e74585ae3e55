export {
  GraphOptionsSchema,
  LogLevelSchema,
  LOG_LEVEL_ENV,
  parseOptions,
  resolveGraphOptions,
} from "./config"
export type { GraphOptions, GraphOptionsInput, ResolvedGraphOptions } from "./config"
