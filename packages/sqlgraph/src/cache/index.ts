export { ObjectCache } from "./object-cache"
export type { CacheStats, Identified } from "./object-cache"
