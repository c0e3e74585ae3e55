export { IdAllocator, isEntityId, assertEntityId } from "./allocator"
export type { IdGenerator, IdWatermarkStore } from "./allocator"
