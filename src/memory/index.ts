export { escapeLike, MemoryStore, type MemoryStoreOptions, memoryId } from "./memory-store.js";
export type { AddMemoryOptions, Ask, Memory, MemoryStats, RecallEntry } from "./types.js";
