export { MemoryStore, buildMemoryItem, DEFAULT_MEMORY_STORE_CONFIG, type MemoryStoreConfig } from "./memory-store.js";
export { ShortTermMemory } from "./short-term.js";
export { tokenize, overlapScore } from "./tokenize.js";
export type { MemoryItem, ScoredMemoryItem } from "./types.js";
