export interface MemoryItem {
  /** ISO-8601 timestamp, second precision. */
  timestamp: string;
  scene: string;
  heard: string;
  speak: string;
  actions: unknown[];
}

export interface ScoredMemoryItem {
  item: MemoryItem;
  overlapScore: number;
  recencyScore: number;
  score: number;
}
