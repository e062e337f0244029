/**
 * Long-term memory - JSONL file of past turns
 * Retrieval mixes token overlap with the query and recency of the row.
 */
import fs from "node:fs";
import path from "node:path";
import { overlapScore, tokenize } from "./tokenize.js";
import type { MemoryItem, ScoredMemoryItem } from "./types.js";

export interface MemoryStoreConfig {
  filePath: string;
  maxRecords: number; // floor of 10
  overlapWeight: number; // default 0.85
  recencyWeight: number; // default 0.15
}

export const DEFAULT_MEMORY_STORE_CONFIG: Omit<MemoryStoreConfig, "filePath"> = {
  maxRecords: 1000,
  overlapWeight: 0.85,
  recencyWeight: 0.15,
};

export class MemoryStore {
  private config: MemoryStoreConfig;
  /** Rows as last read or written; the file is only read the first time. */
  private rows: MemoryItem[] | null = null;

  constructor(config: Pick<MemoryStoreConfig, "filePath"> & Partial<MemoryStoreConfig>) {
    this.config = { ...DEFAULT_MEMORY_STORE_CONFIG, ...config };
    this.config.maxRecords = Math.max(10, Math.floor(this.config.maxRecords));
    this.ensureDir(path.dirname(this.config.filePath));
  }

  private ensureDir(dirPath: string) {
    if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
    }
  }

  get filePath(): string {
    return this.config.filePath;
  }

  append(item: MemoryItem): void {
    const rows = this.cachedRows();
    fs.appendFileSync(this.config.filePath, JSON.stringify(item) + "\n", "utf-8");
    rows.push(item);
    if (rows.length > this.config.maxRecords) {
      this.truncate(rows);
    }
  }

  retrieve(query: string, topK = 5): ScoredMemoryItem[] {
    const rows = this.cachedRows();
    if (rows.length === 0) return [];

    const k = Math.max(1, Math.floor(topK));
    const queryTokens = tokenize(query);
    const total = rows.length;

    const scored = rows.map((item, idx): ScoredMemoryItem & { idx: number } => {
      const text = `${item.scene}\n${item.heard}\n${item.speak}`;
      const overlap = overlapScore(queryTokens, tokenize(text));
      const recency = (idx + 1) / total;
      return {
        idx,
        item,
        overlapScore: overlap,
        recencyScore: recency,
        score: overlap * this.config.overlapWeight + recency * this.config.recencyWeight,
      };
    });

    return scored
      .filter((entry) => entry.overlapScore > 0)
      .sort((a, b) => b.score - a.score || b.idx - a.idx)
      .slice(0, k)
      .map(({ item, overlapScore: o, recencyScore, score }) => ({
        item,
        overlapScore: o,
        recencyScore,
        score,
      }));
  }

  /** Reads every row from disk, skipping malformed lines. */
  loadAll(): MemoryItem[] {
    if (!fs.existsSync(this.config.filePath)) return [];
    const rows: MemoryItem[] = [];
    const lines = fs.readFileSync(this.config.filePath, "utf-8").split("\n");
    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      try {
        const parsed: unknown = JSON.parse(trimmed);
        const item = toMemoryItem(parsed);
        if (item) rows.push(item);
      } catch {
        continue;
      }
    }
    return rows;
  }

  private cachedRows(): MemoryItem[] {
    this.rows ??= this.loadAll();
    return this.rows;
  }

  private truncate(rows: MemoryItem[]) {
    const keep = rows.slice(-this.config.maxRecords);
    const tmpPath = `${this.config.filePath}.tmp`;
    fs.writeFileSync(tmpPath, keep.map((row) => JSON.stringify(row)).join("\n") + "\n", "utf-8");
    fs.renameSync(tmpPath, this.config.filePath);
    this.rows = keep;
  }
}

function toMemoryItem(value: unknown): MemoryItem | null {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return null;
  const actions: unknown = Reflect.get(value, "actions");
  return {
    timestamp: stringField(value, "timestamp"),
    scene: stringField(value, "scene"),
    heard: stringField(value, "heard"),
    speak: stringField(value, "speak"),
    actions: Array.isArray(actions) ? actions : [],
  };
}

function stringField(row: object, key: string): string {
  const value: unknown = Reflect.get(row, key);
  return typeof value === "string" ? value : "";
}

export function buildMemoryItem(params: {
  scene: string;
  heard: string;
  speak: string;
  actions: unknown[];
  at?: Date;
}): MemoryItem {
  const at = params.at ?? new Date();
  return {
    timestamp: at.toISOString().slice(0, 19) + "Z",
    scene: params.scene,
    heard: params.heard,
    speak: params.speak,
    actions: params.actions,
  };
}
