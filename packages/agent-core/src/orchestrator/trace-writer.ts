import fs from "node:fs/promises";
import path from "node:path";
import { describeError } from "../errors.js";
import type { Logger } from "../logging.js";

export type TraceArtifact = "intents" | "dispatch" | "planner" | "state_active";
export type TraceLog = Exclude<TraceArtifact, "state_active">;

const TRACE_FILES: Record<TraceArtifact, readonly string[]> = {
  intents: ["intents.jsonl"],
  dispatch: ["dispatch.jsonl"],
  planner: ["planner.jsonl"],
  state_active: ["state", "active.json"],
};

export function resolveTracePath(dir: string, type: TraceArtifact): string {
  return path.join(dir, ...TRACE_FILES[type]);
}

/**
 * Queues trace writes so the tick never waits on disk. Writes land in the
 * order they were requested; a failed write is logged and the queue moves on.
 */
export class TraceWriter {
  private queue: Promise<void> = Promise.resolve();
  private readonly logger: Logger;
  private readonly createdDirs = new Set<string>();

  constructor(
    readonly dir: string,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "trace" });
  }

  /** Adds one JSON line to an append-only trace log. */
  append(type: TraceLog, payload: unknown): void {
    this.enqueue(type, async (filePath) => {
      await fs.appendFile(filePath, `${JSON.stringify(payload)}\n`, "utf-8");
    });
  }

  writeActiveState(payload: unknown): void {
    this.enqueue("state_active", async (filePath) => {
      // Readers never see a half-written snapshot.
      const staging = `${filePath}.tmp`;
      await fs.writeFile(staging, `${JSON.stringify(payload, null, 2)}\n`, "utf-8");
      await fs.rename(staging, filePath);
    });
  }

  flush(): Promise<void> {
    return this.queue;
  }

  private enqueue(type: TraceArtifact, write: (filePath: string) => Promise<void>): void {
    const filePath = resolveTracePath(this.dir, type);
    this.queue = this.queue
      .then(async () => {
        await this.prepareDir(path.dirname(filePath));
        await write(filePath);
      })
      .catch((err: unknown) => {
        this.logger.warn({ artifact: type, err: describeError(err) }, "trace write failed");
      });
  }

  private async prepareDir(dirPath: string): Promise<void> {
    if (this.createdDirs.has(dirPath)) return;
    await fs.mkdir(dirPath, { recursive: true });
    this.createdDirs.add(dirPath);
  }
}
