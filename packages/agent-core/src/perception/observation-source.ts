import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { CapturedFrame } from "../types/observation.js";

/** Capture contract for whatever produces scene and speech text. */
export interface ObservationSource {
  capture(signal: AbortSignal): Promise<CapturedFrame>;
}

const frameSchema = z.object({
  scene: z.string().default(""),
  heard: z.string().default(""),
});

/**
 * Reads `{ "scene": ..., "heard": ... }` written by an external capture tool
 * (screen describer, speech recognizer). Re-read on every capture.
 */
export class FileObservationSource implements ObservationSource {
  constructor(readonly filePath: string) {}

  async capture(signal: AbortSignal): Promise<CapturedFrame> {
    const text = await readFile(this.filePath, { encoding: "utf-8", signal });
    const parsed = frameSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Invalid observation file ${this.filePath}: ${parsed.error.issues[0]?.message ?? "bad shape"}`);
    }
    return parsed.data;
  }
}

/** Plays back scripted frames, repeating the last one. */
export class StaticObservationSource implements ObservationSource {
  private readonly frames: CapturedFrame[];
  private index = 0;

  constructor(frames: CapturedFrame | CapturedFrame[]) {
    this.frames = Array.isArray(frames) ? [...frames] : [frames];
  }

  set(frame: CapturedFrame): void {
    this.frames.splice(0, this.frames.length, frame);
    this.index = 0;
  }

  async capture(signal: AbortSignal): Promise<CapturedFrame> {
    signal.throwIfAborted();
    const frame = this.frames[Math.min(this.index, this.frames.length - 1)] ?? { scene: "", heard: "" };
    this.index += 1;
    return { ...frame };
  }
}
