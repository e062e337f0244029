import { nanoid } from "nanoid";
import { describeError } from "../errors.js";
import type { Logger } from "../logging.js";
import type { CapturedFrame, Observation } from "../types/observation.js";
import type { ObservationSource } from "./observation-source.js";

export interface ObservationFeedOptions {
  source: ObservationSource;
  intervalMs: number;
  /** How long heard text stays on observations after it was last heard. */
  heardLatchMs: number;
  logger: Logger;
  now?: () => number;
  onObservation?: (observation: Observation) => void;
}

/**
 * Background capture at the slow rate. The control loop reads latest()
 * synchronously and never waits on a capture.
 */
export class ObservationFeed {
  private readonly logger: Logger;
  private readonly now: () => number;
  private current: Observation | undefined;
  private inFlight: Promise<Observation | undefined> | undefined;
  private controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  private running = false;
  private lastHeard = "";
  private lastHeardAtMs = Number.NEGATIVE_INFINITY;

  constructor(private readonly options: ObservationFeedOptions) {
    this.logger = options.logger.child({ component: "observation-feed" });
    this.now = options.now ?? Date.now;
  }

  latest(): Observation | undefined {
    return this.current;
  }

  /** Captures once; joins the capture already running, if any. */
  refresh(): Promise<Observation | undefined> {
    if (!this.inFlight) {
      this.inFlight = this.captureOnce().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.controller = new AbortController();
    void this.loop();
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
    this.controller.abort();
    await this.inFlight;
  }

  private async loop(): Promise<void> {
    if (!this.running) return;
    await this.refresh();
    if (!this.running) return;
    this.timer = setTimeout(() => void this.loop(), this.options.intervalMs);
  }

  private async captureOnce(): Promise<Observation | undefined> {
    let frame: CapturedFrame;
    try {
      frame = await this.options.source.capture(this.controller.signal);
    } catch (err) {
      if (!this.controller.signal.aborted) {
        this.logger.warn({ err: describeError(err) }, "capture failed, keeping previous observation");
      }
      return this.current;
    }

    const timestampMs = this.now();
    const observation: Observation = Object.freeze({
      id: nanoid(),
      timestampMs,
      scene: frame.scene.trim(),
      heard: this.latchHeard(frame.heard.trim(), timestampMs),
    });
    this.current = observation;
    this.logger.debug(
      { observationId: observation.id, sceneChars: observation.scene.length, heard: observation.heard.slice(0, 40) },
      "observation captured",
    );
    this.options.onObservation?.(observation);
    return observation;
  }

  private latchHeard(heard: string, nowMs: number): string {
    if (heard) {
      this.lastHeard = heard;
      this.lastHeardAtMs = nowMs;
      return heard;
    }
    return nowMs - this.lastHeardAtMs < this.options.heardLatchMs ? this.lastHeard : "";
  }
}
