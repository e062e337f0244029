import type { Logger } from "../logging.js";
import { describeError } from "../errors.js";

export interface InstinctLoopOptions {
  intervalMs: number;
  onTick: (tick: number) => void;
  logger: Logger;
  now?: () => number;
}

/**
 * Fixed-cadence timer loop for the fast path. Ticks are scheduled against an
 * absolute target time so a slow tick shortens the next delay instead of
 * pushing every later tick back; when a whole interval is lost the schedule
 * restarts from now rather than firing a burst of catch-up ticks.
 */
export class InstinctLoop {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private nextTargetMs = 0;
  private ticks = 0;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: InstinctLoopOptions) {
    this.logger = options.logger.child({ component: "instinct-loop" });
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.running) {
      this.logger.warn({}, "instinct loop already running");
      return;
    }
    this.running = true;
    this.nextTargetMs = this.now();
    this.logger.info({ intervalMs: this.options.intervalMs }, "instinct loop started");
    this.schedule();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info({ tickCount: this.ticks }, "instinct loop stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  get tickCount(): number {
    return this.ticks;
  }

  private schedule(): void {
    if (!this.running) return;
    const delay = Math.max(0, this.nextTargetMs - this.now());
    this.timer = setTimeout(() => this.runTick(), delay);
  }

  private runTick(): void {
    this.timer = null;
    if (!this.running) return;

    const startedAt = this.now();
    this.ticks += 1;
    try {
      this.options.onTick(this.ticks);
    } catch (err) {
      this.logger.error({ tick: this.ticks, err: describeError(err) }, "tick failed, continuing");
    }

    const finishedAt = this.now();
    const elapsed = finishedAt - startedAt;
    if (elapsed > this.options.intervalMs) {
      this.logger.warn({ tick: this.ticks, elapsedMs: elapsed }, "tick overran its interval");
    }

    this.nextTargetMs += this.options.intervalMs;
    if (finishedAt - this.nextTargetMs > this.options.intervalMs) {
      this.nextTargetMs = finishedAt;
    }
    this.schedule();
  }
}
