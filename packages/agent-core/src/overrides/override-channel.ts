import { buildObservationLine, collapseWhitespace, type LineTemplates } from "../execution/chat-lines.js";
import type { Logger } from "../logging.js";
import type { AgentAction } from "../types/action.js";
import type { Observation } from "../types/observation.js";

export interface OverrideChannelOptions {
  templates: LineTemplates;
  latestObservation: () => Observation | undefined;
  logger: Logger;
  now?: () => number;
  minSayIntervalMs?: number;
  maxLineLength?: number;
}

type StopListener = () => void;

/**
 * Operator input that outranks both instinct and intent. Queued actions are
 * picked up by the next tick via drain().
 */
export class OverrideChannel {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly minSayIntervalMs: number;
  private readonly maxLineLength: number;
  private queued: AgentAction[] = [];
  private lastSayAtMs = Number.NEGATIVE_INFINITY;
  private stopped = false;
  private readonly stopListeners = new Set<StopListener>();

  constructor(private readonly options: OverrideChannelOptions) {
    this.logger = options.logger.child({ component: "overrides" });
    this.now = options.now ?? Date.now;
    this.minSayIntervalMs = options.minSayIntervalMs ?? 800;
    this.maxLineLength = options.maxLineLength ?? 70;
  }

  get stopRequested(): boolean {
    return this.stopped;
  }

  /**
   * Queues an extra chat line. Without text, one is built from the latest
   * observation. Returns false when rate-limited or there is nothing to say.
   */
  say(text?: string): boolean {
    const nowMs = this.now();
    if (nowMs - this.lastSayAtMs < this.minSayIntervalMs) {
      this.logger.debug({}, "say ignored, too soon");
      return false;
    }

    const line = (
      text === undefined
        ? buildObservationLine(this.options.latestObservation(), this.options.templates, this.maxLineLength)
        : collapseWhitespace(text)
    ).slice(0, this.maxLineLength);
    if (!line) {
      this.logger.info({}, "nothing observed yet, no line to say");
      return false;
    }

    this.lastSayAtMs = nowMs;
    this.queued.push({ type: "chat", text: line });
    this.logger.info({ text: line }, "extra line queued");
    return true;
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.logger.info({}, "stop requested");
    for (const listener of [...this.stopListeners]) {
      listener();
    }
  }

  onStop(listener: StopListener): () => void {
    this.stopListeners.add(listener);
    return () => this.stopListeners.delete(listener);
  }

  drain(): AgentAction[] {
    const actions = this.queued;
    this.queued = [];
    return actions;
  }
}
