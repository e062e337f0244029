import { nanoid } from "nanoid";
import { describeError } from "../errors.js";
import type { Logger } from "../logging.js";
import type { IntentCell } from "../state/intent-cell.js";
import type { Intent, IntentDraft } from "../types/intent.js";
import type { Planner, PlanRequest } from "./planner.js";

export interface PlannerRunnerOptions {
  planner: Planner;
  cell: IntentCell;
  intentTtlMs: number;
  failureBackoffMs: number;
  maxFailureBackoffMs: number;
  logger: Logger;
  now?: () => number;
  onIntent?: (intent: Intent, request: PlanRequest) => void;
  onFailure?: (err: unknown, consecutiveFailures: number) => void;
}

type Outcome =
  | { kind: "installed"; intent: Intent }
  | { kind: "superseded" }
  | { kind: "cancelled" }
  | { kind: "failed"; error: unknown };

/**
 * Runs at most one planner call at a time in the background. Results go into
 * the intent cell under the ticket reserved when the call started; failures
 * leave the current intent alone and push the next attempt out with an
 * exponential back-off.
 */
export class PlannerRunner {
  private readonly logger: Logger;
  private readonly now: () => number;
  private current: AbortController | undefined;
  private readonly running = new Set<Promise<void>>();
  private consecutiveFailures = 0;
  private backoffUntil = 0;

  constructor(private readonly options: PlannerRunnerOptions) {
    this.logger = options.logger.child({ component: "planner-runner" });
    this.now = options.now ?? Date.now;
  }

  get busy(): boolean {
    return this.current !== undefined;
  }

  get backoffUntilMs(): number {
    return this.backoffUntil;
  }

  get failures(): number {
    return this.consecutiveFailures;
  }

  /** Returns false when a call is already in flight. */
  start(request: PlanRequest): boolean {
    if (this.current) return false;

    const ticket = this.options.cell.reserve();
    const controller = new AbortController();
    this.current = controller;
    this.logger.debug({ ticket, observationId: request.observation.id }, "planner call started");

    const run = this.run(ticket, request, controller)
      .then((outcome) => this.settle(outcome, request))
      .finally(() => {
        if (this.current === controller) this.current = undefined;
        this.running.delete(run);
      });
    this.running.add(run);
    return true;
  }

  /** Aborts the outstanding call; its result is discarded. */
  cancel(): void {
    const controller = this.current;
    if (!controller) return;
    this.current = undefined;
    controller.abort(new Error("planner call cancelled"));
  }

  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  private async run(ticket: number, request: PlanRequest, controller: AbortController): Promise<Outcome> {
    let draft: IntentDraft;
    try {
      draft = await this.options.planner.plan(request, controller.signal);
    } catch (error) {
      return controller.signal.aborted ? { kind: "cancelled" } : { kind: "failed", error };
    }
    if (controller.signal.aborted) return { kind: "cancelled" };

    const intent: Intent = {
      id: nanoid(),
      goal: draft.goal,
      activityLevel: draft.activityLevel,
      curiosity: draft.curiosity,
      allowMove: draft.allowMove,
      speak: draft.speak,
      actions: draft.actions,
      createdAtMs: this.now(),
      ttlMs: this.options.intentTtlMs,
      observationId: request.observation.id,
      planner: this.options.planner.name,
    };
    return this.options.cell.replace(ticket, intent) ? { kind: "installed", intent } : { kind: "superseded" };
  }

  private settle(outcome: Outcome, request: PlanRequest): void {
    switch (outcome.kind) {
      case "installed":
        this.consecutiveFailures = 0;
        this.backoffUntil = 0;
        this.logger.info(
          { intentId: outcome.intent.id, goal: outcome.intent.goal, actions: outcome.intent.actions.length },
          "intent installed",
        );
        this.notify(() => this.options.onIntent?.(outcome.intent, request));
        return;
      case "superseded":
        this.logger.debug({ observationId: request.observation.id }, "planner result superseded");
        return;
      case "cancelled":
        this.logger.debug({ observationId: request.observation.id }, "planner result discarded");
        return;
      case "failed": {
        this.consecutiveFailures += 1;
        const delayMs = Math.min(
          this.options.maxFailureBackoffMs,
          this.options.failureBackoffMs * 2 ** (this.consecutiveFailures - 1),
        );
        this.backoffUntil = this.now() + delayMs;
        this.logger.warn(
          { err: describeError(outcome.error), failures: this.consecutiveFailures, backoffMs: delayMs },
          "planner call failed, keeping current intent",
        );
        this.notify(() => this.options.onFailure?.(outcome.error, this.consecutiveFailures));
        return;
      }
    }
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (err) {
      this.logger.error({ err: describeError(err) }, "planner listener failed");
    }
  }
}
