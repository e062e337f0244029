import { describeError } from "../errors.js";
import type { ActionDispatcher } from "../execution/dispatcher.js";
import { summarizeDenied, type DispatchRecord } from "../execution/dispatch-record.js";
import type { GateDecision, IntentGate } from "../gating/intent-gate.js";
import type { InstinctGenerator, InstinctMood } from "../instinct/instinct-generator.js";
import type { Logger } from "../logging.js";
import type { OverrideChannel } from "../overrides/override-channel.js";
import type { PlannerRunner } from "../planning/planner-runner.js";
import type { PlanRequest } from "../planning/planner.js";
import type { IntentCell } from "../state/intent-cell.js";
import type { DispatchedAction, InstinctAction } from "../types/action.js";
import { DEFAULT_MOOD, type Intent } from "../types/intent.js";
import type { Observation } from "../types/observation.js";

export interface TickReport {
  tick: number;
  nowMs: number;
  observationId?: string;
  intentId?: string;
  goal: string;
  gate: GateDecision;
  plannerStarted: boolean;
  instinctActions: number;
  dispatched?: DispatchedAction;
  deniedActions: number;
  observeOnly: boolean;
}

export interface AgentControllerDeps {
  latestObservation: () => Observation | undefined;
  cell: IntentCell;
  gate: IntentGate;
  runner: PlannerRunner;
  instinct: InstinctGenerator;
  dispatcher: ActionDispatcher;
  overrides: OverrideChannel;
  buildRequest: (observation: Observation, mood: InstinctMood, nowMs: number) => PlanRequest;
  logger: Logger;
  observeOnly?: boolean;
  onDispatched?: (record: DispatchRecord) => void;
}

const NO_TRIGGERS: GateDecision = { replan: false, reasons: [] };

export function moodOf(intent: Intent | undefined): InstinctMood {
  if (!intent) return { ...DEFAULT_MOOD };
  return {
    goal: intent.goal,
    activityLevel: intent.activityLevel,
    curiosity: intent.curiosity,
    allowMove: intent.allowMove,
  };
}

/**
 * One pass of the fast path. Everything here is synchronous: planner calls
 * are only started, and dispatch hands off to the sink without waiting.
 */
export class AgentController {
  private readonly logger: Logger;
  private ticks = 0;

  constructor(private readonly deps: AgentControllerDeps) {
    this.logger = deps.logger.child({ component: "controller" });
  }

  get tickCount(): number {
    return this.ticks;
  }

  tick(nowMs: number): TickReport {
    this.ticks += 1;
    const tick = this.ticks;
    const { cell, gate, runner, dispatcher } = this.deps;

    const observation = this.deps.latestObservation();
    const intent = cell.read(nowMs);
    const mood = moodOf(intent);
    const instinct = this.runInstinct(nowMs, mood, observation);

    const decision = observation
      ? gate.decide({
          observation,
          intentExpired: cell.isExpired(nowMs),
          nowMs,
          plannerBusy: runner.busy,
          backoffUntilMs: runner.backoffUntilMs,
        })
      : NO_TRIGGERS;

    let plannerStarted = false;
    if (decision.replan && observation) {
      plannerStarted = this.startPlanner(observation, mood, nowMs);
      this.logger.debug({ tick, reasons: decision.reasons }, "replanning");
    } else if (decision.suppressedBy) {
      this.logger.debug({ tick, reasons: decision.reasons, suppressedBy: decision.suppressedBy }, "replan suppressed");
    }

    const composed = dispatcher.compose({
      tick,
      nowMs,
      instinct,
      intent,
      overrides: this.deps.overrides.drain(),
      observation,
      observeOnly: this.deps.observeOnly,
    });

    const observeOnly = this.deps.observeOnly ?? false;
    if (composed.action) {
      if (!observeOnly) dispatcher.dispatch(composed.action);
      this.deps.onDispatched?.({
        id: composed.action.id,
        tick,
        atMs: nowMs,
        primarySource: composed.action.primarySource,
        entries: composed.action.entries,
        denied: summarizeDenied(composed.denied),
        intentId: composed.intentId,
        stabilized: composed.stabilized,
        status: observeOnly ? "observed" : "dispatched",
      });
    }

    return {
      tick,
      nowMs,
      observationId: observation?.id,
      intentId: intent?.id,
      goal: mood.goal,
      gate: decision,
      plannerStarted,
      instinctActions: instinct.actions.length,
      dispatched: composed.action,
      deniedActions: composed.denied.length,
      observeOnly,
    };
  }

  /** Starts a planner call for the latest observation, ignoring the gate. */
  planNow(nowMs: number): boolean {
    const observation = this.deps.latestObservation();
    if (!observation) return false;
    return this.startPlanner(observation, moodOf(this.deps.cell.read(nowMs)), nowMs);
  }

  private startPlanner(observation: Observation, mood: InstinctMood, nowMs: number): boolean {
    const started = this.deps.runner.start(this.deps.buildRequest(observation, mood, nowMs));
    // The baseline moves only when a call really starts.
    if (started) this.deps.gate.accept(observation);
    return started;
  }

  private runInstinct(nowMs: number, mood: InstinctMood, observation: Observation | undefined): InstinctAction {
    try {
      return this.deps.instinct.generate({ nowMs, mood, heard: observation?.heard ?? "" });
    } catch (err) {
      this.logger.error({ err: describeError(err) }, "instinct failed, skipping this tick");
      return { actions: [] };
    }
  }
}
