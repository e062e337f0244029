import type { Observation } from "../types/observation.js";
import { sceneSimilarity } from "./scene-similarity.js";

export type TriggerReason = "scene_changed" | "heard_new" | "intent_expired";

export type SuppressionReason = "in_flight" | "backoff";

export interface GateInput {
  observation: Observation | undefined;
  /** True when the cell holds an intent whose TTL has run out. */
  intentExpired: boolean;
  nowMs: number;
  plannerBusy: boolean;
  backoffUntilMs: number;
}

export interface GateDecision {
  replan: boolean;
  reasons: TriggerReason[];
  suppressedBy?: SuppressionReason;
}

export interface IntentGateOptions {
  /** Similarity below this counts as a scene change. */
  sceneChangeThreshold: number;
  /** Only this many leading characters are compared. */
  compareChars?: number;
}

/**
 * Decides per tick whether the planner should run. Triggers are scene change
 * against the last accepted observation, newly heard speech, and intent
 * expiry. The baseline only moves in accept(), which the caller invokes when
 * a planner call actually starts, so triggers dropped while a call is in
 * flight surface again (once) after it ends.
 */
export class IntentGate {
  private acceptedScene: string | undefined;
  private acceptedHeard = "";
  private readonly threshold: number;
  private readonly compareChars: number;

  constructor(options: IntentGateOptions) {
    this.threshold = options.sceneChangeThreshold;
    this.compareChars = options.compareChars ?? 320;
  }

  triggers(observation: Observation | undefined, intentExpired: boolean): TriggerReason[] {
    const reasons: TriggerReason[] = [];
    if (observation) {
      if (this.sceneChanged(observation.scene)) reasons.push("scene_changed");
      const heard = observation.heard.trim();
      if (heard && heard !== this.acceptedHeard) reasons.push("heard_new");
    }
    if (intentExpired) reasons.push("intent_expired");
    return reasons;
  }

  decide(input: GateInput): GateDecision {
    const reasons = this.triggers(input.observation, input.intentExpired);
    if (reasons.length === 0) return { replan: false, reasons };
    if (input.plannerBusy) return { replan: false, reasons, suppressedBy: "in_flight" };
    if (input.nowMs < input.backoffUntilMs) return { replan: false, reasons, suppressedBy: "backoff" };
    return { replan: true, reasons };
  }

  accept(observation: Observation | undefined): void {
    if (!observation) return;
    const scene = observation.scene.trim();
    if (scene) this.acceptedScene = scene;
    this.acceptedHeard = observation.heard.trim();
  }

  reset(): void {
    this.acceptedScene = undefined;
    this.acceptedHeard = "";
  }

  private sceneChanged(rawScene: string): boolean {
    const scene = rawScene.trim();
    if (!scene) return false;
    if (this.acceptedScene === undefined) return true;
    const similarity = sceneSimilarity(
      this.acceptedScene.slice(0, this.compareChars),
      scene.slice(0, this.compareChars),
    );
    return similarity < this.threshold;
  }
}
