import type { InstinctConfig } from "../config/schema.js";
import { actionSignature } from "../execution/action-signature.js";
import type { AgentAction, InstinctAction, MoveDirection } from "../types/action.js";
import { clamp01, pick, randomInt, round2, uniform, type RandomSource } from "./random.js";

export interface InstinctMood {
  goal: string;
  activityLevel: number;
  curiosity: number;
  allowMove: boolean;
}

export interface InstinctContext {
  nowMs: number;
  mood: InstinctMood;
  /** Latest heard text, empty when nothing was heard. */
  heard: string;
}

const MAX_ACTIONS = 3;
const PX_PER_DEGREE = 9;
const CALM_GOALS = new Set(["observe", "listen"]);
const DIRECTIONS: readonly MoveDirection[] = ["forward", "left", "back", "right"];

/**
 * Planner-free micro-behavior: look jitter, tiny steps and pauses, shaped by
 * the current intent's mood. Keeps per-instance state (last look delta, last
 * signature, last non-empty output) so successive ticks stay smooth and do
 * not repeat exactly.
 */
export class InstinctGenerator {
  private lastOutputAtMs = Number.NEGATIVE_INFINITY;
  private lastSignature = "";
  private lastDx = 0;

  constructor(
    private readonly config: InstinctConfig,
    private readonly random: RandomSource = Math.random,
  ) {}

  generate(context: InstinctContext): InstinctAction {
    const actions = this.build(context);
    if (actions.length > 0) this.lastOutputAtMs = context.nowMs;
    return { actions };
  }

  private build(context: InstinctContext): AgentAction[] {
    const { mood } = context;
    const forceKeepalive = context.nowMs - this.lastOutputAtMs > this.config.keepaliveMs;

    if (!forceKeepalive && this.random() < clamp01(this.config.hesitateIdleProb)) {
      return [];
    }
    if (!forceKeepalive && this.random() < clamp01(this.config.hesitatePauseProb)) {
      return [{ type: "wait", seconds: round2(uniform(this.random, 0.3, 0.8)) }];
    }

    const actions: AgentAction[] = [];
    if (this.random() < 0.25) {
      actions.push({ type: "wait", seconds: round2(uniform(this.random, 0.08, 0.28)) });
    }

    const jitterMin = Math.max(0.2, this.config.lookJitterMinDeg);
    const jitterMax = Math.max(jitterMin, this.config.lookJitterMaxDeg);
    const jitterDeg = uniform(this.random, jitterMin, jitterMax) * (0.8 + 0.4 * mood.curiosity);
    const baseDx = degToDx(jitterDeg) * pick(this.random, [-1, 1]);
    const baseDy = CALM_GOALS.has(mood.goal.toLowerCase())
      ? randomInt(this.random, -5, 6)
      : randomInt(this.random, -4, 4);
    const maxDx = degToDx(jitterMax * 1.35);

    if (context.heard.trim() && this.random() < 0.45) {
      // Orient toward the speaker, sometimes overshooting and pulling back.
      const dx = this.softCap(Math.trunc(baseDx * 1.5), maxDx);
      if (this.random() < clamp01(this.config.lookOvershootProb)) {
        const pullBack = Math.trunc(-dx * uniform(this.random, 0.28, 0.42));
        actions.push({ type: "look", dx, dy: 0 });
        actions.push({ type: "wait", seconds: 0.06 });
        actions.push({ type: "look", dx: pullBack, dy: 0 });
      } else {
        actions.push({ type: "look", dx, dy: 0 });
      }
    } else {
      actions.push({ type: "look", dx: this.softCap(Math.trunc(baseDx), maxDx), dy: baseDy });
    }

    const moveProb = clamp01(this.config.smallStepMoveProb + mood.activityLevel * 0.2);
    if (mood.allowMove && this.random() < moveProb) {
      if (this.random() < 0.28) {
        actions.push({ type: "wait", seconds: round2(uniform(this.random, 0.25, 0.5)) });
      } else {
        actions.push({
          type: "move",
          direction: pick(this.random, DIRECTIONS),
          seconds: round2(uniform(this.random, 0.12, 0.25)),
        });
      }
    }

    let result = actions.slice(0, MAX_ACTIONS);
    let signature = actionSignature(result);
    if (signature && signature === this.lastSignature) {
      result = this.mutate(result, maxDx);
      signature = actionSignature(result);
    }
    this.lastSignature = signature;
    return result;
  }

  /** Clamp to ±maxDx and limit the change from the previous look. */
  private softCap(dx: number, maxDx: number): number {
    let capped = Math.max(-maxDx, Math.min(maxDx, Math.trunc(dx)));
    const deltaCap = Math.max(4, Math.floor(maxDx / 2));
    const delta = capped - this.lastDx;
    if (delta > deltaCap) capped = this.lastDx + deltaCap;
    else if (delta < -deltaCap) capped = this.lastDx - deltaCap;
    this.lastDx = capped;
    return capped;
  }

  private mutate(actions: AgentAction[], maxDx: number): AgentAction[] {
    const index = actions.findIndex((action) => action.type === "look");
    const target = actions[index];
    if (target?.type === "look") {
      const mutated = [...actions];
      mutated[index] = {
        type: "look",
        dx: this.softCap(target.dx + pick(this.random, [-3, -2, 2, 3]), maxDx),
        dy: target.dy + pick(this.random, [-1, 0, 1]),
      };
      return mutated;
    }
    const nudge: AgentAction = { type: "look", dx: this.softCap(pick(this.random, [-6, 6]), maxDx), dy: 0 };
    return [...actions, nudge].slice(0, MAX_ACTIONS);
  }
}

export function degToDx(deg: number): number {
  return Math.max(1, Math.round(Math.abs(deg) * PX_PER_DEGREE));
}
