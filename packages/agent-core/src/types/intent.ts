import type { AgentAction } from "./action.js";

/**
 * Planner result before the runner stamps it with identity and validity.
 */
export interface IntentDraft {
  /** Short goal label, e.g. "observe", "socialize". At most 40 chars. */
  goal: string;
  /** 0..1, scales how often instinct steps around. */
  activityLevel: number;
  /** 0..1, scales look jitter amplitude. */
  curiosity: number;
  allowMove: boolean;
  /** Line to say in the chatbox, empty for none. */
  speak: string;
  /** One-shot actions emitted on the first tick that sees the intent. */
  actions: AgentAction[];
}

export interface Intent extends Readonly<Omit<IntentDraft, "actions">> {
  readonly id: string;
  readonly actions: readonly AgentAction[];
  readonly createdAtMs: number;
  readonly ttlMs: number;
  readonly observationId: string;
  readonly planner: string;
}

/** Mood the instinct generator falls back to when no intent is current. */
export const DEFAULT_MOOD = {
  goal: "observe",
  activityLevel: 0.35,
  curiosity: 0.55,
  allowMove: true,
} as const;

export function isIntentStale(intent: Intent, nowMs: number): boolean {
  return nowMs >= intent.createdAtMs + intent.ttlMs;
}
