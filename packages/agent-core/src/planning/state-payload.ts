import type { PlanRequest } from "./planner.js";

export type PlannerStatePayload = {
  time: string;
  scene: string;
  heard: string;
  intent_state: {
    intent: string;
    activity_level: number;
    curiosity: number;
    allow_move: boolean;
  };
  short_term_memory: Array<{ speak: string; actions: string }>;
  long_term_memory: Array<{ scene: string; speak: string }>;
};

/**
 * Compact state sent to the LLM planner. Intent planning does not need the
 * full scene dump, so every text field is cut short.
 */
export function buildStatePayload(request: PlanRequest): PlannerStatePayload {
  return {
    time: new Date(request.nowMs).toISOString().slice(0, 19) + "Z",
    scene: request.observation.scene.slice(0, 280),
    heard: request.observation.heard.slice(0, 90),
    intent_state: {
      intent: request.mood.goal,
      activity_level: request.mood.activityLevel,
      curiosity: request.mood.curiosity,
      allow_move: request.mood.allowMove,
    },
    short_term_memory: request.shortTermMemory.slice(-2).map((item) => ({
      speak: item.speak.slice(0, 80),
      actions: item.actions.slice(0, 80),
    })),
    long_term_memory: request.longTermMemory.slice(0, 2).map((item) => ({
      scene: item.scene.slice(0, 100),
      speak: item.speak.slice(0, 80),
    })),
  };
}
