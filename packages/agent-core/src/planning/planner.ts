import type { IntentDraft } from "../types/intent.js";
import type { Observation } from "../types/observation.js";
import type { AgentAction } from "../types/action.js";
import type { InstinctMood } from "../instinct/instinct-generator.js";
import { buildObservationLine, cleanSceneText, type LineTemplates } from "../execution/chat-lines.js";

export interface PlanRequest {
  observation: Observation;
  /** Mood of the intent being replaced, or the default mood. */
  mood: InstinctMood;
  shortTermMemory: Array<{ speak: string; actions: string }>;
  longTermMemory: Array<{ scene: string; speak: string }>;
  nowMs: number;
}

export interface Planner {
  readonly name: string;
  plan(request: PlanRequest, signal: AbortSignal): Promise<IntentDraft>;
}

export interface HeuristicPlannerConfig {
  templates: LineTemplates;
  maxLineLength: number;
}

const SOCIAL_WORDS = [
  "player",
  "players",
  "friend",
  "friends",
  "chat",
  "avatar",
  "people",
  "group",
  "social",
  "online",
  "vrchat",
  "玩家",
  "朋友",
  "聊天",
  "角色",
];

const OPEN_SPACE_WORDS = ["door", "path", "hall", "outside", "portal", "world", "room", "corridor", "房间"];

export const DEFAULT_HEURISTIC_CONFIG: HeuristicPlannerConfig = {
  templates: {
    heardLine: "I heard someone say: {heard}. I'm over here.",
    sceneLine: "I'm here, I see {scene}. Carry on!",
  },
  maxLineLength: 70,
};

/**
 * Offline planner: keyword rules over the observation, no network. Used when
 * no LLM is configured and as a reference for what a plan looks like.
 */
export function createHeuristicPlanner(config: HeuristicPlannerConfig = DEFAULT_HEURISTIC_CONFIG): Planner {
  return {
    name: "heuristic",
    async plan(request: PlanRequest, signal: AbortSignal): Promise<IntentDraft> {
      signal.throwIfAborted();
      const { observation } = request;
      const scene = cleanSceneText(observation.scene).toLowerCase();
      const heard = observation.heard.trim();

      // Someone spoke: turn to them and answer.
      if (heard) {
        return {
          goal: "reply",
          activityLevel: 0.5,
          curiosity: 0.6,
          allowMove: false,
          speak: buildObservationLine(observation, config.templates, config.maxLineLength),
          actions: [],
        };
      }

      if (containsAny(scene, SOCIAL_WORDS)) {
        return {
          goal: "socialize",
          activityLevel: 0.55,
          curiosity: 0.6,
          allowMove: true,
          speak: buildObservationLine(observation, config.templates, config.maxLineLength),
          actions: [{ type: "look", dx: 18, dy: 0 }],
        };
      }

      if (containsAny(scene, OPEN_SPACE_WORDS)) {
        return {
          goal: "explore",
          activityLevel: 0.6,
          curiosity: 0.75,
          allowMove: true,
          speak: "",
          actions: exploreActions(request.nowMs),
        };
      }

      return {
        goal: "observe",
        activityLevel: 0.35,
        curiosity: 0.55,
        allowMove: true,
        speak: "",
        actions: [],
      };
    },
  };
}

function containsAny(text: string, words: readonly string[]): boolean {
  return words.some((word) => text.includes(word));
}

// Alternate the turn direction so consecutive explore plans differ.
function exploreActions(nowMs: number): AgentAction[] {
  const turn = Math.floor(nowMs / 1000) % 2 === 0 ? 20 : -20;
  return [
    { type: "move", direction: "forward", seconds: 0.4 },
    { type: "look", dx: turn, dy: 0 },
  ];
}
