import { z } from "zod";
import type { AgentAction } from "../types/action.js";
import type { IntentDraft } from "../types/intent.js";
import { DEFAULT_MOOD } from "../types/intent.js";

const seconds = (fallback: number, max: number) =>
  z.number().finite().catch(fallback).transform((value) => Math.max(0, Math.min(max, value)));

const pixels = z.number().finite().catch(0).transform((value) => Math.round(value));

/** Action items in the shape the planner prompt asks for. */
const plannedActionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("move"), direction: z.enum(["w", "a", "s", "d"]), seconds: seconds(0.2, 2) }),
  z.object({ type: z.literal("mouse_move"), dx: pixels, dy: pixels }),
  z.object({ type: z.literal("jump") }),
  z.object({ type: z.literal("chat_send"), text: z.string() }),
  z.object({ type: z.literal("mouse_click"), button: z.enum(["left", "right"]).catch("left") }),
  z.object({ type: z.literal("wait"), seconds: seconds(0.2, 3) }),
]);

type PlannedAction = z.infer<typeof plannedActionSchema>;

const unit = (fallback: number) =>
  z.number().finite().catch(fallback).transform((value) => Math.max(0, Math.min(1, value)));

const rawPlanSchema = z.object({
  intent: z.string().catch(""),
  next_focus: z.string().catch(""),
  activity_level: unit(DEFAULT_MOOD.activityLevel),
  curiosity: unit(DEFAULT_MOOD.curiosity),
  allow_move: z.boolean().catch(DEFAULT_MOOD.allowMove),
  speak: z.string().catch(""),
  actions: z.array(z.unknown()).catch([]),
});

export interface ParsedPlan {
  draft: IntentDraft;
  /** Action items that did not match the action schema. */
  dropped: unknown[];
}

const DIRECTION_BY_KEY = { w: "forward", a: "left", s: "back", d: "right" } as const;

function toAgentAction(action: PlannedAction): AgentAction {
  switch (action.type) {
    case "move":
      return { type: "move", direction: DIRECTION_BY_KEY[action.direction], seconds: action.seconds };
    case "mouse_move":
      return { type: "look", dx: action.dx, dy: action.dy };
    case "jump":
      return { type: "jump" };
    case "chat_send":
      return { type: "chat", text: action.text };
    case "mouse_click":
      return action.button === "right" ? { type: "grab" } : { type: "use" };
    case "wait":
      return { type: "wait", seconds: action.seconds };
  }
}

/**
 * Pulls the first JSON object out of model output: the whole text when it
 * parses, otherwise the outermost {...} block. Undefined when neither works.
 */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const candidates = [text.trim()];
  const block = text.match(/\{[\s\S]*\}/);
  if (block) candidates.push(block[0]);

  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      const object = z.record(z.unknown()).safeParse(parsed);
      if (object.success) return object.data;
    } catch {
      continue;
    }
  }
  return undefined;
}

export function normalizePlan(raw: Record<string, unknown>): ParsedPlan {
  const plan = rawPlanSchema.parse(raw);
  const goal = (plan.intent.trim() || plan.next_focus.trim() || DEFAULT_MOOD.goal).slice(0, 40);

  const actions: AgentAction[] = [];
  const dropped: unknown[] = [];
  for (const item of plan.actions) {
    const parsed = plannedActionSchema.safeParse(item);
    if (parsed.success) actions.push(toAgentAction(parsed.data));
    else dropped.push(item);
  }

  return {
    draft: {
      goal,
      activityLevel: plan.activity_level,
      curiosity: plan.curiosity,
      allowMove: plan.allow_move,
      speak: plan.speak.trim(),
      actions,
    },
    dropped,
  };
}
