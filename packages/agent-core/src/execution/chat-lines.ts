import type { Observation } from "../types/observation.js";

// Markup that vision models like to wrap scene descriptions in.
const SCENE_NOISE = ["###", "---", "**", "##", "__"];

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function cleanSceneText(scene: string): string {
  let cleaned = scene;
  for (const token of SCENE_NOISE) {
    cleaned = cleaned.split(token).join(" ");
  }
  return collapseWhitespace(cleaned);
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export interface LineTemplates {
  heardLine: string;
  sceneLine: string;
}

/**
 * Short chat line about the latest observation: heard speech wins over the
 * scene. Empty when there is nothing to talk about.
 */
export function buildObservationLine(
  observation: Observation | undefined,
  templates: LineTemplates,
  maxLength = 70,
): string {
  if (!observation) return "";
  const heard = collapseWhitespace(observation.heard);
  if (heard) {
    return fillTemplate(templates.heardLine, { heard: heard.slice(0, 30) }).slice(0, maxLength);
  }
  const scene = cleanSceneText(observation.scene).slice(0, 26).trim();
  if (!scene) return "";
  return fillTemplate(templates.sceneLine, { scene }).slice(0, maxLength);
}

const SOCIAL_CONTEXT_WORDS = [
  "玩家",
  "朋友",
  "聊天",
  "房间",
  "角色",
  "avatar",
  "vrchat",
  "social",
  "online",
  "friend",
];

/** True when someone is talking or the scene mentions other people. */
export function hasSocialContext(observation: Observation): boolean {
  if (collapseWhitespace(observation.heard)) return true;
  const scene = observation.scene.toLowerCase();
  return SOCIAL_CONTEXT_WORDS.some((word) => scene.includes(word));
}
