export type { Observation, CapturedFrame } from "./observation.js";
export type {
  AgentAction,
  AgentActionType,
  ActionSource,
  DispatchEntry,
  DispatchedAction,
  InstinctAction,
  MoveDirection,
} from "./action.js";
export type { Intent, IntentDraft } from "./intent.js";
export { DEFAULT_MOOD, isIntentStale } from "./intent.js";
