export type MoveDirection = "forward" | "back" | "left" | "right";

export type AgentAction =
  | { type: "move"; direction: MoveDirection; seconds: number }
  | { type: "look"; dx: number; dy: number }
  | { type: "jump" }
  | { type: "use" }
  | { type: "grab" }
  | { type: "chat"; text: string }
  | { type: "wait"; seconds: number };

export type AgentActionType = AgentAction["type"];

export type ActionSource = "override" | "intent" | "instinct";

/** Output of one instinct tick; an empty list is a no-op. */
export interface InstinctAction {
  actions: AgentAction[];
}

export interface DispatchEntry {
  source: ActionSource;
  action: AgentAction;
}

export interface DispatchedAction {
  id: string;
  tick: number;
  atMs: number;
  entries: DispatchEntry[];
  /** Highest-priority source present, for diagnostics. */
  primarySource: ActionSource;
}
