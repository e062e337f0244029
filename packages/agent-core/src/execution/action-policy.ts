import type { ActionSource, AgentAction, AgentActionType, DispatchEntry } from "../types/action.js";

export type Actuator = "locomotion" | "view" | "jump" | "hands" | "chatbox";

/** `wait` drives nothing, so it has no actuator. */
export const ACTUATOR_BY_TYPE: Record<AgentActionType, Actuator | undefined> = {
  move: "locomotion",
  look: "view",
  jump: "jump",
  use: "hands",
  grab: "hands",
  chat: "chatbox",
  wait: undefined,
};

/** Lower value wins. */
export const SOURCE_PRIORITY: Record<ActionSource, number> = {
  override: 0,
  intent: 1,
  instinct: 2,
};

export type PolicyDecision = {
  decision: "allow" | "deny";
  reason: "actuator-free" | "same-source" | "no-actuator" | "outranks-holder" | `claimed-by-${ActionSource}`;
  source: ActionSource;
  actuator?: Actuator;
};

export type ActuatorClaims = Map<Actuator, ActionSource>;

export function actuatorOf(action: AgentAction): Actuator | undefined {
  return ACTUATOR_BY_TYPE[action.type];
}

export function decide(entry: DispatchEntry, claims: ActuatorClaims): PolicyDecision {
  const actuator = actuatorOf(entry.action);
  if (!actuator) {
    return { decision: "allow", reason: "no-actuator", source: entry.source };
  }

  const holder = claims.get(actuator);
  if (holder === undefined) {
    return { decision: "allow", reason: "actuator-free", source: entry.source, actuator };
  }
  if (holder === entry.source) {
    return { decision: "allow", reason: "same-source", source: entry.source, actuator };
  }
  if (SOURCE_PRIORITY[holder] < SOURCE_PRIORITY[entry.source]) {
    return { decision: "deny", reason: `claimed-by-${holder}`, source: entry.source, actuator };
  }
  return { decision: "allow", reason: "outranks-holder", source: entry.source, actuator };
}

export type DeniedEntry = {
  entry: DispatchEntry;
  decision: PolicyDecision;
};

export type ResolvedEntries = {
  entries: DispatchEntry[];
  denied: DeniedEntry[];
};

/**
 * Merges per-source action lists into one ordered list. Sources claim the
 * actuators they use in priority order; a lower-priority source loses every
 * action on an actuator already claimed. Waits survive only when their
 * source still contributes a real action.
 */
export function resolveConflicts(groups: DispatchEntry[][], maxEntries = 8): ResolvedEntries {
  const ordered = [...groups].sort((a, b) => groupPriority(a) - groupPriority(b));
  const claims: ActuatorClaims = new Map();
  const entries: DispatchEntry[] = [];
  const denied: DeniedEntry[] = [];

  for (const group of ordered) {
    const allowed: DispatchEntry[] = [];
    for (const entry of group) {
      const decision = decide(entry, claims);
      if (decision.decision === "deny") {
        denied.push({ entry, decision });
        continue;
      }
      allowed.push(entry);
      if (decision.actuator) claims.set(decision.actuator, entry.source);
    }
    if (allowed.some((entry) => actuatorOf(entry.action) !== undefined)) {
      entries.push(...allowed);
    }
  }

  return { entries: entries.slice(0, maxEntries), denied };
}

function groupPriority(group: DispatchEntry[]): number {
  const first = group[0];
  return first ? SOURCE_PRIORITY[first.source] : Number.MAX_SAFE_INTEGER;
}
