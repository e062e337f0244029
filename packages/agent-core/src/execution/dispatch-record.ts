import type { ActionSource, DispatchEntry } from "../types/action.js";
import type { DeniedEntry } from "./action-policy.js";

export type DispatchRecord = {
  id: string;
  tick: number;
  atMs: number;
  primarySource: ActionSource;
  entries: DispatchEntry[];
  denied: Array<{ source: ActionSource; type: string; reason: string }>;
  /** Intent whose one-shot actions went out with this dispatch, if any. */
  intentId?: string;
  stabilized: boolean;
  status: "dispatched" | "dropped" | "observed";
};

export function summarizeDenied(denied: DeniedEntry[]): DispatchRecord["denied"] {
  return denied.map(({ entry, decision }) => ({
    source: entry.source,
    type: entry.action.type,
    reason: decision.reason,
  }));
}
