import type { AgentAction } from "../types/action.js";

/**
 * Coarse fingerprint of an action list, used to spot scripts that keep
 * repeating. Look deltas are bucketed by tens so tiny jitter still matches.
 */
export function actionSignature(actions: readonly AgentAction[]): string {
  return actions
    .slice(0, 5)
    .map((action) => {
      switch (action.type) {
        case "move":
          return `move:${action.direction}`;
        case "look":
          return `look:${Math.floor(action.dx / 10)}:${Math.floor(action.dy / 10)}`;
        default:
          return action.type;
      }
    })
    .join("|");
}
