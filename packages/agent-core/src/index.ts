export * from "./types/index.js";
export * from "./errors.js";
export { createLogger, createSilentLogger, type Logger, type LoggerOptions } from "./logging.js";

export * from "./config/schema.js";
export * from "./config/presets.js";
export * from "./config/load-config.js";

export { InstinctGenerator, degToDx, type InstinctContext, type InstinctMood } from "./instinct/instinct-generator.js";
export { InstinctLoop, type InstinctLoopOptions } from "./instinct/instinct-loop.js";
export type { RandomSource } from "./instinct/random.js";

export { sceneSimilarity } from "./gating/scene-similarity.js";
export * from "./gating/intent-gate.js";
export { IntentCell } from "./state/intent-cell.js";

export * from "./planning/planner.js";
export * from "./planning/plan-parser.js";
export * from "./planning/llm-planner.js";
export * from "./planning/planner-runner.js";
export { withRetry, sleep, type RetryOptions } from "./planning/retry.js";
export { buildStatePayload, type PlannerStatePayload } from "./planning/state-payload.js";

export * from "./execution/action-policy.js";
export * from "./execution/dispatcher.js";
export type { DispatchRecord } from "./execution/dispatch-record.js";
export { actionSignature } from "./execution/action-signature.js";
export { buildObservationLine, cleanSceneText, fillTemplate } from "./execution/chat-lines.js";

export * from "./perception/observation-source.js";
export * from "./perception/observation-feed.js";

export * from "./osc/osc-codec.js";
export * from "./osc/osc-sink.js";

export * from "./overrides/override-channel.js";
export { attachKeyboardHotkeys, hotkeyFor } from "./overrides/keyboard-hotkeys.js";

export * from "./orchestrator/agent-controller.js";
export * from "./orchestrator/agent-runtime.js";
export { TraceWriter, resolveTracePath } from "./orchestrator/trace-writer.js";
