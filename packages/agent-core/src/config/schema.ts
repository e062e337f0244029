import { z } from "zod";

const probability = z.number().min(0).max(1);

export const oscConfigSchema = z
  .object({
    host: z.string().min(1).default("127.0.0.1"),
    port: z.number().int().min(1).max(65535).default(9000),
    dryRun: z.boolean().default(true),
    /** Actions allowed to wait behind the one currently playing. */
    maxQueued: z.number().int().min(0).default(2),
  })
  .default({});

export const plannerConfigSchema = z
  .object({
    kind: z.enum(["llm", "heuristic"]).default("heuristic"),
    baseUrl: z.string().url().default("https://api.openai.com/v1"),
    apiKey: z.string().default(""),
    model: z.string().min(1).default("gpt-4o-mini"),
    systemPrompt: z.string().optional(),
    timeoutMs: z.number().int().positive().default(90_000),
    maxAttempts: z.number().int().min(1).max(10).default(3),
    retryBaseDelayMs: z.number().int().min(0).default(1_200),
    failureBackoffMs: z.number().int().min(0).default(2_000),
    maxFailureBackoffMs: z.number().int().min(0).default(60_000),
  })
  .default({});

export const runtimeConfigSchema = z
  .object({
    tickIntervalMs: z.number().int().min(20).default(385),
    observeIntervalMs: z.number().int().min(50).default(2_000),
    intentTtlMs: z.number().int().min(1_000).default(2_800),
    sceneChangeThreshold: probability.default(0.58),
    heardLatchMs: z.number().int().min(0).default(10_000),
    observeOnly: z.boolean().default(false),
  })
  .default({});

export const instinctConfigSchema = z
  .object({
    hesitateIdleProb: probability.default(0.16),
    hesitatePauseProb: probability.default(0.24),
    lookJitterMinDeg: z.number().min(0.2).default(1.0),
    lookJitterMaxDeg: z.number().min(0.2).default(3.0),
    lookOvershootProb: probability.default(0.2),
    smallStepMoveProb: probability.default(0.26),
    keepaliveMs: z.number().int().min(0).default(2_000),
  })
  .default({})
  .refine((value) => value.lookJitterMaxDeg >= value.lookJitterMinDeg, {
    message: "lookJitterMaxDeg must be >= lookJitterMinDeg",
    path: ["lookJitterMaxDeg"],
  });

export const memoryConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    filePath: z.string().min(1).default("data/memory.jsonl"),
    maxRecords: z.number().int().min(10).default(1_000),
    retrieveTopK: z.number().int().min(1).default(5),
  })
  .default({});

export const traceConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    dir: z.string().min(1).default(".vrc-pilot/trace"),
  })
  .default({});

export const chatConfigSchema = z
  .object({
    maxLength: z.number().int().min(4).default(140),
    /** `{heard}` is replaced with the (shortened) heard text. */
    heardLine: z.string().default("I heard someone say: {heard}. I'm over here."),
    /** `{scene}` is replaced with the (shortened) scene text. */
    sceneLine: z.string().default("I'm here, I see {scene}. Carry on!"),
    /** Answer to heard speech when the planner said nothing; `{heard}` as above. */
    replyLine: z.string().default('Got it, I heard you say "{heard}". I\'m right here.'),
    replyDedupeMs: z.number().int().nonnegative().default(12_000),
    autoChatCooldownMs: z.number().int().nonnegative().default(14_000),
  })
  .default({});

export const agentConfigSchema = z.object({
  osc: oscConfigSchema,
  planner: plannerConfigSchema,
  runtime: runtimeConfigSchema,
  instinct: instinctConfigSchema,
  memory: memoryConfigSchema,
  trace: traceConfigSchema,
  observation: z
    .object({
      file: z.string().default("data/observation.json"),
    })
    .default({}),
  chat: chatConfigSchema,
  logging: z
    .object({
      level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    })
    .default({}),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;
export type OscConfig = AgentConfig["osc"];
export type PlannerConfig = AgentConfig["planner"];
export type RuntimeConfig = AgentConfig["runtime"];
export type InstinctConfig = AgentConfig["instinct"];
export type MemoryConfig = AgentConfig["memory"];
export type TraceConfig = AgentConfig["trace"];
export type ChatConfig = AgentConfig["chat"];
