import OpenAI, { APIConnectionError, InternalServerError, RateLimitError } from "openai";
import type { PlannerConfig } from "../config/schema.js";
import { describeError, PlannerError } from "../errors.js";
import type { Logger } from "../logging.js";
import type { IntentDraft } from "../types/intent.js";
import { extractJsonObject, normalizePlan } from "./plan-parser.js";
import type { Planner, PlanRequest } from "./planner.js";
import { withRetry } from "./retry.js";
import { buildStatePayload } from "./state-payload.js";

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

/** Minimal chat-completions surface the planner needs. */
export interface ChatClient {
  complete(messages: ChatMessage[], signal: AbortSignal): Promise<string>;
}

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a low-frequency intent controller for a VRChat avatar.",
  "Return one strict JSON object with keys:",
  '{"intent": string, "activity_level": number(0-1), "curiosity": number(0-1),',
  '"allow_move": boolean, "speak": string, "actions": array}',
  "Action items use one of these shapes:",
  '{"type":"move","direction":"w|a|s|d","seconds":number}',
  '{"type":"mouse_move","dx":number,"dy":number}',
  '{"type":"jump"}',
  '{"type":"chat_send","text":string}',
  '{"type":"mouse_click","button":"left|right"}',
  '{"type":"wait","seconds":number}',
  "Rules:",
  "- Keep output concise.",
  "- When players are nearby or someone spoke, give a short friendly `speak` line.",
  "- If short_term_memory shows a very recent chat line, you may skip chat to avoid spam.",
  "- In quiet scenes, actions can be empty.",
  "- Do NOT output any text outside the JSON object.",
].join("\n");

export function createOpenAiChatClient(config: PlannerConfig): ChatClient {
  const client = new OpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    // Retries are ours, see withRetry.
    maxRetries: 0,
  });

  return {
    async complete(messages, signal) {
      const response = await client.chat.completions.create(
        {
          model: config.model,
          messages: messages.map((message) =>
            message.role === "system"
              ? { role: "system" as const, content: message.content }
              : { role: "user" as const, content: message.content },
          ),
          temperature: 0.2,
          max_tokens: 1024,
        },
        { signal },
      );
      return response.choices[0]?.message.content ?? "";
    },
  };
}

/** Connection problems, timeouts, rate limits and 5xx responses. */
export function isRetryablePlannerError(err: unknown): boolean {
  if (err instanceof PlannerError) return err.retryable;
  return err instanceof APIConnectionError || err instanceof RateLimitError || err instanceof InternalServerError;
}

export interface LlmPlannerOptions {
  client: ChatClient;
  config: Pick<PlannerConfig, "maxAttempts" | "retryBaseDelayMs" | "systemPrompt">;
  logger: Logger;
}

export function createLlmPlanner(options: LlmPlannerOptions): Planner {
  const { client, config } = options;
  const logger = options.logger.child({ component: "llm-planner" });
  const systemPrompt = config.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

  return {
    name: "llm",
    async plan(request: PlanRequest, signal: AbortSignal): Promise<IntentDraft> {
      const messages: ChatMessage[] = [
        { role: "system", content: systemPrompt },
        { role: "user", content: JSON.stringify(buildStatePayload(request)) },
      ];

      let text: string;
      try {
        text = await withRetry(() => client.complete(messages, signal), {
          maxAttempts: config.maxAttempts,
          baseDelayMs: config.retryBaseDelayMs,
          isRetryable: isRetryablePlannerError,
          signal,
          onRetry: ({ attempt, delayMs, error }) => {
            logger.warn({ attempt, delayMs, err: describeError(error) }, "planner request failed, retrying");
          },
        });
      } catch (err) {
        if (signal.aborted) throw err;
        throw new PlannerError(`planner request failed: ${describeError(err)}`, {
          retryable: isRetryablePlannerError(err),
          cause: err,
        });
      }

      const raw = extractJsonObject(text);
      if (!raw) {
        throw new PlannerError("planner reply contained no JSON object", { retryable: false });
      }
      const { draft, dropped } = normalizePlan(raw);
      if (dropped.length > 0) {
        logger.warn({ dropped: dropped.length }, "dropped invalid planned actions");
      }
      return draft;
    },
  };
}
