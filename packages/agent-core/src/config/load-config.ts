import fs from "node:fs/promises";
import { ConfigError } from "../errors.js";
import { agentConfigSchema, type AgentConfig } from "./schema.js";

const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function expandEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(ENV_PLACEHOLDER, (_match, name: string) => env[name] ?? "");
}

function expandTree(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") return expandEnv(value, env);
  if (Array.isArray(value)) return value.map((entry) => expandTree(entry, env));
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, expandTree(entry, env)]),
    );
  }
  return value;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const result = agentConfigSchema.safeParse(expandTree(raw ?? {}, env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, { cause: result.error });
  }
  const config = result.data;
  if (config.planner.kind === "llm" && !config.planner.apiKey) {
    config.planner.apiKey = env.VRC_PILOT_API_KEY ?? env.OPENAI_API_KEY ?? "";
  }
  return config;
}

/** Throws ConfigError for settings that only matter once the agent starts. */
export function assertRunnable(config: AgentConfig): void {
  if (config.planner.kind === "llm" && !config.planner.apiKey) {
    throw new ConfigError(
      "Missing planner API key. Set planner.apiKey or the VRC_PILOT_API_KEY / OPENAI_API_KEY env var.",
    );
  }
}

export async function loadConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<AgentConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, { cause: err });
  }
  return parseConfig(raw, env);
}
