#!/usr/bin/env node
import { existsSync } from "node:fs";
import { config as dotenvConfig } from "dotenv";
import { applyCliOverrides, parseCliArgs, USAGE, type CliOptions } from "./cli-args.js";
import { assertRunnable, loadConfig, parseConfig } from "./config/load-config.js";
import type { AgentConfig } from "./config/schema.js";
import { ConfigError, describeError } from "./errors.js";
import { createLogger, type Logger } from "./logging.js";
import { createDefaultPlanner, createDefaultSink, AgentRuntime } from "./orchestrator/agent-runtime.js";
import { attachKeyboardHotkeys } from "./overrides/keyboard-hotkeys.js";
import { FileObservationSource } from "./perception/observation-source.js";

async function resolveConfig(argv: string[]): Promise<{ options: CliOptions; config: AgentConfig }> {
  const options = parseCliArgs(argv);
  // The default config file is optional; an explicit one is not.
  const base: AgentConfig =
    options.configExplicit || existsSync(options.configPath)
      ? await loadConfig(options.configPath)
      : parseConfig({});
  const config = applyCliOverrides(base, options);
  if (config.planner.kind === "llm" && !config.planner.apiKey) {
    config.planner.apiKey = process.env.VRC_PILOT_API_KEY ?? process.env.OPENAI_API_KEY ?? "";
  }
  return { options, config };
}

async function run(logger: Logger, config: AgentConfig, once: boolean): Promise<void> {
  assertRunnable(config);
  const runtime = new AgentRuntime({
    config,
    logger,
    source: new FileObservationSource(config.observation.file),
    planner: createDefaultPlanner(config, logger),
    sink: createDefaultSink(config, logger),
  });

  if (once) {
    const report = await runtime.runOnce();
    process.stdout.write(JSON.stringify(report, null, 2) + "\n");
    await runtime.stop();
    return;
  }

  const detach = process.stdin.isTTY ? attachKeyboardHotkeys(runtime.overrides) : () => undefined;
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "signal received");
    runtime.overrides.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  runtime.start();
  await runtime.done;
  detach();
  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
}

async function main(): Promise<number> {
  dotenvConfig();
  let resolved: { options: CliOptions; config: AgentConfig };
  try {
    resolved = await resolveConfig(process.argv.slice(2));
  } catch (err) {
    process.stderr.write(`${describeError(err)}\n\n${USAGE}\n`);
    return 1;
  }
  if (resolved.options.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const { config } = resolved;
  const level = process.env.LOG_LEVEL ?? config.logging.level;
  const logger = createLogger({ level: isLevel(level) ? level : config.logging.level });
  try {
    await run(logger, config, resolved.options.once);
    return 0;
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ err: describeError(err) }, "invalid configuration");
    } else {
      logger.fatal({ err: describeError(err) }, "agent crashed");
    }
    return 1;
  }
}

function isLevel(value: string): value is AgentConfig["logging"]["level"] {
  return ["fatal", "error", "warn", "info", "debug", "trace", "silent"].includes(value);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`${describeError(err)}\n`);
    process.exitCode = 1;
  },
);
