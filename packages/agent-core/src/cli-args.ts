import { parseArgs } from "node:util";
import { ConfigError } from "./errors.js";
import type { AgentConfig } from "./config/schema.js";
import { applyPreset, isPresetName, PRESET_NAMES, type PresetName } from "./config/presets.js";

export const DEFAULT_CONFIG_PATH = "config/agent.json";

export interface CliOptions {
  configPath: string;
  /** False when --config was not given and the default path is used. */
  configExplicit: boolean;
  preset?: PresetName;
  dryRun?: boolean;
  once: boolean;
  planner?: "llm" | "heuristic";
  observationFile?: string;
  observeOnly: boolean;
  help: boolean;
}

export const USAGE = `Usage: vrc-pilot [options]

  --config <path>            JSON config file (default ${DEFAULT_CONFIG_PATH})
  --preset <${PRESET_NAMES.join("|")}>     runtime/instinct preset
  --dry-run                  log actions instead of sending OSC
  --live                     send OSC even if the config says dry-run
  --once                     capture, plan and tick once, then exit
  --planner <llm|heuristic>  override planner.kind
  --observation-file <path>  override observation.file
  --observe-only             plan but never dispatch
  -h, --help                 show this help

Keys while running: F11 or s says an extra line, F12, q or Ctrl-C stops.`;

const CLI_OPTIONS = {
  config: { type: "string" },
  preset: { type: "string" },
  "dry-run": { type: "boolean", default: false },
  live: { type: "boolean", default: false },
  once: { type: "boolean", default: false },
  planner: { type: "string" },
  "observation-file": { type: "string" },
  "observe-only": { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = readArgs(argv);
  const preset = values.preset;
  if (preset !== undefined && !isPresetName(preset)) {
    throw new ConfigError(`Unknown preset "${preset}", expected one of ${PRESET_NAMES.join(", ")}`);
  }
  const planner = values.planner;
  if (planner !== undefined && planner !== "llm" && planner !== "heuristic") {
    throw new ConfigError(`Unknown planner "${planner}", expected llm or heuristic`);
  }
  const dryRunFlag = values["dry-run"] ?? false;
  const liveFlag = values.live ?? false;
  if (dryRunFlag && liveFlag) {
    throw new ConfigError("--dry-run and --live cannot be combined");
  }

  return {
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    configExplicit: values.config !== undefined,
    preset,
    dryRun: dryRunFlag ? true : liveFlag ? false : undefined,
    once: values.once ?? false,
    planner,
    observationFile: values["observation-file"],
    observeOnly: values["observe-only"] ?? false,
    help: values.help ?? false,
  };
}

/** Layers preset and command-line overrides over the loaded config. */
export function applyCliOverrides(config: AgentConfig, options: CliOptions): AgentConfig {
  const withPreset = applyPreset(config, options.preset);
  return {
    ...withPreset,
    osc: { ...withPreset.osc, dryRun: options.dryRun ?? withPreset.osc.dryRun },
    planner: { ...withPreset.planner, kind: options.planner ?? withPreset.planner.kind },
    observation: { ...withPreset.observation, file: options.observationFile ?? withPreset.observation.file },
    runtime: { ...withPreset.runtime, observeOnly: options.observeOnly || withPreset.runtime.observeOnly },
  };
}
