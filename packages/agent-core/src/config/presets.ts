import type { AgentConfig } from "./schema.js";

export type PresetName = "quiet" | "active";

export const PRESET_NAMES: readonly PresetName[] = ["quiet", "active"];

type PresetOverrides = {
  runtime: Partial<AgentConfig["runtime"]>;
  instinct: Partial<AgentConfig["instinct"]>;
};

// Startup-only overrides; the config file on disk is never rewritten.
const PRESETS: Record<PresetName, PresetOverrides> = {
  quiet: {
    runtime: { tickIntervalMs: 500, observeIntervalMs: 2_400, intentTtlMs: 3_400 },
    instinct: {
      hesitateIdleProb: 0.28,
      hesitatePauseProb: 0.34,
      lookJitterMinDeg: 0.8,
      lookJitterMaxDeg: 2.0,
      lookOvershootProb: 0.08,
      smallStepMoveProb: 0.14,
    },
  },
  active: {
    runtime: { tickIntervalMs: 315, observeIntervalMs: 1_800, intentTtlMs: 2_400 },
    instinct: {
      hesitateIdleProb: 0.1,
      hesitatePauseProb: 0.18,
      lookJitterMinDeg: 1.2,
      lookJitterMaxDeg: 3.4,
      lookOvershootProb: 0.28,
      smallStepMoveProb: 0.26,
    },
  },
};

export function isPresetName(value: string): value is PresetName {
  return value === "quiet" || value === "active";
}

export function applyPreset(config: AgentConfig, preset: PresetName | undefined): AgentConfig {
  if (!preset) return config;
  const overrides = PRESETS[preset];
  return {
    ...config,
    runtime: { ...config.runtime, ...overrides.runtime },
    instinct: { ...config.instinct, ...overrides.instinct },
  };
}
