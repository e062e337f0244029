import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { applyPreset } from "../src/config/presets.js";
import { assertRunnable, expandEnv, loadConfig, parseConfig } from "../src/config/load-config.js";
import { ConfigError } from "../src/errors.js";

describe("parseConfig", () => {
  it("fills every default from an empty object", () => {
    const config = parseConfig({}, {});
    expect(config.osc).toEqual({ host: "127.0.0.1", port: 9000, dryRun: true, maxQueued: 2 });
    expect(config.runtime.tickIntervalMs).toBe(385);
    expect(config.runtime.intentTtlMs).toBe(2_800);
    expect(config.runtime.sceneChangeThreshold).toBe(0.58);
    expect(config.planner.kind).toBe("heuristic");
    expect(config.memory.maxRecords).toBe(1_000);
    expect(config.logging.level).toBe("info");
  });

  it("expands ${VAR} placeholders from the environment", () => {
    const config = parseConfig(
      { planner: { kind: "llm", apiKey: "${PILOT_KEY}", model: "${MISSING}x" } },
      { PILOT_KEY: "test-secret" },
    );
    expect(config.planner.apiKey).toBe("test-secret");
    expect(config.planner.model).toBe("x");
  });

  it("falls back to the API key env vars for the llm planner", () => {
    expect(parseConfig({ planner: { kind: "llm" } }, { OPENAI_API_KEY: "test-secret" }).planner.apiKey).toBe(
      "test-secret",
    );
    expect(
      parseConfig({ planner: { kind: "llm" } }, { VRC_PILOT_API_KEY: "first", OPENAI_API_KEY: "second" }).planner
        .apiKey,
    ).toBe("first");
    expect(parseConfig({}, { OPENAI_API_KEY: "test-secret" }).planner.apiKey).toBe("");
  });

  it("names the offending path", () => {
    expect(() => parseConfig({ osc: { port: 70000 } }, {})).toThrow(ConfigError);
    expect(() => parseConfig({ osc: { port: 70000 } }, {})).toThrow(/osc\.port/);
  });

  it("requires the jitter range to be ordered", () => {
    expect(() => parseConfig({ instinct: { lookJitterMinDeg: 3, lookJitterMaxDeg: 1 } }, {})).toThrow(
      /instinct\.lookJitterMaxDeg/,
    );
  });
});

describe("expandEnv", () => {
  it("replaces unknown variables with nothing", () => {
    expect(expandEnv("${A}-${B}", { A: "1" })).toBe("1-");
  });
});

describe("assertRunnable", () => {
  it("needs an API key for the llm planner only", () => {
    expect(() => assertRunnable(parseConfig({ planner: { kind: "llm" } }, {}))).toThrow(/API key/);
    expect(() => assertRunnable(parseConfig({}, {}))).not.toThrow();
  });
});

describe("applyPreset", () => {
  it("overrides runtime and instinct settings only", () => {
    const base = parseConfig({ osc: { port: 9001 } }, {});
    const quiet = applyPreset(base, "quiet");
    expect(quiet.runtime.tickIntervalMs).toBe(500);
    expect(quiet.runtime.heardLatchMs).toBe(10_000);
    expect(quiet.instinct.hesitateIdleProb).toBe(0.28);
    expect(quiet.instinct.keepaliveMs).toBe(2_000);
    expect(quiet.osc.port).toBe(9001);
    expect(base.runtime.tickIntervalMs).toBe(385);
    expect(applyPreset(base, undefined)).toBe(base);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vrc-pilot-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads a JSON file", async () => {
    const file = path.join(dir, "agent.json");
    await fs.writeFile(file, JSON.stringify({ osc: { dryRun: false }, runtime: { tickIntervalMs: 400 } }));
    const config = await loadConfig(file, {});
    expect(config.osc.dryRun).toBe(false);
    expect(config.runtime.tickIntervalMs).toBe(400);
  });

  it("reports a missing file", async () => {
    await expect(loadConfig(path.join(dir, "nope.json"), {})).rejects.toThrow(/Cannot read config file/);
  });

  it("reports broken JSON", async () => {
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json");
    await expect(loadConfig(file, {})).rejects.toBeInstanceOf(ConfigError);
  });
});
