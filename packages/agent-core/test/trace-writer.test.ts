import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createSilentLogger } from "../src/logging.js";
import { resolveTracePath, TraceWriter } from "../src/orchestrator/trace-writer.js";

describe("resolveTracePath", () => {
  it("maps artifacts to files under the trace dir", () => {
    expect(resolveTracePath("/t", "intents")).toBe(path.join("/t", "intents.jsonl"));
    expect(resolveTracePath("/t", "state_active")).toBe(path.join("/t", "state", "active.json"));
  });
});

describe("TraceWriter", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "vrc-pilot-trace-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("appends JSON lines in order", async () => {
    const writer = new TraceWriter(dir, createSilentLogger());
    writer.append("dispatch", { tick: 1 });
    writer.append("dispatch", { tick: 2 });
    await writer.flush();

    const text = await fs.readFile(path.join(dir, "dispatch.jsonl"), "utf-8");
    expect(text).toBe('{"tick":1}\n{"tick":2}\n');
  });

  it("replaces the active state file", async () => {
    const writer = new TraceWriter(dir, createSilentLogger());
    writer.writeActiveState({ goal: "observe" });
    writer.writeActiveState({ goal: "explore" });
    await writer.flush();

    const state = JSON.parse(await fs.readFile(path.join(dir, "state", "active.json"), "utf-8"));
    expect(state).toEqual({ goal: "explore" });
    await expect(fs.access(path.join(dir, "state", "active.json.tmp"))).rejects.toThrow();
  });

  it("keeps going after a failed write", async () => {
    const blocked = path.join(dir, "blocked");
    await fs.writeFile(blocked, "not a directory");
    const writer = new TraceWriter(path.join(blocked, "trace"), createSilentLogger());

    writer.append("planner", { failures: 1 });
    await expect(writer.flush()).resolves.toBeUndefined();
  });
});
