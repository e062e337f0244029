import { describe, it, expect } from "vitest";
import { parseConfig } from "../src/config/load-config.js";
import type { DispatchRecord } from "../src/execution/dispatch-record.js";
import { ActionDispatcher } from "../src/execution/dispatcher.js";
import { IntentGate } from "../src/gating/intent-gate.js";
import { InstinctGenerator } from "../src/instinct/instinct-generator.js";
import type { RandomSource } from "../src/instinct/random.js";
import { createSilentLogger } from "../src/logging.js";
import { AgentController } from "../src/orchestrator/agent-controller.js";
import { OverrideChannel } from "../src/overrides/override-channel.js";
import type { Planner, PlanRequest } from "../src/planning/planner.js";
import { PlannerRunner } from "../src/planning/planner-runner.js";
import { IntentCell } from "../src/state/intent-cell.js";
import type { IntentDraft } from "../src/types/intent.js";
import type { Observation } from "../src/types/observation.js";
import { deferred, ManualClock, observation, RecordingSink, type Deferred } from "./helpers/fakes.js";

const OBSERVE: IntentDraft = {
  goal: "observe",
  activityLevel: 0.35,
  curiosity: 0.55,
  allowMove: true,
  speak: "",
  actions: [],
};

class CountingPlanner implements Planner {
  readonly name = "counting";
  readonly requests: PlanRequest[] = [];
  readonly pending: Deferred<IntentDraft>[] = [];

  constructor(private readonly manual = false) {}

  plan(request: PlanRequest): Promise<IntentDraft> {
    this.requests.push(request);
    if (!this.manual) return Promise.resolve(OBSERVE);
    const result = deferred<IntentDraft>();
    this.pending.push(result);
    return result.promise;
  }
}

interface SetupOptions {
  random?: RandomSource;
  intentTtlMs?: number;
  observeOnly?: boolean;
  manualPlanner?: boolean;
}

function setup(options: SetupOptions = {}) {
  const config = parseConfig({}, {});
  const logger = createSilentLogger();
  const clock = new ManualClock(0);
  const sink = new RecordingSink();
  const cell = new IntentCell();
  const planner = new CountingPlanner(options.manualPlanner ?? false);
  const runner = new PlannerRunner({
    planner,
    cell,
    intentTtlMs: options.intentTtlMs ?? config.runtime.intentTtlMs,
    failureBackoffMs: 2_000,
    maxFailureBackoffMs: 60_000,
    logger,
    now: clock.now,
  });
  const state: { latest: Observation | undefined } = { latest: undefined };
  const overrides = new OverrideChannel({
    templates: config.chat,
    latestObservation: () => state.latest,
    logger,
    now: clock.now,
  });
  const records: DispatchRecord[] = [];
  const controller = new AgentController({
    latestObservation: () => state.latest,
    cell,
    gate: new IntentGate({ sceneChangeThreshold: config.runtime.sceneChangeThreshold }),
    runner,
    instinct: new InstinctGenerator(config.instinct, options.random ?? (() => 0.5)),
    dispatcher: new ActionDispatcher({ sink, logger }),
    overrides,
    buildRequest: (obs, mood, nowMs) => ({ observation: obs, mood, shortTermMemory: [], longTermMemory: [], nowMs }),
    logger,
    observeOnly: options.observeOnly,
    onDispatched: (record) => records.push(record),
  });
  return { clock, sink, cell, planner, runner, state, overrides, controller, records };
}

describe("AgentController", () => {
  it("does nothing before the first observation except instinct", () => {
    const { controller, planner } = setup();
    const report = controller.tick(0);
    expect(report.gate).toEqual({ replan: false, reasons: [] });
    expect(report.plannerStarted).toBe(false);
    expect(report.goal).toBe("observe");
    expect(planner.requests).toHaveLength(0);
  });

  it("keeps to instinct while the scene stays the same and nothing is heard", async () => {
    const { controller, planner, runner, clock, state, records } = setup();
    state.latest = observation("A quiet lobby with a mirror");

    expect(controller.tick(clock.nowMs).gate.reasons).toEqual(["scene_changed"]);
    await runner.whenIdle();

    for (let i = 0; i < 5; i++) {
      const report = controller.tick(clock.advance(385));
      expect(report.gate).toEqual({ replan: false, reasons: [] });
      expect(report.goal).toBe("observe");
    }
    expect(planner.requests).toHaveLength(1);
    expect(records.length).toBeGreaterThan(0);
    expect(new Set(records.flatMap((record) => record.entries.map((entry) => entry.source)))).toEqual(
      new Set(["instinct"]),
    );
  });

  it("does not treat a missing intent as a trigger", async () => {
    const { controller, planner, runner, cell, clock, state, records } = setup({ manualPlanner: true });
    state.latest = observation("A quiet lobby with a mirror");
    controller.tick(clock.nowMs);
    planner.pending[0]?.reject(new Error("planner offline"));
    await runner.whenIdle();

    const report = controller.tick(clock.advance(10_000));
    expect(cell.peek()).toBeUndefined();
    expect(report.gate).toEqual({ replan: false, reasons: [] });
    expect(report.dispatched?.entries.every((entry) => entry.source === "instinct")).toBe(true);
    expect(records).toHaveLength(2);
  });

  it("replans when the intent expires even though nothing changed", async () => {
    const { controller, planner, runner, clock, state } = setup({ intentTtlMs: 30_000 });
    state.latest = observation("A quiet lobby with a mirror");

    controller.tick(clock.nowMs);
    await runner.whenIdle();

    const stillFresh = controller.tick(clock.advance(29_000));
    expect(stillFresh.gate.replan).toBe(false);

    const expired = controller.tick(clock.advance(2_000));
    expect(expired.gate).toEqual({ replan: true, reasons: ["intent_expired"] });
    expect(expired.plannerStarted).toBe(true);
    expect(expired.intentId).toBeUndefined();
    expect(planner.requests).toHaveLength(2);
  });

  it("coalesces triggers that arrive while a call is in flight", async () => {
    const { controller, planner, runner, clock, state } = setup({ manualPlanner: true });

    state.latest = observation("A quiet lobby with a mirror");
    expect(controller.tick(clock.nowMs).plannerStarted).toBe(true);

    state.latest = observation("A crowded dance floor with lights");
    const busy = controller.tick(clock.advance(385));
    expect(busy.gate).toEqual({ replan: false, reasons: ["scene_changed"], suppressedBy: "in_flight" });

    state.latest = observation("Rain falling over a rooftop garden");
    controller.tick(clock.advance(385));

    planner.pending[0]?.resolve(OBSERVE);
    await runner.whenIdle();

    expect(controller.tick(clock.advance(385)).plannerStarted).toBe(true);
    planner.pending[1]?.resolve(OBSERVE);
    await runner.whenIdle();
    controller.tick(clock.advance(385));

    expect(planner.requests).toHaveLength(2);
    expect(planner.requests[1]?.observation.scene).toBe("Rain falling over a rooftop garden");
  });

  it("replans on newly heard speech", async () => {
    const { controller, runner, clock, state } = setup();
    state.latest = observation("A quiet lobby with a mirror");
    controller.tick(clock.nowMs);
    await runner.whenIdle();

    state.latest = observation("A quiet lobby with a mirror", "hello, who are you?");
    expect(controller.tick(clock.advance(385)).gate.reasons).toEqual(["heard_new"]);
  });

  it("sends override lines ahead of everything else", () => {
    const { controller, overrides, sink, state } = setup();
    state.latest = observation("A quiet lobby with a mirror");
    overrides.say("brb, getting water");

    const report = controller.tick(0);

    expect(report.dispatched?.primarySource).toBe("override");
    expect(report.dispatched?.entries[0]).toEqual({
      source: "override",
      action: { type: "chat", text: "brb, getting water" },
    });
    expect(sink.sent).toHaveLength(1);
  });

  it("records but never sends in observe-only mode", async () => {
    const { controller, sink, records, overrides, state } = setup({ observeOnly: true });
    state.latest = observation("A quiet lobby with a mirror");
    overrides.say("just watching");

    const report = controller.tick(0);

    expect(report.observeOnly).toBe(true);
    expect(records).toHaveLength(1);
    expect(records[0]?.status).toBe("observed");
    await Promise.resolve();
    expect(sink.sent).toEqual([]);
  });

  it("survives a failing instinct generator", () => {
    const { controller, state } = setup({
      random: () => {
        throw new Error("random source broke");
      },
    });
    state.latest = observation("A quiet lobby with a mirror");

    const report = controller.tick(0);
    expect(report.instinctActions).toBe(0);
    expect(report.plannerStarted).toBe(true);
    expect(controller.tickCount).toBe(1);
  });

  it("starts a call on demand with planNow", () => {
    const { controller, planner, state } = setup();
    expect(controller.planNow(0)).toBe(false);
    state.latest = observation("A quiet lobby with a mirror");
    expect(controller.planNow(0)).toBe(true);
    expect(planner.requests).toHaveLength(1);
  });
});
