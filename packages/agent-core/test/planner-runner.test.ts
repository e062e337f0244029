import { describe, it, expect, vi } from "vitest";
import { createSilentLogger } from "../src/logging.js";
import type { Planner, PlanRequest } from "../src/planning/planner.js";
import { PlannerRunner, type PlannerRunnerOptions } from "../src/planning/planner-runner.js";
import { IntentCell } from "../src/state/intent-cell.js";
import type { IntentDraft } from "../src/types/intent.js";
import { deferred, ManualClock, observation, type Deferred } from "./helpers/fakes.js";

interface PendingCall {
  request: PlanRequest;
  signal: AbortSignal;
  result: Deferred<IntentDraft>;
}

class ControlledPlanner implements Planner {
  readonly name = "controlled";
  readonly calls: PendingCall[] = [];

  plan(request: PlanRequest, signal: AbortSignal): Promise<IntentDraft> {
    const result = deferred<IntentDraft>();
    this.calls.push({ request, signal, result });
    return result.promise;
  }

  call(index: number): PendingCall {
    const call = this.calls[index];
    if (!call) throw new Error(`no planner call #${index}`);
    return call;
  }
}

function draft(goal: string): IntentDraft {
  return { goal, activityLevel: 0.4, curiosity: 0.5, allowMove: true, speak: "", actions: [] };
}

function request(scene = "lobby"): PlanRequest {
  return {
    observation: observation(scene, "", { id: `obs-${scene}` }),
    mood: { goal: "observe", activityLevel: 0.35, curiosity: 0.55, allowMove: true },
    shortTermMemory: [],
    longTermMemory: [],
    nowMs: 0,
  };
}

function setup(overrides: Partial<PlannerRunnerOptions> = {}) {
  const planner = new ControlledPlanner();
  const cell = new IntentCell();
  const clock = new ManualClock(1_000);
  const runner = new PlannerRunner({
    planner,
    cell,
    intentTtlMs: 2_800,
    failureBackoffMs: 2_000,
    maxFailureBackoffMs: 5_000,
    logger: createSilentLogger(),
    now: clock.now,
    ...overrides,
  });
  return { planner, cell, clock, runner };
}

describe("PlannerRunner", () => {
  it("installs the result stamped at completion time", async () => {
    const onIntent = vi.fn();
    const { planner, cell, clock, runner } = setup({ onIntent });

    expect(runner.start(request())).toBe(true);
    expect(runner.busy).toBe(true);

    clock.advance(500);
    planner.call(0).result.resolve(draft("greet"));
    await runner.whenIdle();

    const installed = cell.peek();
    expect(installed).toMatchObject({
      goal: "greet",
      createdAtMs: 1_500,
      ttlMs: 2_800,
      observationId: "obs-lobby",
      planner: "controlled",
    });
    expect(runner.busy).toBe(false);
    expect(onIntent).toHaveBeenCalledWith(installed, request());
  });

  it("allows only one call in flight", async () => {
    const { planner, runner } = setup();

    expect(runner.start(request("a"))).toBe(true);
    expect(runner.start(request("b"))).toBe(false);
    expect(runner.start(request("c"))).toBe(false);
    expect(planner.calls).toHaveLength(1);

    planner.call(0).result.resolve(draft("a"));
    await runner.whenIdle();
    expect(runner.start(request("d"))).toBe(true);
    expect(planner.calls).toHaveLength(2);
  });

  it("discards the result of a cancelled call", async () => {
    const { planner, cell, runner } = setup();

    runner.start(request("old"));
    runner.cancel();
    expect(planner.call(0).signal.aborted).toBe(true);
    expect(runner.busy).toBe(false);

    runner.start(request("new"));
    planner.call(1).result.resolve(draft("new"));
    planner.call(0).result.resolve(draft("old"));
    await runner.whenIdle();

    expect(cell.peek()?.goal).toBe("new");
    expect(runner.failures).toBe(0);
  });

  it("does not count an aborted call as a failure", async () => {
    const onFailure = vi.fn();
    const { planner, runner } = setup({ onFailure });

    runner.start(request());
    runner.cancel();
    planner.call(0).result.reject(new Error("aborted"));
    await runner.whenIdle();

    expect(onFailure).not.toHaveBeenCalled();
    expect(runner.backoffUntilMs).toBe(0);
  });

  it("keeps the current intent on failure and backs off exponentially", async () => {
    const onFailure = vi.fn();
    const { planner, cell, clock, runner } = setup({ onFailure });

    runner.start(request());
    planner.call(0).result.resolve(draft("steady"));
    await runner.whenIdle();

    const backoffs: number[] = [];
    for (let i = 1; i <= 3; i++) {
      runner.start(request());
      planner.call(i).result.reject(new Error("planner down"));
      await runner.whenIdle();
      backoffs.push(runner.backoffUntilMs - clock.nowMs);
    }

    expect(cell.peek()?.goal).toBe("steady");
    expect(backoffs).toEqual([2_000, 4_000, 5_000]);
    expect(runner.failures).toBe(3);
    expect(onFailure).toHaveBeenLastCalledWith(expect.any(Error), 3);
  });

  it("clears the back-off after a success", async () => {
    const { planner, runner } = setup();

    runner.start(request());
    planner.call(0).result.reject(new Error("planner down"));
    await runner.whenIdle();
    expect(runner.backoffUntilMs).toBe(3_000);

    runner.start(request());
    planner.call(1).result.resolve(draft("back"));
    await runner.whenIdle();
    expect(runner.backoffUntilMs).toBe(0);
    expect(runner.failures).toBe(0);
  });

  it("survives a listener that throws", async () => {
    const { planner, cell, runner } = setup({
      onIntent: () => {
        throw new Error("listener bug");
      },
    });

    runner.start(request());
    planner.call(0).result.resolve(draft("fine"));
    await runner.whenIdle();

    expect(cell.peek()?.goal).toBe("fine");
    expect(runner.failures).toBe(0);
  });
});
