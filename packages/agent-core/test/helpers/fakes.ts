import type { RandomSource } from "../../src/instinct/random.js";
import type { ActionSink } from "../../src/execution/dispatcher.js";
import type { DispatchedAction } from "../../src/types/action.js";
import type { Intent } from "../../src/types/intent.js";
import type { Observation } from "../../src/types/observation.js";

/** Returns the given values in order, then keeps returning the last one. */
export function scriptedRandom(values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

export class ManualClock {
  constructor(public nowMs = 0) {}

  readonly now = (): number => this.nowMs;

  advance(ms: number): number {
    this.nowMs += ms;
    return this.nowMs;
  }
}

export function observation(scene: string, heard = "", overrides: Partial<Observation> = {}): Observation {
  return { id: `obs-${scene.length}-${heard.length}`, timestampMs: 0, scene, heard, ...overrides };
}

export function intent(overrides: Partial<Intent> = {}): Intent {
  return {
    id: "intent-1",
    goal: "observe",
    activityLevel: 0.35,
    curiosity: 0.55,
    allowMove: true,
    speak: "",
    actions: [],
    createdAtMs: 0,
    ttlMs: 2_800,
    observationId: "obs-1",
    planner: "test",
    ...overrides,
  };
}

export class RecordingSink implements ActionSink {
  readonly sent: DispatchedAction[] = [];
  closed = false;
  failWith: Error | undefined;

  async send(action: DispatchedAction): Promise<void> {
    if (this.failWith) throw this.failWith;
    this.sent.push(action);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
