import { describe, it, expect } from "vitest";
import { IntentCell } from "../src/state/intent-cell.js";
import { isIntentStale } from "../src/types/intent.js";
import { intent } from "./helpers/fakes.js";

describe("IntentCell", () => {
  it("installs an intent under a reserved ticket", () => {
    const cell = new IntentCell();
    const ticket = cell.reserve();

    expect(cell.replace(ticket, intent({ id: "a" }))).toBe(true);
    expect(cell.read(100)?.id).toBe("a");
  });

  it("freezes stored intents and their actions", () => {
    const cell = new IntentCell();
    cell.replace(cell.reserve(), intent({ actions: [{ type: "jump" }] }));

    const stored = cell.peek();
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.actions)).toBe(true);
    expect(Object.isFrozen(stored?.actions[0])).toBe(true);
  });

  it("ignores a late completion from an older ticket", () => {
    const cell = new IntentCell();
    const older = cell.reserve();
    const newer = cell.reserve();

    expect(cell.replace(newer, intent({ id: "newer" }))).toBe(true);
    expect(cell.replace(older, intent({ id: "older" }))).toBe(false);
    expect(cell.peek()?.id).toBe("newer");
  });

  it("rejects tickets that were never reserved", () => {
    const cell = new IntentCell();
    expect(() => cell.replace(1, intent())).toThrow(RangeError);
  });

  it("treats an intent as stale from createdAt + ttl onwards", () => {
    const cell = new IntentCell();
    const held = intent({ createdAtMs: 1_000, ttlMs: 2_000 });
    cell.replace(cell.reserve(), held);

    expect(cell.read(2_999)?.id).toBe(held.id);
    expect(cell.isExpired(2_999)).toBe(false);
    expect(cell.read(3_000)).toBeUndefined();
    expect(cell.isExpired(3_000)).toBe(true);
    expect(isIntentStale(held, 3_000)).toBe(true);
    expect(cell.peek()?.id).toBe(held.id);
  });

  it("is not expired while empty", () => {
    const cell = new IntentCell();
    expect(cell.isExpired(1_000_000)).toBe(false);
    expect(cell.read(0)).toBeUndefined();
  });

  it("clears", () => {
    const cell = new IntentCell();
    cell.replace(cell.reserve(), intent());
    cell.clear();
    expect(cell.peek()).toBeUndefined();
  });
});
