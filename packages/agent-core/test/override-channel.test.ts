import { PassThrough } from "node:stream";
import { describe, it, expect, vi } from "vitest";
import { createSilentLogger } from "../src/logging.js";
import { attachKeyboardHotkeys, hotkeyFor } from "../src/overrides/keyboard-hotkeys.js";
import { OverrideChannel } from "../src/overrides/override-channel.js";
import type { Observation } from "../src/types/observation.js";
import { ManualClock, observation } from "./helpers/fakes.js";

const templates = {
  heardLine: "I heard someone say: {heard}. I'm over here.",
  sceneLine: "I'm here, I see {scene}. Carry on!",
};

function setup(latest: Observation | null = observation("Two players chatting near the bar")) {
  const clock = new ManualClock(10_000);
  const channel = new OverrideChannel({
    templates,
    latestObservation: () => latest ?? undefined,
    logger: createSilentLogger(),
    now: clock.now,
  });
  return { clock, channel };
}

describe("OverrideChannel.say", () => {
  it("builds a line from the latest scene", () => {
    const { channel } = setup();
    expect(channel.say()).toBe(true);
    expect(channel.drain()).toEqual([{ type: "chat", text: "I'm here, I see Two players chatting near. Carry on!" }]);
    expect(channel.drain()).toEqual([]);
  });

  it("prefers heard speech over the scene", () => {
    const { channel } = setup(observation("a quiet room", "  hello   bot "));
    channel.say();
    expect(channel.drain()).toEqual([{ type: "chat", text: "I heard someone say: hello bot. I'm over here." }]);
  });

  it("queues explicit text as given", () => {
    const { channel } = setup();
    channel.say("be right\nback");
    expect(channel.drain()).toEqual([{ type: "chat", text: "be right back" }]);
  });

  it("rate-limits repeated presses", () => {
    const { clock, channel } = setup();
    expect(channel.say()).toBe(true);
    clock.advance(500);
    expect(channel.say()).toBe(false);
    clock.advance(300);
    expect(channel.say()).toBe(true);
    expect(channel.drain()).toHaveLength(2);
  });

  it("says nothing before anything was observed", () => {
    const { channel } = setup(null);
    expect(channel.say()).toBe(false);
    expect(channel.drain()).toEqual([]);
  });
});

describe("OverrideChannel.stop", () => {
  it("notifies listeners once", () => {
    const { channel } = setup();
    const listener = vi.fn();
    const removed = vi.fn();
    channel.onStop(listener);
    const unsubscribe = channel.onStop(removed);
    unsubscribe();

    channel.stop();
    channel.stop();

    expect(channel.stopRequested).toBe(true);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(removed).not.toHaveBeenCalled();
  });
});

describe("hotkeyFor", () => {
  it("maps keys to override actions", () => {
    expect(hotkeyFor({ name: "f11" })).toBe("say");
    expect(hotkeyFor({ name: "s" })).toBe("say");
    expect(hotkeyFor({ name: "f12" })).toBe("stop");
    expect(hotkeyFor({ name: "q" })).toBe("stop");
    expect(hotkeyFor({ name: "c", ctrl: true })).toBe("stop");
    expect(hotkeyFor({ name: "c" })).toBeUndefined();
    expect(hotkeyFor({})).toBeUndefined();
  });
});

describe("attachKeyboardHotkeys", () => {
  it("routes keypresses to the channel until detached", () => {
    const { channel } = setup();
    const input = new PassThrough();
    const detach = attachKeyboardHotkeys(channel, input);

    input.emit("keypress", "s", { name: "s" });
    expect(channel.drain()).toHaveLength(1);

    detach();
    input.emit("keypress", "q", { name: "q" });
    expect(channel.stopRequested).toBe(false);
  });

  it("puts a terminal into raw mode and restores it", () => {
    const { channel } = setup();
    const setRawMode = vi.fn();
    const input = Object.assign(new PassThrough(), { isTTY: true, setRawMode });

    const detach = attachKeyboardHotkeys(channel, input);
    input.emit("keypress", "q", { name: "q" });
    detach();

    expect(channel.stopRequested).toBe(true);
    expect(setRawMode.mock.calls).toEqual([[true], [false]]);
  });
});
