import { emitKeypressEvents } from "node:readline";
import type { OverrideChannel } from "./override-channel.js";

export type KeypressInfo = {
  name?: string;
  ctrl?: boolean;
  sequence?: string;
};

export type KeypressInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

export type HotkeyAction = "say" | "stop";

export function hotkeyFor(key: KeypressInfo): HotkeyAction | undefined {
  if (key.ctrl && key.name === "c") return "stop";
  switch (key.name) {
    case "f11":
    case "s":
      return "say";
    case "f12":
    case "q":
      return "stop";
    default:
      return undefined;
  }
}

/**
 * Feeds terminal keypresses into the override channel. Returns a detach
 * function that restores the terminal.
 */
export function attachKeyboardHotkeys(channel: OverrideChannel, input: KeypressInput = process.stdin): () => void {
  emitKeypressEvents(input);
  const raw = input.isTTY === true && input.setRawMode !== undefined;
  if (raw) input.setRawMode?.(true);

  const onKeypress = (_chunk: unknown, key: KeypressInfo | undefined) => {
    if (!key) return;
    const action = hotkeyFor(key);
    if (action === "say") channel.say();
    if (action === "stop") channel.stop();
  };
  input.on("keypress", onKeypress);

  return () => {
    input.off("keypress", onKeypress);
    if (raw) input.setRawMode?.(false);
    input.pause();
  };
}
