import { createSocket, type Socket } from "node:dgram";
import { DispatchError, describeError } from "../errors.js";
import type { ActionSink } from "../execution/dispatcher.js";
import type { Logger } from "../logging.js";
import type { AgentAction, DispatchedAction } from "../types/action.js";
import { sleep } from "../planning/retry.js";
import { encodeOscMessage, oscInt, type OscArgument } from "./osc-codec.js";

export const OSC_ADDRESS = {
  vertical: "/input/Vertical",
  horizontal: "/input/Horizontal",
  lookHorizontal: "/input/LookHorizontal",
  lookVertical: "/input/LookVertical",
  jump: "/input/Jump",
  use: "/input/UseRight",
  grab: "/input/GrabRight",
} as const;

export const CHATBOX_ADDRESS = "/chatbox/input";
export const CHATBOX_MAX_LENGTH = 144;

const BUTTON_HOLD_MS = 30;
const MIN_AXIS_HOLD_MS = 20;
const LOOK_UNITS_PER_AXIS = 35;
const LOOK_UNITS_PER_SECOND = 120;

export interface OscTransport {
  send(packet: Buffer): Promise<void>;
  close(): Promise<void>;
}

export function createUdpTransport(host: string, port: number): OscTransport {
  const socket: Socket = createSocket("udp4");
  let closed = false;
  return {
    send(packet) {
      return new Promise((resolve, reject) => {
        socket.send(packet, port, host, (err) => (err ? reject(err) : resolve()));
      });
    },
    close() {
      if (closed) return Promise.resolve();
      closed = true;
      return new Promise((resolve) => socket.close(() => resolve()));
    },
  };
}

export interface UdpOscSinkOptions {
  transport: OscTransport;
  logger: Logger;
  /** Instinct-only actions allowed to wait behind the one currently playing. */
  maxQueued?: number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

interface QueuedAction {
  action: DispatchedAction;
  resolve: () => void;
  reject: (err: unknown) => void;
}

function clampAxis(value: number): number {
  return Math.max(-1, Math.min(1, value));
}

function isInstinctOnly(action: DispatchedAction): boolean {
  return action.entries.every((entry) => entry.source === "instinct");
}

/**
 * Plays dispatched actions as VRChat OSC input, one at a time.
 *
 * Actions carrying override or intent entries are always queued. Instinct
 * filler is not worth waiting for: a newer instinct-only action replaces any
 * queued one, and once the queue holds `maxQueued` actions an instinct-only
 * action is refused with sink_busy while queued ones are evicted to make room
 * for higher-priority work. close() cancels everything that has not played
 * and interrupts the action in progress.
 */
export class UdpOscSink implements ActionSink {
  private readonly transport: OscTransport;
  private readonly logger: Logger;
  private readonly maxQueued: number;
  private readonly pause: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Addresses currently driven away from rest, with the arg that resets them. */
  private readonly held = new Map<string, OscArgument>();
  private readonly queue: QueuedAction[] = [];
  private readonly playback = new AbortController();
  private draining: Promise<void> | undefined;
  private closed = false;

  constructor(options: UdpOscSinkOptions) {
    this.transport = options.transport;
    this.logger = options.logger.child({ component: "osc-sink" });
    this.maxQueued = options.maxQueued ?? 2;
    this.pause = options.sleep ?? sleep;
  }

  get queued(): number {
    return this.queue.length;
  }

  send(action: DispatchedAction): Promise<void> {
    if (this.closed) {
      return Promise.reject(new DispatchError("sink_closed", "OSC sink is closed"));
    }
    const busy = this.draining !== undefined;
    if (isInstinctOnly(action)) {
      this.evictInstinctOnly();
      if (busy && this.queue.length >= this.maxQueued) {
        return Promise.reject(
          new DispatchError("sink_busy", `OSC sink busy, ${this.queue.length} action(s) already queued`),
        );
      }
    } else if (busy && this.queue.length >= this.maxQueued) {
      this.evictInstinctOnly();
    }

    return new Promise<void>((resolve, reject) => {
      this.queue.push({ action, resolve, reject });
      this.draining ??= this.drain();
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const pending of this.queue.splice(0)) {
      pending.reject(new DispatchError("sink_closed", "OSC sink closed before the action played"));
    }
    this.playback.abort(new Error("OSC sink closed"));
    await this.draining;
    await this.releaseAll();
    await this.transport.close();
  }

  private async drain(): Promise<void> {
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        try {
          await this.play(next.action);
          next.resolve();
        } catch (err) {
          next.reject(err);
        }
      }
    } finally {
      this.draining = undefined;
    }
  }

  private evictInstinctOnly(): void {
    for (let i = this.queue.length - 1; i >= 0; i--) {
      const pending = this.queue[i];
      if (pending && isInstinctOnly(pending.action)) {
        this.queue.splice(i, 1);
        pending.reject(new DispatchError("superseded", `action ${pending.action.id} replaced by a newer one`));
      }
    }
  }

  private async play(action: DispatchedAction): Promise<void> {
    const signal = this.playback.signal;
    this.logger.debug({ actionId: action.id, entries: action.entries.length }, "playing action");
    try {
      for (const { action: step } of action.entries) {
        signal.throwIfAborted();
        await this.playStep(step, signal);
      }
    } catch (err) {
      await this.releaseAll();
      if (signal.aborted) {
        throw new DispatchError("sink_closed", "OSC sink closed during playback", { cause: err });
      }
      throw new DispatchError("sink_unreachable", `OSC send failed: ${describeError(err)}`, { cause: err });
    }
  }

  private async playStep(step: AgentAction, signal: AbortSignal): Promise<void> {
    switch (step.type) {
      case "move": {
        const vertical = step.direction === "forward" || step.direction === "back";
        const value = step.direction === "forward" || step.direction === "right" ? 1 : -1;
        await this.holdAxis(vertical ? OSC_ADDRESS.vertical : OSC_ADDRESS.horizontal, value, step.seconds * 1000, signal);
        return;
      }
      case "look":
        await this.look(OSC_ADDRESS.lookHorizontal, step.dx, signal);
        await this.look(OSC_ADDRESS.lookVertical, -step.dy, signal);
        return;
      case "jump":
        await this.pressButton(OSC_ADDRESS.jump, signal);
        return;
      case "use":
        await this.pressButton(OSC_ADDRESS.use, signal);
        return;
      case "grab":
        await this.pressButton(OSC_ADDRESS.grab, signal);
        return;
      case "chat": {
        // Cut on code points so a surrogate pair is never split.
        const text = Array.from(step.text.replace(/[\r\n]+/g, " ")).slice(0, CHATBOX_MAX_LENGTH).join("");
        // immediate send, no notification sound
        await this.write(CHATBOX_ADDRESS, [text, true, false]);
        return;
      }
      case "wait":
        await this.pause(Math.max(0, step.seconds * 1000), signal);
        return;
    }
  }

  private async look(address: string, delta: number, signal: AbortSignal): Promise<void> {
    if (Math.abs(delta) <= 1) return;
    const holdMs = Math.max(0.03, Math.min(0.22, Math.abs(delta) / LOOK_UNITS_PER_SECOND)) * 1000;
    await this.holdAxis(address, clampAxis(delta / LOOK_UNITS_PER_AXIS), holdMs, signal);
  }

  private async holdAxis(address: string, value: number, holdMs: number, signal: AbortSignal): Promise<void> {
    this.held.set(address, 0);
    await this.write(address, [clampAxis(value)]);
    await this.pause(Math.max(MIN_AXIS_HOLD_MS, holdMs), signal);
    await this.write(address, [0]);
    this.held.delete(address);
  }

  private async pressButton(address: string, signal: AbortSignal): Promise<void> {
    this.held.set(address, oscInt(0));
    await this.write(address, [oscInt(1)]);
    await this.pause(BUTTON_HOLD_MS, signal);
    await this.write(address, [oscInt(0)]);
    this.held.delete(address);
  }

  private write(address: string, args: OscArgument[]): Promise<void> {
    return this.transport.send(encodeOscMessage(address, args));
  }

  private async releaseAll(): Promise<void> {
    for (const [address, rest] of [...this.held]) {
      try {
        await this.write(address, [rest]);
      } catch (err) {
        this.logger.warn({ address, err: describeError(err) }, "failed to release OSC input");
      }
      this.held.delete(address);
    }
  }
}

/** Logs actions instead of sending them. */
export class DryRunSink implements ActionSink {
  private readonly logger: Logger;
  private sentCount = 0;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "dry-run-sink" });
  }

  async send(action: DispatchedAction): Promise<void> {
    this.sentCount += 1;
    this.logger.info(
      {
        actionId: action.id,
        tick: action.tick,
        entries: action.entries.map(({ source, action: step }) => `${source}:${step.type}`),
      },
      "dry-run dispatch",
    );
  }

  async close(): Promise<void> {
    this.logger.debug({ sent: this.sentCount }, "dry-run sink closed");
  }
}
