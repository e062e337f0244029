import { nanoid } from "nanoid";
import type { Logger } from "../logging.js";
import { DispatchError, describeError } from "../errors.js";
import { clamp01, type RandomSource } from "../instinct/random.js";
import type { Intent } from "../types/intent.js";
import type { Observation } from "../types/observation.js";
import type {
  ActionSource,
  AgentAction,
  DispatchedAction,
  DispatchEntry,
  InstinctAction,
} from "../types/action.js";
import { actionSignature } from "./action-signature.js";
import { resolveConflicts, type DeniedEntry } from "./action-policy.js";
import {
  buildObservationLine,
  collapseWhitespace,
  fillTemplate,
  hasSocialContext,
  type LineTemplates,
} from "./chat-lines.js";

/** Where dispatched actions end up: OSC in production, fakes in tests. */
export interface ActionSink {
  send(action: DispatchedAction): Promise<void>;
  close(): Promise<void>;
}

export interface ComposeInput {
  tick: number;
  nowMs: number;
  instinct: InstinctAction;
  /** Current (non-stale) intent, if any. */
  intent: Intent | undefined;
  overrides: AgentAction[];
  observation?: Observation;
  /** Suppresses unprompted chat; replies to heard speech still compose. */
  observeOnly?: boolean;
}

export interface ComposeResult {
  action: DispatchedAction | undefined;
  denied: DeniedEntry[];
  /** Set when this tick carried the intent's one-shot actions. */
  intentId?: string;
  stabilized: boolean;
}

export interface ConversationOptions extends LineTemplates {
  /** `{heard}` is replaced with the (shortened) heard text. */
  replyLine: string;
  /** The same heard text is answered at most once in this window. */
  replyDedupeMs: number;
  autoChatCooldownMs: number;
}

export const DEFAULT_CONVERSATION: ConversationOptions = {
  heardLine: "I heard someone say: {heard}. I'm over here.",
  sceneLine: "I'm here, I see {scene}. Carry on!",
  replyLine: 'Got it, I heard you say "{heard}". I\'m right here.',
  replyDedupeMs: 12_000,
  autoChatCooldownMs: 14_000,
};

export interface ActionDispatcherOptions {
  sink: ActionSink;
  logger: Logger;
  chatMaxLength?: number;
  maxEntries?: number;
  conversation?: Partial<ConversationOptions>;
  random?: RandomSource;
  onDropped?: (action: DispatchedAction, err: unknown) => void;
}

const RECENT_SCRIPTS = 6;

const EXPLORATION_VARIANTS: readonly AgentAction[][] = [
  [
    { type: "move", direction: "left", seconds: 0.25 },
    { type: "look", dx: -30, dy: 0 },
    { type: "jump" },
    { type: "wait", seconds: 0.25 },
  ],
  [
    { type: "move", direction: "right", seconds: 0.25 },
    { type: "look", dx: 25, dy: -8 },
    { type: "wait", seconds: 0.2 },
  ],
  [
    { type: "move", direction: "back", seconds: 0.2 },
    { type: "look", dx: 0, dy: -12 },
    { type: "use" },
  ],
];

/**
 * Replaces chat text that is too short or mostly digits with the fallback
 * line. Returns "" when nothing sensible is left.
 */
export function repairChatText(text: string, fallback: string, maxLength = 140): string {
  let repaired = text.trim();
  const digits = [...repaired].filter((ch) => ch >= "0" && ch <= "9").length;
  const mostlyDigits = repaired.length > 0 && digits / repaired.length >= 0.8;
  if (repaired.length < 4 || mostlyDigits) {
    repaired = fallback.trim();
  }
  return repaired.slice(0, maxLength);
}

export class ActionDispatcher {
  private readonly sink: ActionSink;
  private readonly logger: Logger;
  private readonly chatMaxLength: number;
  private readonly maxEntries: number;
  private readonly conversation: ConversationOptions;
  private readonly random: RandomSource;
  private readonly onDropped?: (action: DispatchedAction, err: unknown) => void;
  private readonly recentScripts: string[] = [];
  private readonly pending = new Set<Promise<void>>();
  private consumedIntentId: string | undefined;
  private lastReply: { heard: string; atMs: number } | undefined;
  private lastAutoChatAtMs: number | undefined;

  constructor(options: ActionDispatcherOptions) {
    this.sink = options.sink;
    this.logger = options.logger.child({ component: "dispatcher" });
    this.chatMaxLength = options.chatMaxLength ?? 140;
    this.maxEntries = options.maxEntries ?? 8;
    this.conversation = { ...DEFAULT_CONVERSATION, ...options.conversation };
    this.random = options.random ?? Math.random;
    this.onDropped = options.onDropped;
  }

  compose(input: ComposeInput): ComposeResult {
    const overrideGroup = this.repairChats(input.overrides, "").map((action) => entry("override", action));
    const instinctGroup = input.instinct.actions.map((action) => entry("instinct", action));

    let intentGroup: DispatchEntry[] = [];
    let intentId: string | undefined;
    let stabilized = false;
    if (input.intent && input.intent.id !== this.consumedIntentId) {
      this.consumedIntentId = input.intent.id;
      intentId = input.intent.id;
      const script = this.intentScript(input.intent, input);
      const stable = this.stabilize(script, input.tick);
      stabilized = stable !== script;
      intentGroup = stable.map((action) => entry("intent", action));
    }

    const { entries, denied } = resolveConflicts([overrideGroup, intentGroup, instinctGroup], this.maxEntries);
    const first = entries[0];
    if (!first) {
      return { action: undefined, denied, intentId, stabilized };
    }
    return {
      action: {
        id: nanoid(),
        tick: input.tick,
        atMs: input.nowMs,
        entries,
        primarySource: first.source,
      },
      denied,
      intentId,
      stabilized,
    };
  }

  /** Hands the action to the sink without waiting for playback. */
  dispatch(action: DispatchedAction): void {
    const delivery = this.sink.send(action).catch((err: unknown) => {
      if (err instanceof DispatchError && err.reason === "superseded") {
        this.logger.debug({ actionId: action.id, tick: action.tick }, "dispatch superseded");
      } else {
        this.logger.warn({ actionId: action.id, tick: action.tick, err: describeError(err) }, "dispatch dropped");
      }
      this.onDropped?.(action, err);
    });
    this.pending.add(delivery);
    void delivery.finally(() => this.pending.delete(delivery));
  }

  get inFlight(): number {
    return this.pending.size;
  }

  /** Resolves once every dispatched action has played or been dropped. */
  async flush(): Promise<void> {
    await Promise.all([...this.pending]);
  }

  /**
   * The intent's one-shot actions plus at most one chat line: the planner's
   * own speak first, then a reply to heard speech, then an unprompted remark
   * about the scene.
   */
  private intentScript(intent: Intent, input: ComposeInput): AgentAction[] {
    const actions = [...intent.actions];
    const hasChat = () => actions.some((action) => action.type === "chat");
    if (intent.speak && !hasChat()) {
      actions.push({ type: "chat", text: intent.speak });
    }
    if (!hasChat()) {
      const reply = this.replyToHeard(input.observation, input.nowMs);
      if (reply) actions.push(reply);
    }
    if (!hasChat() && !input.observeOnly) {
      const remark = this.autoChat(intent, input.observation, input.nowMs);
      if (remark) actions.push(remark);
    }
    return this.repairChats(actions, intent.speak);
  }

  private replyToHeard(observation: Observation | undefined, nowMs: number): AgentAction | undefined {
    const heard = collapseWhitespace(observation?.heard ?? "");
    if (!heard) return undefined;
    const last = this.lastReply;
    if (last && last.heard === heard && nowMs - last.atMs < this.conversation.replyDedupeMs) {
      return undefined;
    }
    this.lastReply = { heard, atMs: nowMs };
    return { type: "chat", text: fillTemplate(this.conversation.replyLine, { heard: heard.slice(0, 30) }) };
  }

  private autoChat(intent: Intent, observation: Observation | undefined, nowMs: number): AgentAction | undefined {
    if (!observation || !hasSocialContext(observation)) return undefined;
    const last = this.lastAutoChatAtMs;
    if (last !== undefined && nowMs - last < this.conversation.autoChatCooldownMs) return undefined;
    if (this.random() >= clamp01(0.35 + 0.45 * intent.activityLevel)) return undefined;
    const line = buildObservationLine(observation, this.conversation);
    if (!line) return undefined;
    this.lastAutoChatAtMs = nowMs;
    return { type: "chat", text: line };
  }

  private repairChats(actions: readonly AgentAction[], fallback: string): AgentAction[] {
    const repaired: AgentAction[] = [];
    for (const action of actions) {
      if (action.type !== "chat") {
        repaired.push(action);
        continue;
      }
      const text = repairChatText(action.text, fallback, this.chatMaxLength);
      if (text) repaired.push({ type: "chat", text });
    }
    return repaired;
  }

  private stabilize(script: AgentAction[], tick: number): AgentAction[] {
    if (script.length === 0 || script.some((action) => action.type === "chat")) {
      return script;
    }
    const signature = actionSignature(script);
    const repeated = this.recentScripts.filter((seen) => seen === signature).length;
    this.recentScripts.push(signature);
    if (this.recentScripts.length > RECENT_SCRIPTS) this.recentScripts.shift();

    if (repeated < 2) return script;
    const variant = EXPLORATION_VARIANTS[tick % EXPLORATION_VARIANTS.length] ?? script;
    this.logger.debug({ tick, signature }, "repeated intent script replaced");
    return variant.map((action) => ({ ...action }));
  }
}

function entry(source: ActionSource, action: AgentAction): DispatchEntry {
  return { source, action };
}
