import { buildMemoryItem, MemoryStore, ShortTermMemory } from "@vrc-pilot/agent-memory";
import type { AgentConfig } from "../config/schema.js";
import { describeError } from "../errors.js";
import { ActionDispatcher, type ActionSink } from "../execution/dispatcher.js";
import { IntentGate } from "../gating/intent-gate.js";
import { InstinctGenerator, type InstinctMood } from "../instinct/instinct-generator.js";
import { InstinctLoop } from "../instinct/instinct-loop.js";
import type { RandomSource } from "../instinct/random.js";
import type { Logger } from "../logging.js";
import { createUdpTransport, DryRunSink, UdpOscSink } from "../osc/osc-sink.js";
import { OverrideChannel } from "../overrides/override-channel.js";
import { ObservationFeed } from "../perception/observation-feed.js";
import type { ObservationSource } from "../perception/observation-source.js";
import { createLlmPlanner, createOpenAiChatClient } from "../planning/llm-planner.js";
import { createHeuristicPlanner, type Planner, type PlanRequest } from "../planning/planner.js";
import { PlannerRunner } from "../planning/planner-runner.js";
import { IntentCell } from "../state/intent-cell.js";
import type { Intent } from "../types/intent.js";
import type { Observation } from "../types/observation.js";
import { AgentController, type TickReport } from "./agent-controller.js";
import { TraceWriter } from "./trace-writer.js";

export interface AgentRuntimeOptions {
  config: AgentConfig;
  logger: Logger;
  source: ObservationSource;
  planner: Planner;
  sink: ActionSink;
  random?: RandomSource;
  now?: () => number;
}

type ShortTermEntry = { speak: string; actions: string };

export function createDefaultPlanner(config: AgentConfig, logger: Logger): Planner {
  if (config.planner.kind === "llm") {
    return createLlmPlanner({ client: createOpenAiChatClient(config.planner), config: config.planner, logger });
  }
  return createHeuristicPlanner({
    templates: { heardLine: config.chat.heardLine, sceneLine: config.chat.sceneLine },
    maxLineLength: 70,
  });
}

export function createDefaultSink(config: AgentConfig, logger: Logger): ActionSink {
  if (config.osc.dryRun) return new DryRunSink(logger);
  return new UdpOscSink({
    transport: createUdpTransport(config.osc.host, config.osc.port),
    logger,
    maxQueued: config.osc.maxQueued,
  });
}

/**
 * Wires the two rates together: the instinct loop ticks the controller on a
 * timer while the observation feed and planner runner work in the
 * background. Memory and trace hang off planner and dispatch events.
 */
export class AgentRuntime {
  readonly overrides: OverrideChannel;
  readonly cell = new IntentCell();
  readonly done: Promise<void>;

  private readonly config: AgentConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly sink: ActionSink;
  private readonly feed: ObservationFeed;
  private readonly runner: PlannerRunner;
  private readonly dispatcher: ActionDispatcher;
  private readonly controller: AgentController;
  private readonly loop: InstinctLoop;
  private readonly memory: MemoryStore | undefined;
  private readonly shortTerm = new ShortTermMemory<ShortTermEntry>(8);
  private readonly trace: TraceWriter | undefined;
  private resolveDone: () => void = () => undefined;
  private stopping: Promise<void> | undefined;
  private started = false;

  constructor(options: AgentRuntimeOptions) {
    const { config } = options;
    this.config = config;
    this.logger = options.logger.child({ component: "runtime" });
    this.now = options.now ?? Date.now;
    this.sink = options.sink;
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });

    this.memory = config.memory.enabled
      ? new MemoryStore({ filePath: config.memory.filePath, maxRecords: config.memory.maxRecords })
      : undefined;
    this.trace = config.trace.enabled ? new TraceWriter(config.trace.dir, options.logger) : undefined;

    this.feed = new ObservationFeed({
      source: options.source,
      intervalMs: config.runtime.observeIntervalMs,
      heardLatchMs: config.runtime.heardLatchMs,
      logger: options.logger,
      now: this.now,
    });

    this.runner = new PlannerRunner({
      planner: options.planner,
      cell: this.cell,
      intentTtlMs: config.runtime.intentTtlMs,
      failureBackoffMs: config.planner.failureBackoffMs,
      maxFailureBackoffMs: config.planner.maxFailureBackoffMs,
      logger: options.logger,
      now: this.now,
      onIntent: (intent, request) => this.remember(intent, request),
      onFailure: (err, failures) => {
        this.trace?.append("planner", { atMs: this.now(), err: describeError(err), failures });
      },
    });

    this.dispatcher = new ActionDispatcher({
      sink: this.sink,
      logger: options.logger,
      chatMaxLength: config.chat.maxLength,
      conversation: config.chat,
      random: options.random,
      onDropped: (action, err) => {
        this.trace?.append("dispatch", { id: action.id, tick: action.tick, status: "dropped", err: describeError(err) });
      },
    });

    this.overrides = new OverrideChannel({
      templates: { heardLine: config.chat.heardLine, sceneLine: config.chat.sceneLine },
      latestObservation: () => this.feed.latest(),
      logger: options.logger,
      now: this.now,
    });
    this.overrides.onStop(() => {
      this.stop().catch((err: unknown) => {
        this.logger.error({ err: describeError(err) }, "stop failed");
      });
    });

    this.controller = new AgentController({
      latestObservation: () => this.feed.latest(),
      cell: this.cell,
      gate: new IntentGate({ sceneChangeThreshold: config.runtime.sceneChangeThreshold }),
      runner: this.runner,
      instinct: new InstinctGenerator(config.instinct, options.random),
      dispatcher: this.dispatcher,
      overrides: this.overrides,
      buildRequest: (observation, mood, nowMs) => this.buildRequest(observation, mood, nowMs),
      logger: options.logger,
      observeOnly: config.runtime.observeOnly,
      onDispatched: (record) => this.trace?.append("dispatch", record),
    });

    this.loop = new InstinctLoop({
      intervalMs: config.runtime.tickIntervalMs,
      onTick: () => this.onTick(),
      logger: options.logger,
      now: this.now,
    });
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.logger.info(
      {
        tickIntervalMs: this.config.runtime.tickIntervalMs,
        observeIntervalMs: this.config.runtime.observeIntervalMs,
        planner: this.config.planner.kind,
        dryRun: this.config.osc.dryRun,
        observeOnly: this.config.runtime.observeOnly,
      },
      "agent starting",
    );
    this.feed.start();
    this.loop.start();
  }

  /** Captures, plans and ticks once, waiting for each step. */
  async runOnce(): Promise<TickReport> {
    await this.feed.refresh();
    this.controller.planNow(this.now());
    await this.runner.whenIdle();
    const report = this.controller.tick(this.now());
    await this.dispatcher.flush();
    await this.trace?.flush();
    return report;
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  private onTick(): void {
    const report = this.controller.tick(this.now());
    if (report.dispatched) {
      this.logger.trace(
        { tick: report.tick, entries: report.dispatched.entries.length, primary: report.dispatched.primarySource },
        "tick dispatched",
      );
    }
  }

  private async shutdown(): Promise<void> {
    this.logger.info({ ticks: this.controller.tickCount }, "agent stopping");
    this.loop.stop();
    this.runner.cancel();
    await this.feed.stop();
    // Closing first cancels queued input instead of playing it out.
    try {
      await this.sink.close();
    } catch (err) {
      this.logger.warn({ err: describeError(err) }, "sink close failed");
    }
    await this.dispatcher.flush();
    await this.runner.whenIdle();
    await this.trace?.flush();
    this.logger.info({}, "agent stopped");
    this.resolveDone();
  }

  private buildRequest(observation: Observation, mood: InstinctMood, nowMs: number): PlanRequest {
    const query = `${observation.scene}\n${observation.heard}`;
    let longTermMemory: PlanRequest["longTermMemory"] = [];
    if (this.memory) {
      try {
        longTermMemory = this.memory
          .retrieve(query, this.config.memory.retrieveTopK)
          .map(({ item }) => ({ scene: item.scene, speak: item.speak }));
      } catch (err) {
        this.logger.warn({ err: describeError(err) }, "memory retrieval failed");
      }
    }
    return {
      observation,
      mood,
      shortTermMemory: this.shortTerm.recent(2),
      longTermMemory,
      nowMs,
    };
  }

  private remember(intent: Intent, request: PlanRequest): void {
    const actions = JSON.stringify(intent.actions);
    this.shortTerm.push({ speak: intent.speak, actions });
    if (this.memory) {
      try {
        this.memory.append(
          buildMemoryItem({
            scene: request.observation.scene,
            heard: request.observation.heard,
            speak: intent.speak,
            actions: [...intent.actions],
            at: new Date(intent.createdAtMs),
          }),
        );
      } catch (err) {
        this.logger.warn({ err: describeError(err) }, "memory append failed");
      }
    }
    if (this.trace) {
      this.trace.append("intents", intent);
      this.trace.writeActiveState({ intent, updatedAtMs: intent.createdAtMs });
    }
  }
}
