/**
 * One self-contained runtime: its own registry, bus and orchestrator, plus
 * the actors spawned into it. Nothing is shared between runtimes, so several
 * can run side by side in one process.
 */

import type { Logger } from "pino";
import { AgentActor } from "./agent/agentActor.js";
import type { CapabilityHandler } from "./agent/types.js";
import { MessageBus } from "./bus/messageBus.js";
import { resolveConfig, type RuntimeConfig, type RuntimeConfigInput } from "./config.js";
import { A2AError } from "./errors.js";
import { createChildLogger, logger as rootLogger } from "./logger.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import { Planner } from "./orchestrator/planner.js";
import type { HandleRequestOptions, PipelineResult } from "./orchestrator/types.js";
import { AgentRegistry } from "./registry/registry.js";

export type AgentSpec = {
  id: string;
  capabilities: readonly string[];
  handler: CapabilityHandler;
};

export type A2ARuntimeOptions = {
  config?: RuntimeConfigInput;
  /** Replaces the planner built from `config.routingTablePath` */
  planner?: Planner;
  logger?: Logger;
};

export class A2ARuntime {
  readonly config: RuntimeConfig;
  readonly registry: AgentRegistry;
  readonly bus: MessageBus;
  readonly orchestrator: Orchestrator;
  private readonly actors = new Map<string, AgentActor>();
  private readonly baseLogger: Logger;
  private readonly log: Logger;

  constructor(options: A2ARuntimeOptions = {}) {
    this.config = resolveConfig(options.config);
    const base = options.logger ?? rootLogger;
    this.baseLogger = base;
    this.log = createChildLogger({ component: "runtime" }, base);

    this.registry = new AgentRegistry({ logger: createChildLogger({ component: "registry" }, base) });
    this.bus = new MessageBus({
      registry: this.registry,
      logger: createChildLogger({ component: "bus" }, base)
    });

    const planner =
      options.planner ??
      (this.config.routingTablePath ? Planner.fromFile(this.config.routingTablePath) : new Planner());
    this.orchestrator = new Orchestrator({
      registry: this.registry,
      bus: this.bus,
      planner,
      config: {
        orchestratorId: this.config.orchestratorId,
        stageTimeoutMs: this.config.stageTimeoutMs
      },
      maxTrackedRequests: this.config.maxTrackedRequests,
      logger: createChildLogger({ component: "orchestrator" }, base)
    });
  }

  /**
   * Create an actor bound to this runtime's registry and bus. The actor is
   * not started.
   */
  spawn(spec: AgentSpec): AgentActor {
    if (this.actors.has(spec.id)) {
      throw new A2AError("BAD_REQUEST", `An actor with id '${spec.id}' was already spawned`, { agentId: spec.id });
    }
    const actor = new AgentActor({
      id: spec.id,
      capabilities: spec.capabilities,
      handler: spec.handler,
      registry: this.registry,
      bus: this.bus,
      inbox: {
        capacity: this.config.inboxCapacity,
        overflow: this.config.inboxOverflow,
        sendTimeoutMs: this.config.sendTimeoutMs
      },
      logger: createChildLogger({ component: "agent", agentId: spec.id }, this.baseLogger)
    });
    this.actors.set(spec.id, actor);
    return actor;
  }

  actor(id: string): AgentActor | undefined {
    return this.actors.get(id);
  }

  listActors(): AgentActor[] {
    return [...this.actors.values()];
  }

  /**
   * Start every stopped actor, in spawn order.
   */
  async startAll(): Promise<void> {
    for (const actor of this.actors.values()) {
      if (actor.state === "stopped") {
        await actor.start();
      }
    }
    this.log.info({ agents: this.registry.list().map((d) => d.id) }, "Runtime started");
  }

  /**
   * Stop every actor; each finishes its in-flight request first.
   */
  async stopAll(): Promise<void> {
    await Promise.all([...this.actors.values()].map((actor) => actor.stop()));
    this.log.info({ bus: this.bus.stats() }, "Runtime stopped");
  }

  handleUserRequest(text: string, options?: HandleRequestOptions): Promise<PipelineResult> {
    return this.orchestrator.handleUserRequest(text, options);
  }
}
