/**
 * Agent Actor
 *
 * Lifecycle-managed consumer of one inbox:
 *
 *   stopped → starting → running → stopping → stopped
 *                          └──→ failed (loop machinery fault)
 *
 * The loop takes requests in FIFO order, runs the capability handler and
 * replies on the bus with the request's correlation id. Handler failures turn
 * into `error` replies; only a fault in the loop itself fails the actor.
 */

import type { Logger } from "pino";
import { Inbox } from "../bus/inbox.js";
import { createReply, type Message } from "../bus/message.js";
import type { MessageBus } from "../bus/messageBus.js";
import { AgentUnavailableError, AlreadyRunningError, HandlerError, toA2AError } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { AgentRegistry } from "../registry/registry.js";
import type { AgentStatus } from "../registry/types.js";
import type { AgentStats, CapabilityHandler, HandlerContext, InboxSettings } from "./types.js";

export type AgentActorOptions = {
  id: string;
  capabilities: readonly string[];
  handler: CapabilityHandler;
  registry: AgentRegistry;
  bus: MessageBus;
  inbox?: InboxSettings;
  logger?: Logger;
};

const DEFAULT_INBOX: InboxSettings = { capacity: 100, overflow: "reject", sendTimeoutMs: 0 };

/**
 * Reads the capability a request asks for, when its payload names one.
 */
function requestedCapability(payload: unknown): string | undefined {
  if (payload && typeof payload === "object" && "capability" in payload) {
    return typeof payload.capability === "string" ? payload.capability : undefined;
  }
  return undefined;
}

export class AgentActor {
  readonly id: string;
  readonly capabilities: readonly string[];
  private readonly handler: CapabilityHandler;
  private readonly registry: AgentRegistry;
  private readonly bus: MessageBus;
  private readonly inboxSettings: InboxSettings;
  private readonly log: Logger;
  private currentState: AgentStatus = "stopped";
  private inbox: Inbox | undefined;
  private loop: Promise<void> | undefined;
  private stopping: Promise<void> | undefined;
  private inFlight: Message | undefined;
  private readonly counters: AgentStats = { processed: 0, failed: 0, rejectedOnStop: 0 };

  constructor(options: AgentActorOptions) {
    this.id = options.id;
    this.capabilities = [...options.capabilities];
    this.handler = options.handler;
    this.registry = options.registry;
    this.bus = options.bus;
    this.inboxSettings = options.inbox ?? DEFAULT_INBOX;
    this.log = options.logger ?? createChildLogger({ component: "agent", agentId: options.id });
  }

  get state(): AgentStatus {
    return this.currentState;
  }

  /**
   * Id of the request being handled right now, if any.
   */
  get currentRequestId(): string | undefined {
    return this.inFlight?.id;
  }

  get queued(): number {
    return this.inbox?.size ?? 0;
  }

  stats(): AgentStats {
    return { ...this.counters };
  }

  /**
   * Register, attach an inbox to the bus and start consuming.
   * @throws AlreadyRunningError unless the actor is stopped
   * @throws DuplicateAgentError if another agent holds this id
   */
  async start(): Promise<void> {
    if (this.currentState !== "stopped") {
      throw new AlreadyRunningError(this.id, this.currentState);
    }
    const inbox = new Inbox({ ownerId: this.id, ...this.inboxSettings });
    this.currentState = "starting";

    try {
      this.registry.register({ id: this.id, capabilities: this.capabilities, status: "starting" });
    } catch (err) {
      this.currentState = "stopped";
      throw err;
    }

    try {
      this.bus.attachInbox(this.id, inbox);
      this.registry.setStatus(this.id, "running");
    } catch (err) {
      this.bus.detachInbox(this.id);
      this.registry.unregister(this.id);
      this.currentState = "stopped";
      throw err;
    }

    this.inbox = inbox;
    this.currentState = "running";
    this.loop = this.runLoop(inbox);
    this.log.info({ capabilities: this.capabilities }, "Agent started");
  }

  /**
   * Stop consuming. The request in flight finishes and is answered; requests
   * still queued are answered with AGENT_UNAVAILABLE errors. Resolves once
   * the actor is unregistered. No-op unless running (or failed).
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.currentState === "failed") {
      this.teardown();
      this.currentState = "stopped";
      return Promise.resolve();
    }
    if (this.currentState !== "running") return Promise.resolve();

    this.stopping = this.shutdown().finally(() => {
      this.stopping = undefined;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.currentState = "stopping";
    this.registry.setStatus(this.id, "stopping");
    this.inbox?.close();

    await this.loop;
    if (this.inbox) {
      await this.rejectQueued(this.inbox, "agent stopped");
    }

    this.teardown();
    this.currentState = "stopped";
    this.log.info({ processed: this.counters.processed }, "Agent stopped");
  }

  private async runLoop(inbox: Inbox): Promise<void> {
    try {
      while (this.currentState === "running") {
        const message = await inbox.take();
        if (message === undefined) break;
        await this.process(message);
      }
    } catch (err) {
      await this.crash(inbox, err);
    }
  }

  private async process(message: Message): Promise<void> {
    if (message.kind !== "request") {
      this.log.warn({ messageId: message.id, kind: message.kind }, "Ignoring non-request message in inbox");
      return;
    }

    const capability = requestedCapability(message.payload) ?? this.capabilities[0] ?? this.id;
    const context: HandlerContext = {
      agentId: this.id,
      capability,
      request: message,
      logger: this.log.child({ correlationId: message.correlationId })
    };

    this.inFlight = message;
    let reply: Message;
    try {
      const output: unknown = await this.handler.handle(message.payload, context);
      reply = createReply(message, "response", output);
      this.counters.processed++;
    } catch (err) {
      const handlerError = new HandlerError(this.id, capability, err);
      this.log.warn({ err, correlationId: message.correlationId }, "Handler failed");
      reply = createReply(message, "error", handlerError.toJSON());
      this.counters.failed++;
    } finally {
      this.inFlight = undefined;
    }

    await this.bus.send(reply);
  }

  private async crash(inbox: Inbox, err: unknown): Promise<void> {
    const fault = toA2AError(err);
    this.log.error({ err: fault }, "Agent loop crashed");
    this.currentState = "failed";
    if (this.registry.has(this.id)) {
      this.registry.setStatus(this.id, "failed");
    }
    inbox.close();
    await this.rejectQueued(inbox, `agent failed: ${fault.message}`);
  }

  private async rejectQueued(inbox: Inbox, reason: string): Promise<void> {
    for (const message of inbox.drain()) {
      if (message.kind !== "request") continue;
      const error = new AgentUnavailableError(this.id, reason);
      try {
        await this.bus.send(createReply(message, "error", error.toJSON()));
        this.counters.rejectedOnStop++;
      } catch (sendErr) {
        this.log.error({ err: sendErr, messageId: message.id }, "Could not reject queued request");
      }
    }
  }

  private teardown(): void {
    this.bus.detachInbox(this.id);
    this.registry.unregister(this.id);
    this.inbox = undefined;
    this.loop = undefined;
  }
}
