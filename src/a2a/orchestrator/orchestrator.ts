/**
 * A2A Orchestrator - turns one user request into a pipeline of capability
 * stages and runs them over the message bus.
 *
 * - Planning: keyword routing table (see planner.ts)
 * - Dispatch: strictly sequential; each stage gets the previous stage's output
 * - Failure: abort-and-report; the first failing stage ends the pipeline and
 *   the result carries the completed stages plus the failure
 */

import type { Logger } from "pino";
import type { MessageBus } from "../bus/messageBus.js";
import { createRequest } from "../bus/message.js";
import { CapabilityNotFoundError, fromErrorPayload, toA2AError, type A2AErrorJSON } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { AgentRegistry } from "../registry/registry.js";
import { Planner, type PipelinePlan } from "./planner.js";
import { RequestTracker } from "./requestTracker.js";
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  type HandleRequestOptions,
  type OrchestrationEvent,
  type OrchestrationEventOptions,
  type OrchestratorConfig,
  type PipelineResult,
  type StageCompletedEvent,
  type StageFailure,
  type StagePayload,
  type StageResult
} from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

type StageOutcome =
  | { status: "success"; result: StageResult }
  | { status: "error"; failure: StageFailure; durationMs: number };

export type OrchestratorOptions = {
  registry: AgentRegistry;
  bus: MessageBus;
  planner?: Planner;
  config?: Partial<OrchestratorConfig>;
  /** Requests kept by the tracker before the oldest finished one is evicted */
  maxTrackedRequests?: number;
  logger?: Logger;
};

/**
 * The orchestrator coordinates capability pipelines.
 */
export class Orchestrator {
  readonly requests: RequestTracker;
  private readonly registry: AgentRegistry;
  private readonly bus: MessageBus;
  private readonly planner: Planner;
  private readonly config: OrchestratorConfig;
  private readonly log: Logger;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.bus = options.bus;
    this.planner = options.planner ?? new Planner();
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config };
    this.requests = new RequestTracker(options.maxTrackedRequests);
    this.log = options.logger ?? createChildLogger({ component: "orchestrator" });
  }

  get id(): string {
    return this.config.orchestratorId;
  }

  /**
   * Derive the stage list for `text` without running anything.
   */
  plan(text: string): PipelinePlan {
    return this.planner.plan(text);
  }

  /**
   * Cancel an in-flight request. Its current stage fails with CANCELLED.
   */
  cancel(requestId: string): boolean {
    return this.requests.cancel(requestId);
  }

  /**
   * Run a user request through its pipeline. Never throws for stage-level
   * failures; they are reported in the result.
   */
  async handleUserRequest(text: string, options: HandleRequestOptions = {}): Promise<PipelineResult> {
    const startTime = Date.now();
    const stageTimeoutMs = options.stageTimeoutMs ?? this.config.stageTimeoutMs;
    const eventOptions = options.events;

    const { id: requestId, abortController } = this.requests.create(text);
    const signal = abortController.signal;

    // Relay an external abort into this request's own controller
    const external = options.signal;
    const relayAbort = (): void => {
      this.requests.cancel(requestId);
    };
    if (external?.aborted) {
      relayAbort();
    } else {
      external?.addEventListener("abort", relayAbort, { once: true });
    }

    const plan = this.planner.plan(text).stages;
    this.requests.setPlan(requestId, plan);
    this.requests.updateStatus(requestId, "running");
    const log = this.log.child({ requestId });
    log.info({ plan }, "Handling user request");

    this.emitEvent(eventOptions, {
      type: "run_started",
      timestamp: isoNow(),
      requestId,
      text,
      plan
    });

    const stages: StageResult[] = [];
    const context: Record<string, unknown> = {};
    let input: unknown = text;

    try {
      for (const [index, capability] of plan.entries()) {
        this.requests.updateStatus(requestId, "running", capability);
        const payload: StagePayload = { capability, query: text, input, context: { ...context } };

        const outcome = await this.runStageWithEvents(
          capability,
          index,
          payload,
          stageTimeoutMs,
          signal,
          requestId,
          eventOptions
        );

        if (outcome.status === "error") {
          log.warn({ failure: outcome.failure }, "Pipeline aborted");
          return this.finishRun(requestId, eventOptions, startTime, {
            kind: "error",
            requestId,
            plan,
            stages,
            error: outcome.failure
          });
        }

        stages.push(outcome.result);
        context[capability] = outcome.result.output;
        input = outcome.result.output;
      }

      return this.finishRun(requestId, eventOptions, startTime, { kind: "ok", requestId, plan, stages });
    } catch (err) {
      const a2aErr = toA2AError(err);
      log.error({ err: a2aErr }, "Pipeline failed unexpectedly");
      const failedIndex = stages.length;
      return this.finishRun(requestId, eventOptions, startTime, {
        kind: "error",
        requestId,
        plan,
        stages,
        error: {
          stage: plan[failedIndex] ?? "",
          index: failedIndex,
          code: a2aErr.code,
          message: a2aErr.message,
          ...(a2aErr.details !== undefined && { details: a2aErr.details })
        }
      });
    } finally {
      external?.removeEventListener("abort", relayAbort);
    }
  }

  /**
   * Dispatch one stage to the capability owner and wait for its reply.
   */
  private async runStage(
    capability: string,
    index: number,
    agentId: string | undefined,
    payload: StagePayload,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<StageOutcome> {
    const stageStart = Date.now();
    const fail = (error: A2AErrorJSON): StageOutcome => ({
      status: "error",
      failure: {
        stage: capability,
        index,
        ...(agentId !== undefined && { agentId }),
        code: error.code,
        message: error.message,
        ...(error.details !== undefined && { details: error.details })
      },
      durationMs: Date.now() - stageStart
    });

    if (agentId === undefined) {
      return fail(new CapabilityNotFoundError(capability).toJSON());
    }

    try {
      const request = createRequest(this.config.orchestratorId, agentId, payload);
      const reply = await this.bus.request(request, timeoutMs, signal);
      if (reply.kind === "error") {
        return fail(fromErrorPayload(reply.payload));
      }
      return {
        status: "success",
        result: {
          capability,
          agentId,
          output: reply.payload,
          durationMs: Date.now() - stageStart
        }
      };
    } catch (err) {
      return fail(toA2AError(err).toJSON());
    }
  }

  /**
   * Run a stage with event emission.
   */
  private async runStageWithEvents(
    capability: string,
    index: number,
    payload: StagePayload,
    timeoutMs: number,
    signal: AbortSignal,
    requestId: string,
    eventOptions: OrchestrationEventOptions | undefined
  ): Promise<StageOutcome> {
    // First registration wins when several agents share a capability
    const agentId = this.registry.owner(capability);

    if (agentId !== undefined) {
      this.emitEvent(eventOptions, {
        type: "stage_started",
        timestamp: isoNow(),
        requestId,
        stage: capability,
        index,
        agentId
      });
    }

    const outcome = await this.runStage(capability, index, agentId, payload, timeoutMs, signal);

    const completedEvent: StageCompletedEvent = {
      type: "stage_completed",
      timestamp: isoNow(),
      requestId,
      stage: capability,
      index,
      status: outcome.status,
      durationMs: outcome.status === "success" ? outcome.result.durationMs : outcome.durationMs
    };
    if (agentId !== undefined) {
      completedEvent.agentId = agentId;
    }
    if (outcome.status === "error") {
      completedEvent.error = { code: outcome.failure.code, message: outcome.failure.message };
    }
    this.emitEvent(eventOptions, completedEvent);

    return outcome;
  }

  /**
   * Record the result and emit exactly one run_completed event per request.
   */
  private finishRun(
    requestId: string,
    eventOptions: OrchestrationEventOptions | undefined,
    startTime: number,
    result: PipelineResult
  ): PipelineResult {
    this.requests.setResult(requestId, result);

    this.emitEvent(eventOptions, {
      type: "run_completed",
      timestamp: isoNow(),
      requestId,
      resultKind: result.kind,
      totalStages: result.plan.length,
      completedStages: result.stages.length,
      durationMs: Date.now() - startTime
    });

    return result;
  }

  /**
   * Deliver an event on a microtask so observers can neither throw into nor
   * re-enter the pipeline.
   */
  private emitEvent(options: OrchestrationEventOptions | undefined, event: OrchestrationEvent): void {
    if (!options?.onEvent) return;
    if (event.type === "stage_started" && options.emitStageStarted === false) return;
    if (event.type === "stage_completed" && options.emitStageCompleted === false) return;

    const handler = options.onEvent;
    queueMicrotask(() => {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            this.log.debug({ err, eventType: event.type }, "Event handler rejected");
          });
        }
      } catch (err) {
        this.log.debug({ err, eventType: event.type }, "Event handler threw");
      }
    });
  }
}
