/**
 * Orchestrator types for pipeline execution.
 * Defines the stage payload contract and result envelopes.
 */

import type { A2AErrorCode } from "../errors.js";

/**
 * Payload of every stage request.
 */
export type StagePayload = {
  /** Capability this stage asks for */
  capability: string;
  /** The user's original request text */
  query: string;
  /** Original text for the first stage, previous stage output afterwards */
  input: unknown;
  /** Outputs of the stages completed so far, keyed by capability */
  context: Readonly<Record<string, unknown>>;
};

/**
 * A completed stage.
 */
export type StageResult = {
  capability: string;
  agentId: string;
  output: unknown;
  durationMs: number;
};

/**
 * Why the pipeline stopped.
 */
export type StageFailure = {
  /** Capability of the failing stage */
  stage: string;
  /** Position of the failing stage in the plan */
  index: number;
  /** Agent the stage was routed to, when one was found */
  agentId?: string;
  code: A2AErrorCode;
  message: string;
  details?: unknown;
};

/**
 * Final orchestration result envelope.
 */
export type PipelineResult =
  | { kind: "ok"; requestId: string; plan: string[]; stages: StageResult[] }
  | { kind: "error"; requestId: string; plan: string[]; stages: StageResult[]; error: StageFailure };

/**
 * Configuration for the orchestrator.
 */
export type OrchestratorConfig = {
  /** Sender id stamped on stage requests */
  orchestratorId: string;
  /** Timeout per stage in ms */
  stageTimeoutMs: number;
};

/**
 * Per-request options.
 */
export type HandleRequestOptions = {
  /** Overrides the configured stage timeout for this request */
  stageTimeoutMs?: number;
  /** AbortSignal for cancellation */
  signal?: AbortSignal;
  /** Event handling options */
  events?: OrchestrationEventOptions;
};

/**
 * Request state kept by the request tracker.
 */
export type RequestState = {
  id: string;
  createdAt: string;
  updatedAt: string;
  status: "pending" | "running" | "completed" | "failed" | "cancelled";
  text: string;
  plan?: string[];
  result?: PipelineResult;
  currentStage?: string;
};

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  orchestratorId: "orchestrator",
  stageTimeoutMs: 30_000
};

// ============================================================================
// Orchestration Events
// ============================================================================

export type OrchestrationEventType = "run_started" | "stage_started" | "stage_completed" | "run_completed";

export type OrchestrationEventBase = {
  type: OrchestrationEventType;
  timestamp: string;
  requestId: string;
};

export type RunStartedEvent = OrchestrationEventBase & {
  type: "run_started";
  text: string;
  plan: string[];
};

export type StageStartedEvent = OrchestrationEventBase & {
  type: "stage_started";
  stage: string;
  index: number;
  agentId: string;
};

/**
 * Emitted when a stage completes, successfully or not.
 */
export type StageCompletedEvent = OrchestrationEventBase & {
  type: "stage_completed";
  stage: string;
  index: number;
  status: "success" | "error";
  durationMs: number;
  agentId?: string;
  error?: { code: A2AErrorCode; message: string };
};

export type RunCompletedEvent = OrchestrationEventBase & {
  type: "run_completed";
  resultKind: PipelineResult["kind"];
  totalStages: number;
  completedStages: number;
  durationMs: number;
};

export type OrchestrationEvent = RunStartedEvent | StageStartedEvent | StageCompletedEvent | RunCompletedEvent;

export type OrchestrationEventHandler = (event: OrchestrationEvent) => void | Promise<void>;

export type OrchestrationEventOptions = {
  onEvent?: OrchestrationEventHandler;
  /** Whether to emit stage_started events */
  emitStageStarted?: boolean;
  /** Whether to emit stage_completed events */
  emitStageCompleted?: boolean;
};
