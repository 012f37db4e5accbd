/**
 * Orchestrator module - request planning and sequential pipeline execution.
 *
 * Exports:
 * - Orchestrator: pipeline execution over the bus
 * - Planner: keyword routing table
 * - RequestTracker: per-orchestrator request state
 * - Types: results, payloads and events
 */

export { Orchestrator } from "./orchestrator.js";
export type { OrchestratorOptions } from "./orchestrator.js";

export {
  Planner,
  loadRoutingTable,
  parseRoutingTable,
  RoutingRuleSchema,
  RoutingTableSchema,
  DEFAULT_ROUTING_TABLE_PATH
} from "./planner.js";
export type { RoutingRule, RoutingTable, RoutingTableInput, PlanDecision, PipelinePlan } from "./planner.js";

export { RequestTracker } from "./requestTracker.js";
export type { SetResultOutcome } from "./requestTracker.js";

export type {
  StagePayload,
  StageResult,
  StageFailure,
  PipelineResult,
  OrchestratorConfig,
  HandleRequestOptions,
  RequestState,
  OrchestrationEvent,
  OrchestrationEventHandler,
  OrchestrationEventOptions
} from "./types.js";

export { DEFAULT_ORCHESTRATOR_CONFIG } from "./types.js";
