export * from "./a2a/errors.js";
export { logger, createChildLogger, type Logger } from "./a2a/logger.js";
export {
  RuntimeConfigSchema,
  InboxOverflowSchema,
  DEFAULT_RUNTIME_CONFIG,
  MAX_TIMEOUT_MS,
  resolveConfig,
  loadConfigFromEnv,
  type RuntimeConfig,
  type RuntimeConfigInput,
  type InboxOverflow
} from "./a2a/config.js";

export { AgentRegistry, type AgentRegistryOptions } from "./a2a/registry/registry.js";
export type { AgentDescriptor, AgentRegistration, AgentStatus } from "./a2a/registry/types.js";

export { Inbox, type InboxOptions } from "./a2a/bus/inbox.js";
export {
  MessageBus,
  type MessageBusOptions,
  type BusStats,
  type DroppedReply
} from "./a2a/bus/messageBus.js";
export {
  MessageSchema,
  MessageKindSchema,
  createRequest,
  createReply,
  parseMessage,
  isReply,
  type Message,
  type MessageKind
} from "./a2a/bus/message.js";

export { AgentActor, type AgentActorOptions } from "./a2a/agent/agentActor.js";
export type { CapabilityHandler, HandlerContext, InboxSettings, AgentStats } from "./a2a/agent/types.js";

export * from "./a2a/orchestrator/index.js";

export { A2ARuntime, type A2ARuntimeOptions, type AgentSpec } from "./a2a/runtime.js";

export * from "./agents/index.js";
