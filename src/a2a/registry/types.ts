/**
 * Lifecycle state of an agent as seen by the registry.
 * `failed` marks an actor whose consumption loop crashed.
 */
export type AgentStatus = "stopped" | "starting" | "running" | "stopping" | "failed";

export type AgentDescriptor = {
  /** Unique agent id */
  id: string;
  /** Capability tags in advertised order, without duplicates */
  capabilities: readonly string[];
  status: AgentStatus;
  /** ISO timestamp of registration; filled in by the registry */
  registeredAt: string;
};

export type AgentRegistration = {
  id: string;
  capabilities: readonly string[];
  status?: AgentStatus;
};
