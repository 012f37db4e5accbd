/**
 * Agent Registry
 *
 * Directory of agents and the capabilities they advertise. Each capability
 * bucket keeps ids in registration order; the first id is the dispatch owner,
 * so routing stays deterministic when several agents share a capability.
 *
 * All mutations are synchronous, so register/unregister/lookup never
 * interleave on the event loop.
 */

import type { Logger } from "pino";
import { AgentUnavailableError, A2AError, DuplicateAgentError } from "../errors.js";
import { createChildLogger } from "../logger.js";
import type { AgentDescriptor, AgentRegistration, AgentStatus } from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

export type AgentRegistryOptions = {
  logger?: Logger;
};

export class AgentRegistry {
  private readonly agents = new Map<string, AgentDescriptor>();
  private readonly byCapability = new Map<string, string[]>();
  private readonly log: Logger;

  constructor(options: AgentRegistryOptions = {}) {
    this.log = options.logger ?? createChildLogger({ component: "registry" });
  }

  /**
   * Register an agent and index it under each advertised capability.
   * @throws DuplicateAgentError if the id is already registered
   */
  register(registration: AgentRegistration): AgentDescriptor {
    const id = registration.id;
    if (id.trim().length === 0) {
      throw new A2AError("BAD_REQUEST", "Agent id must be a non-empty string");
    }
    if (this.agents.has(id)) {
      throw new DuplicateAgentError(id);
    }

    const capabilities = [...new Set(registration.capabilities)];
    const descriptor: AgentDescriptor = {
      id,
      capabilities,
      status: registration.status ?? "stopped",
      registeredAt: isoNow()
    };
    this.agents.set(id, descriptor);

    for (const capability of capabilities) {
      const bucket = this.byCapability.get(capability);
      if (bucket) {
        bucket.push(id);
      } else {
        this.byCapability.set(capability, [id]);
      }
    }

    this.log.debug({ agentId: id, capabilities }, "Agent registered");
    return { ...descriptor };
  }

  /**
   * Remove an agent and its capability index entries. No-op if absent.
   */
  unregister(id: string): void {
    const descriptor = this.agents.get(id);
    if (!descriptor) return;

    this.agents.delete(id);
    for (const capability of descriptor.capabilities) {
      const bucket = this.byCapability.get(capability);
      if (!bucket) continue;
      const remaining = bucket.filter((agentId) => agentId !== id);
      if (remaining.length > 0) {
        this.byCapability.set(capability, remaining);
      } else {
        this.byCapability.delete(capability);
      }
    }

    this.log.debug({ agentId: id }, "Agent unregistered");
  }

  /**
   * Agent ids advertising `capability`, oldest registration first.
   * Returns an empty list when nobody advertises it.
   */
  lookup(capability: string): string[] {
    return [...(this.byCapability.get(capability) ?? [])];
  }

  /**
   * The dispatch owner for a capability: the oldest registration.
   */
  owner(capability: string): string | undefined {
    return this.byCapability.get(capability)?.[0];
  }

  status(id: string): AgentStatus | undefined {
    return this.agents.get(id)?.status;
  }

  /**
   * @throws AgentUnavailableError if the agent is not registered
   */
  setStatus(id: string, status: AgentStatus): void {
    const descriptor = this.agents.get(id);
    if (!descriptor) {
      throw new AgentUnavailableError(id, "not registered");
    }
    if (descriptor.status === status) return;
    this.log.debug({ agentId: id, from: descriptor.status, to: status }, "Agent status changed");
    descriptor.status = status;
  }

  get(id: string): AgentDescriptor | undefined {
    const descriptor = this.agents.get(id);
    return descriptor ? { ...descriptor } : undefined;
  }

  has(id: string): boolean {
    return this.agents.has(id);
  }

  /**
   * All descriptors in registration order.
   */
  list(): AgentDescriptor[] {
    return [...this.agents.values()].map((d) => ({ ...d }));
  }

  /**
   * Every capability with at least one registered agent.
   */
  capabilities(): string[] {
    return [...this.byCapability.keys()];
  }

  get size(): number {
    return this.agents.size;
  }
}
