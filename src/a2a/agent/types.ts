import type { Logger } from "pino";
import type { Message } from "../bus/message.js";
import type { InboxOverflow } from "../config.js";

/**
 * What a handler gets besides the payload.
 */
export type HandlerContext = {
  agentId: string;
  /** Capability named by the request, or the agent's primary capability */
  capability: string;
  request: Message;
  logger: Logger;
};

/**
 * Capability logic behind an agent. Return the output (or a promise of it);
 * throw to fail the request. A throw becomes an `error` reply and never stops
 * the agent.
 */
export interface CapabilityHandler {
  handle(payload: unknown, context: HandlerContext): unknown;
}

export type InboxSettings = {
  capacity: number;
  overflow?: InboxOverflow;
  sendTimeoutMs?: number;
};

export type AgentStats = {
  processed: number;
  failed: number;
  rejectedOnStop: number;
};
