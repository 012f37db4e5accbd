export type A2AErrorCode =
  | "DUPLICATE_AGENT"
  | "CAPABILITY_NOT_FOUND"
  | "AGENT_UNAVAILABLE"
  | "INBOX_FULL"
  | "DELIVERY_TIMEOUT"
  | "ALREADY_RUNNING"
  | "HANDLER_ERROR"
  | "DUPLICATE_WAITER"
  | "DUPLICATE_MESSAGE"
  | "CANCELLED"
  | "BAD_REQUEST"
  | "INTERNAL";

export type A2AErrorJSON = { code: A2AErrorCode; message: string; details?: unknown };

export class A2AError extends Error {
  readonly code: A2AErrorCode;
  readonly details?: unknown;

  constructor(code: A2AErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "A2AError";
    this.code = code;
    this.details = details;
  }

  toJSON(): A2AErrorJSON {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export class DuplicateAgentError extends A2AError {
  readonly agentId: string;

  constructor(agentId: string) {
    super("DUPLICATE_AGENT", `Agent '${agentId}' is already registered`, { agentId });
    this.name = "DuplicateAgentError";
    this.agentId = agentId;
  }
}

export class CapabilityNotFoundError extends A2AError {
  readonly capability: string;

  constructor(capability: string) {
    super("CAPABILITY_NOT_FOUND", `No agent advertises capability '${capability}'`, { capability });
    this.name = "CapabilityNotFoundError";
    this.capability = capability;
  }
}

export class AgentUnavailableError extends A2AError {
  readonly agentId: string;

  constructor(agentId: string, reason: string) {
    super("AGENT_UNAVAILABLE", `Agent '${agentId}' is unavailable: ${reason}`, { agentId, reason });
    this.name = "AgentUnavailableError";
    this.agentId = agentId;
  }
}

export class InboxFullError extends A2AError {
  readonly agentId: string;
  readonly capacity: number;

  constructor(agentId: string, capacity: number, waitedMs?: number) {
    super(
      "INBOX_FULL",
      waitedMs === undefined
        ? `Inbox of '${agentId}' is full (capacity ${capacity})`
        : `Inbox of '${agentId}' stayed full for ${waitedMs}ms (capacity ${capacity})`,
      { agentId, capacity, ...(waitedMs !== undefined && { waitedMs }) }
    );
    this.name = "InboxFullError";
    this.agentId = agentId;
    this.capacity = capacity;
  }
}

export class DeliveryTimeoutError extends A2AError {
  readonly correlationId: string;
  readonly timeoutMs: number;

  constructor(correlationId: string, timeoutMs: number) {
    super("DELIVERY_TIMEOUT", `No response for '${correlationId}' within ${timeoutMs}ms`, {
      correlationId,
      timeoutMs
    });
    this.name = "DeliveryTimeoutError";
    this.correlationId = correlationId;
    this.timeoutMs = timeoutMs;
  }
}

export class AlreadyRunningError extends A2AError {
  constructor(agentId: string, state: string) {
    super("ALREADY_RUNNING", `Agent '${agentId}' cannot start from state '${state}'`, { agentId, state });
    this.name = "AlreadyRunningError";
  }
}

/**
 * Wraps a capability handler failure. Travels as the payload of an `error`
 * message, so it must stay plain-JSON serializable via toJSON().
 */
export class HandlerError extends A2AError {
  readonly agentId: string;
  readonly capability: string;

  constructor(agentId: string, capability: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("HANDLER_ERROR", `Handler for '${capability}' on '${agentId}' failed: ${reason}`, {
      agentId,
      capability,
      cause: cause instanceof Error ? { name: cause.name, message: cause.message } : cause
    });
    this.name = "HandlerError";
    this.agentId = agentId;
    this.capability = capability;
  }
}

export class DuplicateWaiterError extends A2AError {
  constructor(correlationId: string) {
    super("DUPLICATE_WAITER", `A waiter for '${correlationId}' is already pending`, { correlationId });
    this.name = "DuplicateWaiterError";
  }
}

export class DuplicateMessageError extends A2AError {
  constructor(messageId: string) {
    super("DUPLICATE_MESSAGE", `Message '${messageId}' was already delivered`, { messageId });
    this.name = "DuplicateMessageError";
  }
}

export class CancelledError extends A2AError {
  constructor(message = "Operation cancelled", details?: unknown) {
    super("CANCELLED", message, details);
    this.name = "CancelledError";
  }
}

const ERROR_CODES: ReadonlySet<string> = new Set<A2AErrorCode>([
  "DUPLICATE_AGENT",
  "CAPABILITY_NOT_FOUND",
  "AGENT_UNAVAILABLE",
  "INBOX_FULL",
  "DELIVERY_TIMEOUT",
  "ALREADY_RUNNING",
  "HANDLER_ERROR",
  "DUPLICATE_WAITER",
  "DUPLICATE_MESSAGE",
  "CANCELLED",
  "BAD_REQUEST",
  "INTERNAL"
]);

export function isA2AErrorCode(value: unknown): value is A2AErrorCode {
  return typeof value === "string" && ERROR_CODES.has(value);
}

export function toA2AError(err: unknown): A2AError {
  if (err instanceof A2AError) return err;
  if (err instanceof Error) {
    // Check for Zod validation errors
    if (err.name === "ZodError" && "issues" in err) {
      return new A2AError("BAD_REQUEST", "Validation error", { issues: err.issues });
    }
    return new A2AError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new A2AError("INTERNAL", "Unknown error", { err });
}

/**
 * Reads an error payload that came back over the bus. Agents send
 * `A2AError.toJSON()` output; anything else is reported as INTERNAL.
 */
export function fromErrorPayload(payload: unknown): A2AErrorJSON {
  if (payload && typeof payload === "object" && "code" in payload && "message" in payload) {
    const { code, message } = payload;
    if (isA2AErrorCode(code) && typeof message === "string") {
      const details = "details" in payload ? payload.details : undefined;
      return { code, message, ...(details !== undefined && { details }) };
    }
  }
  return { code: "INTERNAL", message: "Malformed error payload", details: { payload } };
}
