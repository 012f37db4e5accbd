import { describe, expect, it } from "vitest";
import {
  A2AError,
  AgentUnavailableError,
  DeliveryTimeoutError,
  DuplicateAgentError,
  HandlerError,
  InboxFullError,
  fromErrorPayload,
  toA2AError
} from "../src/a2a/errors.js";
import { z } from "zod";

describe("A2AError", () => {
  it("creates error with code and message", () => {
    const err = new A2AError("CAPABILITY_NOT_FOUND", "Test message");
    expect(err.code).toBe("CAPABILITY_NOT_FOUND");
    expect(err.message).toBe("Test message");
    expect(err.name).toBe("A2AError");
  });

  it("toJSON excludes details when undefined", () => {
    const json = new A2AError("INTERNAL", "Something went wrong").toJSON();
    expect(json).toEqual({ code: "INTERNAL", message: "Something went wrong" });
    expect("details" in json).toBe(false);
  });

  it("subclasses carry their code and context", () => {
    const dup = new DuplicateAgentError("research-agent");
    expect(dup).toBeInstanceOf(A2AError);
    expect(dup.code).toBe("DUPLICATE_AGENT");
    expect(dup.message).toBe("Agent 'research-agent' is already registered");

    const full = new InboxFullError("analysis-agent", 2);
    expect(full.message).toBe("Inbox of 'analysis-agent' is full (capacity 2)");
    expect(full.details).toEqual({ agentId: "analysis-agent", capacity: 2 });

    const blocked = new InboxFullError("analysis-agent", 2, 50);
    expect(blocked.message).toBe("Inbox of 'analysis-agent' stayed full for 50ms (capacity 2)");

    const timeout = new DeliveryTimeoutError("corr-1", 25);
    expect(timeout.code).toBe("DELIVERY_TIMEOUT");
    expect(timeout.details).toEqual({ correlationId: "corr-1", timeoutMs: 25 });

    const unavailable = new AgentUnavailableError("viz", "status is 'stopping'");
    expect(unavailable.message).toBe("Agent 'viz' is unavailable: status is 'stopping'");
  });

  it("HandlerError serializes the cause without its stack", () => {
    const err = new HandlerError("analysis-agent", "analysis", new TypeError("bad input"));
    expect(err.toJSON()).toEqual({
      code: "HANDLER_ERROR",
      message: "Handler for 'analysis' on 'analysis-agent' failed: bad input",
      details: {
        agentId: "analysis-agent",
        capability: "analysis",
        cause: { name: "TypeError", message: "bad input" }
      }
    });
  });
});

describe("toA2AError", () => {
  it("returns A2AError unchanged", () => {
    const original = new A2AError("CANCELLED", "stop");
    expect(toA2AError(original)).toBe(original);
  });

  it("converts regular Error to INTERNAL", () => {
    const result = toA2AError(new Error("Something failed"));
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Something failed");
    expect(result.details).toHaveProperty("name", "Error");
    expect(result.details).toHaveProperty("stack");
  });

  it("converts ZodError to BAD_REQUEST", () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      const result = toA2AError(parsed.error);
      expect(result.code).toBe("BAD_REQUEST");
      expect(result.message).toBe("Validation error");
      expect(result.details).toHaveProperty("issues");
    }
  });

  it("converts unknown values to INTERNAL", () => {
    const result = toA2AError("string error");
    expect(result.code).toBe("INTERNAL");
    expect(result.message).toBe("Unknown error");
    expect(result.details).toEqual({ err: "string error" });
  });
});

describe("fromErrorPayload", () => {
  it("reads a serialized A2AError", () => {
    const payload = new InboxFullError("a", 1).toJSON();
    expect(fromErrorPayload(payload)).toEqual({
      code: "INBOX_FULL",
      message: "Inbox of 'a' is full (capacity 1)",
      details: { agentId: "a", capacity: 1 }
    });
  });

  it("reports unknown shapes as INTERNAL", () => {
    expect(fromErrorPayload({ code: "NOPE", message: "x" })).toEqual({
      code: "INTERNAL",
      message: "Malformed error payload",
      details: { payload: { code: "NOPE", message: "x" } }
    });
    expect(fromErrorPayload("boom").code).toBe("INTERNAL");
  });
});
