/**
 * Message envelope exchanged over the bus.
 *
 * Field order (id, correlationId, sender, recipient, kind, payload, timestamp)
 * is the stable interop contract. Messages are frozen at construction.
 */

import crypto from "node:crypto";
import { z } from "zod";
import { A2AError } from "../errors.js";

export const MessageKindSchema = z.enum(["request", "response", "error"]);
export type MessageKind = z.infer<typeof MessageKindSchema>;

export const MessageSchema = z.object({
  id: z.string().min(1),
  correlationId: z.string().min(1),
  sender: z.string().min(1),
  recipient: z.string().min(1),
  kind: MessageKindSchema,
  payload: z.unknown(),
  timestamp: z.string().datetime()
});

export type Message = Readonly<{
  id: string;
  correlationId: string;
  sender: string;
  recipient: string;
  kind: MessageKind;
  payload: unknown;
  timestamp: string;
}>;

function isoNow(): string {
  return new Date().toISOString();
}

function id(): string {
  return crypto.randomUUID();
}

function freeze(message: Message): Message {
  return Object.freeze({
    id: message.id,
    correlationId: message.correlationId,
    sender: message.sender,
    recipient: message.recipient,
    kind: message.kind,
    payload: message.payload,
    timestamp: message.timestamp
  });
}

/**
 * Build a request. Its correlation id is its own id.
 */
export function createRequest(sender: string, recipient: string, payload: unknown): Message {
  const messageId = id();
  return freeze({
    id: messageId,
    correlationId: messageId,
    sender,
    recipient,
    kind: "request",
    payload,
    timestamp: isoNow()
  });
}

/**
 * Build the reply to `request`, addressed back to its sender.
 */
export function createReply(request: Message, kind: "response" | "error", payload: unknown): Message {
  return freeze({
    id: id(),
    correlationId: request.correlationId,
    sender: request.recipient,
    recipient: request.sender,
    kind,
    payload,
    timestamp: isoNow()
  });
}

/**
 * Validate an arbitrary value as a message and return a frozen copy.
 * @throws A2AError with BAD_REQUEST on a malformed envelope
 */
export function parseMessage(value: unknown): Message {
  const parsed = MessageSchema.safeParse(value);
  if (!parsed.success) {
    throw new A2AError("BAD_REQUEST", "Malformed message", { issues: parsed.error.issues });
  }
  return freeze({ ...parsed.data, payload: parsed.data.payload });
}

export function isReply(message: Message): boolean {
  return message.kind === "response" || message.kind === "error";
}
