/**
 * A2A Message Bus
 *
 * Two delivery paths:
 * - Requests go to the recipient's inbox (ordered per recipient, at most once
 *   per message id). The bus only holds the inbox handle; the owning actor
 *   consumes it.
 * - Responses and errors go to the correlation table, resolving the single
 *   waiter registered for their correlation id. Unmatched replies (late,
 *   duplicate or unsolicited) are dropped and recorded, never redelivered.
 *
 * Every table mutation happens synchronously between awaits, which is what
 * keeps insert/resolve/remove atomic on the event loop.
 */

import type { Logger } from "pino";
import {
  A2AError,
  AgentUnavailableError,
  CancelledError,
  DeliveryTimeoutError,
  DuplicateMessageError,
  DuplicateWaiterError
} from "../errors.js";
import { MAX_TIMEOUT_MS } from "../config.js";
import { createChildLogger } from "../logger.js";
import type { AgentRegistry } from "../registry/registry.js";
import type { Inbox } from "./inbox.js";
import { isReply, parseMessage, type Message } from "./message.js";

function isoNow(): string {
  return new Date().toISOString();
}

type PendingWaiter = {
  resolve: (message: Message) => void;
  reject: (err: Error) => void;
  /** Clears the timer and abort listener */
  dispose: () => void;
};

/**
 * Diagnostic kept for a reply nobody was waiting for.
 */
export type DroppedReply = {
  messageId: string;
  correlationId: string;
  sender: string;
  kind: Message["kind"];
  droppedAt: string;
};

export type BusStats = {
  attachedInboxes: number;
  pendingWaiters: number;
  delivered: number;
  resolved: number;
  timedOut: number;
  dropped: number;
};

export type MessageBusOptions = {
  registry: AgentRegistry;
  logger?: Logger;
  /** Dropped-reply diagnostics kept in memory (default 100) */
  maxDroppedHistory?: number;
  /** Message ids remembered for duplicate detection (default 10_000) */
  maxSeenMessageIds?: number;
};

export class MessageBus {
  private readonly registry: AgentRegistry;
  private readonly log: Logger;
  private readonly maxDroppedHistory: number;
  private readonly maxSeenMessageIds: number;
  private readonly inboxes = new Map<string, Inbox>();
  private readonly waiters = new Map<string, PendingWaiter>();
  // Insertion-ordered, so the oldest id is evicted first
  private readonly seen = new Set<string>();
  private readonly dropped: DroppedReply[] = [];
  private readonly counters = { delivered: 0, resolved: 0, timedOut: 0, dropped: 0 };

  constructor(options: MessageBusOptions) {
    this.registry = options.registry;
    this.log = options.logger ?? createChildLogger({ component: "bus" });
    this.maxDroppedHistory = options.maxDroppedHistory ?? 100;
    this.maxSeenMessageIds = options.maxSeenMessageIds ?? 10_000;
  }

  /**
   * Give the bus a delivery handle for an agent's inbox.
   */
  attachInbox(agentId: string, inbox: Inbox): void {
    const existing = this.inboxes.get(agentId);
    if (existing && existing !== inbox) {
      throw new A2AError("BAD_REQUEST", `Agent '${agentId}' already has an inbox attached`, { agentId });
    }
    this.inboxes.set(agentId, inbox);
  }

  detachInbox(agentId: string): void {
    this.inboxes.delete(agentId);
  }

  /**
   * Deliver a message. Requests land in the recipient's inbox; replies resolve
   * their waiter or are dropped.
   *
   * @throws AgentUnavailableError if the recipient is unknown, not running or has no inbox
   * @throws InboxFullError per the recipient inbox's overflow policy
   * @throws DuplicateMessageError if this message id was already delivered
   * @throws CancelledError if `signal` aborts while the request waits for inbox space
   */
  async send(input: Message, signal?: AbortSignal): Promise<void> {
    const message = parseMessage(input);
    if (this.seen.has(message.id)) {
      throw new DuplicateMessageError(message.id);
    }

    if (isReply(message)) {
      this.remember(message.id);
      this.routeReply(message);
      return;
    }

    const inbox = this.resolveInbox(message.recipient);
    // Claim the id before suspending so a concurrent resend is rejected
    this.remember(message.id);
    try {
      await inbox.put(message, signal);
    } catch (err) {
      this.seen.delete(message.id);
      throw err;
    }
    this.counters.delivered++;
    this.log.debug(
      { messageId: message.id, sender: message.sender, recipient: message.recipient },
      "Request delivered"
    );
  }

  /**
   * Suspend until the reply for `correlationId` arrives.
   *
   * The waiter is registered synchronously, before this returns.
   * @throws DuplicateWaiterError if a waiter for this id is already pending
   * @throws DeliveryTimeoutError after `timeoutMs`; the waiter is removed first
   * @throws CancelledError when `signal` aborts
   */
  awaitResponse(correlationId: string, timeoutMs: number, signal?: AbortSignal): Promise<Message> {
    try {
      this.assertCanWait(correlationId, timeoutMs, signal);
    } catch (err) {
      return Promise.reject(err);
    }

    return new Promise<Message>((resolve, reject) => {
      const onAbort = (): void => {
        if (this.removeWaiter(correlationId, waiter)) {
          reject(new CancelledError("Cancelled while awaiting response", { correlationId }));
        }
      };

      const timeoutId = setTimeout(() => {
        if (this.removeWaiter(correlationId, waiter)) {
          this.counters.timedOut++;
          this.log.warn({ correlationId, timeoutMs }, "Response wait timed out");
          reject(new DeliveryTimeoutError(correlationId, timeoutMs));
        }
      }, timeoutMs);

      const waiter: PendingWaiter = {
        resolve,
        reject,
        dispose: () => {
          clearTimeout(timeoutId);
          signal?.removeEventListener("abort", onAbort);
        }
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.set(correlationId, waiter);
    });
  }

  /**
   * Send a request and await its reply, registering the waiter before the
   * request is delivered so a fast responder cannot outrun it.
   * A delivery failure removes the waiter and is thrown as is. When the wait
   * ends first (timeout or abort), a request still blocked on a full inbox is
   * withdrawn and never delivered.
   */
  async request(message: Message, timeoutMs: number, signal?: AbortSignal): Promise<Message> {
    if (message.kind !== "request") {
      throw new A2AError("BAD_REQUEST", `Expected a request message, got '${message.kind}'`, {
        messageId: message.id
      });
    }
    // Fail before delivery so a rejected wait never leaves a request behind
    this.assertCanWait(message.correlationId, timeoutMs, signal);

    const delivery = new AbortController();
    const pending = this.awaitResponse(message.correlationId, timeoutMs, signal).catch((err: unknown) => {
      delivery.abort();
      throw err;
    });
    try {
      const [, reply] = await Promise.all([this.send(message, delivery.signal), pending]);
      return reply;
    } catch (err) {
      // Delivery failed while the waiter was still registered: settle it
      const waiter = this.waiters.get(message.correlationId);
      if (waiter && this.removeWaiter(message.correlationId, waiter)) {
        waiter.reject(err instanceof Error ? err : new A2AError("INTERNAL", String(err)));
      }
      throw err;
    }
  }

  hasWaiter(correlationId: string): boolean {
    return this.waiters.has(correlationId);
  }

  /**
   * Recent replies that arrived with no matching waiter, oldest first.
   */
  droppedReplies(): DroppedReply[] {
    return [...this.dropped];
  }

  stats(): BusStats {
    return {
      attachedInboxes: this.inboxes.size,
      pendingWaiters: this.waiters.size,
      ...this.counters
    };
  }

  private assertCanWait(correlationId: string, timeoutMs: number, signal: AbortSignal | undefined): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new A2AError("BAD_REQUEST", "Response timeout must be a positive number of ms", { timeoutMs });
    }
    if (timeoutMs > MAX_TIMEOUT_MS) {
      throw new A2AError("BAD_REQUEST", `Response timeout exceeds ${MAX_TIMEOUT_MS}ms`, { timeoutMs });
    }
    if (this.waiters.has(correlationId)) {
      throw new DuplicateWaiterError(correlationId);
    }
    if (signal?.aborted) {
      throw new CancelledError("Cancelled before waiting", { correlationId });
    }
  }

  private resolveInbox(recipient: string): Inbox {
    const status = this.registry.status(recipient);
    if (status === undefined) {
      throw new AgentUnavailableError(recipient, "not registered");
    }
    if (status !== "running") {
      throw new AgentUnavailableError(recipient, `status is '${status}'`);
    }
    const inbox = this.inboxes.get(recipient);
    if (!inbox) {
      throw new AgentUnavailableError(recipient, "no inbox attached");
    }
    return inbox;
  }

  private routeReply(message: Message): void {
    const waiter = this.waiters.get(message.correlationId);
    if (!waiter) {
      this.recordDropped(message);
      return;
    }
    this.removeWaiter(message.correlationId, waiter);
    this.counters.resolved++;
    waiter.resolve(message);
  }

  /**
   * Remove `waiter` if it is still the one registered for `correlationId`.
   * Returns false when it already resolved, timed out or was cancelled.
   */
  private removeWaiter(correlationId: string, waiter: PendingWaiter): boolean {
    if (this.waiters.get(correlationId) !== waiter) return false;
    this.waiters.delete(correlationId);
    waiter.dispose();
    return true;
  }

  private recordDropped(message: Message): void {
    this.counters.dropped++;
    this.dropped.push({
      messageId: message.id,
      correlationId: message.correlationId,
      sender: message.sender,
      kind: message.kind,
      droppedAt: isoNow()
    });
    if (this.dropped.length > this.maxDroppedHistory) {
      this.dropped.shift();
    }
    this.log.warn(
      { messageId: message.id, correlationId: message.correlationId, sender: message.sender },
      "Dropped reply with no pending waiter"
    );
  }

  private remember(messageId: string): void {
    this.seen.add(messageId);
    if (this.seen.size > this.maxSeenMessageIds) {
      const oldest = this.seen.values().next();
      if (!oldest.done) this.seen.delete(oldest.value);
    }
  }
}
