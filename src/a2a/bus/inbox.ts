import { MAX_TIMEOUT_MS, type InboxOverflow } from "../config.js";
import { A2AError, AgentUnavailableError, CancelledError, InboxFullError } from "../errors.js";
import type { Message } from "./message.js";

export type InboxOptions = {
  /** Agent that owns (and is the only consumer of) this inbox */
  ownerId: string;
  /** Maximum queued messages */
  capacity: number;
  /** `reject` fails a put on a full inbox; `block` waits for space */
  overflow?: InboxOverflow;
  /** How long a blocked put waits (ms). 0 = no timeout */
  sendTimeoutMs?: number;
};

type BlockedPut = {
  message: Message;
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
  /** Detaches the abort listener, if any */
  release?: () => void;
};

/**
 * Bounded FIFO of messages with a single consumer.
 *
 * Producers call `put`; on a full inbox they either fail with InboxFullError or
 * queue behind earlier blocked producers, depending on `overflow`. The owner
 * calls `take`, which suspends while the inbox is empty and yields `undefined`
 * once the inbox is closed and empty.
 */
export class Inbox {
  readonly ownerId: string;
  readonly capacity: number;
  readonly overflow: InboxOverflow;
  private readonly sendTimeoutMs: number;
  private readonly items: Message[] = [];
  private readonly blocked: BlockedPut[] = [];
  private taker: ((message: Message | undefined) => void) | undefined;
  private closed = false;

  constructor(options: InboxOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new A2AError("BAD_REQUEST", "Inbox capacity must be a positive integer", {
        capacity: options.capacity
      });
    }
    const sendTimeoutMs = options.sendTimeoutMs ?? 0;
    if (!Number.isInteger(sendTimeoutMs) || sendTimeoutMs < 0 || sendTimeoutMs > MAX_TIMEOUT_MS) {
      throw new A2AError("BAD_REQUEST", `Send timeout must be an integer between 0 and ${MAX_TIMEOUT_MS}ms`, {
        sendTimeoutMs
      });
    }
    this.ownerId = options.ownerId;
    this.capacity = options.capacity;
    this.overflow = options.overflow ?? "reject";
    this.sendTimeoutMs = sendTimeoutMs;
  }

  /**
   * Number of queued messages.
   */
  get size(): number {
    return this.items.length;
  }

  /**
   * Number of producers waiting for space.
   */
  get waitingSenders(): number {
    return this.blocked.length;
  }

  get isFull(): boolean {
    return this.items.length >= this.capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Enqueue a message.
   *
   * Aborting `signal` while the put is blocked withdraws the message; it is
   * never queued afterwards.
   * @throws InboxFullError when full under `reject`, or when a blocked put times out
   * @throws AgentUnavailableError when the inbox is closed
   * @throws CancelledError when `signal` aborts before the message is queued
   */
  async put(message: Message, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      throw new AgentUnavailableError(this.ownerId, "inbox closed");
    }
    if (signal?.aborted) {
      throw new CancelledError("Delivery withdrawn", { messageId: message.id });
    }

    // Owner is parked on an empty inbox: hand the message straight over
    if (this.taker) {
      const taker = this.taker;
      this.taker = undefined;
      taker(message);
      return;
    }

    if (this.items.length < this.capacity && this.blocked.length === 0) {
      this.items.push(message);
      return;
    }

    if (this.overflow === "reject") {
      throw new InboxFullError(this.ownerId, this.capacity);
    }

    await this.waitForSpace(message, signal);
  }

  /**
   * Dequeue the oldest message, suspending while the inbox is empty.
   * Resolves `undefined` once the inbox is closed and drained.
   */
  take(): Promise<Message | undefined> {
    if (this.taker) {
      return Promise.reject(
        new A2AError("INTERNAL", `Inbox of '${this.ownerId}' already has a pending consumer`)
      );
    }

    const next = this.items.shift();
    if (next !== undefined) {
      this.admitBlocked();
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<Message | undefined>((resolve) => {
      this.taker = resolve;
    });
  }

  /**
   * Stop accepting messages. A parked consumer wakes with `undefined`; blocked
   * producers fail with AgentUnavailableError. Queued messages stay until drained.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const taker = this.taker;
    this.taker = undefined;
    taker?.(undefined);

    for (const entry of this.blocked.splice(0)) {
      this.settle(entry);
      entry.reject(new AgentUnavailableError(this.ownerId, "inbox closed"));
    }
  }

  /**
   * Remove and return every queued message.
   */
  drain(): Message[] {
    return this.items.splice(0);
  }

  private waitForSpace(message: Message, signal: AbortSignal | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: BlockedPut = { message, resolve, reject };

      if (this.sendTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          if (this.withdraw(entry)) {
            reject(new InboxFullError(this.ownerId, this.capacity, this.sendTimeoutMs));
          }
        }, this.sendTimeoutMs);
      }

      if (signal) {
        const onAbort = (): void => {
          if (this.withdraw(entry)) {
            reject(new CancelledError("Delivery withdrawn", { messageId: message.id }));
          }
        };
        signal.addEventListener("abort", onAbort, { once: true });
        entry.release = () => signal.removeEventListener("abort", onAbort);
      }

      this.blocked.push(entry);
    });
  }

  /**
   * Remove a still-blocked producer. False once it was admitted or failed.
   */
  private withdraw(entry: BlockedPut): boolean {
    const idx = this.blocked.indexOf(entry);
    if (idx === -1) return false;
    this.blocked.splice(idx, 1);
    this.settle(entry);
    return true;
  }

  private settle(entry: BlockedPut): void {
    if (entry.timeoutId) clearTimeout(entry.timeoutId);
    entry.release?.();
  }

  /**
   * Move the longest-waiting blocked producer into the freed slot.
   */
  private admitBlocked(): void {
    const entry = this.blocked.shift();
    if (!entry) return;
    this.settle(entry);
    this.items.push(entry.message);
    entry.resolve();
  }
}
