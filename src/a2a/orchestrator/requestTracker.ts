/**
 * Tracks user requests handled by one orchestrator: status, plan, result and
 * the AbortController used to cancel them.
 */

import crypto from "node:crypto";
import type { PipelineResult, RequestState } from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

function generateRequestId(): string {
  return crypto.randomUUID();
}

/**
 * Result of setResult operation.
 */
export type SetResultOutcome =
  | { success: true; wasIdempotent: false }
  | { success: true; wasIdempotent: true }
  | { success: false; reason: "not_found" | "already_terminal" };

const TERMINAL: ReadonlySet<RequestState["status"]> = new Set(["completed", "failed", "cancelled"]);

/**
 * In-memory request tracker, one per orchestrator.
 */
export class RequestTracker {
  private readonly requests = new Map<string, RequestState>();
  private readonly abortControllers = new Map<string, AbortController>();
  private readonly maxRequests: number;

  constructor(maxRequests = 1000) {
    this.maxRequests = maxRequests;
  }

  /**
   * Record a new request and return its id with a controller for cancellation.
   */
  create(text: string): { id: string; abortController: AbortController } {
    // Evict the oldest finished request if at capacity
    if (this.requests.size >= this.maxRequests) {
      const oldest = this.getOldestFinished();
      if (oldest) {
        this.delete(oldest.id);
      }
    }

    const id = generateRequestId();
    const now = isoNow();
    this.requests.set(id, {
      id,
      createdAt: now,
      updatedAt: now,
      status: "pending",
      text
    });
    const abortController = new AbortController();
    this.abortControllers.set(id, abortController);

    return { id, abortController };
  }

  get(id: string): RequestState | undefined {
    return this.requests.get(id);
  }

  /**
   * Update status; ignored once the request is terminal.
   */
  updateStatus(id: string, status: RequestState["status"], currentStage?: string): boolean {
    const request = this.requests.get(id);
    if (!request || TERMINAL.has(request.status)) return false;
    request.status = status;
    request.updatedAt = isoNow();
    if (currentStage !== undefined) request.currentStage = currentStage;
    return true;
  }

  setPlan(id: string, plan: string[]): boolean {
    const request = this.requests.get(id);
    if (!request) return false;
    request.plan = [...plan];
    request.updatedAt = isoNow();
    return true;
  }

  /**
   * Set the request result and mark it terminal.
   * Idempotent: once a result is stored, further calls are no-ops.
   * A request cancelled before finishing keeps its `cancelled` status.
   */
  setResult(id: string, result: PipelineResult): SetResultOutcome {
    const request = this.requests.get(id);
    if (!request) {
      return { success: false, reason: "not_found" };
    }
    if (request.result !== undefined) {
      return { success: true, wasIdempotent: true };
    }
    if (TERMINAL.has(request.status) && request.status !== "cancelled") {
      return { success: false, reason: "already_terminal" };
    }

    request.result = result;
    if (request.status !== "cancelled") {
      request.status = result.kind === "error" ? "failed" : "completed";
    }
    request.updatedAt = isoNow();
    this.abortControllers.delete(id);
    return { success: true, wasIdempotent: false };
  }

  /**
   * Cancel a pending or running request and fire its abort signal.
   */
  cancel(id: string): boolean {
    const request = this.requests.get(id);
    if (!request) return false;
    if (request.status !== "pending" && request.status !== "running") return false;

    request.status = "cancelled";
    request.updatedAt = isoNow();
    const controller = this.abortControllers.get(id);
    if (controller && !controller.signal.aborted) {
      controller.abort();
    }
    return true;
  }

  list(status?: RequestState["status"]): RequestState[] {
    const all = Array.from(this.requests.values());
    if (status) return all.filter((r) => r.status === status);
    return all;
  }

  delete(id: string): boolean {
    this.abortControllers.delete(id);
    return this.requests.delete(id);
  }

  /**
   * Oldest terminal request; in-flight requests are never evicted.
   */
  private getOldestFinished(): RequestState | undefined {
    let oldest: RequestState | undefined;
    for (const request of this.requests.values()) {
      if (!TERMINAL.has(request.status)) continue;
      if (!oldest || request.createdAt < oldest.createdAt) {
        oldest = request;
      }
    }
    return oldest;
  }

  stats(): { total: number; byStatus: Record<RequestState["status"], number> } {
    const byStatus: Record<RequestState["status"], number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0
    };
    for (const request of this.requests.values()) {
      byStatus[request.status]++;
    }
    return { total: this.requests.size, byStatus };
  }
}
