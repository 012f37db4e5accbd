import { afterEach, describe, expect, it, vi } from "vitest";
import type { CapabilityHandler } from "../src/a2a/agent/types.js";
import { A2ARuntime } from "../src/a2a/runtime.js";
import type { OrchestrationEvent } from "../src/a2a/orchestrator/types.js";

const FULL_REQUEST = "Research AI trends and analyze the data for visualization";
const RESEARCH_ONLY = "Research top AI companies by market cap";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function flushEvents(): Promise<void> {
  return new Promise((r) => setTimeout(r, 0));
}

describe("Orchestrator", () => {
  let runtime: A2ARuntime | undefined;

  afterEach(async () => {
    await runtime?.stopAll();
    runtime = undefined;
  });

  async function startRuntime(
    handlers: Partial<Record<"research" | "analysis" | "visualization", CapabilityHandler>>,
    stageTimeoutMs = 1000
  ): Promise<A2ARuntime> {
    const rt = new A2ARuntime({ config: { stageTimeoutMs } });
    for (const [capability, handler] of Object.entries(handlers)) {
      if (!handler) continue;
      rt.spawn({ id: `${capability}-agent`, capabilities: [capability], handler });
    }
    await rt.startAll();
    runtime = rt;
    return rt;
  }

  it("runs research, analysis and visualization in order, chaining outputs", async () => {
    const research = vi.fn(() => ({ stage: "R" }));
    const analysis = vi.fn(() => ({ stage: "A" }));
    const visualization = vi.fn(() => ({ stage: "V" }));
    const rt = await startRuntime({
      research: { handle: research },
      analysis: { handle: analysis },
      visualization: { handle: visualization }
    });

    const result = await rt.handleUserRequest(FULL_REQUEST);

    expect(result.kind).toBe("ok");
    expect(result.plan).toEqual(["research", "analysis", "visualization"]);
    expect(result.stages.map((s) => [s.capability, s.agentId, s.output])).toEqual([
      ["research", "research-agent", { stage: "R" }],
      ["analysis", "analysis-agent", { stage: "A" }],
      ["visualization", "visualization-agent", { stage: "V" }]
    ]);

    expect(research).toHaveBeenCalledWith(
      { capability: "research", query: FULL_REQUEST, input: FULL_REQUEST, context: {} },
      expect.anything()
    );
    expect(analysis).toHaveBeenCalledWith(
      { capability: "analysis", query: FULL_REQUEST, input: { stage: "R" }, context: { research: { stage: "R" } } },
      expect.anything()
    );
    expect(visualization).toHaveBeenCalledWith(
      {
        capability: "visualization",
        query: FULL_REQUEST,
        input: { stage: "A" },
        context: { research: { stage: "R" }, analysis: { stage: "A" } }
      },
      expect.anything()
    );
  });

  it("runs a single research stage for a plain research request", async () => {
    const analysis = vi.fn(() => "unused");
    const rt = await startRuntime({
      research: { handle: () => "companies" },
      analysis: { handle: analysis }
    });

    const result = await rt.handleUserRequest(RESEARCH_ONLY);

    expect(result).toMatchObject({ kind: "ok", plan: ["research"] });
    expect(result.stages).toHaveLength(1);
    expect(result.stages[0]?.output).toBe("companies");
    expect(analysis).not.toHaveBeenCalled();
  });

  it("aborts at the failing stage and reports completed stages", async () => {
    const visualization = vi.fn(() => "unused");
    const rt = await startRuntime({
      research: { handle: () => "findings" },
      analysis: {
        handle: () => {
          throw new Error("analysis exploded");
        }
      },
      visualization: { handle: visualization }
    });

    const result = await rt.handleUserRequest(FULL_REQUEST);

    expect(result.kind).toBe("error");
    expect(result.stages.map((s) => s.capability)).toEqual(["research"]);
    if (result.kind === "error") {
      expect(result.error).toEqual({
        stage: "analysis",
        index: 1,
        agentId: "analysis-agent",
        code: "HANDLER_ERROR",
        message: "Handler for 'analysis' on 'analysis-agent' failed: analysis exploded",
        details: {
          agentId: "analysis-agent",
          capability: "analysis",
          cause: { name: "Error", message: "analysis exploded" }
        }
      });
    }
    expect(visualization).not.toHaveBeenCalled();
    expect(rt.orchestrator.requests.get(result.requestId)?.status).toBe("failed");
  });

  it("reports a planned capability nobody advertises", async () => {
    const rt = await startRuntime({ research: { handle: () => "findings" } });

    const result = await rt.handleUserRequest(FULL_REQUEST);

    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toEqual({
        stage: "analysis",
        index: 1,
        code: "CAPABILITY_NOT_FOUND",
        message: "No agent advertises capability 'analysis'",
        details: { capability: "analysis" }
      });
    }
  });

  it("fails a stage that does not answer in time and drops the late reply", async () => {
    const release = deferred();
    const rt = await startRuntime({
      research: {
        handle: async () => {
          await release.promise;
          return "too late";
        }
      }
    });

    const result = await rt.handleUserRequest(RESEARCH_ONLY, { stageTimeoutMs: 30 });

    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toMatchObject({ stage: "research", index: 0, code: "DELIVERY_TIMEOUT" });
      expect(result.error.message).toMatch(/within 30ms$/);
    }
    expect(rt.bus.stats().pendingWaiters).toBe(0);

    release.resolve();
    await rt.stopAll();
    expect(rt.bus.stats().dropped).toBe(1);
  });

  it("cancels the current stage when the caller's signal aborts", async () => {
    const started = deferred();
    const release = deferred();
    const rt = await startRuntime({
      research: {
        handle: async () => {
          started.resolve();
          await release.promise;
          return "ignored";
        }
      }
    });
    const controller = new AbortController();

    const pending = rt.handleUserRequest(RESEARCH_ONLY, { signal: controller.signal });
    await started.promise;
    controller.abort();
    const result = await pending;

    expect(result.kind).toBe("error");
    if (result.kind === "error") {
      expect(result.error).toMatchObject({
        stage: "research",
        code: "CANCELLED",
        message: "Cancelled while awaiting response"
      });
    }
    expect(rt.orchestrator.requests.get(result.requestId)?.status).toBe("cancelled");
    release.resolve();
  });

  it("does not dispatch anything for an already aborted signal", async () => {
    const research = vi.fn(() => "unused");
    const rt = await startRuntime({ research: { handle: research } });
    const controller = new AbortController();
    controller.abort();

    const result = await rt.handleUserRequest(RESEARCH_ONLY, { signal: controller.signal });

    expect(result).toMatchObject({ kind: "error", stages: [], error: { code: "CANCELLED", index: 0 } });
    expect(research).not.toHaveBeenCalled();
  });

  it("cancels a request by id", async () => {
    const started = deferred();
    const release = deferred();
    const rt = await startRuntime({
      research: {
        handle: async () => {
          started.resolve();
          await release.promise;
          return "ignored";
        }
      }
    });

    const pending = rt.handleUserRequest(RESEARCH_ONLY);
    await started.promise;
    const [running] = rt.orchestrator.requests.list("running");
    expect(running?.currentStage).toBe("research");
    expect(rt.orchestrator.cancel(running?.id ?? "")).toBe(true);

    const result = await pending;
    expect(result.kind).toBe("error");
    expect(rt.orchestrator.requests.get(result.requestId)?.status).toBe("cancelled");
    release.resolve();
  });

  it("keeps concurrent requests through the same agents apart", async () => {
    const rt = await startRuntime({
      research: {
        handle: async (payload) => {
          await new Promise((r) => setTimeout(r, 5));
          const query = payload && typeof payload === "object" && "query" in payload ? payload.query : undefined;
          return { query };
        }
      },
      analysis: {
        handle: (payload) => {
          const input = payload && typeof payload === "object" && "input" in payload ? payload.input : undefined;
          return { analysed: input };
        }
      }
    });
    const alpha = "Research alpha and analyze it";
    const beta = "Research beta and analyze it";

    const [a, b] = await Promise.all([rt.handleUserRequest(alpha), rt.handleUserRequest(beta)]);

    expect(a.requestId).not.toBe(b.requestId);
    expect(a).toMatchObject({ kind: "ok", plan: ["research", "analysis"] });
    expect(b).toMatchObject({ kind: "ok", plan: ["research", "analysis"] });
    expect(a.stages.map((s) => s.output)).toEqual([{ query: alpha }, { analysed: { query: alpha } }]);
    expect(b.stages.map((s) => s.output)).toEqual([{ query: beta }, { analysed: { query: beta } }]);
    expect(rt.bus.stats()).toMatchObject({ pendingWaiters: 0, dropped: 0, resolved: 4 });
  });

  it("never runs a stage that timed out while waiting for inbox space", async () => {
    const started = deferred();
    const release = deferred();
    const seen: unknown[] = [];
    const rt = new A2ARuntime({ config: { inboxCapacity: 1, inboxOverflow: "block", sendTimeoutMs: 0 } });
    runtime = rt;
    rt.spawn({
      id: "research-agent",
      capabilities: ["research"],
      handler: {
        handle: async (payload) => {
          seen.push(payload && typeof payload === "object" && "query" in payload ? payload.query : undefined);
          started.resolve();
          await release.promise;
          return "done";
        }
      }
    });
    await rt.startAll();

    const first = rt.handleUserRequest("Research A");
    await started.promise;
    const second = rt.handleUserRequest("Research B");
    const third = await rt.handleUserRequest("Research C", { stageTimeoutMs: 30 });

    expect(third).toMatchObject({ kind: "error", error: { stage: "research", code: "DELIVERY_TIMEOUT" } });
    expect(rt.actor("research-agent")?.queued).toBe(1);

    release.resolve();
    expect((await first).kind).toBe("ok");
    expect((await second).kind).toBe("ok");
    expect(seen).toEqual(["Research A", "Research B"]);
    expect(rt.bus.stats().dropped).toBe(0);
  });

  it("emits run and stage events in order", async () => {
    const rt = await startRuntime({
      research: { handle: () => "R" },
      analysis: { handle: () => "A" },
      visualization: { handle: () => "V" }
    });
    const events: OrchestrationEvent[] = [];

    const result = await rt.handleUserRequest(FULL_REQUEST, { events: { onEvent: (e) => void events.push(e) } });
    await flushEvents();

    expect(events.map((e) => e.type)).toEqual([
      "run_started",
      "stage_started",
      "stage_completed",
      "stage_started",
      "stage_completed",
      "stage_started",
      "stage_completed",
      "run_completed"
    ]);
    expect(events.every((e) => e.requestId === result.requestId)).toBe(true);
    expect(events[0]).toMatchObject({ type: "run_started", text: FULL_REQUEST, plan: result.plan });
    expect(events[2]).toMatchObject({ stage: "research", index: 0, status: "success", agentId: "research-agent" });
    expect(events[7]).toMatchObject({ resultKind: "ok", totalStages: 3, completedStages: 3 });
  });

  it("can skip stage events and survives a throwing observer", async () => {
    const rt = await startRuntime({ research: { handle: () => "R" } });
    const seen: string[] = [];

    const result = await rt.handleUserRequest(RESEARCH_ONLY, {
      events: {
        emitStageStarted: false,
        emitStageCompleted: false,
        onEvent: (e) => {
          seen.push(e.type);
          throw new Error("observer failed");
        }
      }
    });
    await flushEvents();

    expect(result.kind).toBe("ok");
    expect(seen).toEqual(["run_started", "run_completed"]);
  });

  it("records each request in the tracker", async () => {
    const rt = await startRuntime({ research: { handle: () => "R" } });

    const result = await rt.handleUserRequest(RESEARCH_ONLY);

    expect(rt.orchestrator.requests.get(result.requestId)).toMatchObject({
      status: "completed",
      text: RESEARCH_ONLY,
      plan: ["research"],
      result
    });
  });
});
