import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { A2AError } from "../src/a2a/errors.js";
import {
  DEFAULT_ROUTING_TABLE_PATH,
  Planner,
  loadRoutingTable,
  parseRoutingTable
} from "../src/a2a/orchestrator/planner.js";

describe("Planner with the default routing table", () => {
  const planner = new Planner();

  it("plans research, analysis and visualization", () => {
    const plan = planner.plan("Research AI trends and analyze the data for visualization");
    expect(plan.stages).toEqual(["research", "analysis", "visualization"]);
    expect(plan.decisions).toEqual([
      { capability: "research", planned: true, reason: "always" },
      { capability: "analysis", planned: true, reason: "keyword", keyword: "analy" },
      { capability: "visualization", planned: true, reason: "keyword", keyword: "visuali" }
    ]);
  });

  it("plans research alone when nothing else matches", () => {
    const plan = planner.plan("Research top AI companies by market cap");
    expect(plan.stages).toEqual(["research"]);
    expect(plan.decisions[1]).toEqual({ capability: "analysis", planned: false, reason: "no_match" });
    expect(plan.decisions[2]).toEqual({ capability: "visualization", planned: false, reason: "no_match" });
  });

  it("drops visualization when analysis is not planned", () => {
    const plan = planner.plan("Plot a chart of revenue");
    expect(plan.stages).toEqual(["research"]);
    expect(plan.decisions[2]).toEqual({
      capability: "visualization",
      planned: false,
      reason: "missing_requirement",
      missing: ["analysis"]
    });
  });

  it("matches keywords regardless of case", () => {
    expect(planner.plan("COMPARE vendors on a DASHBOARD").stages).toEqual(["research", "analysis", "visualization"]);
  });

  it("always plans at least the research stage", () => {
    expect(planner.plan("").stages).toEqual(["research"]);
  });

  it("loads the bundled table from config/routing.json", () => {
    expect(path.basename(DEFAULT_ROUTING_TABLE_PATH)).toBe("routing.json");
    expect(loadRoutingTable().rules.map((r) => r.capability)).toEqual(["research", "analysis", "visualization"]);
  });
});

describe("Planner with a custom table", () => {
  it("honours caseSensitive", () => {
    const planner = new Planner(
      parseRoutingTable({
        caseSensitive: true,
        rules: [
          { capability: "search", always: true },
          { capability: "summarize", keywords: ["TL;DR"] }
        ]
      })
    );
    expect(planner.plan("TL;DR of the news").stages).toEqual(["search", "summarize"]);
    expect(planner.plan("tl;dr of the news").stages).toEqual(["search"]);
  });
});

describe("parseRoutingTable", () => {
  function issues(value: unknown): string[] {
    try {
      parseRoutingTable(value);
    } catch (err) {
      if (err instanceof A2AError && err.details && typeof err.details === "object" && "issues" in err.details) {
        const list = err.details.issues;
        if (Array.isArray(list)) {
          return list.map((issue: { message: string }) => issue.message);
        }
      }
      throw err;
    }
    return [];
  }

  it("fills defaults", () => {
    const table = parseRoutingTable({ rules: [{ capability: "research", always: true }] });
    expect(table).toEqual({
      caseSensitive: false,
      rules: [{ capability: "research", always: true, keywords: [], requires: [] }]
    });
  });

  it("rejects duplicate capabilities", () => {
    expect(
      issues({
        rules: [
          { capability: "a", always: true },
          { capability: "a", keywords: ["x"] }
        ]
      })
    ).toEqual(["Duplicate capability 'a'"]);
  });

  it("rejects requirements that are not earlier rules", () => {
    expect(
      issues({
        rules: [
          { capability: "a", keywords: ["x"], requires: ["b"] },
          { capability: "b", always: true }
        ]
      })
    ).toEqual(["'a' requires 'b', which is not an earlier rule"]);
  });

  it("rejects rules that can never match", () => {
    expect(issues({ rules: [{ capability: "a" }] })).toEqual([
      "'a' can never match: no keywords and not 'always'"
    ]);
  });

  it("rejects an empty table", () => {
    expect(() => parseRoutingTable({ rules: [] })).toThrow("Invalid routing table");
  });
});

describe("loadRoutingTable", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "a2a-routing-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads a table from disk", () => {
    const file = path.join(tmpDir, "routing.json");
    fs.writeFileSync(file, JSON.stringify({ rules: [{ capability: "translate", keywords: ["translat"] }] }));

    const planner = Planner.fromFile(file);
    expect(planner.plan("Translate this page").stages).toEqual(["translate"]);
    expect(planner.plan("Summarize this page").stages).toEqual([]);
  });

  it("reports a missing file", () => {
    const file = path.join(tmpDir, "missing.json");
    expect(() => loadRoutingTable(file)).toThrow(`Cannot read routing table: ${file}`);
  });

  it("reports invalid JSON", () => {
    const file = path.join(tmpDir, "broken.json");
    fs.writeFileSync(file, "{ rules: ");
    expect(() => loadRoutingTable(file)).toThrow(`Routing table is not valid JSON: ${file}`);
  });
});
