/**
 * Keyword routing: turns request text into an ordered list of capabilities.
 *
 * The rule table is data (config/routing.json by default). Rules are checked
 * in table order against the request text, lowercased unless the table is
 * case-sensitive; keywords match as substrings.
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { A2AError } from "../errors.js";

export const RoutingRuleSchema = z.object({
  capability: z.string().min(1),
  description: z.string().optional(),
  keywords: z.array(z.string().min(1)).default([]),
  /** Planned regardless of keywords */
  always: z.boolean().default(false),
  /** Capabilities that must already be planned for this rule to apply */
  requires: z.array(z.string().min(1)).default([])
});

export const RoutingTableSchema = z
  .object({
    caseSensitive: z.boolean().default(false),
    rules: z.array(RoutingRuleSchema).min(1)
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    table.rules.forEach((rule, index) => {
      if (seen.has(rule.capability)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", index, "capability"],
          message: `Duplicate capability '${rule.capability}'`
        });
      }
      for (const required of rule.requires) {
        if (!seen.has(required)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["rules", index, "requires"],
            message: `'${rule.capability}' requires '${required}', which is not an earlier rule`
          });
        }
      }
      if (!rule.always && rule.keywords.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rules", index, "keywords"],
          message: `'${rule.capability}' can never match: no keywords and not 'always'`
        });
      }
      seen.add(rule.capability);
    });
  });

export type RoutingRule = z.infer<typeof RoutingRuleSchema>;
export type RoutingTable = z.infer<typeof RoutingTableSchema>;
export type RoutingTableInput = z.input<typeof RoutingTableSchema>;

/**
 * Why a rule was or was not planned.
 */
export type PlanDecision =
  | { capability: string; planned: true; reason: "always" }
  | { capability: string; planned: true; reason: "keyword"; keyword: string }
  | { capability: string; planned: false; reason: "no_match" }
  | { capability: string; planned: false; reason: "missing_requirement"; missing: string[] };

export type PipelinePlan = {
  /** Capabilities in execution order */
  stages: string[];
  decisions: PlanDecision[];
};

export const DEFAULT_ROUTING_TABLE_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../config/routing.json"
);

/**
 * Validate a routing table value.
 * @throws A2AError with BAD_REQUEST listing the zod issues
 */
export function parseRoutingTable(value: unknown): RoutingTable {
  const parsed = RoutingTableSchema.safeParse(value);
  if (!parsed.success) {
    throw new A2AError("BAD_REQUEST", "Invalid routing table", { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Read and validate a routing table from a JSON file.
 */
export function loadRoutingTable(filePath: string = DEFAULT_ROUTING_TABLE_PATH): RoutingTable {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf8");
  } catch (err) {
    throw new A2AError("BAD_REQUEST", `Cannot read routing table: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err)
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new A2AError("BAD_REQUEST", `Routing table is not valid JSON: ${filePath}`, {
      path: filePath,
      cause: err instanceof Error ? err.message : String(err)
    });
  }
  return parseRoutingTable(json);
}

export class Planner {
  readonly table: RoutingTable;

  constructor(table: RoutingTable = loadRoutingTable()) {
    this.table = table;
  }

  static fromFile(filePath: string): Planner {
    return new Planner(loadRoutingTable(filePath));
  }

  plan(text: string): PipelinePlan {
    const haystack = this.table.caseSensitive ? text : text.toLowerCase();
    const stages: string[] = [];
    const decisions: PlanDecision[] = [];

    for (const rule of this.table.rules) {
      const decision = this.evaluate(rule, haystack, stages);
      decisions.push(decision);
      if (decision.planned) {
        stages.push(rule.capability);
      }
    }

    return { stages, decisions };
  }

  private evaluate(rule: RoutingRule, haystack: string, planned: readonly string[]): PlanDecision {
    let decision: PlanDecision;
    if (rule.always) {
      decision = { capability: rule.capability, planned: true, reason: "always" };
    } else {
      const keyword = rule.keywords.find((k) =>
        haystack.includes(this.table.caseSensitive ? k : k.toLowerCase())
      );
      if (keyword === undefined) {
        return { capability: rule.capability, planned: false, reason: "no_match" };
      }
      decision = { capability: rule.capability, planned: true, reason: "keyword", keyword };
    }

    const missing = rule.requires.filter((required) => !planned.includes(required));
    if (missing.length > 0) {
      return { capability: rule.capability, planned: false, reason: "missing_requirement", missing };
    }
    return decision;
  }
}
