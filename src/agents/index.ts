/**
 * Bundled demo agents. The set is closed; other agent kinds implement
 * CapabilityHandler directly and are spawned the same way.
 */

import type { CapabilityHandler } from "../a2a/agent/types.js";
import type { AgentSpec } from "../a2a/runtime.js";
import { analysisHandler } from "./analysis.js";
import { researchHandler } from "./research.js";
import { visualizationHandler } from "./visualization.js";

export type DemoCapability = "research" | "analysis" | "visualization";

export const DEMO_HANDLERS: Record<DemoCapability, CapabilityHandler> = {
  research: researchHandler,
  analysis: analysisHandler,
  visualization: visualizationHandler
};

const DEMO_ORDER: readonly DemoCapability[] = ["research", "analysis", "visualization"];

/**
 * One spec per demo capability, ids `<capability>-agent`.
 */
export function createDemoAgents(): AgentSpec[] {
  return DEMO_ORDER.map((capability) => ({
    id: `${capability}-agent`,
    capabilities: [capability],
    handler: DEMO_HANDLERS[capability]
  }));
}

export { researchHandler, extractTerms, ResearchOutputSchema, type ResearchOutput } from "./research.js";
export { analysisHandler, AnalysisOutputSchema, type AnalysisOutput } from "./analysis.js";
export { visualizationHandler, VisualizationOutputSchema, type VisualizationOutput } from "./visualization.js";
export { parseStagePayload, StagePayloadSchema } from "./payload.js";
