import { z } from "zod";
import type { CapabilityHandler } from "../a2a/agent/types.js";
import { AnalysisOutputSchema } from "./analysis.js";
import { parseStageInput, parseStagePayload } from "./payload.js";

export const VisualizationOutputSchema = z.object({
  chartType: z.literal("bar"),
  title: z.string(),
  series: z.array(z.object({ label: z.string(), value: z.number() }))
});

export type VisualizationOutput = z.infer<typeof VisualizationOutputSchema>;

export const visualizationHandler: CapabilityHandler = {
  handle(payload): VisualizationOutput {
    const { input } = parseStagePayload(payload);
    const analysis = parseStageInput(AnalysisOutputSchema, input, "analysis output");
    // Earlier terms rank higher
    const series = analysis.keyTerms.map((label, i) => ({ label, value: analysis.keyTerms.length - i }));
    return { chartType: "bar", title: `Key terms: ${analysis.topic}`, series };
  }
};
