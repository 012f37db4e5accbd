import { z } from "zod";
import type { CapabilityHandler } from "../a2a/agent/types.js";
import { parseStageInput, parseStagePayload } from "./payload.js";
import { ResearchOutputSchema } from "./research.js";

export const AnalysisOutputSchema = z.object({
  topic: z.string(),
  findingCount: z.number().int().nonnegative(),
  keyTerms: z.array(z.string()),
  summary: z.string()
});

export type AnalysisOutput = z.infer<typeof AnalysisOutputSchema>;

export const analysisHandler: CapabilityHandler = {
  handle(payload): AnalysisOutput {
    const { input } = parseStagePayload(payload);
    const research = parseStageInput(ResearchOutputSchema, input, "research output");
    const keyTerms = research.findings.map((f) => f.term);
    return {
      topic: research.topic,
      findingCount: research.findings.length,
      keyTerms,
      summary:
        keyTerms.length > 0
          ? `${keyTerms.length} finding(s) on ${keyTerms.join(", ")}`
          : "No findings to analyse"
    };
  }
};
