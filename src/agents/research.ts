import { z } from "zod";
import type { CapabilityHandler } from "../a2a/agent/types.js";
import { parseStagePayload } from "./payload.js";

export const ResearchOutputSchema = z.object({
  topic: z.string(),
  findings: z.array(
    z.object({
      id: z.string(),
      term: z.string(),
      summary: z.string()
    })
  )
});

export type ResearchOutput = z.infer<typeof ResearchOutputSchema>;

const STOP_WORDS = new Set([
  "the", "and", "for", "with", "from", "into", "about", "data", "research",
  "analyze", "analyse", "analysis", "visualize", "visualization", "chart", "plot"
]);

const MAX_FINDINGS = 3;

/**
 * Terms worth researching: lowercase words of three or more letters, in order
 * of first appearance, minus stop words.
 */
export function extractTerms(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  const terms: string[] = [];
  for (const word of words) {
    if (word.length < 3 || STOP_WORDS.has(word) || terms.includes(word)) continue;
    terms.push(word);
  }
  return terms;
}

export const researchHandler: CapabilityHandler = {
  handle(payload): ResearchOutput {
    const { query } = parseStagePayload(payload);
    const topic = query.trim();
    const findings = extractTerms(topic)
      .slice(0, MAX_FINDINGS)
      .map((term, i) => ({
        id: `finding-${i + 1}`,
        term,
        summary: `Sources covering "${term}" for: ${topic}`
      }));
    return { topic, findings };
  }
};
