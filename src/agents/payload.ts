import { z } from "zod";
import { A2AError } from "../a2a/errors.js";
import type { StagePayload } from "../a2a/orchestrator/types.js";

export const StagePayloadSchema = z.object({
  capability: z.string().min(1),
  query: z.string(),
  input: z.unknown(),
  context: z.record(z.unknown())
});

/**
 * Validate a stage request payload.
 * @throws A2AError with BAD_REQUEST when the payload is not a stage payload
 */
export function parseStagePayload(payload: unknown): StagePayload {
  const parsed = StagePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new A2AError("BAD_REQUEST", "Malformed stage payload", { issues: parsed.error.issues });
  }
  const { capability, query, input, context } = parsed.data;
  return { capability, query, input, context };
}

/**
 * Validate a previous stage's output against `schema`.
 */
export function parseStageInput<T extends z.ZodTypeAny>(schema: T, input: unknown, expected: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new A2AError("BAD_REQUEST", `Expected ${expected} as input`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
