import { z } from "zod";
import { A2AError } from "./errors.js";

/** Largest delay a Node timer accepts (2^31 - 1 ms) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const InboxOverflowSchema = z.enum(["reject", "block"]);
export type InboxOverflow = z.infer<typeof InboxOverflowSchema>;

export const RuntimeConfigSchema = z.object({
  /** Maximum queued messages per agent inbox */
  inboxCapacity: z.number().int().positive().default(100),
  /** What `send` does when the target inbox is full */
  inboxOverflow: InboxOverflowSchema.default("reject"),
  /** How long a blocked sender waits for space (ms). 0 = wait indefinitely */
  sendTimeoutMs: z.number().int().nonnegative().max(MAX_TIMEOUT_MS).default(5_000),
  /** Per-stage response timeout (ms) */
  stageTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30_000),
  /** Finished requests kept by the request tracker before eviction */
  maxTrackedRequests: z.number().int().positive().default(1_000),
  /** Sender id the orchestrator stamps on its requests */
  orchestratorId: z.string().min(1).default("orchestrator"),
  /** Optional JSON routing table replacing config/routing.json */
  routingTablePath: z.string().min(1).optional()
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type RuntimeConfigInput = z.input<typeof RuntimeConfigSchema>;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = RuntimeConfigSchema.parse({});

/**
 * Validate a partial config and fill defaults.
 * @throws A2AError with BAD_REQUEST when a value is out of range.
 */
export function resolveConfig(input: RuntimeConfigInput = {}): RuntimeConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): RuntimeConfig {
  const parsed = RuntimeConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new A2AError("BAD_REQUEST", "Invalid runtime configuration", { issues: parsed.error.issues });
  }
  return parsed.data;
}

const ENV_KEYS = {
  inboxCapacity: "A2A_INBOX_CAPACITY",
  inboxOverflow: "A2A_INBOX_OVERFLOW",
  sendTimeoutMs: "A2A_SEND_TIMEOUT_MS",
  stageTimeoutMs: "A2A_STAGE_TIMEOUT_MS",
  maxTrackedRequests: "A2A_MAX_TRACKED_REQUESTS",
  orchestratorId: "A2A_ORCHESTRATOR_ID",
  routingTablePath: "A2A_ROUTING_TABLE"
} as const;

const NUMERIC_KEYS: ReadonlySet<string> = new Set([
  "inboxCapacity",
  "sendTimeoutMs",
  "stageTimeoutMs",
  "maxTrackedRequests"
]);

/**
 * Build a config from A2A_* environment variables, with `overrides` taking
 * precedence. Unset variables fall back to schema defaults.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: RuntimeConfigInput = {}
): RuntimeConfig {
  const fromEnv: Record<string, unknown> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName];
    if (raw === undefined || raw === "") continue;
    // Non-numeric strings become NaN and fail validation below
    fromEnv[key] = NUMERIC_KEYS.has(key) ? Number(raw) : raw;
  }
  return parseConfig({ ...fromEnv, ...overrides });
}
