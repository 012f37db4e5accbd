/**
 * Structured logging for the runtime.
 *
 * One root pino logger; components take a child bound to `component` so a
 * log line can be traced back to the registry, bus, an actor or a request.
 *
 * ```typescript
 * const log = createChildLogger({ component: "bus" });
 * log.warn({ correlationId }, "Dropped unmatched response");
 * ```
 *
 * Level comes from A2A_LOG_LEVEL, defaulting to `silent` under NODE_ENV=test
 * and `info` otherwise.
 */

import pino, { type Logger } from "pino";

export type { Logger };

function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.A2A_LOG_LEVEL) return env.A2A_LOG_LEVEL;
  return env.NODE_ENV === "test" ? "silent" : "info";
}

export const logger: Logger = pino({
  level: resolveLogLevel(),
  base: { service: "a2a-runtime" },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err
  }
});

/**
 * Create a child logger carrying extra bindings (component, agentId, requestId).
 */
export function createChildLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}
