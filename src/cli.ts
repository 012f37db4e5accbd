#!/usr/bin/env node
import { Command } from "commander";
import process from "node:process";
import chalk from "chalk";
import { A2ARuntime } from "./a2a/runtime.js";
import { loadConfigFromEnv, type RuntimeConfigInput } from "./a2a/config.js";
import { Planner } from "./a2a/orchestrator/planner.js";
import type { PipelineResult } from "./a2a/orchestrator/types.js";
import { createDemoAgents } from "./agents/index.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,           // Every planned stage completed
  ERROR: 30,       // Pipeline aborted, or the runtime failed
  CANCELLED: 40    // Cancelled by user (SIGINT/SIGTERM)
} as const;

type RunOptions = {
  stageTimeout?: string;
  inboxCapacity?: string;
  routing?: string;
  json: boolean;
};

const program = new Command();

program.name("a2a").description("In-process agent-to-agent orchestration runtime").version("0.1.0");

program
  .command("run")
  .description("Run a request through the demo research/analysis/visualization agents")
  .argument("<request>", "The user request text")
  .option("--stage-timeout <ms>", "Per-stage response timeout in ms")
  .option("--inbox-capacity <n>", "Per-agent inbox capacity")
  .option("--routing <file>", "JSON routing table (defaults to config/routing.json)")
  .option("--json", "Output full JSON result", false)
  .action(async (request: string, opts: RunOptions) => {
    const overrides: RuntimeConfigInput = {};
    if (opts.stageTimeout !== undefined) overrides.stageTimeoutMs = Number(opts.stageTimeout);
    if (opts.inboxCapacity !== undefined) overrides.inboxCapacity = Number(opts.inboxCapacity);
    if (typeof opts.routing === "string") overrides.routingTablePath = opts.routing;

    const abortController = new AbortController();
    let cancelled = false;

    const handleSignal = (signal: string) => {
      if (cancelled) {
        // Force exit on second signal
        process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
        process.exit(EXIT_CODES.CANCELLED);
      }
      cancelled = true;
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
      abortController.abort();
    };

    process.on("SIGINT", () => handleSignal("SIGINT"));
    process.on("SIGTERM", () => handleSignal("SIGTERM"));

    try {
      const runtime = new A2ARuntime({ config: loadConfigFromEnv(process.env, overrides) });
      for (const spec of createDemoAgents()) {
        runtime.spawn(spec);
      }
      await runtime.startAll();

      process.stderr.write(chalk.blue(`Handling request: "${request}"\n`));
      process.stderr.write(chalk.dim(`  Agents: ${runtime.registry.list().map((d) => d.id).join(", ")}\n`));
      process.stderr.write(chalk.dim(`  Capabilities: ${runtime.registry.capabilities().join(", ")}\n`));
      process.stderr.write(chalk.dim(`  Stage timeout: ${runtime.config.stageTimeoutMs}ms\n`));
      process.stderr.write("\n");

      let result: PipelineResult;
      try {
        result = await runtime.handleUserRequest(request, { signal: abortController.signal });
      } finally {
        await runtime.stopAll();
      }

      if (opts.json) {
        process.stdout.write(JSON.stringify(result, null, 2) + "\n");
      } else {
        outputResultHuman(result);
      }

      process.exit(resultToExitCode(result, cancelled));
    } catch (err) {
      process.stderr.write(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}\n`));
      process.exit(EXIT_CODES.ERROR);
    }
  });

program
  .command("plan")
  .description("Show the stages a request would run, without running them")
  .argument("<request>", "The user request text")
  .option("--routing <file>", "JSON routing table (defaults to config/routing.json)")
  .action((request: string, opts: { routing?: string }) => {
    try {
      const planner = typeof opts.routing === "string" ? Planner.fromFile(opts.routing) : new Planner();
      const plan = planner.plan(request);
      process.stdout.write(`${plan.stages.join(" → ")}\n`);
      for (const decision of plan.decisions) {
        const mark = decision.planned ? chalk.green("✓") : chalk.dim("·");
        let why: string = decision.reason;
        if (decision.reason === "keyword") why = `keyword "${decision.keyword}"`;
        if (decision.reason === "missing_requirement") why = `requires ${decision.missing.join(", ")}`;
        process.stderr.write(`  ${mark} ${decision.capability} ${chalk.dim(`(${why})`)}\n`);
      }
    } catch (err) {
      process.stderr.write(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}\n`));
      process.exit(EXIT_CODES.ERROR);
    }
  });

program
  .command("agents")
  .description("List the bundled demo agents and their capabilities")
  .action(() => {
    for (const spec of createDemoAgents()) {
      process.stdout.write(`${spec.id}\t${spec.capabilities.join(",")}\n`);
    }
  });

/**
 * Map a pipeline result to an exit code.
 */
function resultToExitCode(result: PipelineResult, cancelled: boolean): number {
  if (cancelled) {
    return EXIT_CODES.CANCELLED;
  }
  return result.kind === "ok" ? EXIT_CODES.OK : EXIT_CODES.ERROR;
}

/**
 * Output a pipeline result in human-readable format.
 */
function outputResultHuman(result: PipelineResult): void {
  const planned = result.plan.length;
  const done = result.stages.length;

  if (result.kind === "ok") {
    process.stderr.write(chalk.green("✓ Pipeline completed\n"));
  } else {
    process.stderr.write(
      chalk.red(`✗ Pipeline aborted at '${result.error.stage}': [${result.error.code}] ${result.error.message}\n`)
    );
  }
  process.stderr.write(chalk.dim(`  Stages: ${done}/${planned} completed\n`));

  for (const stage of result.stages) {
    process.stderr.write(`  ${chalk.bold(stage.capability)} ${chalk.dim(`(${stage.agentId}, ${stage.durationMs}ms)`)}\n`);
    process.stdout.write(`${JSON.stringify(stage.output)}\n`);
  }
}

await program.parseAsync(process.argv);
