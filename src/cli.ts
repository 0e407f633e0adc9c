#!/usr/bin/env node

import { Command } from "commander";
import { nonNegativeInt, positiveInt } from "./cli-options.js";
import { getConfig } from "./config.js";
import { SubtaskError, TaskTreeError } from "./errors.js";
import { buildSpecs, loadTaskFile, taskFileDir } from "./loader/task-file.js";
import { RunStore } from "./persistence/store.js";
import { describePlan } from "./planner/task-graph.js";
import type { TaskResult } from "./planner/types.js";
import { run } from "./run.js";
import type { RunConfigOverrides } from "./schemas.js";
import { formatDuration } from "./ui/renderer.js";
import { setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", reason instanceof Error ? reason.message : reason);
});

const program = new Command();

program
  .name("tasktree")
  .description("Run task chains with nested children and watchers, with a live progress tree")
  .version("0.1.0")
  .option("--debug", "Enable debug logging")
  .option("--quiet", "Only log errors");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals();
  if (opts.debug) setLogLevel("debug");
  else if (opts.quiet) setLogLevel("error");
});

type RunCommandOptions = {
  workers?: number;
  failFast?: boolean;
  raise: boolean;
  outputLines?: number;
  errorLines?: number;
  history: boolean;
  db?: string;
};

// --- run ---
program
  .command("run")
  .description("Run the tasks in a YAML or JSON task file")
  .argument("<file>", "Task file")
  .option("-w, --workers <n>", "Max parallel tasks per batch", positiveInt)
  .option("--fail-fast", "Skip queued tasks as soon as one fails")
  .option("--no-raise", "Stop after a failed batch without reporting it as an error")
  .option("--output-lines <n>", "Recent output lines shown under a running task", nonNegativeInt)
  .option("--error-lines <n>", "Output lines shown under a failed task", nonNegativeInt)
  .option("--no-history", "Do not record this run")
  .option("--db <path>", "History database path")
  .action(async (file: string, opts: RunCommandOptions) => {
    const taskFile = await loadTaskFile(file);
    const specs = buildSpecs(taskFile.tasks, taskFileDir(file));
    const overrides: RunConfigOverrides = {
      ...taskFile.config,
      ...(opts.workers !== undefined && { maxWorkers: opts.workers }),
      ...(opts.failFast !== undefined && { failFast: opts.failFast }),
      ...(opts.raise === false && { raiseOnFailure: false }),
      ...(opts.outputLines !== undefined && { outputLines: opts.outputLines }),
      ...(opts.errorLines !== undefined && { errorLines: opts.errorLines }),
    };

    const store = opts.history && getConfig().history.enabled ? new RunStore(opts.db) : undefined;
    const startedAt = Date.now();
    try {
      const results = await run(specs, overrides, { store });
      printSummary(results, Date.now() - startedAt);
      if (!results.every((r) => r.ok)) process.exitCode = 1;
    } catch (err) {
      if (err instanceof SubtaskError) {
        console.error(`\n${err.message}`);
        if (err.output) console.error(err.output);
        process.exitCode = 1;
        return;
      }
      throw err;
    } finally {
      store?.close();
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Print the batches a task file would run, without running anything")
  .argument("<file>", "Task file")
  .action(async (file: string) => {
    const taskFile = await loadTaskFile(file);
    const specs = buildSpecs(taskFile.tasks, taskFileDir(file));
    console.log(JSON.stringify(describePlan(specs), null, 2));
  });

// --- history ---
const history = program
  .command("history")
  .description("List recorded runs")
  .option("-n, --limit <n>", "Number of runs to show", positiveInt, 20)
  .option("--db <path>", "History database path")
  .action((opts: { limit: number; db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      const runs = store.list(opts.limit);
      if (runs.length === 0) {
        console.log("No runs recorded.");
        return;
      }
      for (const r of runs) {
        const icon = r.ok ? "+" : "x";
        const when = new Date(r.startedAt).toISOString();
        const names = r.results.map((t) => t.name).join(", ") || "(no tasks)";
        console.log(`[${icon}] ${r.runId} ${when} ${formatDuration(r.finishedAt - r.startedAt)} ${names}${r.error ? ` (${r.error})` : ""}`);
      }
    } finally {
      store.close();
    }
  });

history
  .command("clear")
  .description("Delete every recorded run")
  .option("--db <path>", "History database path")
  .action((opts: { db?: string }) => {
    const store = new RunStore(opts.db);
    try {
      console.log(`Deleted ${store.deleteAll()} run(s).`);
    } finally {
      store.close();
    }
  });

function printSummary(results: readonly TaskResult[], elapsedMs: number): void {
  const failed = results.filter((r) => !r.ok);
  console.log(`\n${results.length - failed.length}/${results.length} task(s) succeeded ${formatDuration(elapsedMs)}`);
  for (const r of failed) {
    console.log(`  x ${r.name} (exit ${r.exitCode})`);
  }
}

void (async () => {
  try {
    await program.parseAsync();
  } catch (err) {
    console.error(err instanceof TaskTreeError ? `${err.code}: ${err.message}` : err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
})();
