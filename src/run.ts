import { randomUUID } from "node:crypto";
import { getConfig, mergeSection, type RunConfig } from "./config.js";
import { ConfigError, SubtaskError } from "./errors.js";
import { Executor } from "./executor/executor.js";
import type { RuntimeTask } from "./executor/runtime-task.js";
import type { DisplayFactory } from "./executor/types.js";
import type { RunStore } from "./persistence/store.js";
import type { TaskSpec } from "./planner/task-spec.js";
import type { TaskResult } from "./planner/types.js";
import { parseOrThrow, RunConfigSchema } from "./schemas.js";
import { liveDisplay, type DisplayStream } from "./ui/display.js";
import { log } from "./utils/logger.js";

export type RunOptions = {
  /** `false` turns the live display off; a factory replaces it. Default: live tree on stdout. */
  display?: boolean | DisplayFactory;
  /** Where the default display writes. */
  stream?: DisplayStream;
  /** Record the run in this history store. */
  store?: RunStore;
  onTaskStart?: (task: RuntimeTask) => void;
  onTaskEnd?: (task: RuntimeTask, result: TaskResult) => void;
};

/** Validate per-call overrides and lay them over the configured defaults. */
export function resolveRunConfig(overrides?: Partial<RunConfig>): RunConfig {
  const valid = overrides
    ? parseOrThrow(RunConfigSchema, overrides, "run config", (message) => new ConfigError(message))
    : {};
  return mergeSection(getConfig().run, valid);
}

function pickDisplay(config: RunConfig, options?: RunOptions): DisplayFactory | undefined {
  if (options?.display === false) return undefined;
  if (typeof options?.display === "function") return options.display;
  return liveDisplay({
    stream: options?.stream,
    outputLines: config.outputLines,
    errorLines: config.errorLines,
  });
}

/**
 * Execute task chains and return one result per task that ran.
 *
 * Throws SubtaskError when a task fails and `raiseOnFailure` or `failFast`
 * is set; otherwise stops after the failing batch and returns what ran.
 */
export async function run(
  specs: readonly TaskSpec[],
  config?: Partial<RunConfig>,
  options?: RunOptions,
): Promise<TaskResult[]> {
  const resolved = resolveRunConfig(config);
  const executor = new Executor({ config: resolved });
  const runId = randomUUID();
  const startedAt = Date.now();

  let results: TaskResult[] = [];
  let error: string | undefined;
  try {
    results = await executor.execute(specs, {
      display: pickDisplay(resolved, options),
      onTaskStart: options?.onTaskStart,
      onTaskEnd: options?.onTaskEnd,
    });
    return results;
  } catch (err) {
    error = err instanceof Error ? err.message : String(err);
    if (err instanceof SubtaskError) results = [...err.results];
    throw err;
  } finally {
    if (options?.store) {
      const ok = error === undefined && results.every((r) => r.ok);
      options.store.insert({ runId, startedAt, finishedAt: Date.now(), ok, error, results });
      log.debug("Recorded run", { runId, ok, tasks: results.length });
    }
  }
}
