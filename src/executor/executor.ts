import { getConfig, mergeSection, type RunConfig, type TaskTreeConfig } from "../config.js";
import { SubtaskError } from "../errors.js";
import { planBatches } from "../planner/task-graph.js";
import type { TaskSpec } from "../planner/task-spec.js";
import type { TaskResult } from "../planner/types.js";
import { CompletionChannel } from "../utils/completion-channel.js";
import { log } from "../utils/logger.js";
import { JobCancelledError, WorkerPool } from "../utils/worker-pool.js";
import { RuntimeTask } from "./runtime-task.js";
import { runTask, type TaskContext } from "./task-runner.js";
import type { BatchOutcome, ExecutionOptions } from "./types.js";

type Completion =
  | { index: number; result: TaskResult }
  | { index: number; error: unknown };

export type ExecutorOptions = {
  config?: Partial<RunConfig>;
  timing?: Partial<TaskTreeConfig["timing"]>;
};

/**
 * Runs root task chains in depth batches: stage N of every chain runs
 * together, bounded by `maxWorkers`, and only after every stage N-1 finished.
 */
export class Executor {
  readonly config: RunConfig;
  private readonly timing: TaskTreeConfig["timing"];

  constructor(opts?: ExecutorOptions) {
    const defaults = getConfig();
    this.config = mergeSection(defaults.run, opts?.config);
    this.timing = mergeSection(defaults.timing, opts?.timing);
  }

  async execute(roots: readonly TaskSpec[], opts?: ExecutionOptions): Promise<TaskResult[]> {
    const all: TaskResult[] = [];
    const batches = planBatches(roots);

    for (const [depth, batch] of batches.entries()) {
      const tasks = batch.map((spec) => new RuntimeTask(spec, this.config.outputLines));
      const names = tasks.map((t) => t.name);
      log.debug("Starting batch", { depth, tasks: names });
      opts?.onBatchStart?.(depth, names);

      const outcome = await this.runBatch(tasks, opts);
      all.push(...outcome.results);

      if (outcome.failure) {
        throw this.toError(outcome.failure, all);
      }

      const failed = outcome.results.find((r) => !r.ok);
      if (failed) {
        if (this.config.failFast || this.config.raiseOnFailure) {
          throw this.toError(failed, all);
        }
        log.debug("Stopping after failed batch", { depth, task: failed.name, skippedDepths: batches.length - depth - 1 });
        break;
      }
    }

    return all;
  }

  /**
   * Run one batch on a bounded pool. The loop wakes on every completion or
   * refresh tick to redraw. Under fail-fast the first failure cancels queued
   * tasks; tasks already running are left to finish.
   */
  async runBatch(tasks: readonly RuntimeTask[], opts?: ExecutionOptions): Promise<BatchOutcome> {
    const pool = new WorkerPool(this.config.maxWorkers);
    const channel = new CompletionChannel<Completion>();
    const ctx: TaskContext = {
      retryDelayMs: this.timing.retryDelayMs,
      stopGraceMs: this.timing.stopGraceMs,
      onTaskStart: opts?.onTaskStart,
      onTaskEnd: opts?.onTaskEnd,
    };

    // Queued tasks are cancelled from inside the failing job, before its slot
    // is handed to the next one.
    const job = async (task: RuntimeTask): Promise<TaskResult> => {
      const result = await runTask(task, ctx);
      if (this.config.failFast && !result.ok) {
        const dropped = pool.cancelPending();
        log.debug("Fail-fast triggered", { task: result.name, cancelled: dropped });
      }
      return result;
    };

    tasks.forEach((task, index) => {
      void pool.submit(() => job(task)).then(
        (result) => channel.push({ index, result }),
        (error: unknown) => channel.push({ index, error }),
      );
    });

    const display = opts?.display?.(tasks);
    const results: Array<TaskResult | undefined> = new Array(tasks.length).fill(undefined);
    const cancelled: string[] = [];
    let failure: TaskResult | undefined;
    let remaining = tasks.length;

    try {
      display?.refresh();
      while (remaining > 0) {
        const completion = await channel.next(this.timing.refreshIntervalMs);
        display?.refresh();
        if (!completion) continue;
        remaining--;

        const task = tasks[completion.index];
        if ("result" in completion) {
          results[completion.index] = completion.result;
        } else if (completion.error instanceof JobCancelledError) {
          cancelled.push(task.name);
          continue;
        } else {
          const message = completion.error instanceof Error ? completion.error.message : String(completion.error);
          log.error(`Task "${task.name}" crashed`, { error: message });
          results[completion.index] = crashedResult(task.name, message);
        }

        const result = results[completion.index];
        if (this.config.failFast && result && !result.ok && !failure) {
          failure = result;
          pool.cancelPending();
        }
      }
    } finally {
      display?.close();
    }

    return {
      results: results.filter((r): r is TaskResult => r !== undefined),
      failure,
      cancelled,
    };
  }

  private toError(failed: TaskResult, results: readonly TaskResult[]): SubtaskError {
    const lines = failed.stdout.split("\n");
    const tail = this.config.errorLines > 0 ? lines.slice(-this.config.errorLines).join("\n") : "";
    return new SubtaskError(failed.name, failed.exitCode, failed.stderr || tail, results);
  }
}

function crashedResult(name: string, message: string): TaskResult {
  const result: TaskResult = {
    name,
    status: "failed",
    ok: false,
    exitCode: 1,
    stdout: "",
    stderr: message,
    durationMs: 0,
    children: [],
  };
  return Object.freeze(result);
}
