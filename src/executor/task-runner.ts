import type { TaskResult } from "../planner/types.js";
import { log } from "../utils/logger.js";
import { retryUntilStopped, sleep } from "../utils/retry.js";
import { StopToken } from "../utils/stop-token.js";
import { runCommand, signalGroup, type CommandOutcome } from "./process.js";
import { toResult, type RuntimeTask } from "./runtime-task.js";

export type TaskContext = {
  retryDelayMs: number;
  stopGraceMs: number;
  onTaskStart?: (task: RuntimeTask) => void;
  onTaskEnd?: (task: RuntimeTask, result: TaskResult) => void;
};

/**
 * Drive one runtime task, and recursively its children, from pending to a
 * terminal state. Never rejects: every failure ends up in the result.
 */
export async function runTask(task: RuntimeTask, ctx: TaskContext): Promise<TaskResult> {
  task.status = "running";
  task.startTime = Date.now();
  ctx.onTaskStart?.(task);
  log.debug(`Starting "${task.name}"`, { kind: task.spec.kind, children: task.children.length });

  const detachStop = task.stop.onStop(() => {
    if (task.process) signalGroup(task.process, "SIGTERM");
  });

  // Children are running before the parent's own action starts.
  const childRuns = task.children.map((child) => ({ child, done: runTask(child, ctx) }));

  try {
    await runAction(task, ctx);
  } catch (err) {
    task.errorMessage = err instanceof Error ? err.message : String(err);
    task.finish("failed", 1);
  } finally {
    detachStop();
    for (const { child } of childRuns) {
      if (child.spec.killOnParentComplete) forceStop(child);
    }
    await Promise.all(childRuns.map(({ child, done }) => joinChild(child, done, ctx.stopGraceMs)));
  }

  task.endTime = Date.now();
  const result = toResult(task);
  log.debug(`Finished "${task.name}"`, { status: result.status, exitCode: result.exitCode, durationMs: result.durationMs });
  ctx.onTaskEnd?.(task, result);
  return result;
}

async function runAction(task: RuntimeTask, ctx: TaskContext): Promise<void> {
  const { action } = task.spec;

  if (typeof action === "function") {
    try {
      await action();
      task.finish("success", 0);
    } catch (err) {
      task.errorMessage = err instanceof Error ? err.message : String(err);
      task.finish("failed", 1);
    }
    return;
  }

  if (task.spec.retry) {
    const attempts = await retryUntilStopped(
      async (attempt) => {
        const outcome = await launch(task, action);
        log.debug(`"${task.name}" exited`, { attempt, exitCode: outcome.exitCode });
      },
      { delayMs: ctx.retryDelayMs, token: task.stop },
    );
    log.debug(`"${task.name}" stopped`, { attempts });
    // A retrying task only ever stops; it has no pass/fail outcome.
    task.finish("success", 0);
    return;
  }

  const outcome = await launch(task, action);
  if (outcome.error) task.errorMessage = outcome.error;
  task.finish(outcome.exitCode === 0 ? "success" : "failed", outcome.exitCode);
}

async function launch(task: RuntimeTask, command: string): Promise<CommandOutcome> {
  try {
    return await runCommand(command, {
      env: task.spec.env,
      cwd: task.spec.cwd,
      onLine: (line) => {
        if (task.spec.retry && task.stop.stopped) return;
        task.appendLine(line);
      },
      onSpawn: (child) => {
        task.process = child;
        // Stopped between the loop check and the spawn.
        if (task.stop.stopped) signalGroup(child, "SIGTERM");
      },
    });
  } finally {
    task.process = null;
  }
}

/**
 * Ask a task to stop and signal its process group, then do the same for its
 * own kill-on-parent-complete descendants.
 */
export function forceStop(task: RuntimeTask): void {
  task.stop.request();
  for (const child of task.children) {
    if (child.spec.killOnParentComplete) forceStop(child);
  }
}

/**
 * Wait for a child run. Watchers get `graceMs` after being stopped; one that
 * is still alive after that gets SIGKILL and is left behind. Other children
 * are awaited to completion.
 */
async function joinChild(child: RuntimeTask, done: Promise<TaskResult>, graceMs: number): Promise<void> {
  if (!child.spec.killOnParentComplete) {
    await done;
    return;
  }

  const timer = new StopToken();
  const winner = await Promise.race([
    done.then(() => "done" as const),
    sleep(graceMs, timer).then(() => "timeout" as const),
  ]);
  timer.request();

  if (winner === "timeout") {
    const proc = child.process;
    const killed = proc ? signalGroup(proc, "SIGKILL") : false;
    log.warn(`"${child.name}" did not stop within ${graceMs}ms`, { killed });
  }
}
