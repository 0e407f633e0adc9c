import type { ChildProcess } from "node:child_process";
import type { TaskSpec } from "../planner/task-spec.js";
import type { TaskResult, TaskStatus } from "../planner/types.js";
import { StopToken } from "../utils/stop-token.js";

/** Fixed-capacity line buffer that keeps only the most recent lines. */
export class OutputWindow {
  private readonly capacity: number;
  private buffer: string[] = [];

  constructor(capacity: number) {
    this.capacity = Math.max(0, capacity);
  }

  push(line: string): void {
    if (this.capacity === 0) return;
    this.buffer.push(line);
    if (this.buffer.length > this.capacity) {
      this.buffer.shift();
    }
  }

  lines(): readonly string[] {
    return this.buffer;
  }

  get length(): number {
    return this.buffer.length;
  }
}

/**
 * Mutable, per-run state behind one TaskSpec. Only the executor running the
 * task writes to it; the renderer reads it while it changes. The one outside
 * write is `stop.request()` from the parent.
 */
export class RuntimeTask {
  readonly spec: TaskSpec;
  readonly window: OutputWindow;
  readonly output: string[] = [];
  readonly stop = new StopToken();
  readonly children: RuntimeTask[];

  status: TaskStatus = "pending";
  exitCode = -1;
  errorMessage = "";
  startTime = 0;
  endTime = 0;
  process: ChildProcess | null = null;

  constructor(spec: TaskSpec, outputLines: number) {
    this.spec = spec;
    this.window = new OutputWindow(outputLines);
    this.children = spec.children.map((c) => new RuntimeTask(c, outputLines));
  }

  get name(): string {
    return this.spec.name;
  }

  get isTerminal(): boolean {
    return this.status === "success" || this.status === "failed";
  }

  appendLine(line: string): void {
    this.output.push(line);
    this.window.push(line);
  }

  /** Move to a terminal state. Terminal states are absorbing. */
  finish(status: "success" | "failed", exitCode: number): void {
    if (this.isTerminal) return;
    this.status = status;
    this.exitCode = exitCode;
  }

  /** Elapsed milliseconds; measured against `now` while still running. */
  elapsedMs(now = Date.now()): number {
    if (this.startTime === 0) return 0;
    return (this.endTime || now) - this.startTime;
  }
}

/** Freeze the current state of a task tree into an immutable result. */
export function toResult(task: RuntimeTask): TaskResult {
  return Object.freeze({
    name: task.name,
    status: task.status,
    ok: task.status === "success",
    exitCode: task.exitCode,
    stdout: task.output.join("\n"),
    stderr: task.errorMessage,
    durationMs: task.endTime ? task.endTime - task.startTime : 0,
    children: Object.freeze(task.children.map(toResult)),
  });
}
