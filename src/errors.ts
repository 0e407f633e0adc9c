import type { TaskResult } from "./planner/types.js";

export type ErrorCode =
  | "TASK_FAILED"
  | "VALIDATION_ERROR"
  | "PARSE_ERROR"
  | "CONFIG_ERROR";

/** Base class for every error the engine raises on purpose. */
export class TaskTreeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised by the scheduler when the failure policy says to stop. */
export class SubtaskError extends TaskTreeError {
  readonly taskName: string;
  readonly exitCode: number;
  /** Error message or output tail of the failing task. */
  readonly output: string;
  /** Results of every task that finished before the run was aborted. */
  readonly results: readonly TaskResult[];

  constructor(taskName: string, exitCode: number, output: string, results: readonly TaskResult[] = []) {
    super("TASK_FAILED", `Task '${taskName}' failed with exit code ${exitCode}`);
    this.taskName = taskName;
    this.exitCode = exitCode;
    this.output = output;
    this.results = results;
  }
}

export class ValidationError extends TaskTreeError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

export class ParseError extends TaskTreeError {
  constructor(message: string) {
    super("PARSE_ERROR", message);
  }
}

export class ConfigError extends TaskTreeError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}
