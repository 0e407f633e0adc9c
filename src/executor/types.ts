import type { TaskResult } from "../planner/types.js";
import type { RuntimeTask } from "./runtime-task.js";

/** Observer of one depth batch while it runs. */
export interface BatchDisplay {
  /** Redraw the current state. Called on every completion and every refresh tick. */
  refresh(): void;
  /** Draw the final frame and release the output. */
  close(): void;
}

export type DisplayFactory = (tasks: readonly RuntimeTask[]) => BatchDisplay;

export type ExecutionOptions = {
  display?: DisplayFactory;
  onBatchStart?: (depth: number, taskNames: string[]) => void;
  onTaskStart?: (task: RuntimeTask) => void;
  onTaskEnd?: (task: RuntimeTask, result: TaskResult) => void;
};

export type BatchOutcome = {
  /** Results of the tasks that ran, in input order. */
  results: TaskResult[];
  /** Set when fail-fast stopped the batch early. */
  failure?: TaskResult;
  /** Tasks that never started because of fail-fast. */
  cancelled: string[];
};
