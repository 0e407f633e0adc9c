/** A zero-argument in-process action. Throwing (or rejecting) marks the task failed. */
export type TaskCallback = () => void | Promise<void>;

/** Either a shell command line or a callback. */
export type TaskAction = string | TaskCallback;

export type TaskStatus = "pending" | "running" | "success" | "failed";

export type TaskOptions = {
  /** Relaunch the command on every exit until the task is stopped. */
  retry?: boolean;
  /** Force-stop this task once its parent's own action finishes. */
  killOnParentComplete?: boolean;
};

export type TaskResult = {
  readonly name: string;
  readonly status: TaskStatus;
  readonly ok: boolean;
  readonly exitCode: number;
  /** Every captured output line, joined with newlines. */
  readonly stdout: string;
  /** Error message for callback failures and spawn errors; empty otherwise. */
  readonly stderr: string;
  readonly durationMs: number;
  readonly children: readonly TaskResult[];
};
