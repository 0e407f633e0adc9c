import chalk, { type ChalkInstance } from "chalk";
import type { RuntimeTask } from "../executor/runtime-task.js";

export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"] as const;

const TREE_BRANCH = "├── ";
const TREE_LAST = "└── ";
const TREE_PIPE = "│   ";
const TREE_SPACE = "    ";

export type RenderOptions = {
  /** Spinner frame counter; wrapped around the frame list. */
  frame: number;
  outputLines: number;
  errorLines: number;
  chalk?: ChalkInstance;
};

export function formatDuration(ms: number): string {
  return `(${(ms / 1000).toFixed(1)}s)`;
}

function tail<T>(items: readonly T[], count: number): readonly T[] {
  return count > 0 ? items.slice(-count) : [];
}

/**
 * Render a forest of runtime tasks as tree lines. Reads task state without
 * touching it, so it can run while tasks are still changing.
 */
export function renderTree(tasks: readonly RuntimeTask[], opts: RenderOptions): string[] {
  const lines: string[] = [];
  for (const task of tasks) {
    renderTask(task, lines, opts, { prefix: "", isLast: true, isRoot: true });
  }
  return lines;
}

type Placement = {
  prefix: string;
  isLast: boolean;
  isRoot: boolean;
};

function renderTask(task: RuntimeTask, lines: string[], opts: RenderOptions, at: Placement): void {
  const c = opts.chalk ?? chalk;
  const spinner = SPINNER_FRAMES[opts.frame % SPINNER_FRAMES.length];
  const hasChildren = task.children.length > 0;

  const connector = at.isRoot ? "" : c.dim(at.prefix + (at.isLast ? TREE_LAST : TREE_BRANCH));
  const duration = task.endTime ? c.dim(` ${formatDuration(task.endTime - task.startTime)}`) : "";

  switch (task.status) {
    case "running":
      lines.push(`${connector}${c.blue.bold(`${spinner} `)}${c.blue(task.name)}`);
      break;
    case "success":
      lines.push(`${connector}${c.green.bold("✓ ")}${c.green(task.name)}${duration}`);
      break;
    case "failed":
      lines.push(`${connector}${c.red.bold("✗ ")}${c.red(task.name)}${duration}`);
      break;
    default:
      lines.push(`${connector}${c.dim("○ ")}${c.dim(task.name)}`);
  }

  const childPrefix = at.isRoot ? "" : at.prefix + (at.isLast ? TREE_SPACE : TREE_PIPE);
  const outputPrefix = c.dim(childPrefix + (hasChildren ? TREE_PIPE : TREE_SPACE));

  if (task.status === "running") {
    for (const line of tail(task.window.lines(), opts.outputLines)) {
      lines.push(`${outputPrefix}${c.dim(line)}`);
    }
    task.children.forEach((child, i) => {
      renderTask(child, lines, opts, {
        prefix: childPrefix,
        isLast: i === task.children.length - 1,
        isRoot: false,
      });
    });
  } else if (task.status === "failed") {
    for (const line of tail(task.output, opts.errorLines)) {
      lines.push(`${outputPrefix}${c.red.dim(line)}`);
    }
    if (task.errorMessage) {
      lines.push(`${outputPrefix}${c.red(task.errorMessage)}`);
    }
  }
}
