/**
 * In-place terminal display for one batch. On an interactive stream every
 * refresh moves the cursor back over the previous frame and redraws it; on
 * anything else only the final frame is written, once.
 */

import type { ChalkInstance } from "chalk";
import type { RuntimeTask } from "../executor/runtime-task.js";
import type { BatchDisplay, DisplayFactory } from "../executor/types.js";
import { renderTree } from "./renderer.js";
import { truncateToWidth } from "./text-width.js";

/** The part of a writable stream the display needs. */
export type DisplayStream = {
  write(chunk: string): boolean;
  isTTY?: boolean;
  /** Terminal width. Interactive frames are cut to fit it so no line wraps. */
  columns?: number;
};

export type LiveDisplayOptions = {
  stream?: DisplayStream;
  outputLines: number;
  errorLines: number;
  chalk?: ChalkInstance;
};

const CLEAR_LINE = "\x1b[K";
const CLEAR_BELOW = "\x1b[J";

export class LiveDisplay implements BatchDisplay {
  private readonly tasks: readonly RuntimeTask[];
  private readonly stream: DisplayStream;
  private readonly interactive: boolean;
  private readonly opts: LiveDisplayOptions;
  private frame = 0;
  private linesRendered = 0;
  private closed = false;

  constructor(tasks: readonly RuntimeTask[], opts: LiveDisplayOptions) {
    this.tasks = tasks;
    this.opts = opts;
    this.stream = opts.stream ?? process.stdout;
    this.interactive = this.stream.isTTY === true;
  }

  refresh(): void {
    if (this.closed || !this.interactive) return;
    this.frame++;
    this.draw(this.render());
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const lines = this.render();
    if (this.interactive) {
      this.draw(lines);
      return;
    }
    for (const line of lines) this.stream.write(`${line}\n`);
  }

  private render(): string[] {
    return renderTree(this.tasks, {
      frame: this.frame,
      outputLines: this.opts.outputLines,
      errorLines: this.opts.errorLines,
      chalk: this.opts.chalk,
    });
  }

  private draw(lines: string[]): void {
    // A wrapped line would take more rows than the cursor-up of the next frame covers.
    const width = this.stream.columns;
    const fit = width ? (line: string) => truncateToWidth(line, width - 1) : (line: string) => line;
    let out = this.linesRendered > 0 ? `\x1b[${this.linesRendered}A` : "";
    for (const line of lines) out += `${fit(line)}${CLEAR_LINE}\n`;
    out += CLEAR_BELOW;
    this.stream.write(out);
    this.linesRendered = lines.length;
  }
}

/** Factory the executor calls once per batch. */
export function liveDisplay(opts: LiveDisplayOptions): DisplayFactory {
  return (tasks) => new LiveDisplay(tasks, opts);
}
