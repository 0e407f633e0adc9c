/**
 * Shell command spawning with line-by-line output capture and
 * process-group signalling.
 */

import { spawn, type ChildProcess } from "node:child_process";
import { constants } from "node:os";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { log } from "../utils/logger.js";

export type CommandOptions = {
  /** Merged over process.env; these entries win. */
  env?: Readonly<Record<string, string>>;
  cwd?: string;
  /** Called for every line of combined stdout/stderr. */
  onLine: (line: string) => void;
  /** Called once the OS process exists. */
  onSpawn?: (child: ChildProcess) => void;
};

export type CommandOutcome = {
  exitCode: number;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started. */
  error?: string;
};

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/** Exit code a POSIX shell reports for a process killed by `signal`. */
export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

function pipeLines(stream: Readable | null, onLine: (line: string) => void): Promise<void> {
  if (!stream) return Promise.resolve();
  const rl = createInterface({ input: stream, crlfDelay: Infinity });
  rl.on("line", onLine);
  return new Promise((resolve) => rl.once("close", () => resolve()));
}

/**
 * Run `command` through the shell in its own process group and resolve when it
 * exits and its output is drained. Never rejects: spawn failures come back as
 * exit code 127 with `error` set.
 */
export function runCommand(command: string, opts: CommandOptions): Promise<CommandOutcome> {
  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(command, {
        shell: true,
        detached: true,
        cwd: opts.cwd,
        env: { ...process.env, ...opts.env },
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      resolve({ exitCode: 127, signal: null, error: message });
      return;
    }

    let settled = false;
    const drained = Promise.all([
      pipeLines(child.stdout, opts.onLine),
      pipeLines(child.stderr, opts.onLine),
    ]);

    child.once("error", (err) => {
      if (settled) return;
      settled = true;
      log.debug("Process error", { command, error: err.message });
      resolve({ exitCode: 127, signal: null, error: err.message });
    });

    child.once("exit", (code, signal) => {
      void drained.then(() => {
        if (settled) return;
        settled = true;
        const exitCode = code ?? (signal ? signalExitCode(signal) : 1);
        log.debug("Process exited", { command, pid: child.pid, exitCode, signal });
        resolve({ exitCode, signal });
      });
    });

    if (child.pid !== undefined) {
      opts.onSpawn?.(child);
    }
  });
}

/**
 * Send `signal` to the whole process group led by `child`. Best effort:
 * a group that is already gone is not an error. Returns whether the signal
 * was delivered.
 */
export function signalGroup(child: ChildProcess, signal: NodeJS.Signals): boolean {
  // The shell may already be gone while the rest of its group lives on.
  if (child.pid === undefined) return false;
  try {
    process.kill(-child.pid, signal);
    return true;
  } catch (err) {
    log.debug("Could not signal process group", {
      pid: child.pid,
      signal,
      error: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}
