import { homedir } from "node:os";
import { join } from "node:path";

export type RunConfig = {
  /** Parallelism bound for a single depth batch. */
  maxWorkers: number;
  /** Recent output lines shown under a running task. */
  outputLines: number;
  /** Tail of the full output shown under a failed task. */
  errorLines: number;
  failFast: boolean;
  raiseOnFailure: boolean;
};

export type TaskTreeConfig = {
  run: RunConfig;
  timing: {
    /** Pause between relaunches of a retrying command. */
    retryDelayMs: number;
    /** Display refresh cadence while a batch is in flight. */
    refreshIntervalMs: number;
    /** How long a force-stopped watcher gets before SIGKILL. */
    stopGraceMs: number;
  };
  history: {
    enabled: boolean;
    dbPath: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: TaskTreeConfig = {
  run: {
    maxWorkers: 4,
    outputLines: 3,
    errorLines: 20,
    failFast: false,
    raiseOnFailure: true,
  },
  timing: {
    retryDelayMs: 500,
    refreshIntervalMs: 100,
    stopGraceMs: 1_000,
  },
  history: {
    enabled: true,
    dbPath: join(homedir(), ".tasktree", "runs.db"),
  },
};

let current: TaskTreeConfig = structuredClone(DEFAULTS);

/** Shallow-merge one section, ignoring keys explicitly set to undefined. */
export function mergeSection<T extends object>(base: T, overrides?: Partial<T>): T {
  const result = { ...base };
  if (!overrides) return result;
  for (const key of Object.keys(overrides) as (keyof T)[]) {
    const val = overrides[key];
    if (val !== undefined) result[key] = val;
  }
  return result;
}

/** Override config values. Merges section by section with defaults. */
export function configure(overrides: DeepPartial<TaskTreeConfig>): void {
  current = {
    run: mergeSection(DEFAULTS.run, overrides.run),
    timing: mergeSection(DEFAULTS.timing, overrides.timing),
    history: mergeSection(DEFAULTS.history, overrides.history),
  };
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<TaskTreeConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<TaskTreeConfig> = Object.freeze(structuredClone(DEFAULTS));
