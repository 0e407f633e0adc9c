export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let currentLevel: LogLevel = "info";

// stdout belongs to the live display; logs go to stderr.
let sink: (line: string) => void = (line) => {
  process.stderr.write(`${line}\n`);
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Redirect log lines, e.g. to capture them in tests. Returns the previous sink. */
export function setLogSink(next: (line: string) => void): (line: string) => void {
  const prev = sink;
  sink = next;
  return prev;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("debug")) sink(formatMsg("debug", msg, data));
  },
  info(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("info")) sink(formatMsg("info", msg, data));
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("warn")) sink(formatMsg("warn", msg, data));
  },
  error(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("error")) sink(formatMsg("error", msg, data));
  },
};
