import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { ParseError } from "../errors.js";
import type { TaskResult } from "../planner/types.js";
import { parseOrThrow, TaskResultListSchema } from "../schemas.js";

export type RunRecord = {
  runId: string;
  startedAt: number;
  finishedAt: number;
  ok: boolean;
  error?: string;
  results: TaskResult[];
};

type RunRow = {
  run_id: string;
  started_at: number;
  finished_at: number;
  ok: number;
  error: string | null;
  results: string;
};

/** Run history in SQLite. Pass ":memory:" for a throwaway store. */
export class RunStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().history.dbPath;
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    if (path !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL,
        ok          INTEGER NOT NULL,
        error       TEXT,
        results     TEXT NOT NULL DEFAULT '[]'
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(run: RunRecord): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (run_id, started_at, finished_at, ok, error, results)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      run.runId,
      run.startedAt,
      run.finishedAt,
      run.ok ? 1 : 0,
      run.error ?? null,
      JSON.stringify(run.results),
    );
  }

  get(runId: string): RunRecord | undefined {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row ? rowToRecord(row) : undefined;
  }

  /** Most recent runs first. */
  list(limit = 20): RunRecord[] {
    const rows = this.db
      .prepare<[number], RunRow>("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit);
    return rows.map(rowToRecord);
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete all runs. Returns count of deleted runs. */
  deleteAll(): number {
    const result = this.db.prepare("DELETE FROM runs").run();
    return result.changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToRecord(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    ok: row.ok === 1,
    error: row.error ?? undefined,
    results: parseResults(row),
  };
}

function parseResults(row: RunRow): TaskResult[] {
  const label = `results of run ${row.run_id}`;
  let data: unknown;
  try {
    data = JSON.parse(row.results);
  } catch (err) {
    throw new ParseError(`Could not parse ${label}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseOrThrow(TaskResultListSchema, data, label, (message) => new ParseError(message));
}
