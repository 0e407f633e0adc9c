import { stripVTControlCharacters } from "node:util";
import { afterEach, describe, expect, it } from "vitest";
import { configure, resetConfig } from "../src/config.js";
import { ConfigError, SubtaskError } from "../src/errors.js";
import { RunStore } from "../src/persistence/store.js";
import { newTask } from "../src/planner/task-spec.js";
import { resolveRunConfig, run } from "../src/run.js";

class CaptureStream {
  chunks: string[] = [];
  isTTY = false;
  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

afterEach(() => {
  resetConfig();
});

describe("resolveRunConfig", () => {
  it("lays overrides over the configured defaults", () => {
    configure({ run: { errorLines: 5 } });
    expect(resolveRunConfig({ maxWorkers: 2 })).toEqual({
      maxWorkers: 2,
      outputLines: 3,
      errorLines: 5,
      failFast: false,
      raiseOnFailure: true,
    });
  });

  it("rejects invalid overrides with a ConfigError", () => {
    expect(() => resolveRunConfig({ maxWorkers: 0 })).toThrow(ConfigError);
    expect(() => resolveRunConfig({ outputLines: 1.5 })).toThrow(/^Invalid run config: outputLines: /);
  });
});

describe("run", () => {
  it("returns one result per task, in batch order", async () => {
    const build = newTask("build", "echo built");
    build.then("test", "echo tested");
    const lint = newTask("lint", () => {});

    const results = await run([build, lint], undefined, { display: false });

    expect(results.map((r) => [r.name, r.ok, r.stdout])).toEqual([
      ["build", true, "built"],
      ["lint", true, ""],
      ["test", true, "tested"],
    ]);
  });

  it("rejects bad config before running anything", async () => {
    let ran = false;
    const spec = newTask("never", () => {
      ran = true;
    });

    await expect(run([spec], { maxWorkers: 0 }, { display: false })).rejects.toBeInstanceOf(ConfigError);
    expect(ran).toBe(false);
  });

  it("writes the final tree to a non-interactive stream", async () => {
    const stream = new CaptureStream();

    await run([newTask("hello", "echo hi")], undefined, { stream });

    expect(stream.chunks).toHaveLength(1);
    expect(stripVTControlCharacters(stream.chunks[0])).toMatch(/^✓ hello \(\d+\.\ds\)\n$/);
  });

  it("uses a custom display factory", async () => {
    const closed: string[][] = [];

    await run([newTask("a", "true"), newTask("b", "true")], undefined, {
      display: (tasks) => ({
        refresh() {},
        close() {
          closed.push(tasks.map((t) => t.name));
        },
      }),
    });

    expect(closed).toEqual([["a", "b"]]);
  });

  it("records successful and failed runs in the store", async () => {
    const store = new RunStore(":memory:");
    try {
      await run([newTask("fine", "true")], undefined, { display: false, store });
      const failure = await run([newTask("bad", "exit 1")], undefined, { display: false, store }).catch(
        (e: unknown) => e,
      );
      expect(failure).toBeInstanceOf(SubtaskError);

      const runs = store.list();
      expect(runs).toHaveLength(2);
      const bad = runs.find((r) => !r.ok);
      expect(bad?.error).toBe("Task 'bad' failed with exit code 1");
      expect(bad?.results.map((r) => [r.name, r.exitCode])).toEqual([["bad", 1]]);
      expect(runs.find((r) => r.ok)?.results.map((r) => r.name)).toEqual(["fine"]);
    } finally {
      store.close();
    }
  });

  it("returns partial results without throwing when raising is off", async () => {
    const a = newTask("a", "exit 3");
    a.then("a2", "true");

    const results = await run([a], { raiseOnFailure: false }, { display: false });

    expect(results.map((r) => [r.name, r.exitCode])).toEqual([["a", 3]]);
  });
});
