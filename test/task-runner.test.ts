import { realpathSync } from "node:fs";
import { tmpdir } from "node:os";
import { describe, expect, it } from "vitest";
import { RuntimeTask } from "../src/executor/runtime-task.js";
import { forceStop, runTask, type TaskContext } from "../src/executor/task-runner.js";
import { newTask, type TaskSpec } from "../src/planner/task-spec.js";

const ctx: TaskContext = { retryDelayMs: 20, stopGraceMs: 1_000 };

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

function start(spec: TaskSpec, outputLines = 3): RuntimeTask {
  return new RuntimeTask(spec, outputLines);
}

async function waitFor(check: () => boolean, timeoutMs = 5_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await delay(10);
  }
}

function pidIsGone(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return false;
  } catch {
    return true;
  }
}

describe("runTask: callbacks", () => {
  it("marks a returning callback as success", async () => {
    let called = 0;
    const result = await runTask(start(newTask("cb", () => {
      called++;
    })), ctx);

    expect(called).toBe(1);
    expect(result.status).toBe("success");
    expect(result.ok).toBe(true);
    expect(result.exitCode).toBe(0);
  });

  it("captures a thrown error as a failure with exit code 1", async () => {
    const result = await runTask(start(newTask("cb", () => {
      throw new Error("boom");
    })), ctx);

    expect(result.status).toBe("failed");
    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe("boom");
  });

  it("awaits an async callback and captures its rejection", async () => {
    const result = await runTask(start(newTask("cb", async () => {
      await delay(10);
      throw new Error("late boom");
    })), ctx);

    expect(result.status).toBe("failed");
    expect(result.stderr).toBe("late boom");
  });
});

describe("runTask: commands", () => {
  it("captures output line by line", async () => {
    const task = start(newTask("print", "printf 'one\\ntwo\\nthree\\nfour\\n'"));
    const result = await runTask(task, ctx);

    expect(result.status).toBe("success");
    expect(result.stdout).toBe("one\ntwo\nthree\nfour");
    expect(task.window.lines()).toEqual(["two", "three", "four"]);
  });

  it("combines stdout and stderr", async () => {
    const result = await runTask(start(newTask("both", "echo out; echo err 1>&2")), ctx);
    expect(result.stdout.split("\n").sort()).toEqual(["err", "out"]);
  });

  it("fails with the process exit code", async () => {
    const result = await runTask(start(newTask("bad", "echo nope; exit 3")), ctx);

    expect(result.status).toBe("failed");
    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe("nope");
    expect(result.stderr).toBe("");
  });

  it("maps death by signal to 128 + signal number", async () => {
    const result = await runTask(start(newTask("self-kill", "kill -TERM $$")), ctx);

    expect(result.status).toBe("failed");
    expect(result.exitCode).toBe(143);
  });

  it("merges env over the process environment", async () => {
    const result = await runTask(start(newTask("env", 'echo "$TASKTREE_TEST_VAR:$HOME"', { TASKTREE_TEST_VAR: "set" })), ctx);
    expect(result.stdout).toBe(`set:${process.env.HOME ?? ""}`);
  });

  it("runs in the requested working directory", async () => {
    const dir = realpathSync(tmpdir());
    const result = await runTask(start(newTask("where", "pwd -P", undefined, dir)), ctx);
    expect(result.stdout).toBe(dir);
  });

  it("reports a spawn failure as exit code 127", async () => {
    const result = await runTask(start(newTask("nowhere", "true", undefined, "/definitely/not/a/dir")), ctx);

    expect(result.status).toBe("failed");
    expect(result.exitCode).toBe(127);
    expect(result.stderr).toContain("ENOENT");
  });
});

describe("runTask: retrying commands", () => {
  it("reports success after being stopped, however many attempts failed", async () => {
    const task = start(newTask("flaky", "echo attempt; exit 1", undefined, undefined, { retry: true }));
    const done = runTask(task, ctx);

    await waitFor(() => task.output.length >= 3);
    forceStop(task);
    const result = await done;

    expect(result.status).toBe("success");
    expect(result.exitCode).toBe(0);
    expect(task.output.length).toBeGreaterThanOrEqual(3);
    expect(task.output.every((line) => line === "attempt")).toBe(true);
  });
});

describe("forceStop", () => {
  it("reaches flagged descendants and leaves ordinary children alone", () => {
    const watcher = newTask("watch", "sleep 30", undefined, undefined, {
      retry: true,
      killOnParentComplete: true,
    })
      .watching("tail -f app.log")
      .child(newTask("helper", "true"));
    const task = start(watcher);

    forceStop(task);

    const [nested, helper] = task.children;
    expect(task.stop.stopped).toBe(true);
    expect(nested.stop.stopped).toBe(true);
    expect(helper.stop.stopped).toBe(false);
  });
});

describe("runTask: children", () => {
  it("starts children before the parent's own action", async () => {
    let childStatus: string | undefined;
    const spec = newTask("parent", () => {
      childStatus = task.children[0].status;
    }).child(newTask("kid", "sleep 0.1"));
    const task = start(spec);

    await runTask(task, ctx);

    expect(childStatus).toBe("running");
  });

  it("awaits ordinary children and keeps their failures out of the parent status", async () => {
    const spec = newTask("parent", "true")
      .child(newTask("slow", "sleep 0.2; echo finished"))
      .child(newTask("broken", "exit 2"));

    const result = await runTask(start(spec), ctx);

    expect(result.status).toBe("success");
    expect(result.children.map((c) => [c.name, c.status, c.exitCode])).toEqual([
      ["slow", "success", 0],
      ["broken", "failed", 2],
    ]);
    expect(result.children[0].stdout).toBe("finished");
    expect(result.durationMs).toBeGreaterThanOrEqual(150);
  });

  it("stops a watcher as soon as the parent's action ends", async () => {
    const spec = newTask("parent", "sleep 0.2").watching("echo $$; sleep 30");
    const task = start(spec);
    const begin = Date.now();

    const result = await runTask(task, ctx);

    expect(Date.now() - begin).toBeLessThan(3_000);
    expect(result.status).toBe("success");
    expect(result.children[0]).toMatchObject({ status: "success", exitCode: 0 });

    const pid = Number(task.children[0].output[0]);
    expect(Number.isInteger(pid)).toBe(true);
    await waitFor(() => pidIsGone(pid), 2_000);
  });

  it("stops a watcher that is sleeping between attempts", async () => {
    const spec = newTask("parent", "sleep 0.2").watching("exit 1");
    const task = start(spec);
    const begin = Date.now();

    const result = await runTask(task, { retryDelayMs: 60_000, stopGraceMs: 1_000 });

    expect(Date.now() - begin).toBeLessThan(3_000);
    expect(result.children[0].status).toBe("success");
  });

  it("stops a watcher when the parent's callback fails", async () => {
    const spec = newTask("parent", async () => {
      await delay(50);
      throw new Error("parent broke");
    }).watching("sleep 30");

    const result = await runTask(start(spec), ctx);

    expect(result.status).toBe("failed");
    expect(result.stderr).toBe("parent broke");
    expect(result.children[0].status).toBe("success");
  });

  it("kills a watcher that ignores SIGTERM once the grace period ends", async () => {
    const spec = newTask("parent", "sleep 0.2").watching("trap '' TERM; echo $$; sleep 30");
    const task = start(spec);
    const begin = Date.now();

    await runTask(task, { retryDelayMs: 20, stopGraceMs: 300 });

    const elapsed = Date.now() - begin;
    expect(elapsed).toBeGreaterThanOrEqual(450);
    expect(elapsed).toBeLessThan(2_000);

    const pid = Number(task.children[0].output[0]);
    expect(Number.isInteger(pid)).toBe(true);
    await waitFor(() => pidIsGone(pid), 2_000);
  });

  it("stops a watcher's own watchers along with it", async () => {
    const watcher = newTask("watch", "sleep 30", undefined, undefined, {
      retry: true,
      killOnParentComplete: true,
    }).watching("echo $$; sleep 30");
    const task = start(newTask("parent", "sleep 0.2").child(watcher));
    const begin = Date.now();

    await runTask(task, ctx);

    expect(Date.now() - begin).toBeLessThan(3_000);
    const grandchild = task.children[0].children[0];
    expect(grandchild.stop.stopped).toBe(true);
    const pid = Number(grandchild.output[0]);
    expect(Number.isInteger(pid)).toBe(true);
    await waitFor(() => pidIsGone(pid), 2_000);
  });

  it("builds a result tree that mirrors a three-level spec", async () => {
    const spec = newTask("root", "true")
      .child(newTask("a", "true").child(newTask("a1", "echo a1")).child(newTask("a2", () => {})))
      .child(newTask("b", "true").child(newTask("b1", "true")));

    const result = await runTask(start(spec), ctx);

    expect(result.children.map((c) => c.name)).toEqual(["a", "b"]);
    expect(result.children[0].children.map((c) => c.name)).toEqual(["a1", "a2"]);
    expect(result.children[1].children.map((c) => c.name)).toEqual(["b1"]);
    expect(result.children[0].children[0].stdout).toBe("a1");
  });

  it("reports start and end of every task in the tree", async () => {
    const started: string[] = [];
    const ended: string[] = [];
    const spec = newTask("parent", "true").child(newTask("kid", "true"));

    await runTask(start(spec), {
      ...ctx,
      onTaskStart: (t) => started.push(t.name),
      onTaskEnd: (t) => ended.push(t.name),
    });

    expect(started).toEqual(["parent", "kid"]);
    expect(ended).toEqual(["kid", "parent"]);
  });
});
