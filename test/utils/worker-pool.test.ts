import { describe, expect, it } from "vitest";
import { JobCancelledError, WorkerPool } from "../../src/utils/worker-pool.js";

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe("WorkerPool", () => {
  it("never runs more jobs than its size", async () => {
    const pool = new WorkerPool(2);
    let active = 0;
    let peak = 0;

    const jobs = Array.from({ length: 5 }, (_, i) =>
      pool.submit(async () => {
        active++;
        peak = Math.max(peak, active);
        await delay(20);
        active--;
        return i;
      }),
    );

    expect(await Promise.all(jobs)).toEqual([0, 1, 2, 3, 4]);
    expect(peak).toBe(2);
    expect(pool.getStats()).toEqual({ started: 5, completed: 5, cancelled: 0 });
  });

  it("starts queued jobs in submission order", async () => {
    const pool = new WorkerPool(1);
    const order: string[] = [];
    await Promise.all(
      ["a", "b", "c"].map((name) =>
        pool.submit(async () => {
          order.push(name);
        }),
      ),
    );
    expect(order).toEqual(["a", "b", "c"]);
  });

  it("cancels queued jobs but lets running ones finish", async () => {
    const pool = new WorkerPool(1);
    const running = pool.submit(async () => {
      await delay(30);
      return "finished";
    });
    const queued = pool.submit(async () => "never");

    expect(pool.running).toBe(1);
    expect(pool.pending).toBe(1);
    expect(pool.cancelPending()).toBe(1);

    await expect(queued).rejects.toBeInstanceOf(JobCancelledError);
    await expect(running).resolves.toBe("finished");
    expect(pool.getStats().cancelled).toBe(1);
  });

  it("propagates job errors, including synchronous throws", async () => {
    const pool = new WorkerPool(1);
    await expect(
      pool.submit(() => {
        throw new Error("sync boom");
      }),
    ).rejects.toThrow("sync boom");
    await expect(pool.submit(async () => "next")).resolves.toBe("next");
  });

  it("rejects a non-positive size", () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
  });
});
