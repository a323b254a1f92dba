import {
  createErr,
  createOk,
  isOk,
  type Result,
  unwrapOk,
} from "option-t/plain_result";
import { describe, expect, it } from "vitest";
import { RequestScheduler } from "../src/scheduler/request-scheduler.ts";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Request Scheduler", () => {
  it("runs one task at a time in submission order", async () => {
    const scheduler = new RequestScheduler();
    const log: string[] = [];
    const first = deferred<Result<number, Error>>();

    const a = scheduler.schedule(async () => {
      log.push("a start");
      const r = await first.promise;
      log.push("a end");
      return r;
    });
    const b = scheduler.schedule(async () => {
      log.push("b");
      return createOk(2);
    });

    await Promise.resolve();
    expect(log).toEqual(["a start"]);
    expect(scheduler.getStats().queueLength).toBe(1);
    expect(scheduler.getStats().activeRequests).toBe(1);

    first.resolve(createOk(1));
    expect(unwrapOk(await a)).toBe(1);
    expect(unwrapOk(await b)).toBe(2);
    expect(log).toEqual(["a start", "a end", "b"]);
  });

  it("counts successes and failures", async () => {
    const scheduler = new RequestScheduler();
    await scheduler.schedule(async () => createOk(1));
    await scheduler.schedule(async () => createErr(new Error("no")));
    const stats = scheduler.getStats();
    expect(stats.totalRequests).toBe(2);
    expect(stats.successfulRequests).toBe(1);
    expect(stats.failedRequests).toBe(1);
  });

  it("settles stats before each caller resumes", async () => {
    const scheduler = new RequestScheduler();
    await scheduler.schedule(async () => createOk(1));
    expect(scheduler.getStats().successfulRequests).toBe(1);

    await expect(
      scheduler.schedule(async () => {
        throw new Error("exploded");
      }),
    ).rejects.toThrow("exploded");
    expect(scheduler.getStats().failedRequests).toBe(1);
  });

  it("rejects when a task throws and keeps going", async () => {
    const scheduler = new RequestScheduler();
    const failing = scheduler.schedule(async () => {
      throw new Error("exploded");
    });
    const next = scheduler.schedule(async () => createOk("fine"));
    await expect(failing).rejects.toThrow("exploded");
    expect(isOk(await next)).toBe(true);
  });

  it("stop rejects queued tasks and refuses new ones", async () => {
    const scheduler = new RequestScheduler();
    const gate = deferred<Result<number, Error>>();
    const active = scheduler.schedule(() => gate.promise);
    const queued = scheduler.schedule(async () => createOk(2));
    expect(scheduler.getQueueContents().map((r) => r.id)).toEqual([2]);

    scheduler.stop(new Error("closing"));
    expect(scheduler.isRunning()).toBe(false);
    await expect(queued).rejects.toThrow("closing");
    await expect(
      scheduler.schedule(async () => createOk(3)),
    ).rejects.toThrow("Scheduler stopped");

    gate.resolve(createOk(1));
    expect(unwrapOk(await active)).toBe(1);
  });
});
