import { describe, expect, it } from "vitest";
import { KeyedMutex, ReadWriteLock } from "../src/utils/locks.js";
import { backoffDelay, runWithRetry } from "../src/utils/retry.js";
import { createDeferred } from "./helpers/fakes.js";

describe("ReadWriteLock", () => {
  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const gate = createDeferred<void>();

    const first = lock.read(() => gate.promise);
    const second = lock.read(() => "done");

    await expect(second).resolves.toBe("done");
    expect(lock.activeReaders).toBe(1);
    gate.resolve();
    await first;
    expect(lock.activeReaders).toBe(0);
  });

  it("admits waiters in arrival order so a writer is not starved", async () => {
    const lock = new ReadWriteLock();
    const gate = createDeferred<void>();
    const order: string[] = [];

    const reader = lock.read(async () => {
      await gate.promise;
      order.push("reader-1");
    });
    const writer = lock.write(() => {
      order.push("writer");
    });
    const lateReader = lock.read(() => {
      order.push("reader-2");
    });

    expect(lock.writeLocked).toBe(false);
    gate.resolve();
    await Promise.all([reader, writer, lateReader]);

    expect(order).toEqual(["reader-1", "writer", "reader-2"]);
  });

  it("releases the lock when a task throws", async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.write(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.write(() => 42)).resolves.toBe(42);
  });
});

describe("KeyedMutex", () => {
  it("runs tasks with the same key one at a time", async () => {
    const mutex = new KeyedMutex();
    const gate = createDeferred<void>();
    const order: string[] = [];

    const first = mutex.run("k", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("k", async () => {
      order.push("second");
    });

    expect(mutex.pendingKeys).toBe(1);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
  });

  it("keeps going after a failed task", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run("k", async () => {
      throw new Error("boom");
    });
    const next = mutex.run("k", async () => "next");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("next");
  });
});

describe("runWithRetry", () => {
  const policy = { maxAttempts: 4, baseDelayMs: 50, maxDelayMs: 300 };

  it("grows the delay exponentially up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(policy, attempt))).toEqual([50, 100, 200, 300, 300]);
  });

  it("reports exhaustion with the last error", async () => {
    const delays: number[] = [];
    const result = await runWithRetry(
      async (attempt) => ({ kind: "retryable", error: new Error(`attempt ${attempt}`) }),
      policy,
      { sleep: async (ms) => void delays.push(ms) },
    );

    expect(result).toMatchObject({ ok: false, reason: "exhausted", attempts: 4 });
    expect(result.ok ? null : result.error).toEqual(new Error("attempt 4"));
    expect(delays).toEqual([50, 100, 200]);
  });

  it("stops at the first fatal outcome", async () => {
    let calls = 0;
    const result = await runWithRetry(
      async () => {
        calls += 1;
        return { kind: "fatal", error: new Error("denied") };
      },
      policy,
      { sleep: async () => {} },
    );

    expect(result).toMatchObject({ ok: false, reason: "fatal", attempts: 1 });
    expect(calls).toBe(1);
  });
});
