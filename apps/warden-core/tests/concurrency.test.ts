import { ReadWriteLock, SingleShot } from "@warden-core/src/concurrency";
import { describe, expect, test } from "vitest";

const settle = () => new Promise((resolve) => setTimeout(resolve, 10));

describe("ReadWriteLock", () => {
  test("readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const releaseA = await lock.acquireRead();
    const releaseB = await lock.acquireRead();
    expect(lock.readers).toBe(2);
    expect(lock.isWriteLocked).toBe(false);

    releaseA();
    releaseB();
    expect(lock.readers).toBe(0);
  });

  test("writer waits for active readers", async () => {
    const lock = new ReadWriteLock();
    const releaseRead = await lock.acquireRead();

    let writerGranted = false;
    const writer = lock.acquireWrite().then((release) => {
      writerGranted = true;
      return release;
    });

    await settle();
    expect(writerGranted).toBe(false);
    expect(lock.pendingCount).toBe(1);

    releaseRead();
    const releaseWrite = await writer;
    expect(writerGranted).toBe(true);
    expect(lock.isWriteLocked).toBe(true);
    releaseWrite();
    expect(lock.isWriteLocked).toBe(false);
  });

  test("a queued writer is not overtaken by later readers", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const releaseFirst = await lock.acquireRead();

    const writer = lock.withWrite(() => {
      order.push("write");
    });
    const reader = lock.withRead(() => {
      order.push("read");
    });

    await settle();
    expect(order).toEqual([]);

    releaseFirst();
    await Promise.all([writer, reader]);
    expect(order).toEqual(["write", "read"]);
  });

  test("consecutive queued readers are granted together", async () => {
    const lock = new ReadWriteLock();
    const releaseWrite = await lock.acquireWrite();

    const readerA = lock.acquireRead();
    const readerB = lock.acquireRead();
    await settle();
    expect(lock.readers).toBe(0);

    releaseWrite();
    const [releaseA, releaseB] = await Promise.all([readerA, readerB]);
    expect(lock.readers).toBe(2);
    releaseA();
    releaseB();
  });

  test("releasing twice has no further effect", async () => {
    const lock = new ReadWriteLock();
    const releaseA = await lock.acquireRead();
    const releaseB = await lock.acquireRead();

    releaseA();
    releaseA();
    expect(lock.readers).toBe(1);
    releaseB();
  });

  test("withWrite releases the lock when the callback throws", async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.withWrite(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(lock.isWriteLocked).toBe(false);
    await expect(lock.withRead(() => 7)).resolves.toBe(7);
  });
});

describe("SingleShot", () => {
  test("runs only the first task it is given", async () => {
    const shot = new SingleShot("test");
    let runs = 0;
    const run = async () => {
      runs += 1;
    };

    expect(shot.start(run)).toBe(true);
    expect(shot.start(run)).toBe(false);
    expect(shot.start(run)).toBe(false);
    await shot.whenSettled();

    expect(runs).toBe(1);
    expect(shot.started).toBe(true);
    expect(shot.start(run)).toBe(false);
  });

  test("a failing task settles without rejecting", async () => {
    const shot = new SingleShot("failing");
    shot.start(async () => {
      throw new Error("task exploded");
    });
    await expect(shot.whenSettled()).resolves.toBeUndefined();
  });

  test("whenSettled resolves immediately when never started", async () => {
    const shot = new SingleShot("idle");
    expect(shot.started).toBe(false);
    await expect(shot.whenSettled()).resolves.toBeUndefined();
  });
});
