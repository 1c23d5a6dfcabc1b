/**
 * Countdown Bot — tests/lib/mutex.test.ts
 * WHAT: Tests for Mutex and KeyedMutex.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { KeyedMutex, Mutex } from "../../src/lib/mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("Mutex", () => {
  it("runs callers one at a time, in arrival order", async () => {
    const lock = new Mutex();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive(() => {
      order.push("second");
    });

    await Promise.resolve();
    expect(lock.queued).toBe(2);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.queued).toBe(0);
  });

  it("releases the lock when the holder throws", async () => {
    const lock = new Mutex();
    await expect(
      lock.runExclusive(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(lock.runExclusive(() => 42)).resolves.toBe(42);
  });
});

describe("KeyedMutex", () => {
  it("serializes the same key but not different keys", async () => {
    const locks = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const a1 = locks.runExclusive("a", async () => {
      await gate.promise;
      order.push("a1");
    });
    const a2 = locks.runExclusive("a", () => {
      order.push("a2");
    });
    const b = locks.runExclusive("b", () => {
      order.push("b");
    });

    await b;
    expect(order).toEqual(["b"]);
    gate.resolve();
    await Promise.all([a1, a2]);
    expect(order).toEqual(["b", "a1", "a2"]);
  });

  it("forgets keys once nobody holds them", async () => {
    const locks = new KeyedMutex();
    await locks.runExclusive("g1", () => undefined);
    await locks.runExclusive("g2", () => undefined);
    expect(locks.size).toBe(0);
  });
});
