/**
 * Tests for per-key mutual exclusion.
 */

import { describe, it, expect } from "vitest";
import { KeyedMutex } from "../src/keyed-mutex.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("KeyedMutex", () => {
  it("runs holders of the same key one at a time, in order", async () => {
    const mutex = new KeyedMutex<string>();
    const log: string[] = [];

    const run = (label: string, delayMs: number) =>
      mutex.runExclusive("a", async () => {
        log.push(`${label}:start`);
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        log.push(`${label}:end`);
      });

    await Promise.all([run("first", 10), run("second", 0), run("third", 0)]);

    expect(log).toEqual([
      "first:start",
      "first:end",
      "second:start",
      "second:end",
      "third:start",
      "third:end",
    ]);
  });

  it("does not block different keys", async () => {
    const mutex = new KeyedMutex<number>();
    const releaseA = await mutex.acquire(1);

    let acquiredB = false;
    const pending = mutex.acquire(2).then((release) => {
      acquiredB = true;
      release();
    });
    await pending;

    expect(acquiredB).toBe(true);
    releaseA();
  });

  it("makes waiters wait for release", async () => {
    const mutex = new KeyedMutex<string>();
    const release = await mutex.acquire("k");

    let acquired = false;
    const waiter = mutex.acquire("k").then((next) => {
      acquired = true;
      next();
    });

    await tick();
    expect(acquired).toBe(false);

    release();
    await waiter;
    expect(acquired).toBe(true);
  });

  it("forgets idle keys", async () => {
    const mutex = new KeyedMutex<string>();
    const release = await mutex.acquire("k");
    expect(mutex.isLocked("k")).toBe(true);
    expect(mutex.size).toBe(1);

    release();
    release();
    expect(mutex.isLocked("k")).toBe(false);
    expect(mutex.size).toBe(0);
  });

  it("releases when the holder throws", async () => {
    const mutex = new KeyedMutex<string>();
    await expect(
      mutex.runExclusive("k", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive("k", () => 42)).resolves.toBe(42);
    expect(mutex.size).toBe(0);
  });
});
