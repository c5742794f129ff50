import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("serializes work on the same key", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();

    const first = mutex.runExclusive("sess_a", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("sess_a", async () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(mutex.isLocked("sess_a")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("sess_a")).toBe(false);
  });

  it("runs different keys concurrently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const a = mutex.runExclusive("sess_a", async () => {
      await gate.promise;
      order.push("a");
    });
    const b = mutex.runExclusive("sess_b", async () => {
      order.push("b");
    });

    await b;
    expect(order).toEqual(["b"]);
    gate.resolve();
    await a;
    expect(order).toEqual(["b", "a"]);
  });

  it("releases the lock when the holder throws", async () => {
    const mutex = new KeyedMutex();
    await expect(mutex.runExclusive("k", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.runExclusive("k", async () => 42)).resolves.toBe(42);
  });
});
