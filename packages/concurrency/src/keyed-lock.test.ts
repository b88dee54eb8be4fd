import { describe, it, expect } from "vitest";
import { KeyedLock } from "./keyed-lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs work for the same key in arrival order", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("u1", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = lock.run("u1", async () => {
      order.push("second");
    });

    expect(lock.isLocked("u1")).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.run("u1", async () => {
      await gate.promise;
      order.push("u1");
    });
    await lock.run("u2", async () => {
      order.push("u2");
    });

    expect(order).toEqual(["u2"]);
    gate.resolve();
    await slow;
    expect(order).toEqual(["u2", "u1"]);
  });

  it("keeps the queue moving after a failure", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("u1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.run("u1", async () => "next")).resolves.toBe("next");
  });

  it("releases keys once idle", async () => {
    const lock = new KeyedLock();
    await lock.run("u1", async () => undefined);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(lock.size).toBe(0);
  });

  it("runAll waits for every key it claims", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const holdB = lock.run("b", async () => {
      await gate.promise;
      order.push("b");
    });
    const both = lock.runAll(["a", "b", "a"], async () => {
      order.push("a+b");
    });

    gate.resolve();
    await Promise.all([holdB, both]);
    expect(order).toEqual(["b", "a+b"]);
  });
});
