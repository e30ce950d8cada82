import { describe, it, expect } from "vitest";
import { KeyedMutex } from "@fitsync/connectors";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs tasks for the same key one at a time, in order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const first = mutex.runExclusive("a", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive("a", async () => {
      events.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    expect(await first).toBe(1);
    expect(await second).toBe(2);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const events: string[] = [];

    const blocked = mutex.runExclusive("a", async () => {
      await gate.promise;
      events.push("a");
    });
    await mutex.runExclusive("b", async () => {
      events.push("b");
    });

    expect(events).toEqual(["b"]);
    gate.resolve();
    await blocked;
    expect(events).toEqual(["b", "a"]);
  });

  it("releases the lock when a task throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("a", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await mutex.runExclusive("a", async () => "next")).toBe("next");
  });
});
