import { describe, it, expect } from "vitest";
import { Mutex } from "./mutex.js";

describe("Mutex", () => {
  it("should run holders one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    let releaseFirst = (): void => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = mutex.withLock(async () => {
      events.push("first:start");
      await gate;
      events.push("first:end");
    });
    const second = mutex.withLock(async () => {
      events.push("second");
    });

    await Promise.resolve();
    expect(mutex.locked).toBe(true);
    expect(events).toEqual(["first:start"]);

    releaseFirst();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.locked).toBe(false);
  });

  it("should release the lock when the holder throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.withLock(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(mutex.locked).toBe(false);
    await expect(mutex.withLock(async () => 42)).resolves.toBe(42);
  });
});
