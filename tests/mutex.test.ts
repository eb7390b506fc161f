import { describe, expect, it } from "vitest";

import { Mutex } from "../src/util/mutex.js";
import { deferred, flush } from "./fakes.js";

describe("Mutex", () => {
  it("runs tasks one at a time in call order", async () => {
    const mutex = new Mutex();
    const gate = deferred<void>();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive(async () => {
      events.push("second");
      return 2;
    });

    await flush();
    expect(events).toEqual(["first:start"]);
    expect(mutex.isLocked).toBe(true);

    gate.resolve();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("releases the lock when a task fails", async () => {
    const mutex = new Mutex();

    const failed = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(async () => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });
});
