import { describe, expect, it } from "vitest";

import { sleep } from "../test-utils/fakes.js";
import { createAsyncLock } from "./asyncLock.js";

describe("createAsyncLock", () => {
  it("runs critical sections one at a time in request order", async () => {
    const lock = createAsyncLock();
    const events: string[] = [];

    await Promise.all(
      [30, 10, 0].map((delay, i) =>
        lock(async () => {
          events.push(`start ${i}`);
          await sleep(delay);
          events.push(`end ${i}`);
        }),
      ),
    );

    expect(events).toEqual(["start 0", "end 0", "start 1", "end 1", "start 2", "end 2"]);
  });

  it("returns the section's value", async () => {
    const lock = createAsyncLock();
    await expect(lock(() => 42)).resolves.toBe(42);
    await expect(lock(async () => "done")).resolves.toBe("done");
  });

  it("releases the lock after a failing section", async () => {
    const lock = createAsyncLock();

    const failed = lock(() => {
      throw new Error("boom");
    });
    const next = lock(() => "next");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("next");
  });
});
