import { describe, it, expect } from "vitest";
import { BucketLock } from "../src/server/bucket-lock.js";

describe("BucketLock", () => {
  it("should run same-key tasks one at a time and leave other keys alone", async () => {
    const lock = new BucketLock();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;

    const first = lock.run("alpha", async () => {
      order.push("first:start");
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      order.push("first:end");
      return 1;
    });
    const second = lock.run("alpha", async () => {
      order.push("second");
      return 2;
    });
    const other = lock.run("beta", async () => {
      order.push("other");
      return 3;
    });

    await expect(other).resolves.toBe(3);
    expect(order).toEqual(["first:start", "other"]);

    releaseFirst();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(order).toEqual(["first:start", "other", "first:end", "second"]);
    expect(lock.pendingKeys).toBe(0);
  });

  it("should release the key when a task fails", async () => {
    const lock = new BucketLock();

    await expect(
      lock.run("alpha", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.run("alpha", async () => "next")).resolves.toBe("next");
    expect(lock.pendingKeys).toBe(0);
  });
});
