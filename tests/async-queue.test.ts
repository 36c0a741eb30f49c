import { describe, expect, it } from "vitest";

import { AsyncQueue } from "../src/utils/async-queue.js";

describe("AsyncQueue", () => {
  it("hands items to waiting consumers in order", async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.shift();
    const second = queue.shift();

    queue.push("a");
    queue.push("b");

    await expect(first).resolves.toBe("a");
    await expect(second).resolves.toBe("b");
  });

  it("drains queued items after close, then yields null", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.close();

    expect(queue.push(2)).toBe(false);
    expect(queue.isClosed).toBe(true);
    await expect(queue.shift()).resolves.toBe(1);
    await expect(queue.shift()).resolves.toBeNull();
  });

  it("releases pending consumers on close", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.shift();

    queue.close();

    await expect(pending).resolves.toBeNull();
  });
});
