import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { AsyncQueue } from "../../src/lib/async-queue";

async function drain<T>(queue: AsyncQueue<T>): Promise<T[]> {
  const seen: T[] = [];
  for await (const item of queue) {
    seen.push(item);
  }
  return seen;
}

describe("AsyncQueue", () => {
  it("delivers buffered items in order and ends after close", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);
    assert.equal(queue.size, 3);
    queue.close();

    assert.deepEqual(await drain(queue), [1, 2, 3]);
  });

  it("wakes a waiting consumer", async () => {
    const queue = new AsyncQueue<string>();
    const consumer = drain(queue);

    queue.push("a");
    queue.push("b");
    queue.close();

    assert.deepEqual(await consumer, ["a", "b"]);
  });

  it("rejects pushes after close", () => {
    const queue = new AsyncQueue<number>();
    queue.close();
    assert.equal(queue.isClosed, true);
    assert.throws(() => queue.push(1), /AsyncQueue is closed/);
  });

  it("close is idempotent", async () => {
    const queue = new AsyncQueue<number>();
    queue.close();
    queue.close();
    assert.deepEqual(await drain(queue), []);
  });
});
