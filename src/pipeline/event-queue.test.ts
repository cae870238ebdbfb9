/**
 * Outbox queue tests.
 *
 * Run: node --import tsx --test src/pipeline/event-queue.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { PipelineError } from "./errors.js";
import { EventQueue } from "./event-queue.js";

function noErrors(err: unknown): void {
  throw err;
}

describe("EventQueue", () => {
  it("delivers items pushed before the consumer starts", async () => {
    const queue = new EventQueue<number>(noErrors);
    queue.push(1);
    queue.push(2);
    assert.equal(queue.pending, 2);

    const seen: number[] = [];
    const draining = queue.consume((item) => {
      seen.push(item);
    });
    await queue.close();
    await draining;
    assert.deepEqual(seen, [1, 2]);
  });

  it("delivers in push order across async handlers", async () => {
    const queue = new EventQueue<string>(noErrors);
    const seen: string[] = [];
    const draining = queue.consume(async (item) => {
      await new Promise((resolve) => setTimeout(resolve, item === "slow" ? 15 : 1));
      seen.push(item);
    });

    queue.push("slow");
    queue.push("fast");
    await new Promise((resolve) => setTimeout(resolve, 5));
    queue.push("late");
    await queue.close();
    await draining;
    assert.deepEqual(seen, ["slow", "fast", "late"]);
  });

  it("close waits until everything pushed is delivered", async () => {
    const queue = new EventQueue<number>(noErrors);
    let delivered = 0;
    const draining = queue.consume(async () => {
      await new Promise((resolve) => setTimeout(resolve, 2));
      delivered++;
    });
    for (let i = 0; i < 5; i++) queue.push(i);
    await queue.close();
    assert.equal(delivered, 5);
    assert.equal(queue.pending, 0);
    await draining;
  });

  it("reports a failing handler and keeps draining", async () => {
    const failures: Array<[string, number]> = [];
    const queue = new EventQueue<number>((err, item) => {
      failures.push([err instanceof Error ? err.message : String(err), item]);
    });
    const seen: number[] = [];
    const draining = queue.consume((item) => {
      if (item === 2) throw new Error("bad item");
      seen.push(item);
    });
    queue.push(1);
    queue.push(2);
    queue.push(3);
    await queue.close();
    await draining;
    assert.deepEqual(seen, [1, 3]);
    assert.deepEqual(failures, [["bad item", 2]]);
  });

  it("rejects pushes after close", async () => {
    const queue = new EventQueue<number>(noErrors);
    await queue.close();
    assert.equal(queue.isClosed, true);
    assert.throws(() => queue.push(1), PipelineError);
  });

  it("allows a single consumer", () => {
    const queue = new EventQueue<number>(noErrors);
    const draining = queue.consume(() => undefined);
    assert.throws(() => queue.consume(() => undefined), PipelineError);
    return queue.close().then(() => draining);
  });
});
