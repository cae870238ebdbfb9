/**
 * Retry wrapper tests.
 *
 * Run: node --import tsx --test src/pipeline/retry.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import type { Logger } from "../logging/index.js";
import { MissingUpstreamError, NonRetryableError } from "./errors.js";
import { backoffDelay, isRetryableError, withRetry } from "./retry.js";

interface LogEntry {
  level: string;
  message: string;
  context?: Record<string, unknown>;
}

function recordingLogger(entries: LogEntry[]): Logger {
  const logger: Logger = {
    debug: (message, context) => entries.push({ level: "debug", message, context }),
    info: (message, context) => entries.push({ level: "info", message, context }),
    warn: (message, context) => entries.push({ level: "warn", message, context }),
    error: (message, context) => entries.push({ level: "error", message, context }),
    child: () => logger,
  };
  return logger;
}

function flaky(failures: number, error: () => Error = () => new Error("transient")) {
  let calls = 0;
  const fn = async (value: string): Promise<string> => {
    calls++;
    if (calls <= failures) throw error();
    return `${value}:${calls}`;
  };
  return { fn, calls: () => calls };
}

describe("backoffDelay", () => {
  it("doubles from the base delay", () => {
    assert.deepEqual(
      [1, 2, 3].map((attempt) => backoffDelay(attempt, 100)),
      [200, 400, 800]
    );
  });

  it("caps at the maximum", () => {
    assert.equal(backoffDelay(10, 1000, 5000), 5000);
  });
});

describe("isRetryableError", () => {
  it("treats everything but NonRetryableError as retryable", () => {
    assert.equal(isRetryableError(new Error("x")), true);
    assert.equal(isRetryableError("text"), true);
    assert.equal(isRetryableError(new NonRetryableError("x")), false);
    assert.equal(isRetryableError(new MissingUpstreamError("analysis")), false);
  });
});

describe("withRetry", () => {
  it("returns the first success", async () => {
    const { fn, calls } = flaky(0);
    const wrapped = withRetry(fn, { maxAttempts: 3, baseDelayMs: 0, sleep: async () => {} });
    assert.equal(await wrapped("ok"), "ok:1");
    assert.equal(calls(), 1);
  });

  it("retries thrown errors with exponential waits", async () => {
    const { fn, calls } = flaky(2);
    const waits: number[] = [];
    const wrapped = withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 10,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });
    assert.equal(await wrapped("ok"), "ok:3");
    assert.equal(calls(), 3);
    assert.deepEqual(waits, [20, 40]);
  });

  it("rethrows the last error after the final attempt", async () => {
    let calls = 0;
    const wrapped = withRetry(
      async () => {
        calls++;
        throw new Error(`attempt ${calls}`);
      },
      { maxAttempts: 2, baseDelayMs: 0, sleep: async () => {} }
    );
    await assert.rejects(wrapped(), { message: "attempt 2" });
    assert.equal(calls, 2);
  });

  it("does not retry a NonRetryableError", async () => {
    const { fn, calls } = flaky(5, () => new NonRetryableError("bad input"));
    const wrapped = withRetry(fn, { maxAttempts: 5, baseDelayMs: 0, sleep: async () => {} });
    await assert.rejects(wrapped("x"), NonRetryableError);
    assert.equal(calls(), 1);
  });

  it("returns a resolved value without retrying, whatever it says", async () => {
    let calls = 0;
    const wrapped = withRetry(
      async () => {
        calls++;
        return { kind: "failed" as const };
      },
      { maxAttempts: 3, baseDelayMs: 0, sleep: async () => {} }
    );
    assert.deepEqual(await wrapped(), { kind: "failed" });
    assert.equal(calls, 1);
  });

  it("treats maxAttempts below one as a single attempt", async () => {
    const { fn, calls } = flaky(1);
    const wrapped = withRetry(fn, { maxAttempts: 0, baseDelayMs: 0, sleep: async () => {} });
    await assert.rejects(wrapped("x"), { message: "transient" });
    assert.equal(calls(), 1);
  });

  it("logs each intermediate failure under the label", async () => {
    const entries: LogEntry[] = [];
    const { fn } = flaky(1);
    const wrapped = withRetry(fn, {
      maxAttempts: 3,
      baseDelayMs: 5,
      label: "backend",
      logger: recordingLogger(entries),
      sleep: async () => {},
    });
    await wrapped("x");
    assert.deepEqual(entries, [
      {
        level: "warn",
        message: "backend attempt 1/3 failed, retrying",
        context: { error: "transient", delayMs: 10 },
      },
    ]);
  });

  it("honors a custom retry predicate", async () => {
    const { fn, calls } = flaky(3);
    const wrapped = withRetry(fn, {
      maxAttempts: 5,
      baseDelayMs: 0,
      isRetryable: () => false,
      sleep: async () => {},
    });
    await assert.rejects(wrapped("x"));
    assert.equal(calls(), 1);
  });
});
