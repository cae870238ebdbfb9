/**
 * Event channel tests.
 *
 * Run: node --import tsx --test src/pipeline/event-channel.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { createSilentLogger } from "../logging/index.js";
import { EventType, type PipelineEvent } from "../types/index.js";
import { UpstreamFailedError, UpstreamTimeoutError } from "./errors.js";
import { createEvent, EventChannel } from "./event-channel.js";

function channel(): EventChannel {
  return new EventChannel(createSilentLogger());
}

describe("EventChannel publish", () => {
  it("keeps history in publish order with sequence numbers", () => {
    const events = channel();
    events.emit(EventType.StageStarted, "analysis");
    events.emit(EventType.AnalysisComplete, "analysis");
    events.emit(EventType.StageCompleted, "analysis");

    const history = events.history();
    assert.deepEqual(
      history.map((event) => [event.type, event.sequence]),
      [
        [EventType.StageStarted, 1],
        [EventType.AnalysisComplete, 2],
        [EventType.StageCompleted, 3],
      ]
    );
    assert.equal(events.size, 3);
  });

  it("filters history by type", () => {
    const events = channel();
    events.emit(EventType.StageStarted, "analysis");
    events.emit(EventType.StageStarted, "infrastructure");
    events.emit(EventType.InfraReady, "infrastructure");
    assert.deepEqual(
      events.history(EventType.StageStarted).map((event) => event.sourceStage),
      ["analysis", "infrastructure"]
    );
  });

  it("delivers to handlers in registration order before publish returns", () => {
    const events = channel();
    const calls: string[] = [];
    events.subscribe(EventType.InfraReady, () => calls.push("first"));
    events.subscribe(EventType.InfraReady, () => calls.push("second"));

    events.emit(EventType.InfraReady, "infrastructure");
    assert.deepEqual(calls, ["first", "second"]);
  });

  it("keeps delivering after a handler throws", () => {
    const events = channel();
    const calls: string[] = [];
    events.subscribe(EventType.Error, () => {
      throw new Error("handler broke");
    });
    events.subscribe(EventType.Error, () => calls.push("after"));

    const stored = events.emit(EventType.Error, "orchestrator");
    assert.ok(stored);
    assert.deepEqual(calls, ["after"]);
    assert.equal(events.size, 1);
  });

  it("ignores an event id it has already published", () => {
    const events = channel();
    const event = createEvent(EventType.DbMigrated, "database");
    assert.ok(events.publish(event));
    assert.equal(events.publish(event), undefined);
    assert.equal(events.size, 1);
  });

  it("stops delivering after unsubscribe", () => {
    const events = channel();
    let count = 0;
    const off = events.subscribe(EventType.StageFailed, () => count++);
    events.emit(EventType.StageFailed, "database");
    off();
    events.emit(EventType.StageFailed, "database");
    assert.equal(count, 1);
  });

  it("freezes stored events", () => {
    const events = channel();
    const stored = events.emit(EventType.InfraReady, "infrastructure", { region: "us-central1" });
    assert.ok(stored);
    assert.equal(Object.isFrozen(stored), true);
    assert.equal(Object.isFrozen(stored.payload), true);
  });
});

describe("EventChannel latest", () => {
  it("returns the most recent event of a type", () => {
    const events = channel();
    events.emit(EventType.InfraReady, "infrastructure", { projectId: "first-project" });
    events.emit(EventType.InfraReady, "infrastructure", { projectId: "second-project" });
    assert.equal(events.latest(EventType.InfraReady)?.payload.projectId, "second-project");
  });

  it("applies the predicate", () => {
    const events = channel();
    events.emit(EventType.StageFailed, "database");
    events.emit(EventType.StageFailed, "backend");
    const found = events.latest(
      EventType.StageFailed,
      (event: PipelineEvent) => event.sourceStage === "database"
    );
    assert.equal(found?.sequence, 1);
  });

  it("returns undefined when nothing matches", () => {
    assert.equal(channel().latest(EventType.BackendDeployed), undefined);
  });
});

describe("EventChannel waitFor", () => {
  it("returns immediately when the event is already in history", async () => {
    const events = channel();
    events.emit(EventType.BackendDeployed, "backend", { serviceUrl: "https://api.example.test" });
    const found = await events.waitFor(EventType.BackendDeployed, {
      timeoutMs: 10,
      pollIntervalMs: 5,
    });
    assert.equal(found.payload.serviceUrl, "https://api.example.test");
  });

  it("picks up an event published while waiting", async () => {
    const events = channel();
    setTimeout(() => events.emit(EventType.BackendDeployed, "backend"), 20);
    const found = await events.waitFor(EventType.BackendDeployed, {
      timeoutMs: 1000,
      pollIntervalMs: 5,
    });
    assert.equal(found.sourceStage, "backend");
  });

  it("times out with the event type and bound in the message", async () => {
    const events = channel();
    await assert.rejects(
      events.waitFor(EventType.BackendDeployed, { timeoutMs: 30, pollIntervalMs: 10 }),
      (err: unknown) =>
        err instanceof UpstreamTimeoutError &&
        err.message === 'Timed out after 30ms waiting for "backend-deployed" event'
    );
  });

  it("gives up when the awaited stage fails", async () => {
    const events = channel();
    setTimeout(
      () => events.emit(EventType.StageFailed, "backend", { error: "docker push failed" }),
      10
    );
    await assert.rejects(
      events.waitFor(EventType.BackendDeployed, {
        timeoutMs: 1000,
        pollIntervalMs: 5,
        failWhen: (event) => event.sourceStage === "backend",
      }),
      (err: unknown) =>
        err instanceof UpstreamFailedError &&
        err.upstream === "backend" &&
        err.message ===
          'Upstream stage "backend" failed before publishing "backend-deployed": docker push failed'
    );
  });

  it("ignores failures the predicate does not match", async () => {
    const events = channel();
    events.emit(EventType.StageFailed, "database", { error: "quota" });
    setTimeout(() => events.emit(EventType.BackendDeployed, "backend"), 10);
    const found = await events.waitFor(EventType.BackendDeployed, {
      timeoutMs: 1000,
      pollIntervalMs: 5,
      failWhen: (event) => event.sourceStage === "backend",
    });
    assert.equal(found.type, EventType.BackendDeployed);
  });
});
