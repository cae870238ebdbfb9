/**
 * Scheduler tests: group ordering, concurrency inside a group, critical
 * aborts, non-critical warnings, progress events and rollback.
 *
 * Run: node --import tsx --test src/pipeline/orchestrator.test.ts
 */

import { strict as assert } from "node:assert";
import { describe, it } from "node:test";

import { createSilentLogger } from "../logging/index.js";
import { EventType, StageStatus } from "../types/index.js";
import { PipelineDefinitionError } from "./errors.js";
import { Orchestrator, validateStageGroups, type StageGroup } from "./orchestrator.js";
import { RunState } from "./run-state.js";
import { failed, succeeded, type StageDefinition } from "./stage.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function ok(name: string, extras: Partial<StageDefinition> = {}): StageDefinition {
  return { name, critical: true, execute: async () => succeeded({ name }), ...extras };
}

function broken(name: string, critical: boolean, extras: Partial<StageDefinition> = {}): StageDefinition {
  return {
    name,
    critical,
    execute: async () => {
      throw new Error(`${name} broke`);
    },
    ...extras,
  };
}

function run(groups: readonly StageGroup[], cleanupOnFailure = false) {
  const logger = createSilentLogger();
  const state = new RunState("run-1", logger);
  const orchestrator = new Orchestrator({ state, logger, cleanupOnFailure });
  return { state, outcome: orchestrator.execute(groups) };
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

describe("validateStageGroups", () => {
  it("accepts dependencies on earlier groups", () => {
    assert.doesNotThrow(() =>
      validateStageGroups([[ok("a")], [ok("b", { dependsOn: ["a"] })]])
    );
  });

  it("rejects a dependency inside the same group", () => {
    assert.throws(
      () => validateStageGroups([[ok("a"), ok("b", { dependsOn: ["a"] })]]),
      { message: 'Stage "b" depends on "a", which is not in an earlier group' }
    );
  });

  it("rejects duplicate names and empty groups", () => {
    assert.throws(() => validateStageGroups([[ok("a")], [ok("a")]]), {
      message: "Duplicate stage name: a",
    });
    assert.throws(() => validateStageGroups([[ok("a")], []]), {
      message: "Stage group 2 is empty",
    });
  });

  it("fails the run before any stage starts", async () => {
    let ran = false;
    const { state, outcome } = run([
      [
        ok("a", {
          execute: async () => {
            ran = true;
            return succeeded({});
          },
        }),
      ],
      [ok("b", { dependsOn: ["missing"] })],
    ]);
    await assert.rejects(outcome, PipelineDefinitionError);
    assert.equal(ran, false);
    assert.equal(state.events.size, 0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

describe("Orchestrator.execute", () => {
  it("runs groups in order and reports success", async () => {
    const order: string[] = [];
    const track = (name: string) =>
      ok(name, {
        execute: async () => {
          order.push(name);
          return succeeded({});
        },
      });
    const { state, outcome } = run([[track("a")], [track("b")], [track("c")]]);
    const result = await outcome;

    assert.equal(result.status, "success");
    assert.deepEqual(order, ["a", "b", "c"]);
    assert.deepEqual([...result.results.keys()], ["a", "b", "c"]);
    assert.deepEqual(result.notRun, []);
    assert.equal(result.abortedBy, undefined);
    assert.equal(state.status, "success");
  });

  it("runs the stages of one group concurrently", async () => {
    let running = 0;
    let peak = 0;
    const concurrent = (name: string) =>
      ok(name, {
        execute: async () => {
          running++;
          peak = Math.max(peak, running);
          await delay(20);
          running--;
          return succeeded({});
        },
      });
    const result = await run([[concurrent("a"), concurrent("b")]]).outcome;
    assert.equal(result.status, "success");
    assert.equal(peak, 2);
  });

  it("halts after a critical failure and lists later stages as not run", async () => {
    const { state, outcome } = run([[ok("a")], [broken("b", true)], [ok("c")], [ok("d")]]);
    const result = await outcome;

    assert.equal(result.status, "failed");
    assert.equal(result.abortedBy, "b");
    assert.deepEqual([...result.results.keys()], ["a", "b"]);
    assert.deepEqual(result.notRun, ["c", "d"]);
    assert.deepEqual(result.errors, ["b: b broke"]);
    assert.equal(state.record("c")?.status, StageStatus.Skipped);
    assert.equal(state.events.history(EventType.PipelineComplete).length, 0);
  });

  it("continues past a non-critical failure with a warning", async () => {
    const { state, outcome } = run([[ok("a")], [broken("b", false)], [ok("c")]]);
    const result = await outcome;

    assert.equal(result.status, "success");
    assert.equal(result.results.get("b")?.status, StageStatus.Failed);
    assert.equal(result.results.get("c")?.status, StageStatus.Succeeded);
    assert.deepEqual(result.warnings, ["b failed (non-critical): b broke"]);
    assert.deepEqual(result.errors, []);

    const complete = state.events.latest(EventType.PipelineComplete);
    assert.deepEqual(complete?.payload, { stages: ["a", "b", "c"], warnings: 1 });
  });

  it("prefixes stage warnings with the stage name", async () => {
    const result = await run([
      [ok("a", { execute: async () => succeeded({}, { warnings: ["slow disk"] }) })],
    ]).outcome;
    assert.deepEqual(result.warnings, ["a: slow disk"]);
  });

  it("keeps both results when one stage of a group fails", async () => {
    const result = await run([
      [
        broken("a", true),
        ok("b", {
          execute: async () => {
            await delay(10);
            return succeeded({ finished: true });
          },
        }),
      ],
      [ok("c")],
    ]).outcome;

    assert.equal(result.results.get("a")?.status, StageStatus.Failed);
    assert.equal(result.results.get("b")?.status, StageStatus.Succeeded);
    assert.deepEqual(result.notRun, ["c"]);
  });

  it("treats a failed outcome like a thrown error", async () => {
    const result = await run([
      [ok("a", { execute: async () => failed("no credentials") })],
    ]).outcome;
    assert.equal(result.status, "failed");
    assert.deepEqual(result.errors, ["a: no credentials"]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS
// ═══════════════════════════════════════════════════════════════════════════

describe("Orchestrator progress events", () => {
  it("publishes one progress update per finished stage", async () => {
    const { state, outcome } = run([[ok("a")], [ok("b")], [ok("c")]]);
    await outcome;

    const progress = state.events
      .history(EventType.ProgressUpdate)
      .map((event) => [event.payload.stage, event.payload.completed, event.payload.percentage]);
    assert.deepEqual(progress, [
      ["a", 1, 33.3],
      ["b", 2, 66.7],
      ["c", 3, 100],
    ]);
  });

  it("publishes an error event for a failed stage", async () => {
    const { state, outcome } = run([[ok("a")], [broken("b", false)]]);
    await outcome;

    const errors = state.events.history(EventType.Error);
    assert.equal(errors.length, 1);
    assert.deepEqual(errors[0].payload, { stage: "b", error: "b broke", critical: false });
    assert.equal(errors[0].sourceStage, "orchestrator");
  });

  it("publishes pipeline-complete last", async () => {
    const { state, outcome } = run([[ok("a")], [ok("b")]]);
    await outcome;
    const history = state.events.history();
    assert.equal(history[history.length - 1].type, EventType.PipelineComplete);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// ROLLBACK
// ═══════════════════════════════════════════════════════════════════════════

describe("Orchestrator rollback", () => {
  it("rolls back failed stages most recent first when cleanup is on", async () => {
    const undone: string[] = [];
    const undo = (name: string) => async () => {
      undone.push(name);
    };
    const { state, outcome } = run(
      [
        [ok("a", { rollback: undo("a") })],
        [broken("b", false, { rollback: undo("b") })],
        [broken("c", true, { rollback: undo("c") })],
        [ok("d")],
      ],
      true
    );
    await outcome;

    assert.deepEqual(undone, ["c", "b"]);
    assert.equal(state.record("a")?.status, StageStatus.Succeeded);
    assert.equal(state.record("b")?.status, StageStatus.RolledBack);
    assert.equal(state.record("c")?.status, StageStatus.RolledBack);
    assert.equal(state.record("d")?.status, StageStatus.Skipped);
  });

  it("leaves failed stages alone when cleanup is off", async () => {
    const undone: string[] = [];
    const { state, outcome } = run([
      [
        broken("a", true, {
          rollback: async () => {
            undone.push("a");
          },
        }),
      ],
    ]);
    await outcome;
    assert.deepEqual(undone, []);
    assert.equal(state.record("a")?.status, StageStatus.Failed);
  });

  it("does not roll back on a non-critical failure alone", async () => {
    const undone: string[] = [];
    await run(
      [
        [
          broken("a", false, {
            rollback: async () => {
              undone.push("a");
            },
          }),
        ],
        [ok("b")],
      ],
      true
    ).outcome;
    assert.deepEqual(undone, []);
  });
});
