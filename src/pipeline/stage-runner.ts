/**
 * Stage lifecycle.
 *
 * runStage() is the only way the orchestrator runs a stage:
 *
 *   1. Pending -> Running, start marker taken
 *   2. stage-started emitted (before any stage work)
 *   3. work invoked; a thrown error becomes a Failed outcome
 *   4. on success: artifacts stored, milestones published, output merged
 *   5. stage-completed or stage-failed emitted (after all of the above)
 *
 * runStage() never rejects.
 */

import { performance } from "node:perf_hooks";
import type { Logger } from "../logging/index.js";
import { EventType, StageStatus, type StageResult } from "../types/index.js";
import { errorMessage } from "./errors.js";
import type { RunState, StageRecord } from "./run-state.js";
import type { StageContext, StageDefinition, StageOutcome } from "./stage.js";

export interface StageRunnerDeps {
  readonly state: RunState;
  readonly logger: Logger;
}

/**
 * Build the context a stage's work and rollback hook receive.
 */
export function createStageContext(stage: string, deps: StageRunnerDeps): StageContext {
  const { state } = deps;
  return {
    stage,
    runId: state.runId,
    logger: deps.logger.child(stage),
    artifact: (key) => state.artifact(key),
    requireArtifact: (key) => state.requireArtifact(key),
    record: (name) => {
      const record = state.record(name);
      if (!record) return undefined;
      return {
        name: record.name,
        status: record.status,
        output: record.output,
        error: record.error,
      };
    },
    history: (type) => state.events.history(type),
    latestEvent: (type, predicate) => state.events.latest(type, predicate),
    waitForEvent: (type, options) => state.events.waitFor(type, options),
  };
}

async function invoke(definition: StageDefinition, context: StageContext): Promise<StageOutcome> {
  try {
    return await definition.execute(context);
  } catch (err) {
    return { kind: "failed", errors: [errorMessage(err)] };
  }
}

function alreadyRun(definition: StageDefinition, record: StageRecord): StageResult {
  return {
    stage: definition.name,
    status: StageStatus.Failed,
    output: {},
    errors: [`Stage "${definition.name}" cannot start from status ${record.status}`],
    warnings: [],
    durationMs: 0,
  };
}

/**
 * Run one stage through its full lifecycle.
 */
export async function runStage(
  definition: StageDefinition,
  deps: StageRunnerDeps
): Promise<StageResult> {
  const { state } = deps;
  const record = state.record(definition.name) ?? state.register(definition.name);
  const context = createStageContext(definition.name, deps);
  const log = context.logger;

  if (record.status !== StageStatus.Pending) {
    log.error("Stage already ran", { status: record.status });
    return alreadyRun(definition, record);
  }

  record.markRunning();
  const startedAt = performance.now();
  state.events.emit(EventType.StageStarted, definition.name, { stage: definition.name });
  log.info(">>> stage started", { critical: definition.critical });

  const outcome = await invoke(definition, context);
  const warnings = [...(outcome.warnings ?? [])];

  if (outcome.kind === "succeeded") {
    for (const entry of outcome.artifacts ?? []) {
      state.setArtifact(entry.name, entry.value);
    }
    for (const event of outcome.milestones ?? []) {
      state.events.emit(event.type, definition.name, event.payload);
    }
    record.markCompleted(outcome.output);

    const durationMs = performance.now() - startedAt;
    const result: StageResult = {
      stage: definition.name,
      status: StageStatus.Succeeded,
      output: record.output,
      errors: [],
      warnings,
      durationMs,
    };

    state.events.emit(EventType.StageCompleted, definition.name, {
      stage: definition.name,
      status: result.status,
      output: result.output,
      warnings,
      durationMs,
    });
    log.info("<<< stage completed", { durationMs: Math.round(durationMs), warnings: warnings.length });
    return result;
  }

  const errors = outcome.errors.length > 0 ? [...outcome.errors] : ["Stage failed without an error message"];
  record.markFailed(errors.join("; "));

  const durationMs = performance.now() - startedAt;
  const result: StageResult = {
    stage: definition.name,
    status: StageStatus.Failed,
    output: outcome.output ?? {},
    errors,
    warnings,
    durationMs,
  };

  state.events.emit(EventType.StageFailed, definition.name, {
    stage: definition.name,
    status: result.status,
    error: errors.join("; "),
    warnings,
    durationMs,
  });
  log.error("<<< stage failed", { durationMs: Math.round(durationMs), errors });
  return result;
}

/**
 * Invoke a failed stage's rollback hook and mark it RolledBack.
 *
 * @returns true when the stage is (now or already) rolled back
 */
export async function rollbackStage(
  definition: StageDefinition,
  deps: StageRunnerDeps
): Promise<boolean> {
  const record = deps.state.record(definition.name);
  if (!record) {
    return false;
  }
  if (record.status === StageStatus.RolledBack) {
    return true;
  }
  if (record.status !== StageStatus.Failed) {
    return false;
  }

  const context = createStageContext(definition.name, deps);
  try {
    if (definition.rollback) {
      context.logger.info("Rolling back");
      await definition.rollback(context);
    }
    record.markRolledBack();
    return true;
  } catch (err) {
    context.logger.error("Rollback failed", { error: errorMessage(err) });
    return false;
  }
}
