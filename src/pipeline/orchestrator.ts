/**
 * Dependency-ordered scheduler.
 *
 * Runs groups of stages in order. Stages inside a group run concurrently
 * and are joined with allSettled, so one stage's failure never hides its
 * sibling's result. A failed critical stage halts the run once its group has
 * settled; a failed non-critical stage becomes a warning.
 *
 * Progress reporting goes through an outbox: the event handler pushes
 * synchronously into an EventQueue and a single consumer publishes the
 * resulting progress-update and error events.
 */

import type { Logger } from "../logging/index.js";
import {
  EventType,
  StageStatus,
  type PipelineEvent,
  type PipelineOutcome,
  type StageResult,
} from "../types/index.js";
import { createEvent, type UnsequencedEvent } from "./event-channel.js";
import { EventQueue } from "./event-queue.js";
import { errorMessage, PipelineDefinitionError } from "./errors.js";
import type { RunState } from "./run-state.js";
import type { StageDefinition } from "./stage.js";
import { rollbackStage, runStage } from "./stage-runner.js";

export type StageGroup = readonly StageDefinition[];

export interface OrchestratorOptions {
  readonly state: RunState;
  readonly logger: Logger;
  /** Roll back failed stages that define a rollback hook when the run aborts */
  readonly cleanupOnFailure?: boolean;
  /** Name used as the source of orchestrator events */
  readonly name?: string;
}

/**
 * Check group structure before anything runs.
 *
 * @throws PipelineDefinitionError on duplicate names, empty groups, or a
 *   dependency that is not in an earlier group
 */
export function validateStageGroups(groups: readonly StageGroup[]): void {
  const seen = new Set<string>();

  groups.forEach((group, index) => {
    if (group.length === 0) {
      throw new PipelineDefinitionError(`Stage group ${index + 1} is empty`);
    }

    for (const stage of group) {
      if (seen.has(stage.name) || group.filter((s) => s.name === stage.name).length > 1) {
        throw new PipelineDefinitionError(`Duplicate stage name: ${stage.name}`);
      }
      for (const dependency of stage.dependsOn ?? []) {
        if (!seen.has(dependency)) {
          throw new PipelineDefinitionError(
            `Stage "${stage.name}" depends on "${dependency}", which is not in an earlier group`
          );
        }
      }
    }

    for (const stage of group) {
      seen.add(stage.name);
    }
  });
}

function rejectedResult(stage: StageDefinition, reason: unknown): StageResult {
  return {
    stage: stage.name,
    status: StageStatus.Failed,
    output: {},
    errors: [errorMessage(reason)],
    warnings: [],
    durationMs: 0,
  };
}

export class Orchestrator {
  private readonly state: RunState;
  private readonly logger: Logger;
  private readonly cleanupOnFailure: boolean;
  private readonly name: string;
  private readonly definitions = new Map<string, StageDefinition>();
  private readonly critical = new Map<string, boolean>();
  private readonly finished = new Set<string>();
  private outbox: EventQueue<UnsequencedEvent> | undefined;

  constructor(options: OrchestratorOptions) {
    this.state = options.state;
    this.logger = options.logger;
    this.cleanupOnFailure = options.cleanupOnFailure ?? false;
    this.name = options.name ?? "orchestrator";
  }

  /**
   * Run every group in order.
   *
   * @returns the outcome; stages after an aborting critical failure are
   *   absent from results and listed in notRun
   */
  async execute(groups: readonly StageGroup[]): Promise<PipelineOutcome> {
    validateStageGroups(groups);

    for (const group of groups) {
      for (const stage of group) {
        this.state.register(stage.name);
        this.definitions.set(stage.name, stage);
        this.critical.set(stage.name, stage.critical);
      }
    }

    const outbox = new EventQueue<UnsequencedEvent>((err, event) => {
      this.logger.error("Failed to publish orchestrator event", {
        type: event.type,
        error: errorMessage(err),
      });
    });
    this.outbox = outbox;
    const draining = outbox.consume((event) => {
      this.state.events.publish(event);
    });

    const handler = (event: PipelineEvent) => this.onStageEvent(event);
    const unsubscribe = [
      this.state.events.subscribe(EventType.StageCompleted, handler),
      this.state.events.subscribe(EventType.StageFailed, handler),
    ];

    const results = new Map<string, StageResult>();
    const errors: string[] = [];
    const warnings: string[] = [];
    let abortedBy: string | undefined;

    this.state.start();
    this.logger.info("Pipeline started", {
      groups: groups.length,
      stages: this.critical.size,
    });

    try {
      for (const [index, group] of groups.entries()) {
        if (group.length > 1) {
          this.logger.info("Running stages concurrently", {
            group: index + 1,
            stages: group.map((stage) => stage.name),
          });
        }

        const settled = await Promise.allSettled(
          group.map((stage) => runStage(stage, { state: this.state, logger: this.logger }))
        );

        const failedCritical: StageDefinition[] = [];
        settled.forEach((outcome, position) => {
          const stage = group[position];
          const result =
            outcome.status === "fulfilled" ? outcome.value : rejectedResult(stage, outcome.reason);
          results.set(stage.name, result);

          for (const warning of result.warnings) {
            warnings.push(`${stage.name}: ${warning}`);
          }
          if (result.status === StageStatus.Succeeded) {
            return;
          }

          const reason = result.errors.join("; ");
          if (stage.critical) {
            errors.push(`${stage.name}: ${reason}`);
            failedCritical.push(stage);
          } else {
            warnings.push(`${stage.name} failed (non-critical): ${reason}`);
            this.logger.warn("Non-critical stage failed, continuing", {
              stage: stage.name,
              error: reason,
            });
          }
        });

        if (failedCritical.length > 0) {
          abortedBy = failedCritical[0].name;
          this.logger.error("Critical stage failed, aborting pipeline", {
            stages: failedCritical.map((stage) => stage.name),
          });
          if (this.cleanupOnFailure) {
            await this.rollbackFailed();
          }
          break;
        }
      }
    } finally {
      for (const off of unsubscribe) off();
      await outbox.close();
      await draining;
      this.outbox = undefined;
    }

    const notRun: string[] = [];
    for (const record of this.state.stageRecords()) {
      if (record.status === StageStatus.Pending) {
        record.markSkipped();
        notRun.push(record.name);
      }
    }

    const status = abortedBy === undefined ? "success" : "failed";
    this.state.finish(status);

    if (abortedBy === undefined) {
      this.state.events.emit(EventType.PipelineComplete, this.name, {
        stages: [...results.keys()],
        warnings: warnings.length,
      });
      this.logger.info("Pipeline complete", { warnings: warnings.length });
    } else {
      this.logger.error("Pipeline failed", { abortedBy, notRun });
    }

    return { status, results, notRun, errors, warnings, abortedBy };
  }

  /**
   * Terminal stage events: count progress and, on failure, raise an error
   * event. Runs synchronously inside publish(); events go to the outbox.
   */
  onStageEvent(event: PipelineEvent): void {
    if (event.type !== EventType.StageCompleted && event.type !== EventType.StageFailed) {
      return;
    }
    const outbox = this.outbox;
    if (!outbox || outbox.isClosed) {
      this.logger.debug("Stage event outside a run ignored", { type: event.type });
      return;
    }

    const stage = event.sourceStage;
    this.finished.add(stage);
    const total = this.critical.size;
    const completed = this.finished.size;

    outbox.push(
      createEvent(EventType.ProgressUpdate, this.name, {
        stage,
        status: event.type === EventType.StageCompleted ? StageStatus.Succeeded : StageStatus.Failed,
        completed,
        total,
        percentage: total === 0 ? 100 : Math.round((completed / total) * 1000) / 10,
      })
    );

    if (event.type === EventType.StageFailed) {
      outbox.push(
        createEvent(EventType.Error, this.name, {
          stage,
          error: event.payload.error,
          critical: this.critical.get(stage) ?? true,
        })
      );
    }
  }

  /**
   * Roll back every failed stage that has a hook, most recent first. This
   * includes earlier non-critical failures.
   */
  private async rollbackFailed(): Promise<void> {
    const failedStages = this.state
      .stageRecords()
      .filter((record) => record.status === StageStatus.Failed)
      .reverse();

    for (const record of failedStages) {
      const stage = this.definitions.get(record.name);
      if (!stage?.rollback) continue;
      const rolledBack = await rollbackStage(stage, { state: this.state, logger: this.logger });
      if (rolledBack) {
        this.logger.info("Stage rolled back", { stage: stage.name });
      } else {
        this.logger.warn("Stage rollback incomplete", { stage: stage.name });
      }
    }
  }
}
