/**
 * Pipeline and stage definitions.
 * Pipelines run ordered groups of stages against a shared run state.
 */

export enum StageStatus {
  Pending = "pending",
  Running = "running",
  Succeeded = "succeeded",
  Failed = "failed",
  Skipped = "skipped",
  RolledBack = "rolled_back",
}

/** Statuses a stage run can end in. */
export type TerminalStatus = StageStatus.Succeeded | StageStatus.Failed;

/**
 * Structured result of one stage run. The scheduler only ever sees these,
 * never raw exceptions.
 */
export interface StageResult {
  readonly stage: string;
  readonly status: TerminalStatus;
  readonly output: Readonly<Record<string, unknown>>;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  /** Wall-clock time from the start marker to completion */
  readonly durationMs: number;
}

export type PipelineStatus = "success" | "failed";

/**
 * What the orchestrator hands back after a run.
 */
export interface PipelineOutcome {
  readonly status: PipelineStatus;
  /** Results of every stage that ran, keyed by stage name */
  readonly results: ReadonlyMap<string, StageResult>;
  /** Stages never started because a critical stage failed */
  readonly notRun: readonly string[];
  /** Critical failures */
  readonly errors: readonly string[];
  /** Non-critical failures and stage warnings */
  readonly warnings: readonly string[];
  /** Name of the critical stage that halted the run */
  readonly abortedBy?: string;
}
