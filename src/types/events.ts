/**
 * Event vocabulary shared by stages and the orchestrator.
 */

export enum EventType {
  // Lifecycle
  StageStarted = "stage-started",
  StageCompleted = "stage-completed",
  StageFailed = "stage-failed",

  // Domain milestones
  AnalysisComplete = "analysis-complete",
  InfraReady = "infra-ready",
  DbMigrated = "db-migrated",
  BackendDeployed = "backend-deployed",
  FrontendDeployed = "frontend-deployed",
  PipelineComplete = "pipeline-complete",

  // Orchestrator side channel
  Error = "error",
  ProgressUpdate = "progress-update",
}

/** Events a stage may publish when its work succeeds. */
export type MilestoneEventType =
  | EventType.AnalysisComplete
  | EventType.InfraReady
  | EventType.DbMigrated
  | EventType.BackendDeployed
  | EventType.FrontendDeployed;

export interface PipelineEvent {
  readonly id: string;
  readonly type: EventType;
  readonly sourceStage: string;
  readonly payload: Readonly<Record<string, unknown>>;
  /** ISO-8601 creation time */
  readonly timestamp: string;
  /** Position in the channel's history */
  readonly sequence: number;
}

export type EventHandler = (event: PipelineEvent) => void;
