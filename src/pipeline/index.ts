/**
 * Pipeline coordination layer.
 *
 * Usage:
 *   import { Orchestrator, RunState } from "./pipeline/index.js";
 *
 *   const state = new RunState(runId, logger);
 *   const outcome = await new Orchestrator({ state, logger }).execute(groups);
 */

// Errors
export {
  PipelineError,
  NonRetryableError,
  MissingUpstreamError,
  UpstreamTimeoutError,
  UpstreamFailedError,
  IllegalTransitionError,
  PipelineDefinitionError,
  errorMessage,
} from "./errors.js";

// Events
export {
  EventChannel,
  createEvent,
  type EventPredicate,
  type UnsequencedEvent,
  type WaitForOptions,
} from "./event-channel.js";
export { EventQueue, type QueueHandler } from "./event-queue.js";

// Run state
export {
  RunState,
  StageRecord,
  artifactKey,
  isSerializable,
  type ArtifactKey,
  type RunSnapshot,
  type StageSnapshot,
} from "./run-state.js";

// Stage contract
export {
  succeeded,
  failed,
  artifactEntry,
  milestone,
  type ArtifactEntry,
  type Milestone,
  type StageContext,
  type StageDefinition,
  type StageOutcome,
  type StageView,
  type StageWork,
} from "./stage.js";
export { runStage, rollbackStage, createStageContext, type StageRunnerDeps } from "./stage-runner.js";
export { withRetry, backoffDelay, isRetryableError, type RetryOptions } from "./retry.js";

// Scheduling
export {
  Orchestrator,
  validateStageGroups,
  type OrchestratorOptions,
  type StageGroup,
} from "./orchestrator.js";

// Reporting
export {
  buildReport,
  writeReport,
  renderReport,
  summarizeOutput,
  URL_ARTIFACT_PREFIX,
  type PipelineReport,
  type StageReport,
  type ReportExtras,
  type RenderOptions,
} from "./report.js";
