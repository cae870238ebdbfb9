/**
 * Stage contract.
 *
 * A stage is a name, a criticality flag, and a work function. It does not
 * inherit lifecycle, retry or event behavior from a base class: the stage
 * runner supplies the lifecycle, retry is composed onto the work function
 * with withRetry(), and rollback is an optional hook.
 */

import type { Logger } from "../logging/index.js";
import type {
  EventType,
  MilestoneEventType,
  PipelineEvent,
  StageStatus,
} from "../types/index.js";
import type { EventPredicate, WaitForOptions } from "./event-channel.js";
import type { ArtifactKey } from "./run-state.js";

/** A value the runner stores in the artifact store after success. */
export interface ArtifactEntry {
  readonly name: string;
  readonly value: unknown;
}

/** A domain event the runner publishes after success. */
export interface Milestone {
  readonly type: MilestoneEventType;
  readonly payload: Record<string, unknown>;
}

export interface SucceededOutcome {
  readonly kind: "succeeded";
  readonly output: Record<string, unknown>;
  readonly artifacts?: readonly ArtifactEntry[];
  readonly milestones?: readonly Milestone[];
  readonly warnings?: readonly string[];
}

export interface FailedOutcome {
  readonly kind: "failed";
  readonly errors: readonly string[];
  readonly output?: Record<string, unknown>;
  readonly warnings?: readonly string[];
}

/**
 * What stage work returns. Side effects on the run state (artifacts,
 * milestones) are described here and applied by the runner, so a failed or
 * retried attempt leaves nothing behind.
 */
export type StageOutcome = SucceededOutcome | FailedOutcome;

/** Read-only view of another stage's record. */
export interface StageView {
  readonly name: string;
  readonly status: StageStatus;
  readonly output: Readonly<Record<string, unknown>>;
  readonly error: string | undefined;
}

/**
 * What stage work can see of the run.
 */
export interface StageContext {
  readonly stage: string;
  readonly runId: string;
  readonly logger: Logger;
  artifact<T>(key: ArtifactKey<T>): T | undefined;
  requireArtifact<T>(key: ArtifactKey<T>): T;
  record(name: string): StageView | undefined;
  history(type?: EventType): readonly PipelineEvent[];
  latestEvent(type: EventType, predicate?: EventPredicate): PipelineEvent | undefined;
  waitForEvent(type: EventType, options: WaitForOptions): Promise<PipelineEvent>;
}

export type StageWork = (context: StageContext) => Promise<StageOutcome>;

export interface StageDefinition {
  readonly name: string;
  /** A failed critical stage halts the pipeline */
  readonly critical: boolean;
  /** Stages that must sit in an earlier group */
  readonly dependsOn?: readonly string[];
  readonly execute: StageWork;
  /** Undo externally visible effects after a failure. Must be idempotent. */
  readonly rollback?: (context: StageContext) => Promise<void>;
}

// ============================================================
// Outcome helpers
// ============================================================

export function succeeded(
  output: Record<string, unknown>,
  extras: Omit<SucceededOutcome, "kind" | "output"> = {}
): SucceededOutcome {
  return { kind: "succeeded", output, ...extras };
}

export function failed(
  errors: string | readonly string[],
  extras: Omit<FailedOutcome, "kind" | "errors"> = {}
): FailedOutcome {
  return {
    kind: "failed",
    errors: typeof errors === "string" ? [errors] : errors,
    ...extras,
  };
}

export function artifactEntry<T>(key: ArtifactKey<T>, value: T): ArtifactEntry {
  return { name: key.name, value };
}

export function milestone(
  type: MilestoneEventType,
  payload: Record<string, unknown>
): Milestone {
  return { type, payload };
}
