/**
 * Error taxonomy for the pipeline layer.
 *
 * Stage work may throw any of these; the stage runner converts them into
 * Failed results. Subclasses of NonRetryableError are never retried.
 */

import type { StageStatus } from "../types/index.js";

export class PipelineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineError";
  }
}

/**
 * Failures that a retry cannot fix (bad input, missing upstream data).
 */
export class NonRetryableError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = "NonRetryableError";
  }
}

/**
 * A stage found required upstream data missing at entry.
 */
export class MissingUpstreamError extends NonRetryableError {
  public readonly key: string;

  constructor(key: string, detail?: string) {
    super(detail ? `Missing upstream data "${key}": ${detail}` : `Missing upstream data "${key}"`);
    this.name = "MissingUpstreamError";
    this.key = key;
  }
}

/**
 * A bounded wait for an upstream event ran out.
 */
export class UpstreamTimeoutError extends NonRetryableError {
  public readonly eventType: string;
  public readonly timeoutMs: number;

  constructor(eventType: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for "${eventType}" event`);
    this.name = "UpstreamTimeoutError";
    this.eventType = eventType;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The stage being waited on failed before publishing what was needed.
 */
export class UpstreamFailedError extends NonRetryableError {
  public readonly upstream: string;

  constructor(upstream: string, eventType: string, reason?: string) {
    super(
      `Upstream stage "${upstream}" failed before publishing "${eventType}"` +
        (reason ? `: ${reason}` : "")
    );
    this.name = "UpstreamFailedError";
    this.upstream = upstream;
  }
}

export class IllegalTransitionError extends PipelineError {
  constructor(stage: string, from: StageStatus, to: StageStatus) {
    super(`Illegal status transition for stage "${stage}": ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * The stage groups handed to the orchestrator are inconsistent.
 */
export class PipelineDefinitionError extends PipelineError {
  constructor(message: string) {
    super(message);
    this.name = "PipelineDefinitionError";
  }
}

/**
 * Normalize a thrown value into a message.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  if (err === undefined) {
    return "undefined";
  }
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
