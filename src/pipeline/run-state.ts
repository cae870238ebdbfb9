/**
 * Shared run state.
 *
 * Holds one StageRecord per registered stage, a free-form artifact store,
 * and the run's EventChannel. Constructed at pipeline start and discarded at
 * the end; snapshot() gives a serializable view at any point.
 *
 * Stage records follow a closed state machine:
 *
 *   Pending ──► Running ──► Succeeded
 *      │           └──────► Failed ──► RolledBack
 *      └──► Skipped
 */

import type { ZodType, ZodTypeDef } from "zod";
import type { Logger } from "../logging/index.js";
import { StageStatus, type PipelineStatus } from "../types/index.js";
import { EventChannel } from "./event-channel.js";
import {
  IllegalTransitionError,
  MissingUpstreamError,
  PipelineDefinitionError,
} from "./errors.js";

const LEGAL_TRANSITIONS: Readonly<Record<StageStatus, readonly StageStatus[]>> = {
  [StageStatus.Pending]: [StageStatus.Running, StageStatus.Skipped],
  [StageStatus.Running]: [StageStatus.Succeeded, StageStatus.Failed],
  [StageStatus.Failed]: [StageStatus.RolledBack],
  [StageStatus.Succeeded]: [],
  [StageStatus.Skipped]: [],
  [StageStatus.RolledBack]: [],
};

/**
 * Mutable per-stage record.
 */
export class StageRecord {
  private _status: StageStatus = StageStatus.Pending;
  private _startedAt: number | undefined;
  private _finishedAt: number | undefined;
  private _error: string | undefined;
  private readonly _output: Record<string, unknown> = {};

  constructor(
    public readonly name: string,
    private readonly now: () => number = Date.now
  ) {}

  get status(): StageStatus {
    return this._status;
  }

  get startedAt(): number | undefined {
    return this._startedAt;
  }

  get finishedAt(): number | undefined {
    return this._finishedAt;
  }

  get error(): string | undefined {
    return this._error;
  }

  get output(): Readonly<Record<string, unknown>> {
    return { ...this._output };
  }

  /** Undefined until both timestamps are set. */
  get durationMs(): number | undefined {
    if (this._startedAt === undefined || this._finishedAt === undefined) {
      return undefined;
    }
    return this._finishedAt - this._startedAt;
  }

  markRunning(): void {
    this.transition(StageStatus.Running);
    this._startedAt = this.now();
  }

  /** Output is merged into, not replacing, what is already recorded. */
  markCompleted(output: Record<string, unknown> = {}): void {
    this.transition(StageStatus.Succeeded);
    this._finishedAt = this.now();
    Object.assign(this._output, output);
  }

  markFailed(error: string): void {
    this.transition(StageStatus.Failed);
    this._finishedAt = this.now();
    this._error = error;
  }

  markRolledBack(): void {
    this.transition(StageStatus.RolledBack);
  }

  /** Used by the orchestrator for stages a critical failure kept from running. */
  markSkipped(): void {
    this.transition(StageStatus.Skipped);
  }

  private transition(to: StageStatus): void {
    if (!LEGAL_TRANSITIONS[this._status].includes(to)) {
      throw new IllegalTransitionError(this.name, this._status, to);
    }
    this._status = to;
  }
}

/**
 * Named artifact with the schema its value must satisfy.
 */
export interface ArtifactKey<T> {
  readonly name: string;
  readonly schema: ZodType<T, ZodTypeDef, unknown>;
}

export function artifactKey<T>(
  name: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): ArtifactKey<T> {
  return { name, schema };
}

export interface StageSnapshot {
  status: StageStatus;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number | null;
  error: string | null;
  output: Record<string, unknown>;
}

export interface RunSnapshot {
  runId: string;
  status: PipelineStatus | "pending" | "running";
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number | null;
  stages: Record<string, StageSnapshot>;
  artifacts: Record<string, unknown>;
  eventCount: number;
}

function toIso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

/**
 * True for values that survive a JSON round trip unchanged in meaning.
 */
export function isSerializable(value: unknown, ancestors: Set<object> = new Set()): boolean {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object": {
      if (ancestors.has(value)) return false;
      let children: unknown[];
      if (Array.isArray(value)) {
        children = value;
      } else if (Object.getPrototypeOf(value) === Object.prototype) {
        children = Object.values(value);
      } else {
        return false;
      }
      ancestors.add(value);
      const ok = children.every((child) => isSerializable(child, ancestors));
      ancestors.delete(value);
      return ok;
    }
    default:
      return false;
  }
}

export class RunState {
  public readonly events: EventChannel;
  private readonly records = new Map<string, StageRecord>();
  private readonly artifactStore = new Map<string, unknown>();
  private _status: RunSnapshot["status"] = "pending";
  private _startedAt: number | undefined;
  private _finishedAt: number | undefined;

  constructor(
    public readonly runId: string,
    logger: Logger,
    private readonly now: () => number = Date.now
  ) {
    this.events = new EventChannel(logger.child("events"));
  }

  get status(): RunSnapshot["status"] {
    return this._status;
  }

  get durationMs(): number | undefined {
    if (this._startedAt === undefined || this._finishedAt === undefined) {
      return undefined;
    }
    return this._finishedAt - this._startedAt;
  }

  start(): void {
    this._status = "running";
    this._startedAt = this.now();
  }

  finish(status: PipelineStatus): void {
    this._status = status;
    this._finishedAt = this.now();
  }

  // ============================================================
  // Stage records
  // ============================================================

  /**
   * Register a stage as Pending. Names are unique per run.
   */
  register(name: string): StageRecord {
    if (this.records.has(name)) {
      throw new PipelineDefinitionError(`Stage already registered: ${name}`);
    }
    const record = new StageRecord(name, this.now);
    this.records.set(name, record);
    return record;
  }

  record(name: string): StageRecord | undefined {
    return this.records.get(name);
  }

  /** Records in registration order. */
  stageRecords(): readonly StageRecord[] {
    return [...this.records.values()];
  }

  // ============================================================
  // Artifacts
  // ============================================================

  setArtifact(name: string, value: unknown): void {
    this.artifactStore.set(name, value);
  }

  hasArtifact(name: string): boolean {
    return this.artifactStore.has(name);
  }

  /**
   * Read an artifact through its schema.
   *
   * @returns undefined when absent
   * @throws MissingUpstreamError when present but malformed
   */
  artifact<T>(key: ArtifactKey<T>): T | undefined {
    if (!this.artifactStore.has(key.name)) {
      return undefined;
    }
    const parsed = key.schema.safeParse(this.artifactStore.get(key.name));
    if (!parsed.success) {
      throw new MissingUpstreamError(
        key.name,
        `stored value does not match its schema (${parsed.error.issues
          .map((issue) => issue.message)
          .join("; ")})`
      );
    }
    return parsed.data;
  }

  /**
   * Read an artifact a stage cannot do without.
   *
   * @throws MissingUpstreamError when absent or malformed
   */
  requireArtifact<T>(key: ArtifactKey<T>): T {
    const value = this.artifact(key);
    if (value === undefined) {
      throw new MissingUpstreamError(key.name);
    }
    return value;
  }

  /** Artifact names in insertion order. */
  artifactNames(): readonly string[] {
    return [...this.artifactStore.keys()];
  }

  /** Raw artifact values whose names start with a prefix. */
  artifactsWithPrefix(prefix: string): Record<string, unknown> {
    const found: Record<string, unknown> = {};
    for (const [name, value] of this.artifactStore) {
      if (name.startsWith(prefix)) {
        found[name.slice(prefix.length)] = value;
      }
    }
    return found;
  }

  // ============================================================
  // Snapshot
  // ============================================================

  snapshot(): RunSnapshot {
    const stages: Record<string, StageSnapshot> = {};
    for (const record of this.records.values()) {
      stages[record.name] = {
        status: record.status,
        startedAt: toIso(record.startedAt),
        finishedAt: toIso(record.finishedAt),
        durationMs: record.durationMs ?? null,
        error: record.error ?? null,
        output: { ...record.output },
      };
    }

    const artifacts: Record<string, unknown> = {};
    for (const [name, value] of this.artifactStore) {
      if (isSerializable(value)) {
        artifacts[name] = value;
      }
    }

    return {
      runId: this.runId,
      status: this._status,
      startedAt: toIso(this._startedAt),
      finishedAt: toIso(this._finishedAt),
      durationMs: this.durationMs ?? null,
      stages,
      artifacts,
      eventCount: this.events.size,
    };
  }
}
