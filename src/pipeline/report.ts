/**
 * Result aggregation and rendering.
 *
 * buildReport() folds the run state and the orchestrator's outcome into one
 * JSON document; renderReport() turns it into the lines the CLI prints.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { REPORT_FILE_NAME } from "../config/migration/defaults.js";
import { StageStatus, type PipelineOutcome, type PipelineStatus } from "../types/index.js";
import type { RunState } from "./run-state.js";

/** Artifacts named `url:<stage>` hold deployed addresses. */
export const URL_ARTIFACT_PREFIX = "url:";

const SUMMARY_MAX_LENGTH = 200;

// ============================================================
// Types
// ============================================================

export interface StageReport {
  name: string;
  status: StageStatus;
  durationSeconds: number | null;
  summary: string;
  error: string | null;
  warnings: string[];
}

export interface PipelineReport {
  runId: string;
  generatedAt: string;
  status: PipelineStatus;
  durationSeconds: number | null;
  abortedBy: string | null;
  stages: StageReport[];
  notRun: string[];
  errors: string[];
  warnings: string[];
  urls: Record<string, string>;
  artifacts: Record<string, unknown>;
  dryRunCommands?: string[];
}

export interface ReportExtras {
  /** Commands recorded instead of executed */
  dryRunCommands?: readonly string[];
  now?: Date;
}

// ============================================================
// Build
// ============================================================

function toSeconds(ms: number | undefined): number | null {
  return ms === undefined ? null : Math.round(ms / 10) / 100;
}

function summarizeValue(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Cycles and bigints
    return String(value);
  }
}

/**
 * One-line summary of a stage's output: the first few `key=value` pairs,
 * truncated.
 */
export function summarizeOutput(
  output: Readonly<Record<string, unknown>>,
  maxLength: number = SUMMARY_MAX_LENGTH
): string {
  const parts = Object.entries(output)
    .slice(0, 3)
    .map(([key, value]) => `${key}=${summarizeValue(value)}`);
  const summary = parts.join(", ");
  if (summary.length <= maxLength) {
    return summary;
  }
  return `${summary.slice(0, maxLength - 3)}...`;
}

export function buildReport(
  state: RunState,
  outcome: PipelineOutcome,
  extras: ReportExtras = {}
): PipelineReport {
  const stages: StageReport[] = state.stageRecords().map((record) => {
    const result = outcome.results.get(record.name);
    const durationMs = result?.durationMs ?? record.durationMs;
    return {
      name: record.name,
      status: record.status,
      durationSeconds: toSeconds(durationMs),
      summary: summarizeOutput(record.output),
      error: record.error ?? null,
      warnings: [...(result?.warnings ?? [])],
    };
  });

  const urls: Record<string, string> = {};
  for (const [name, value] of Object.entries(state.artifactsWithPrefix(URL_ARTIFACT_PREFIX))) {
    if (typeof value === "string") {
      urls[name] = value;
    }
  }

  // snapshot() already drops values that do not survive JSON
  const artifacts: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(state.snapshot().artifacts)) {
    if (!name.startsWith(URL_ARTIFACT_PREFIX)) {
      artifacts[name] = value;
    }
  }

  const report: PipelineReport = {
    runId: state.runId,
    generatedAt: (extras.now ?? new Date()).toISOString(),
    status: outcome.status,
    durationSeconds: toSeconds(state.durationMs),
    abortedBy: outcome.abortedBy ?? null,
    stages,
    notRun: [...outcome.notRun],
    errors: [...outcome.errors],
    warnings: [...outcome.warnings],
    urls,
    artifacts,
  };

  if (extras.dryRunCommands) {
    report.dryRunCommands = [...extras.dryRunCommands];
  }
  return report;
}

/**
 * Write the report as pretty-printed JSON.
 *
 * @returns the file path
 */
export async function writeReport(report: PipelineReport, outputDir: string): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const path = join(outputDir, REPORT_FILE_NAME);
  await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, "utf-8");
  return path;
}

// ============================================================
// Render
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

type Color = keyof typeof COLORS;

const STATUS_GLYPHS: Record<StageStatus, { glyph: string; color: Color }> = {
  [StageStatus.Succeeded]: { glyph: "✓", color: "green" },
  [StageStatus.Failed]: { glyph: "✗", color: "red" },
  [StageStatus.RolledBack]: { glyph: "↺", color: "yellow" },
  [StageStatus.Skipped]: { glyph: "○", color: "dim" },
  [StageStatus.Pending]: { glyph: "○", color: "dim" },
  [StageStatus.Running]: { glyph: "…", color: "yellow" },
};

export interface RenderOptions {
  colors?: boolean;
}

/**
 * Lines for the terminal: one per stage, then errors, warnings and
 * deployed addresses.
 */
export function renderReport(report: PipelineReport, options: RenderOptions = {}): string[] {
  const c = (color: Color, text: string): string =>
    options.colors ? `${COLORS[color]}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  lines.push(c("bold", "═".repeat(60)));
  lines.push(c("bold", ` Migration ${report.runId}`));
  lines.push(c("bold", "═".repeat(60)));

  for (const stage of report.stages) {
    const { glyph, color } = STATUS_GLYPHS[stage.status];
    const duration = stage.durationSeconds === null ? "" : ` (${stage.durationSeconds}s)`;
    const label = stage.status === StageStatus.Skipped ? "not run" : stage.status;
    lines.push(`${c(color, glyph)} ${c("bold", stage.name)}: ${label}${duration}`);
  }

  if (report.errors.length > 0) {
    lines.push("");
    lines.push(c("red", "Errors:"));
    for (const error of report.errors) {
      lines.push(`  - ${error}`);
    }
  }

  if (report.warnings.length > 0) {
    lines.push("");
    lines.push(c("yellow", "Warnings:"));
    for (const warning of report.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  const urls = Object.entries(report.urls);
  if (urls.length > 0) {
    lines.push("");
    lines.push(c("cyan", "Deployed:"));
    for (const [name, url] of urls) {
      lines.push(`  ${name}: ${url}`);
    }
  }

  lines.push("");
  const status = report.status === "success" ? c("green", "SUCCESS") : c("red", "FAILED");
  const total = report.durationSeconds === null ? "" : ` in ${report.durationSeconds}s`;
  lines.push(`${c("bold", "Result:")} ${status}${total}`);
  return lines;
}
