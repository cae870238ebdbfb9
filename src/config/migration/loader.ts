/**
 * Migration configuration loader and validator.
 *
 * Responsible for:
 * - Reading YAML (or JSON) configuration documents
 * - Applying command-line overrides before validation
 * - Validating against the schema with fail-fast behavior
 * - Freezing configuration to enforce immutability
 */

import { existsSync, readFileSync } from "node:fs";
import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodIssue } from "zod";
import { MigrationConfigSchema, type MigrationConfig } from "./schema.js";
import type { ExecutionMode } from "./enums.js";

/**
 * Structured validation error for migration configuration.
 */
export class MigrationConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[] = []) {
    super(message);
    this.name = "MigrationConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = ["Migration configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

/**
 * Values supplied on the command line. They take precedence over the file.
 */
export interface ConfigOverrides {
  rootPath?: string;
  projectId?: string;
  region?: string;
  mode?: ExecutionMode;
  dryRun?: boolean;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const values: unknown[] = Object.values(obj);
  for (const value of values) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function withSection(
  raw: Record<string, unknown>,
  section: string,
  patch: Record<string, unknown>
): Record<string, unknown> {
  const existing = raw[section];
  return {
    ...raw,
    [section]: isRecord(existing) ? { ...existing, ...patch } : patch,
  };
}

/**
 * Merge command-line overrides into a raw configuration document.
 * Non-object documents are returned untouched so validation reports them.
 */
export function applyOverrides(raw: unknown, overrides: ConfigOverrides): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  let merged: Record<string, unknown> = raw;
  if (overrides.rootPath !== undefined) {
    merged = withSection(merged, "source", { rootPath: overrides.rootPath });
  }
  if (overrides.projectId !== undefined) {
    merged = withSection(merged, "target", { projectId: overrides.projectId });
  }
  if (overrides.region !== undefined) {
    merged = withSection(merged, "target", { region: overrides.region });
  }
  if (overrides.mode !== undefined) {
    merged = withSection(merged, "execution", { mode: overrides.mode });
  }
  if (overrides.dryRun !== undefined) {
    merged = withSection(merged, "execution", { dryRun: overrides.dryRun });
  }
  return merged;
}

/**
 * Validate and load migration configuration.
 *
 * @param input - Raw configuration object (already parsed)
 * @param overrides - Command-line values applied before validation
 * @returns Validated and frozen MigrationConfig
 * @throws MigrationConfigError if validation fails
 */
export function loadMigrationConfig(
  input: unknown,
  overrides: ConfigOverrides = {}
): Readonly<MigrationConfig> {
  const result = MigrationConfigSchema.safeParse(applyOverrides(input, overrides));

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new MigrationConfigError(
      `Invalid migration configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Parse a YAML or JSON configuration document.
 */
export function parseConfigDocument(text: string, sourceName: string): unknown {
  try {
    return parseYaml(text);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new MigrationConfigError(`Could not parse ${sourceName}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Read, parse and validate a configuration file.
 */
export function loadMigrationConfigFile(
  filePath: string,
  overrides: ConfigOverrides = {}
): Readonly<MigrationConfig> {
  if (!existsSync(filePath)) {
    throw new MigrationConfigError(`Configuration file not found: ${filePath}`);
  }
  const document = parseConfigDocument(readFileSync(filePath, "utf-8"), filePath);
  if (document === null || document === undefined) {
    throw new MigrationConfigError(`Configuration file is empty: ${filePath}`);
  }
  return loadMigrationConfig(document, overrides);
}
