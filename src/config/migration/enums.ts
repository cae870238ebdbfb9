/**
 * Closed enumerations used by the migration configuration.
 *
 * Routing decisions (which model answers a prompt, which stage a tunable
 * belongs to) go through these enums, never through free-form strings.
 */

import { z } from "zod";

/**
 * The five migration stages, in pipeline order.
 */
export const MigrationStage = z.enum([
  "analysis",
  "infrastructure",
  "database",
  "backend",
  "frontend",
]);
export type MigrationStage = z.infer<typeof MigrationStage>;

/**
 * Advisor roles. Each role is mapped to a concrete model identifier in the
 * `advisor.models` section.
 *
 * - analysis: reading source code and producing recommendations
 * - codegen:  producing build artifacts (Dockerfiles)
 * - review:   short checks and operational advice
 */
export const AdvisorRole = z.enum(["analysis", "codegen", "review"]);
export type AdvisorRole = z.infer<typeof AdvisorRole>;

/**
 * Default advisor role per stage when `stages.<name>.advisorRole` is unset.
 */
export const DEFAULT_STAGE_ROLES: Readonly<Record<MigrationStage, AdvisorRole>> = {
  analysis: "analysis",
  infrastructure: "review",
  database: "review",
  backend: "codegen",
  frontend: "review",
};

/**
 * interactive: confirm before running. automated: run straight away.
 */
export const ExecutionMode = z.enum(["interactive", "automated"]);
export type ExecutionMode = z.infer<typeof ExecutionMode>;

/**
 * keep-h2:   leave the embedded H2 database in place (with warnings)
 * cloud-sql: provision a managed Cloud SQL instance and database
 */
export const DatabaseStrategy = z.enum(["keep-h2", "cloud-sql"]);
export type DatabaseStrategy = z.infer<typeof DatabaseStrategy>;
