/**
 * Migration configuration schema definition.
 *
 * Validated once before any stage runs, then frozen for the rest of the run.
 *
 * Required sections: source, target, stages.
 * Everything else falls back to defaults.
 */

import { z } from "zod";
import {
  AdvisorRole,
  DatabaseStrategy,
  ExecutionMode,
} from "./enums.js";

/**
 * Where the application to migrate lives.
 */
export const SourceSchema = z
  .object({
    /** Root of the repository holding both tiers */
    rootPath: z.string().min(1).describe("Path to the application repository"),

    /** Backend directory, relative to rootPath */
    backendPath: z
      .string()
      .min(1)
      .default("backend")
      .describe("Spring Boot project directory relative to rootPath"),

    /** Frontend directory, relative to rootPath */
    frontendPath: z
      .string()
      .min(1)
      .default("frontend")
      .describe("JavaScript frontend directory relative to rootPath"),
  })
  .strict();

export type SourceConfig = z.infer<typeof SourceSchema>;

/**
 * Target cloud project.
 */
export const TargetSchema = z
  .object({
    projectId: z
      .string()
      .regex(
        /^[a-z][a-z0-9-]{4,28}[a-z0-9]$/,
        "Project ID must be 6-30 lowercase letters, digits or hyphens, starting with a letter"
      )
      .describe("Cloud project that receives the deployment"),

    region: z.string().min(1).default("us-central1").describe("Deployment region"),

    artifactRepository: z
      .string()
      .regex(/^[a-z][a-z0-9-]*$/, "Repository name must be lowercase letters, digits or hyphens")
      .default("migrated-apps")
      .describe("Artifact Registry repository for container images"),

    /** Optional service account key file; otherwise the active gcloud account is used */
    serviceAccountKey: z.string().min(1).optional(),
  })
  .strict();

export type TargetConfig = z.infer<typeof TargetSchema>;

/**
 * Per-stage tunables.
 */
export const StageTunablesSchema = z
  .object({
    /** Attempts for transient failures (1 = no retry) */
    maxAttempts: z.number().int().min(1).max(10).default(3),

    /** Advisor role override; see DEFAULT_STAGE_ROLES */
    advisorRole: AdvisorRole.optional(),

    /** Timeout applied to every shell command the stage runs */
    commandTimeoutSeconds: z.number().int().min(1).max(3600).default(300),
  })
  .strict();

export type StageTunables = z.infer<typeof StageTunablesSchema>;

export const StagesSchema = z
  .object({
    analysis: StageTunablesSchema.default({}),
    infrastructure: StageTunablesSchema.default({}),
    database: StageTunablesSchema.default({}),
    backend: StageTunablesSchema.default({}),
    frontend: StageTunablesSchema.default({}),
  })
  .strict();

export type StagesConfig = z.infer<typeof StagesSchema>;

/**
 * Cloud Run service sizing.
 */
export const BackendSchema = z
  .object({
    serviceName: z
      .string()
      .regex(/^[a-z]([-a-z0-9]*[a-z0-9])?$/, "Service name must be a lowercase DNS label")
      .default("backend-api"),
    port: z.number().int().min(1).max(65535).default(8080),
    memory: z.string().min(1).default("512Mi"),
    cpu: z.string().min(1).default("1"),
    minInstances: z.number().int().min(0).default(0),
    maxInstances: z.number().int().min(1).default(3),
    timeoutSeconds: z.number().int().min(1).max(3600).default(300),
    allowUnauthenticated: z.boolean().default(true),
    envVars: z.record(z.string()).default({}),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.minInstances > value.maxInstances) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["minInstances"],
        message: `minInstances (${value.minInstances}) exceeds maxInstances (${value.maxInstances})`,
      });
    }
  });

export type BackendConfig = z.infer<typeof BackendSchema>;

/**
 * Frontend build and hosting overrides. Unset fields are detected from the
 * frontend's package.json.
 */
export const FrontendSchema = z
  .object({
    siteName: z.string().min(1).optional(),
    buildCommand: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    apiUrlVariable: z
      .string()
      .regex(/^[A-Z_][A-Z0-9_]*$/, "Must be an environment variable name")
      .optional(),
  })
  .strict();

export type FrontendConfig = z.infer<typeof FrontendSchema>;

export const CloudSqlSchema = z
  .object({
    instanceName: z.string().min(1).default("app-db"),
    tier: z.string().min(1).default("db-f1-micro"),
    databaseName: z.string().min(1).default("appdb"),
    databaseVersion: z.string().min(1).default("POSTGRES_15"),
  })
  .strict();

export const DatabaseSchema = z
  .object({
    strategy: DatabaseStrategy.default("keep-h2"),
    cloudSql: CloudSqlSchema.default({}),
  })
  .strict();

export type DatabaseConfig = z.infer<typeof DatabaseSchema>;

/**
 * Advisor model routing. Every role maps to one concrete model identifier.
 */
export const AdvisorSchema = z
  .object({
    models: z
      .object({
        analysis: z.string().min(1).default("claude-sonnet-4-5"),
        codegen: z.string().min(1).default("claude-sonnet-4-5"),
        review: z.string().min(1).default("claude-haiku-4-5"),
      })
      .strict()
      .default({}),
    maxOutputTokens: z.number().int().min(256).max(64000).default(4096),
    timeoutSeconds: z.number().int().min(1).max(1800).default(120),
  })
  .strict();

export type AdvisorConfig = z.infer<typeof AdvisorSchema>;

export const ExecutionSchema = z
  .object({
    mode: ExecutionMode.default("automated"),
    dryRun: z.boolean().default(false),

    /** Run backend and frontend in one tier; frontend waits for the backend address */
    parallelDeployments: z.boolean().default(false),
    backendWaitTimeoutSeconds: z.number().int().min(1).default(600),
    backendPollIntervalSeconds: z.number().int().min(1).default(5),

    /** Base delay for exponential retry backoff */
    retryBaseDelayMs: z.number().int().min(0).default(1000),

    /** Roll back failed stages when the pipeline aborts */
    cleanupOnFailure: z.boolean().default(true),
    generateReport: z.boolean().default(true),
    outputDir: z.string().min(1).default("migration-output"),
  })
  .strict();

export type ExecutionConfig = z.infer<typeof ExecutionSchema>;

/**
 * Complete migration configuration.
 */
export const MigrationConfigSchema = z
  .object({
    source: SourceSchema,
    target: TargetSchema,
    stages: StagesSchema,
    backend: BackendSchema.default({}),
    frontend: FrontendSchema.default({}),
    database: DatabaseSchema.default({}),
    advisor: AdvisorSchema.default({}),
    execution: ExecutionSchema.default({}),
  })
  .strict();

export type MigrationConfig = z.infer<typeof MigrationConfigSchema>;
export type MigrationConfigInput = z.input<typeof MigrationConfigSchema>;
