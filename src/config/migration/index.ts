/**
 * Migration configuration module.
 *
 * Usage:
 *   import { loadMigrationConfigFile } from "./config/migration/index.js";
 *
 *   const config = loadMigrationConfigFile("migration.config.yaml", {
 *     projectId: "demo-project",
 *     dryRun: true,
 *   });
 */

// Domain enums
export {
  MigrationStage,
  AdvisorRole,
  ExecutionMode,
  DatabaseStrategy,
  DEFAULT_STAGE_ROLES,
} from "./enums.js";

// Schema types
export type {
  MigrationConfig,
  MigrationConfigInput,
  SourceConfig,
  TargetConfig,
  StageTunables,
  StagesConfig,
  BackendConfig,
  FrontendConfig,
  DatabaseConfig,
  AdvisorConfig,
  ExecutionConfig,
} from "./schema.js";

// Schema objects
export { MigrationConfigSchema, StageTunablesSchema } from "./schema.js";

// Loader and validation
export {
  loadMigrationConfig,
  loadMigrationConfigFile,
  parseConfigDocument,
  applyOverrides,
  MigrationConfigError,
  type ConfigOverrides,
  type ConfigValidationIssue,
} from "./loader.js";

// Defaults
export { DEFAULT_CONFIG_FILE, REPORT_FILE_NAME, resolveAdvisorRole } from "./defaults.js";
