/**
 * Default values that sit outside the schema.
 */

import { DEFAULT_STAGE_ROLES, type AdvisorRole, type MigrationStage } from "./enums.js";
import type { MigrationConfig } from "./schema.js";

/** Default configuration file name looked up by the CLI */
export const DEFAULT_CONFIG_FILE = "migration.config.yaml";

/** Report file written under execution.outputDir */
export const REPORT_FILE_NAME = "migration-report.json";

/**
 * Advisor role a stage uses: its configured override, or the stage default.
 */
export function resolveAdvisorRole(
  config: Readonly<MigrationConfig>,
  stage: MigrationStage
): AdvisorRole {
  return config.stages[stage].advisorRole ?? DEFAULT_STAGE_ROLES[stage];
}
