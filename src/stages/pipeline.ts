/**
 * The five-stage migration pipeline.
 *
 *   [analysis] -> [infrastructure] -> [database] -> [backend] -> [frontend]
 *
 * With execution.parallelDeployments the last two share one group and the
 * frontend waits for the backend-deployed event.
 */

import type { MigrationStage } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { withRetry, type StageDefinition, type StageGroup } from "../pipeline/index.js";
import { createAnalysisStage } from "./analysis.js";
import { createBackendStage } from "./backend.js";
import type { StageDeps } from "./common.js";
import { createDatabaseStage } from "./database.js";
import { createFrontendStage } from "./frontend.js";
import { createInfrastructureStage } from "./infrastructure.js";

export interface PipelineDeps extends StageDeps {
  readonly logger: Logger;
}

/**
 * Compose the configured retry policy onto a stage's work.
 */
export function withStageRetry(
  definition: StageDefinition,
  stage: MigrationStage,
  deps: PipelineDeps
): StageDefinition {
  return {
    ...definition,
    execute: withRetry(definition.execute, {
      maxAttempts: deps.config.stages[stage].maxAttempts,
      baseDelayMs: deps.config.execution.retryBaseDelayMs,
      label: stage,
      logger: deps.logger.child(stage),
    }),
  };
}

export function buildMigrationPipeline(deps: PipelineDeps): StageGroup[] {
  const analysis = withStageRetry(createAnalysisStage(deps), "analysis", deps);
  const infrastructure = withStageRetry(createInfrastructureStage(deps), "infrastructure", deps);
  const database = withStageRetry(createDatabaseStage(deps), "database", deps);
  const backend = withStageRetry(createBackendStage(deps), "backend", deps);
  const frontend = withStageRetry(createFrontendStage(deps), "frontend", deps);

  if (deps.config.execution.parallelDeployments) {
    return [[analysis], [infrastructure], [database], [backend, frontend]];
  }

  return [
    [analysis],
    [infrastructure],
    [database],
    [backend],
    [{ ...frontend, dependsOn: [...(frontend.dependsOn ?? []), "backend"] }],
  ];
}
