/**
 * Migration stages.
 */

export { buildMigrationPipeline, withStageRetry, type PipelineDeps } from "./pipeline.js";
export {
  CommandFailedError,
  StageShell,
  consultAdvisor,
  parseRecommendations,
  shellQuote,
  type StageDeps,
} from "./common.js";
export {
  ANALYSIS,
  INFRASTRUCTURE,
  DATABASE,
  BACKEND_URL,
  FRONTEND_URL,
  type Infrastructure,
  type DatabaseResult,
} from "./artifacts.js";
export { createAnalysisStage } from "./analysis.js";
export { createInfrastructureStage } from "./infrastructure.js";
export { createDatabaseStage } from "./database.js";
export { createBackendStage } from "./backend.js";
export { createFrontendStage } from "./frontend.js";
