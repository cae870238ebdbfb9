/**
 * Artifacts the migration stages hand to each other.
 */

import { z } from "zod";
import { CodeAnalysisSchema } from "../analysis/index.js";
import { DatabaseStrategy } from "../config/index.js";
import { artifactKey, URL_ARTIFACT_PREFIX } from "../pipeline/index.js";

export const InfrastructureSchema = z.object({
  projectId: z.string(),
  region: z.string(),
  repositoryName: z.string(),
  /** Image prefix: <region>-docker.pkg.dev/<project>/<repository> */
  repositoryUrl: z.string(),
  repositoryCreated: z.boolean(),
  firebaseAvailable: z.boolean(),
  enabledApis: z.array(z.string()),
});

export type Infrastructure = z.infer<typeof InfrastructureSchema>;

export const DatabaseResultSchema = z.object({
  strategy: DatabaseStrategy,
  action: z.enum(["kept-h2", "kept-existing", "created-cloud-sql", "reused-cloud-sql"]),
  instanceName: z.string().nullable(),
  databaseName: z.string().nullable(),
  /** <project>:<region>:<instance>, for the Cloud SQL connector */
  connectionName: z.string().nullable(),
  recommendations: z.array(z.string()),
});

export type DatabaseResult = z.infer<typeof DatabaseResultSchema>;

export const ANALYSIS = artifactKey("analysis", CodeAnalysisSchema);
export const INFRASTRUCTURE = artifactKey("infrastructure", InfrastructureSchema);
export const DATABASE = artifactKey("database", DatabaseResultSchema);
export const BACKEND_URL = artifactKey(`${URL_ARTIFACT_PREFIX}backend`, z.string().url());
export const FRONTEND_URL = artifactKey(`${URL_ARTIFACT_PREFIX}frontend`, z.string().url());
