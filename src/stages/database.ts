/**
 * Database stage (non-critical).
 *
 * keep-h2 leaves the embedded database in place and records what that means
 * on Cloud Run. cloud-sql provisions a managed instance and database.
 */

import type { DatabaseAnalysis } from "../analysis/index.js";
import {
  artifactEntry,
  milestone,
  succeeded,
  type StageContext,
  type StageDefinition,
} from "../pipeline/index.js";
import { EventType } from "../types/index.js";
import { ANALYSIS, DATABASE, INFRASTRUCTURE, type DatabaseResult } from "./artifacts.js";
import { consultAdvisor, parseRecommendations, stageShell, type StageDeps } from "./common.js";

/**
 * Warnings for running the detected database unchanged on Cloud Run.
 */
export function keepDatabaseWarnings(database: DatabaseAnalysis): string[] {
  if (database.type === "h2" && database.mode === "in-memory") {
    return [
      "H2 in-memory database loses all data whenever a Cloud Run instance restarts",
      "Cloud Run may restart or scale instances at any time; use Cloud SQL for production data",
    ];
  }
  if (database.type === "h2" && database.mode === "file-based") {
    return [
      "H2 file-based database writes to the container filesystem, which Cloud Run does not persist",
      "Each Cloud Run instance gets its own copy of the database file",
    ];
  }
  if (database.type === "postgresql" || database.type === "mysql") {
    return [`Existing ${database.type} server must be reachable from Cloud Run`];
  }
  return [];
}

const ACTION_SUMMARY: Record<DatabaseResult["action"], (result: DatabaseResult) => string> = {
  "kept-h2": () => "The database is left as it is.",
  "kept-existing": () => "The database is left as it is.",
  "created-cloud-sql": (result) =>
    `A Cloud SQL instance "${result.instanceName}" was created with database "${result.databaseName}".`,
  "reused-cloud-sql": (result) =>
    `The existing Cloud SQL instance "${result.instanceName}" is used with database "${result.databaseName}".`,
};

function buildReviewPrompt(database: DatabaseAnalysis, result: DatabaseResult): string {
  return [
    `The backend uses ${database.type} (${database.mode}).`,
    ACTION_SUMMARY[result.action](result),
    "List up to five concrete follow-up steps for running it on Cloud Run, as a JSON array of strings.",
  ].join("\n");
}

export function createDatabaseStage(deps: StageDeps): StageDefinition {
  const { database: settings, target } = deps.config;
  const shell = stageShell(deps, "database");

  let createdInstance: string | undefined;

  async function provisionCloudSql(context: StageContext): Promise<DatabaseResult> {
    const { instanceName, databaseName, tier, databaseVersion } = settings.cloudSql;
    const project = `--project=${target.projectId}`;

    if (await shell.exists(`gcloud sql instances describe ${instanceName} ${project}`)) {
      context.logger.info("Cloud SQL instance exists", { instanceName });
    } else {
      context.logger.info("Creating Cloud SQL instance (this can take several minutes)", {
        instanceName,
        tier,
      });
      await shell.check(
        "Creating the Cloud SQL instance",
        `gcloud sql instances create ${instanceName} --database-version=${databaseVersion} ` +
          `--tier=${tier} --region=${target.region} ${project} --quiet`
      );
      createdInstance = instanceName;
    }

    const databaseExists = await shell.exists(
      `gcloud sql databases describe ${databaseName} --instance=${instanceName} ${project}`
    );
    if (!databaseExists) {
      await shell.check(
        "Creating the database",
        `gcloud sql databases create ${databaseName} --instance=${instanceName} ${project} --quiet`
      );
    }

    return {
      strategy: "cloud-sql",
      // An instance created by an earlier attempt of this run still counts as created
      action: createdInstance === instanceName ? "created-cloud-sql" : "reused-cloud-sql",
      instanceName,
      databaseName,
      connectionName: `${target.projectId}:${target.region}:${instanceName}`,
      recommendations: [],
    };
  }

  return {
    name: "database",
    critical: false,
    dependsOn: ["infrastructure"],

    async execute(context) {
      const analysis = context.requireArtifact(ANALYSIS);
      context.requireArtifact(INFRASTRUCTURE);

      const warnings: string[] = [];
      let result: DatabaseResult;

      if (settings.strategy === "cloud-sql") {
        result = await provisionCloudSql(context);
      } else {
        warnings.push(...keepDatabaseWarnings(analysis.database));
        result = {
          strategy: "keep-h2",
          action: analysis.database.type === "h2" ? "kept-h2" : "kept-existing",
          instanceName: null,
          databaseName: null,
          connectionName: null,
          recommendations: [],
        };
      }

      const advice = await consultAdvisor(deps, "database", context, {
        prompt: buildReviewPrompt(analysis.database, result),
      });
      if (advice.warning) warnings.push(advice.warning);
      result = {
        ...result,
        recommendations: [...analysis.database.notes, ...parseRecommendations(advice.text)],
      };

      return succeeded(
        {
          strategy: result.strategy,
          action: result.action,
          ...(result.connectionName ? { connectionName: result.connectionName } : {}),
        },
        {
          artifacts: [artifactEntry(DATABASE, result)],
          milestones: [
            milestone(EventType.DbMigrated, {
              strategy: result.strategy,
              action: result.action,
              connectionName: result.connectionName,
            }),
          ],
          warnings,
        }
      );
    },

    async rollback(context) {
      if (!createdInstance) return;
      await shell.check(
        "Deleting the Cloud SQL instance",
        `gcloud sql instances delete ${createdInstance} --project=${target.projectId} --quiet`
      );
      context.logger.info("Cloud SQL instance deleted", { instanceName: createdInstance });
      createdInstance = undefined;
    },
  };
}
