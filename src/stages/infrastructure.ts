/**
 * Infrastructure stage: gcloud access, project APIs, and the Artifact
 * Registry repository images are pushed to.
 */

import {
  artifactEntry,
  milestone,
  NonRetryableError,
  succeeded,
  type StageDefinition,
} from "../pipeline/index.js";
import { EventType } from "../types/index.js";
import { ANALYSIS, INFRASTRUCTURE, type Infrastructure } from "./artifacts.js";
import { shellQuote, stageShell, type StageDeps } from "./common.js";

export const BASE_APIS = [
  "run.googleapis.com",
  "artifactregistry.googleapis.com",
  "cloudbuild.googleapis.com",
  "firebasehosting.googleapis.com",
];

export function requiredApis(deps: StageDeps): string[] {
  return deps.config.database.strategy === "cloud-sql"
    ? [...BASE_APIS, "sqladmin.googleapis.com"]
    : [...BASE_APIS];
}

export function repositoryUrl(region: string, projectId: string, repository: string): string {
  return `${region}-docker.pkg.dev/${projectId}/${repository}`;
}

export function createInfrastructureStage(deps: StageDeps): StageDefinition {
  const { target, execution } = deps.config;
  const shell = stageShell(deps, "infrastructure");
  const scope = `--location=${target.region} --project=${target.projectId}`;

  // Set once this run creates the repository; survives retries
  let createdRepository: string | undefined;

  return {
    name: "infrastructure",
    critical: true,
    dependsOn: ["analysis"],

    async execute(context) {
      context.requireArtifact(ANALYSIS);
      const log = context.logger;

      const gcloud = await shell.run("gcloud --version");
      if (gcloud.exitCode !== 0) {
        throw new NonRetryableError("gcloud CLI not available. Install the Google Cloud SDK.");
      }

      if (target.serviceAccountKey) {
        await shell.check(
          "Service account authentication",
          `gcloud auth activate-service-account --key-file=${shellQuote(target.serviceAccountKey)}`
        );
      } else {
        const accounts = await shell.run(
          `gcloud auth list --filter=status:ACTIVE --format=${shellQuote("value(account)")}`
        );
        const active = accounts.exitCode === 0 && accounts.stdout.trim().length > 0;
        if (!active && !execution.dryRun) {
          throw new NonRetryableError(
            "Not authenticated with gcloud. Run 'gcloud auth login' before migrating."
          );
        }
      }

      await shell.check("Setting the project", `gcloud config set project ${target.projectId}`);

      const apis = requiredApis(deps);
      await shell.check(
        "Enabling APIs",
        `gcloud services enable ${apis.join(" ")} --project=${target.projectId}`
      );

      const repository = target.artifactRepository;
      if (await shell.exists(`gcloud artifacts repositories describe ${repository} ${scope}`)) {
        log.info("Artifact Registry repository exists", { repository });
      } else {
        await shell.check(
          "Creating the Artifact Registry repository",
          `gcloud artifacts repositories create ${repository} --repository-format=docker ${scope} ` +
            `--description=${shellQuote("Migrated application images")} --quiet`
        );
        createdRepository = repository;
        log.info("Artifact Registry repository created", { repository });
      }

      const warnings: string[] = [];
      const firebase = await shell.run("firebase --version");
      if (firebase.exitCode !== 0) {
        warnings.push(
          "Firebase CLI not found. Install firebase-tools before the frontend is deployed."
        );
      }

      const infrastructure: Infrastructure = {
        projectId: target.projectId,
        region: target.region,
        repositoryName: repository,
        repositoryUrl: repositoryUrl(target.region, target.projectId, repository),
        repositoryCreated: createdRepository === repository,
        firebaseAvailable: firebase.exitCode === 0,
        enabledApis: apis,
      };

      return succeeded(
        {
          projectId: infrastructure.projectId,
          region: infrastructure.region,
          repositoryUrl: infrastructure.repositoryUrl,
          repositoryCreated: infrastructure.repositoryCreated,
        },
        {
          artifacts: [artifactEntry(INFRASTRUCTURE, infrastructure)],
          milestones: [
            milestone(EventType.InfraReady, {
              projectId: infrastructure.projectId,
              region: infrastructure.region,
              repositoryUrl: infrastructure.repositoryUrl,
            }),
          ],
          warnings,
        }
      );
    },

    async rollback(context) {
      if (!createdRepository) return;
      await shell.check(
        "Deleting the Artifact Registry repository",
        `gcloud artifacts repositories delete ${createdRepository} ${scope} --quiet`
      );
      context.logger.info("Artifact Registry repository deleted", { repository: createdRepository });
      createdRepository = undefined;
    },
  };
}
