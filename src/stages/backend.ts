/**
 * Backend stage: container image, Artifact Registry push, Cloud Run deploy.
 *
 * Dockerfile source, in order of preference:
 *   1. a Dockerfile already in the backend directory
 *   2. the advisor's answer in the codegen role, when it looks like one
 *   3. a multi-stage template for the detected build tool
 */

import { join } from "node:path";
import type { BackendAnalysis } from "../analysis/index.js";
import { extractCodeBlock } from "../collaborators/index.js";
import {
  artifactEntry,
  milestone,
  NonRetryableError,
  PipelineError,
  succeeded,
  type StageContext,
  type StageDefinition,
} from "../pipeline/index.js";
import { EventType } from "../types/index.js";
import { ANALYSIS, BACKEND_URL, DATABASE, INFRASTRUCTURE } from "./artifacts.js";
import {
  consultAdvisor,
  outputLocation,
  shellQuote,
  sourceDir,
  stageShell,
  writeGeneratedFile,
  type StageDeps,
} from "./common.js";

export type DockerfileSource = "existing" | "advisor" | "template";

const DEFAULT_JAVA_VERSION = "17";

/** Major Java version: "1.8" -> "8", "17.0.2" -> "17". */
export function javaMajor(version: string | null): string {
  if (!version) return DEFAULT_JAVA_VERSION;
  const parts = version.split(".");
  const major = parts[0] === "1" && parts.length > 1 ? parts[1] : parts[0];
  return /^\d+$/.test(major) ? major : DEFAULT_JAVA_VERSION;
}

export function dockerfileTemplate(backend: BackendAnalysis, port: number): string {
  const java = javaMajor(backend.javaVersion);

  const build =
    backend.buildTool === "gradle"
      ? [
          `FROM gradle:8-jdk${java} AS build`,
          "WORKDIR /app",
          "COPY . .",
          "RUN gradle bootJar --no-daemon -x test",
        ]
      : [
          `FROM maven:3.9-eclipse-temurin-${java} AS build`,
          "WORKDIR /app",
          "COPY pom.xml .",
          "RUN mvn -q dependency:go-offline",
          "COPY src ./src",
          "RUN mvn -q package -DskipTests",
        ];

  const jar = backend.buildTool === "gradle" ? "/app/build/libs/*.jar" : "/app/target/*.jar";

  return [
    ...build,
    "",
    `FROM eclipse-temurin:${java}-jre`,
    "WORKDIR /app",
    `COPY --from=build ${jar} app.jar`,
    `ENV PORT=${port}`,
    `EXPOSE ${port}`,
    'ENTRYPOINT ["sh", "-c", "java -Dserver.port=${PORT} -jar app.jar"]',
    "",
  ].join("\n");
}

/** An advisor answer is used only when its first instruction is FROM. */
export function looksLikeDockerfile(text: string): boolean {
  const first = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line.length > 0 && !line.startsWith("#"));
  return first !== undefined && /^FROM\s+\S+/i.test(first);
}

function buildDockerfilePrompt(backend: BackendAnalysis, port: number): string {
  return [
    "Write a production Dockerfile for this Spring Boot service on Google Cloud Run.",
    `Build tool: ${backend.buildTool}`,
    `Java version: ${javaMajor(backend.javaVersion)}`,
    `Spring Boot version: ${backend.springBootVersion ?? "unknown"}`,
    `The container must listen on the port in $PORT (default ${port}).`,
    "Use a multi-stage build and a JRE runtime image. Reply with the Dockerfile only.",
  ].join("\n");
}

export function formatEnvVars(envVars: Readonly<Record<string, string>>): string | undefined {
  const pairs = Object.entries(envVars).map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? pairs.join(",") : undefined;
}

export function dryRunServiceUrl(serviceName: string): string {
  return `https://${serviceName}-dry-run.a.run.app`;
}

export function createBackendStage(deps: StageDeps): StageDefinition {
  const { backend: service, target, execution } = deps.config;
  const shell = stageShell(deps, "backend");
  const scope = `--region=${target.region} --project=${target.projectId}`;

  let deployedService: string | undefined;

  async function prepareDockerfile(
    context: StageContext,
    backend: BackendAnalysis,
    backendDir: string
  ): Promise<{ path: string; source: DockerfileSource; warning?: string }> {
    if (backend.hasDockerfile) {
      return { path: join(backendDir, "Dockerfile"), source: "existing" };
    }
    if (backend.buildTool === "unknown") {
      throw new NonRetryableError(
        "Backend has no Dockerfile and no pom.xml or build.gradle to generate one from"
      );
    }

    const advice = await consultAdvisor(deps, "backend", context, {
      prompt: buildDockerfilePrompt(backend, service.port),
    });
    const answer = extractCodeBlock(advice.text);
    const fromAdvisor = looksLikeDockerfile(answer);

    const path = join(outputLocation(deps, "backend", backendDir), "Dockerfile");
    await writeGeneratedFile(path, fromAdvisor ? answer : dockerfileTemplate(backend, service.port));
    context.logger.info("Dockerfile written", { path, source: fromAdvisor ? "advisor" : "template" });

    return { path, source: fromAdvisor ? "advisor" : "template", warning: advice.warning };
  }

  return {
    name: "backend",
    critical: true,
    dependsOn: ["infrastructure", "database"],

    async execute(context) {
      const analysis = context.requireArtifact(ANALYSIS);
      const infra = context.requireArtifact(INFRASTRUCTURE);
      // Optional: the database stage is non-critical
      const database = context.artifact(DATABASE);

      const backendDir = sourceDir(deps, deps.config.source.backendPath);
      const dockerfile = await prepareDockerfile(context, analysis.backend, backendDir);
      const image = `${infra.repositoryUrl}/${service.serviceName}:${context.runId}`;

      await shell.check(
        "Configuring Docker credentials",
        `gcloud auth configure-docker ${target.region}-docker.pkg.dev --quiet`
      );
      await shell.check(
        "Building the image",
        `docker build --platform linux/amd64 -f ${shellQuote(dockerfile.path)} -t ${image} ${shellQuote(backendDir)}`
      );
      await shell.check("Pushing the image", `docker push ${image}`);

      const flags = [
        `--image=${image}`,
        `--port=${service.port}`,
        `--memory=${service.memory}`,
        `--cpu=${service.cpu}`,
        `--min-instances=${service.minInstances}`,
        `--max-instances=${service.maxInstances}`,
        `--timeout=${service.timeoutSeconds}`,
        scope,
        service.allowUnauthenticated ? "--allow-unauthenticated" : "--no-allow-unauthenticated",
      ];
      const envVars = formatEnvVars(service.envVars);
      if (envVars) flags.push(`--set-env-vars=${shellQuote(envVars)}`);
      if (database?.connectionName) flags.push(`--add-cloudsql-instances=${database.connectionName}`);

      // Only a service this run brings into existence is deleted on rollback
      const existed = await shell.exists(
        `gcloud run services describe ${service.serviceName} ${scope} --format=${shellQuote("value(metadata.name)")}`
      );
      await shell.check(
        "Deploying to Cloud Run",
        `gcloud run deploy ${service.serviceName} ${flags.join(" ")} --quiet`
      );
      if (!existed) deployedService = service.serviceName;

      const described = await shell.check(
        "Reading the service URL",
        `gcloud run services describe ${service.serviceName} ${scope} --format=${shellQuote("value(status.url)")}`
      );
      const url = execution.dryRun
        ? dryRunServiceUrl(service.serviceName)
        : described.stdout.trim().replace(/^'|'$/g, "");
      if (!url) {
        throw new PipelineError(`Cloud Run did not report a URL for ${service.serviceName}`);
      }
      context.logger.info("Backend deployed", { url });

      return succeeded(
        {
          serviceName: service.serviceName,
          image,
          url,
          dockerfile: dockerfile.source,
        },
        {
          artifacts: [artifactEntry(BACKEND_URL, url)],
          milestones: [
            milestone(EventType.BackendDeployed, {
              serviceName: service.serviceName,
              serviceUrl: url,
              image,
            }),
          ],
          warnings: dockerfile.warning ? [dockerfile.warning] : [],
        }
      );
    },

    async rollback(context) {
      if (!deployedService) return;
      await shell.check(
        "Deleting the Cloud Run service",
        `gcloud run services delete ${deployedService} ${scope} --quiet`
      );
      context.logger.info("Cloud Run service deleted", { serviceName: deployedService });
      deployedService = undefined;
    },
  };
}
