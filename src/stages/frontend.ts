/**
 * Frontend stage: point the build at the deployed backend, build, and
 * deploy to Firebase Hosting.
 *
 * The backend address comes from the backend-deployed event. When the
 * deployment tier runs in parallel this is a bounded wait that gives up as
 * soon as the backend stage fails.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { readTextIfExists, type FrontendAnalysis } from "../analysis/index.js";
import {
  artifactEntry,
  milestone,
  MissingUpstreamError,
  succeeded,
  type StageContext,
  type StageDefinition,
} from "../pipeline/index.js";
import { EventType } from "../types/index.js";
import { ANALYSIS, FRONTEND_URL } from "./artifacts.js";
import {
  outputLocation,
  shellQuote,
  sourceDir,
  stageShell,
  writeGeneratedFile,
  type StageDeps,
} from "./common.js";

const BACKEND_STAGE = "backend";

/**
 * Set `name=value` in dotenv text, replacing an existing assignment.
 */
export function upsertEnvVariable(text: string, name: string, value: string): string {
  const lines = text.length > 0 ? text.replace(/\r?\n$/, "").split(/\r?\n/) : [];
  const assignment = `${name}=${value}`;
  const pattern = new RegExp(`^\\s*(?:export\\s+)?${name}\\s*=`);
  const index = lines.findIndex((line) => pattern.test(line));
  if (index >= 0) {
    lines[index] = assignment;
  } else {
    lines.push(assignment);
  }
  return `${lines.join("\n")}\n`;
}

export function firebaseConfig(publicDir: string, site?: string): Record<string, unknown> {
  return {
    hosting: {
      ...(site ? { site } : {}),
      public: publicDir,
      ignore: ["firebase.json", "**/.*", "**/node_modules/**"],
      rewrites: [{ source: "**", destination: "/index.html" }],
    },
  };
}

export function installCommand(frontend: FrontendAnalysis, dir: string): string {
  switch (frontend.packageManager) {
    case "yarn":
      return "yarn install --frozen-lockfile";
    case "pnpm":
      return "pnpm install --frozen-lockfile";
    case "npm":
      return existsSync(join(dir, "package-lock.json")) ? "npm ci" : "npm install";
  }
}

/** "Hosting URL: https://..." from firebase deploy output. */
export function parseHostingUrl(output: string): string | undefined {
  return /Hosting URL:\s*(\S+)/.exec(output)?.[1];
}

const BackendDeployedPayload = z.object({ serviceUrl: z.string().url() });

export function createFrontendStage(deps: StageDeps): StageDefinition {
  const { frontend: overrides, target, execution } = deps.config;
  const shell = stageShell(deps, "frontend");

  async function backendUrl(context: StageContext): Promise<string> {
    const event = await context.waitForEvent(EventType.BackendDeployed, {
      timeoutMs: execution.backendWaitTimeoutSeconds * 1000,
      pollIntervalMs: execution.backendPollIntervalSeconds * 1000,
      failWhen: (failure) => failure.sourceStage === BACKEND_STAGE,
    });
    const payload = BackendDeployedPayload.safeParse(event.payload);
    if (!payload.success) {
      throw new MissingUpstreamError("backend-deployed.serviceUrl", "event carries no valid URL");
    }
    return payload.data.serviceUrl;
  }

  return {
    name: "frontend",
    critical: true,
    dependsOn: ["infrastructure"],

    async execute(context) {
      const analysis = context.requireArtifact(ANALYSIS);
      const frontend = analysis.frontend;

      context.logger.info("Waiting for the backend address");
      const apiUrl = await backendUrl(context);

      // Last infra-ready event wins over the configured project
      const announced = context.latestEvent(EventType.InfraReady)?.payload.projectId;
      const projectId = typeof announced === "string" ? announced : target.projectId;

      const frontendDir = sourceDir(deps, deps.config.source.frontendPath);
      const generatedDir = outputLocation(deps, "frontend", frontendDir);
      const apiUrlVariable = overrides.apiUrlVariable ?? frontend.apiUrlVariable;
      const buildCommand =
        overrides.buildCommand ?? frontend.buildCommand ?? `${frontend.packageManager} run build`;
      const publicDir = overrides.outputDir ?? frontend.outputDir;

      const envText = (await readTextIfExists(join(frontendDir, ".env.production"))) ?? "";
      await writeGeneratedFile(
        join(generatedDir, ".env.production"),
        upsertEnvVariable(envText, apiUrlVariable, apiUrl)
      );

      const generatedFiles = [".env.production"];
      if (!existsSync(join(frontendDir, "firebase.json"))) {
        await writeGeneratedFile(
          join(generatedDir, "firebase.json"),
          JSON.stringify(firebaseConfig(publicDir, overrides.siteName), null, 2)
        );
        generatedFiles.push("firebase.json");
      }
      if (!existsSync(join(frontendDir, ".firebaserc"))) {
        await writeGeneratedFile(
          join(generatedDir, ".firebaserc"),
          JSON.stringify({ projects: { default: projectId } }, null, 2)
        );
        generatedFiles.push(".firebaserc");
      }

      await shell.check("Installing dependencies", installCommand(frontend, frontendDir), {
        cwd: frontendDir,
      });
      await shell.check(
        "Building the frontend",
        `${apiUrlVariable}=${shellQuote(apiUrl)} ${buildCommand}`,
        { cwd: frontendDir }
      );
      const deployed = await shell.check(
        "Deploying to Firebase Hosting",
        `firebase deploy --only hosting --project=${projectId}`,
        { cwd: frontendDir }
      );

      const url =
        parseHostingUrl(deployed.stdout) ?? `https://${overrides.siteName ?? projectId}.web.app`;
      context.logger.info("Frontend deployed", { url });

      return succeeded(
        {
          url,
          backendUrl: apiUrl,
          apiUrlVariable,
          generatedFiles,
        },
        {
          artifacts: [artifactEntry(FRONTEND_URL, url)],
          milestones: [
            milestone(EventType.FrontendDeployed, { hostingUrl: url, backendUrl: apiUrl }),
          ],
        }
      );
    },
  };
}
