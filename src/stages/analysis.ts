/**
 * Analysis stage.
 *
 * Scans the source tree, then asks the advisor for migration
 * recommendations. The advisor may read files through a tool that cannot
 * leave the source root.
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { tool } from "ai";
import { z } from "zod";
import { analyzeSource, type CodeAnalysis } from "../analysis/index.js";
import {
  artifactEntry,
  failed,
  milestone,
  NonRetryableError,
  succeeded,
  type StageDefinition,
} from "../pipeline/index.js";
import { EventType } from "../types/index.js";
import { ANALYSIS } from "./artifacts.js";
import { consultAdvisor, parseRecommendations, sourceDir, type StageDeps } from "./common.js";

const MAX_TOOL_READ_CHARS = 20_000;

const INSTRUCTIONS =
  "You are a cloud migration engineer moving Spring Boot and React applications to " +
  "Google Cloud Run and Firebase Hosting. Answer with a JSON array of short, specific " +
  "recommendations and nothing else.";

/**
 * Read a file below root. Paths that resolve outside root are refused.
 */
export async function readSandboxedFile(root: string, path: string): Promise<string> {
  const base = resolve(root);
  const target = resolve(base, path);
  const rel = relative(base, target);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new NonRetryableError(`Path is outside the source tree: ${path}`);
  }
  const text = await readFile(target, "utf-8");
  return text.length > MAX_TOOL_READ_CHARS
    ? `${text.slice(0, MAX_TOOL_READ_CHARS)}\n[truncated]`
    : text;
}

export function createReadSourceFileTool(root: string) {
  return tool({
    description: "Read a text file from the application's source tree",
    inputSchema: z.object({
      path: z.string().describe("Path relative to the repository root"),
    }),
    execute: async ({ path }) => readSandboxedFile(root, path),
  });
}

export function buildAnalysisPrompt(analysis: CodeAnalysis): string {
  const { backend, frontend, database } = analysis;
  return [
    "Recommend how to migrate this application to Google Cloud.",
    "",
    `Backend: ${backend.buildTool}, Java ${backend.javaVersion ?? "unknown"}, ` +
      `Spring Boot ${backend.springBootVersion ?? "unknown"}, port ${backend.serverPort ?? 8080}, ` +
      `${backend.controllers.length} controller(s), Dockerfile ${backend.hasDockerfile ? "present" : "absent"}`,
    `Frontend: ${frontend.framework} (${frontend.packageManager}), output ${frontend.outputDir}, ` +
      `API variable ${frontend.apiUrlVariable}, ${frontend.hardcodedUrls.length} hard-coded URL(s)`,
    `Database: ${database.type} (${database.mode})`,
    "",
    "Cover database persistence, container sizing for Cloud Run, frontend hosting, " +
      "configuration and secrets. Use readSourceFile to check details before recommending.",
  ].join("\n");
}

export function createAnalysisStage(deps: StageDeps): StageDefinition {
  return {
    name: "analysis",
    critical: true,
    async execute(context) {
      const { source } = deps.config;
      if (!existsSync(source.rootPath)) {
        throw new NonRetryableError(`Source path does not exist: ${source.rootPath}`);
      }

      const analysis = await analyzeSource(source.rootPath, source.backendPath, source.frontendPath);

      const errors: string[] = [];
      if (!analysis.backend.present) {
        errors.push(`Backend path not found: ${sourceDir(deps, source.backendPath)}`);
      }
      if (!analysis.frontend.present) {
        errors.push(`Frontend package.json not found under: ${sourceDir(deps, source.frontendPath)}`);
      }
      if (errors.length > 0) {
        return failed(errors);
      }

      context.logger.info("Source analyzed", {
        buildTool: analysis.backend.buildTool,
        framework: analysis.frontend.framework,
        database: analysis.database.type,
      });

      const advice = await consultAdvisor(deps, "analysis", context, {
        instructions: INSTRUCTIONS,
        prompt: buildAnalysisPrompt(analysis),
        tools: { readSourceFile: createReadSourceFileTool(source.rootPath) },
      });
      const result: CodeAnalysis = {
        ...analysis,
        recommendations: parseRecommendations(advice.text),
      };

      return succeeded(
        {
          buildTool: result.backend.buildTool,
          framework: result.frontend.framework,
          database: `${result.database.type}/${result.database.mode}`,
          controllers: result.backend.controllers.length,
          recommendations: result.recommendations.length,
        },
        {
          artifacts: [artifactEntry(ANALYSIS, result)],
          milestones: [
            milestone(EventType.AnalysisComplete, {
              buildTool: result.backend.buildTool,
              framework: result.frontend.framework,
              databaseType: result.database.type,
              databaseMode: result.database.mode,
            }),
          ],
          warnings: advice.warning ? [advice.warning] : [],
        }
      );
    },
  };
}
