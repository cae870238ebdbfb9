/**
 * Source analysis for a two-tier application.
 *
 * Usage:
 *   const analysis = await analyzeSource("/repo", "backend", "frontend");
 *   analysis.database.mode; // "in-memory"
 */

import { join } from "node:path";
import { analyzeBackend } from "./backend.js";
import { analyzeDatabase } from "./database.js";
import { analyzeFrontend } from "./frontend.js";
import type { CodeAnalysis } from "./schema.js";

export async function analyzeSource(
  root: string,
  backendPath: string,
  frontendPath: string
): Promise<CodeAnalysis> {
  const [backend, frontend] = await Promise.all([
    analyzeBackend(join(root, backendPath)),
    analyzeFrontend(join(root, frontendPath)),
  ]);

  return {
    sourceRoot: root,
    backend,
    frontend,
    database: analyzeDatabase(backend.datasourceUrl),
    recommendations: [],
  };
}

export {
  analyzeBackend,
  parsePom,
  parseGradle,
  parseProperties,
  parseApplicationYaml,
  extractEndpoints,
  type ApplicationSettings,
  type BuildInfo,
} from "./backend.js";
export {
  analyzeFrontend,
  detectFramework,
  detectPackageManager,
  parsePackageJson,
  parseEnvNames,
  findUrlLiterals,
  type PackageJson,
} from "./frontend.js";
export { analyzeDatabase } from "./database.js";
export { walkFiles, readTextIfExists } from "./files.js";
export * from "./schema.js";
