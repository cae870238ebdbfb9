/**
 * JavaScript frontend analysis.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { errorMessage, NonRetryableError } from "../pipeline/errors.js";
import { readTextIfExists, walkFiles } from "./files.js";
import type { FrontendAnalysis, FrontendFramework, PackageManager } from "./schema.js";

const PackageJsonSchema = z
  .object({
    dependencies: z.record(z.string()).default({}),
    devDependencies: z.record(z.string()).default({}),
    scripts: z.record(z.string()).default({}),
  })
  .passthrough();

export type PackageJson = z.infer<typeof PackageJsonSchema>;

const OUTPUT_DIRS: Record<FrontendFramework, string> = {
  next: "out",
  vite: "dist",
  "create-react-app": "build",
  unknown: "build",
};

const API_URL_VARIABLES: Record<FrontendFramework, string> = {
  next: "NEXT_PUBLIC_API_URL",
  vite: "VITE_API_URL",
  "create-react-app": "REACT_APP_API_URL",
  unknown: "REACT_APP_API_URL",
};

const ENV_FILES = [".env", ".env.local", ".env.production"];

/**
 * @throws NonRetryableError when the file is not JSON or has the wrong shape
 */
export function parsePackageJson(text: string, path = "package.json"): PackageJson {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new NonRetryableError(`Could not parse ${path}: ${errorMessage(err)}`);
  }

  const parsed = PackageJsonSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new NonRetryableError(`Invalid ${path}: ${at}: ${issue.message}`);
  }
  return parsed.data;
}

export function detectFramework(pkg: PackageJson): FrontendFramework {
  const deps = { ...pkg.dependencies, ...pkg.devDependencies };
  if ("next" in deps) return "next";
  if ("vite" in deps || "@vitejs/plugin-react" in deps) return "vite";
  if ("react-scripts" in deps) return "create-react-app";
  return "unknown";
}

export function detectPackageManager(dir: string): PackageManager {
  if (existsSync(join(dir, "pnpm-lock.yaml"))) return "pnpm";
  if (existsSync(join(dir, "yarn.lock"))) return "yarn";
  return "npm";
}

/** Variable names assigned in a dotenv file. */
export function parseEnvNames(text: string): string[] {
  return [...text.matchAll(/^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/gm)].map(
    (match) => match[1]
  );
}

const URL_LITERAL = /["'`](https?:\/\/[^"'`\s]+)["'`]/g;

export function findUrlLiterals(source: string): string[] {
  return [...source.matchAll(URL_LITERAL)].map((match) => match[1]);
}

export async function analyzeFrontend(dir: string): Promise<FrontendAnalysis> {
  const packageManager = detectPackageManager(dir);
  const text = await readTextIfExists(join(dir, "package.json"));

  if (text === undefined) {
    return {
      present: false,
      framework: "unknown",
      packageManager,
      reactVersion: null,
      buildCommand: null,
      outputDir: OUTPUT_DIRS.unknown,
      apiUrlVariable: API_URL_VARIABLES.unknown,
      envVars: [],
      hardcodedUrls: [],
      dependencies: [],
    };
  }

  const pkg = parsePackageJson(text, join(dir, "package.json"));
  const framework = detectFramework(pkg);

  const envVars: string[] = [];
  for (const name of ENV_FILES) {
    const env = await readTextIfExists(join(dir, name));
    if (env !== undefined) {
      for (const variable of parseEnvNames(env)) {
        if (!envVars.includes(variable)) envVars.push(variable);
      }
    }
  }

  const urls = new Set<string>();
  const sourceDir = join(dir, "src");
  for (const file of await walkFiles(sourceDir, [".js", ".jsx", ".ts", ".tsx"])) {
    const source = (await readTextIfExists(join(sourceDir, file))) ?? "";
    for (const url of findUrlLiterals(source)) urls.add(url);
  }

  const apiUrlVariable =
    envVars.find((name) => name.includes("API") && name.includes("URL")) ??
    API_URL_VARIABLES[framework];

  return {
    present: true,
    framework,
    packageManager,
    reactVersion: pkg.dependencies["react"] ?? null,
    buildCommand: "build" in pkg.scripts ? `${packageManager} run build` : null,
    outputDir: OUTPUT_DIRS[framework],
    apiUrlVariable,
    envVars,
    hardcodedUrls: [...urls].sort(),
    dependencies: Object.keys(pkg.dependencies).sort(),
  };
}
