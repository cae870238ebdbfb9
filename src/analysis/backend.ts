/**
 * Spring backend analysis.
 *
 * Reads the build file (Maven or Gradle), the Spring application
 * properties, and the controller sources. Parsing is pattern based: enough
 * to size a container and locate the datasource, not a full build model.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { readTextIfExists, walkFiles } from "./files.js";
import type { BackendAnalysis, BuildTool, Controller } from "./schema.js";

export interface BuildInfo {
  javaVersion: string | null;
  springBootVersion: string | null;
  dependencies: string[];
}

export interface ApplicationSettings {
  serverPort: number | null;
  datasourceUrl: string | null;
}

const RESOURCES_DIR = join("src", "main", "resources");

// ============================================================
// Build files
// ============================================================

function firstMatch(pattern: RegExp, text: string): string | null {
  const match = pattern.exec(text);
  return match ? match[1].trim() : null;
}

function allMatches(pattern: RegExp, text: string): string[] {
  return [...text.matchAll(pattern)].map((match) => match[1].trim());
}

export function parsePom(xml: string): BuildInfo {
  const parent = firstMatch(/<parent>([\s\S]*?)<\/parent>/, xml) ?? "";
  const springBootVersion = parent.includes("spring-boot")
    ? firstMatch(/<version>([^<]+)<\/version>/, parent)
    : null;

  const dependencies = allMatches(
    /<dependency>[\s\S]*?<artifactId>([^<]+)<\/artifactId>[\s\S]*?<\/dependency>/g,
    xml
  );

  return {
    javaVersion: firstMatch(/<java\.version>([^<]+)<\/java\.version>/, xml),
    springBootVersion,
    dependencies,
  };
}

export function parseGradle(script: string): BuildInfo {
  const compatibility = firstMatch(
    /sourceCompatibility\s*=\s*['"]?(?:JavaVersion\.VERSION_)?([\d._]+)/,
    script
  );
  const toolchain = firstMatch(/JavaLanguageVersion\.of\(\s*(\d+)\s*\)/, script);

  const coordinates = allMatches(
    /(?:implementation|api|runtimeOnly|compileOnly)\s*\(?\s*['"]([^'"]+)['"]/g,
    script
  );

  return {
    javaVersion: (compatibility ?? toolchain)?.replace(/_/g, ".") ?? null,
    springBootVersion: firstMatch(
      /id\s*\(?\s*['"]org\.springframework\.boot['"]\s*\)?\s*version\s*['"]([^'"]+)['"]/,
      script
    ),
    dependencies: coordinates.map((coordinate) => coordinate.split(":")[1] ?? coordinate),
  };
}

// ============================================================
// Application settings
// ============================================================

function toPort(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const port = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isInteger(port) ? port : null;
}

export function parseProperties(text: string): ApplicationSettings {
  const entries = new Map<string, string>();
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#") || line.startsWith("!")) continue;
    const separator = line.search(/[=:]/);
    if (separator <= 0) continue;
    entries.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
  }

  return {
    serverPort: toPort(entries.get("server.port")),
    datasourceUrl: entries.get("spring.datasource.url") ?? null,
  };
}

const ApplicationYamlSchema = z.object({
  server: z
    .object({ port: z.union([z.number(), z.string()]).optional() })
    .passthrough()
    .optional(),
  spring: z
    .object({
      datasource: z.object({ url: z.string().optional() }).passthrough().optional(),
    })
    .passthrough()
    .optional(),
});

export function parseApplicationYaml(text: string): ApplicationSettings {
  const parsed = ApplicationYamlSchema.safeParse(parseYaml(text) ?? {});
  if (!parsed.success) {
    return { serverPort: null, datasourceUrl: null };
  }
  return {
    serverPort: toPort(parsed.data.server?.port),
    datasourceUrl: parsed.data.spring?.datasource?.url ?? null,
  };
}

async function readApplicationSettings(dir: string): Promise<ApplicationSettings> {
  const resources = join(dir, RESOURCES_DIR);

  const properties = await readTextIfExists(join(resources, "application.properties"));
  if (properties !== undefined) {
    return parseProperties(properties);
  }

  for (const name of ["application.yml", "application.yaml"]) {
    const yaml = await readTextIfExists(join(resources, name));
    if (yaml !== undefined) {
      return parseApplicationYaml(yaml);
    }
  }

  return { serverPort: null, datasourceUrl: null };
}

// ============================================================
// Controllers
// ============================================================

type HttpMethod = Controller["endpoints"][number]["method"];

const MAPPING_METHODS: Record<string, HttpMethod> = {
  Get: "GET",
  Post: "POST",
  Put: "PUT",
  Delete: "DELETE",
  Patch: "PATCH",
};

function joinRoute(base: string, path: string): string {
  const parts = [base, path]
    .map((part) => part.replace(/^\/+|\/+$/g, ""))
    .filter((part) => part.length > 0);
  return `/${parts.join("/")}`;
}

/**
 * Endpoints declared in one controller source. The class-level
 * @RequestMapping, when present, prefixes every method mapping.
 */
export function extractEndpoints(source: string): Controller["endpoints"] {
  const classIndex = source.search(/\bclass\s/);
  const header = classIndex >= 0 ? source.slice(0, classIndex) : "";
  const base =
    firstMatch(/@RequestMapping\(\s*(?:(?:value|path)\s*=\s*)?["']([^"']*)["']/, header) ?? "";

  const endpoints: Controller["endpoints"] = [];
  const pattern =
    /@(Get|Post|Put|Delete|Patch)Mapping(?:\(\s*(?:(?:value|path)\s*=\s*)?(?:["']([^"']*)["'])?[^)]*\))?/g;
  for (const match of source.matchAll(pattern)) {
    const method = MAPPING_METHODS[match[1]];
    if (method) {
      endpoints.push({ method, path: joinRoute(base, match[2] ?? "") });
    }
  }
  return endpoints;
}

async function findControllers(dir: string): Promise<Controller[]> {
  const sourceRoot = join(dir, "src", "main");
  const files = await walkFiles(sourceRoot, [".java", ".kt"]);
  const controllers: Controller[] = [];

  for (const file of files) {
    const source = (await readTextIfExists(join(sourceRoot, file))) ?? "";
    if (!/@(?:Rest)?Controller\b/.test(source)) continue;

    const endpoints = extractEndpoints(source);
    if (endpoints.length > 0) {
      controllers.push({ file: join("src", "main", file), endpoints });
    }
  }
  return controllers;
}

// ============================================================
// Entry point
// ============================================================

function detectBuildTool(dir: string): { tool: BuildTool; file: string | null } {
  if (existsSync(join(dir, "pom.xml"))) {
    return { tool: "maven", file: "pom.xml" };
  }
  for (const file of ["build.gradle", "build.gradle.kts"]) {
    if (existsSync(join(dir, file))) {
      return { tool: "gradle", file };
    }
  }
  return { tool: "unknown", file: null };
}

export async function analyzeBackend(dir: string): Promise<BackendAnalysis> {
  if (!existsSync(dir)) {
    return {
      present: false,
      buildTool: "unknown",
      javaVersion: null,
      springBootVersion: null,
      dependencies: [],
      serverPort: null,
      datasourceUrl: null,
      controllers: [],
      hasDockerfile: false,
    };
  }

  const { tool, file } = detectBuildTool(dir);
  const buildText = file ? ((await readTextIfExists(join(dir, file))) ?? "") : "";
  const build: BuildInfo =
    tool === "maven"
      ? parsePom(buildText)
      : tool === "gradle"
        ? parseGradle(buildText)
        : { javaVersion: null, springBootVersion: null, dependencies: [] };

  const settings = await readApplicationSettings(dir);

  return {
    present: true,
    buildTool: tool,
    ...build,
    ...settings,
    controllers: await findControllers(dir),
    hasDockerfile: existsSync(join(dir, "Dockerfile")),
  };
}
