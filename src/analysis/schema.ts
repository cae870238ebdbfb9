/**
 * Code analysis result schema.
 *
 * The analysis stage stores a CodeAnalysis as the `analysis` artifact; later
 * stages read it back through this schema.
 */

import { z } from "zod";

// ============================================================
// Backend
// ============================================================

export const BuildTool = z.enum(["maven", "gradle", "unknown"]);
export type BuildTool = z.infer<typeof BuildTool>;

export const EndpointSchema = z.object({
  method: z.enum(["GET", "POST", "PUT", "DELETE", "PATCH"]),
  path: z.string(),
});

export const ControllerSchema = z.object({
  /** Path relative to the backend directory */
  file: z.string(),
  endpoints: z.array(EndpointSchema),
});

export type Controller = z.infer<typeof ControllerSchema>;

export const BackendAnalysisSchema = z.object({
  present: z.boolean(),
  buildTool: BuildTool,
  javaVersion: z.string().nullable(),
  springBootVersion: z.string().nullable(),
  dependencies: z.array(z.string()),
  serverPort: z.number().int().nullable(),
  datasourceUrl: z.string().nullable(),
  controllers: z.array(ControllerSchema),
  hasDockerfile: z.boolean(),
});

export type BackendAnalysis = z.infer<typeof BackendAnalysisSchema>;

// ============================================================
// Frontend
// ============================================================

export const FrontendFramework = z.enum(["next", "vite", "create-react-app", "unknown"]);
export type FrontendFramework = z.infer<typeof FrontendFramework>;

export const PackageManager = z.enum(["npm", "yarn", "pnpm"]);
export type PackageManager = z.infer<typeof PackageManager>;

export const FrontendAnalysisSchema = z.object({
  present: z.boolean(),
  framework: FrontendFramework,
  packageManager: PackageManager,
  reactVersion: z.string().nullable(),
  buildCommand: z.string().nullable(),
  outputDir: z.string(),
  /** Variable the build reads the backend address from */
  apiUrlVariable: z.string(),
  envVars: z.array(z.string()),
  /** Absolute URLs hard-coded in the sources */
  hardcodedUrls: z.array(z.string()),
  dependencies: z.array(z.string()),
});

export type FrontendAnalysis = z.infer<typeof FrontendAnalysisSchema>;

// ============================================================
// Database
// ============================================================

export const DatabaseType = z.enum(["h2", "postgresql", "mysql", "unknown", "none"]);
export type DatabaseType = z.infer<typeof DatabaseType>;

export const DatabaseMode = z.enum(["in-memory", "file-based", "server", "none"]);
export type DatabaseMode = z.infer<typeof DatabaseMode>;

export const DatabaseAnalysisSchema = z.object({
  type: DatabaseType,
  mode: DatabaseMode,
  url: z.string().nullable(),
  migrationRecommended: z.boolean(),
  notes: z.array(z.string()),
});

export type DatabaseAnalysis = z.infer<typeof DatabaseAnalysisSchema>;

// ============================================================
// Combined
// ============================================================

export const CodeAnalysisSchema = z.object({
  sourceRoot: z.string(),
  backend: BackendAnalysisSchema,
  frontend: FrontendAnalysisSchema,
  database: DatabaseAnalysisSchema,
  recommendations: z.array(z.string()),
});

export type CodeAnalysis = z.infer<typeof CodeAnalysisSchema>;
