/**
 * Migration configuration tests.
 *
 * Run: node --import tsx --test src/config/migration/loader.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { after, describe, it } from "node:test";

import { resolveAdvisorRole } from "./defaults.js";
import {
  applyOverrides,
  loadMigrationConfig,
  loadMigrationConfigFile,
  MigrationConfigError,
  parseConfigDocument,
} from "./loader.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function minimal(): Record<string, unknown> {
  return {
    source: { rootPath: "/srv/app" },
    target: { projectId: "demo-project" },
    stages: {},
  };
}

function issuesOf(fn: () => unknown): Array<{ path: string; message: string; code: string }> {
  try {
    fn();
  } catch (err) {
    if (err instanceof MigrationConfigError) {
      return err.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      }));
    }
    throw err;
  }
  assert.fail("expected a MigrationConfigError");
}

const EXAMPLE_CONFIG = fileURLToPath(
  new URL("../../../config/migration.example.yaml", import.meta.url)
);

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

describe("loadMigrationConfig", () => {
  it("fills defaults around the required sections", () => {
    const config = loadMigrationConfig(minimal());
    assert.equal(config.source.backendPath, "backend");
    assert.equal(config.source.frontendPath, "frontend");
    assert.equal(config.target.region, "us-central1");
    assert.equal(config.target.artifactRepository, "migrated-apps");
    assert.deepEqual(config.stages.backend, { maxAttempts: 3, commandTimeoutSeconds: 300 });
    assert.equal(config.backend.serviceName, "backend-api");
    assert.equal(config.database.strategy, "keep-h2");
    assert.equal(config.advisor.models.codegen, "claude-sonnet-4-5");
    assert.deepEqual(config.execution, {
      mode: "automated",
      dryRun: false,
      parallelDeployments: false,
      backendWaitTimeoutSeconds: 600,
      backendPollIntervalSeconds: 5,
      retryBaseDelayMs: 1000,
      cleanupOnFailure: true,
      generateReport: true,
      outputDir: "migration-output",
    });
  });

  it("freezes the result", () => {
    const config = loadMigrationConfig(minimal());
    assert.equal(Object.isFrozen(config), true);
    assert.equal(Object.isFrozen(config.execution), true);
    assert.equal(Object.isFrozen(config.advisor.models), true);
  });

  it("reports a missing required section by path", () => {
    const { stages: _stages, ...withoutStages } = minimal();
    assert.deepEqual(issuesOf(() => loadMigrationConfig(withoutStages)), [
      { path: "stages", message: "Required", code: "invalid_type" },
    ]);
  });

  it("rejects a malformed project id", () => {
    const input = { ...minimal(), target: { projectId: "Demo_Project" } };
    const issues = issuesOf(() => loadMigrationConfig(input));
    assert.equal(issues.length, 1);
    assert.equal(issues[0].path, "target.projectId");
  });

  it("rejects unknown keys", () => {
    const input = { ...minimal(), execution: { paralel: true } };
    const issues = issuesOf(() => loadMigrationConfig(input));
    assert.equal(issues[0].path, "execution");
    assert.equal(issues[0].code, "unrecognized_keys");
  });

  it("accepts only the closed set of advisor roles", () => {
    const input = { ...minimal(), stages: { backend: { advisorRole: "poet" } } };
    const issues = issuesOf(() => loadMigrationConfig(input));
    assert.equal(issues[0].path, "stages.backend.advisorRole");
    assert.equal(issues[0].code, "invalid_enum_value");
  });

  it("rejects more minimum than maximum instances", () => {
    const input = { ...minimal(), backend: { minInstances: 4, maxInstances: 2 } };
    assert.deepEqual(issuesOf(() => loadMigrationConfig(input)), [
      {
        path: "backend.minInstances",
        message: "minInstances (4) exceeds maxInstances (2)",
        code: "custom",
      },
    ]);
  });

  it("formats issues one per line", () => {
    const { stages: _stages, ...withoutStages } = minimal();
    try {
      loadMigrationConfig(withoutStages);
      assert.fail("expected a MigrationConfigError");
    } catch (err) {
      assert.ok(err instanceof MigrationConfigError);
      assert.equal(err.format(), "Migration configuration validation failed:\n  - stages: Required");
    }
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════

describe("applyOverrides", () => {
  it("replaces fields without dropping their siblings", () => {
    const config = loadMigrationConfig(
      { ...minimal(), target: { projectId: "demo-project", region: "europe-west1" } },
      { projectId: "other-project", dryRun: true, mode: "interactive" }
    );
    assert.equal(config.target.projectId, "other-project");
    assert.equal(config.target.region, "europe-west1");
    assert.equal(config.execution.dryRun, true);
    assert.equal(config.execution.mode, "interactive");
  });

  it("creates a section the document lacks", () => {
    const merged = applyOverrides({ stages: {} }, { rootPath: "/srv/app", region: "asia-east1" });
    assert.deepEqual(merged, {
      stages: {},
      source: { rootPath: "/srv/app" },
      target: { region: "asia-east1" },
    });
  });

  it("leaves a non-object document for validation to reject", () => {
    assert.equal(applyOverrides("text", { projectId: "demo-project" }), "text");
    assert.throws(() => loadMigrationConfig("text"), MigrationConfigError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

describe("configuration files", () => {
  const dir = mkdtempSync(join(tmpdir(), "config-test-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  it("loads YAML from disk", () => {
    const path = join(dir, "migration.config.yaml");
    writeFileSync(
      path,
      "source:\n  rootPath: /srv/app\ntarget:\n  projectId: demo-project\nstages:\n  backend:\n    maxAttempts: 5\n"
    );
    const config = loadMigrationConfigFile(path);
    assert.equal(config.stages.backend.maxAttempts, 5);
    assert.equal(config.stages.frontend.maxAttempts, 3);
  });

  it("loads JSON through the same parser", () => {
    const path = join(dir, "migration.config.json");
    writeFileSync(path, JSON.stringify(minimal()));
    assert.equal(loadMigrationConfigFile(path).target.projectId, "demo-project");
  });

  it("names a missing or empty file", () => {
    const missing = join(dir, "absent.yaml");
    assert.throws(() => loadMigrationConfigFile(missing), {
      message: `Configuration file not found: ${missing}`,
    });

    const empty = join(dir, "empty.yaml");
    writeFileSync(empty, "# nothing here\n");
    assert.throws(() => loadMigrationConfigFile(empty), {
      message: `Configuration file is empty: ${empty}`,
    });
  });

  it("wraps YAML syntax errors", () => {
    assert.throws(
      () => parseConfigDocument("source: [unclosed\n", "broken.yaml"),
      (err: unknown) =>
        err instanceof MigrationConfigError && err.message.startsWith("Could not parse broken.yaml: ")
    );
  });

  it("ships a valid example configuration", () => {
    const config = loadMigrationConfigFile(EXAMPLE_CONFIG);
    assert.equal(config.target.projectId, "my-gcp-project");
    assert.equal(config.stages.backend.commandTimeoutSeconds, 1200);
    assert.deepEqual(config.backend.envVars, { SPRING_PROFILES_ACTIVE: "prod" });
  });
});

describe("resolveAdvisorRole", () => {
  it("uses the stage default unless overridden", () => {
    const config = loadMigrationConfig({
      ...minimal(),
      stages: { database: { advisorRole: "analysis" } },
    });
    assert.equal(resolveAdvisorRole(config, "backend"), "codegen");
    assert.equal(resolveAdvisorRole(config, "infrastructure"), "review");
    assert.equal(resolveAdvisorRole(config, "database"), "analysis");
  });
});
