/**
 * `migrate` command: load the configuration, run the five stages, print and
 * write the report.
 *
 * Usage:
 *   cloud-migrate migrate [options]
 *
 * Options:
 *   -s, --source <path>    Application repository (overrides source.rootPath)
 *   -c, --config <path>    Configuration file (default: migration.config.yaml)
 *   -p, --project <id>     Cloud project (overrides target.projectId)
 *   -r, --region <region>  Deployment region (overrides target.region)
 *   -m, --mode <mode>      interactive | automated
 *   -d, --dry-run          Record commands instead of running them
 *   -v, --verbose          Debug logging
 *   -h, --help             Show help
 *
 * Exit codes:
 *   0 - Pipeline succeeded, or the confirmation was declined
 *   1 - A critical stage failed, or the configuration is invalid
 */

import { join, resolve } from "node:path";
import { createInterface } from "node:readline/promises";
import { parseArgs } from "node:util";

import {
  DryRunAdvisor,
  DryRunShellRunner,
  ModelAdvisor,
  ProcessShellRunner,
  createAnthropicGenerator,
  type Advisor,
  type ShellRunner,
} from "../collaborators/index.js";
import {
  ConfigError,
  DEFAULT_CONFIG_FILE,
  ExecutionMode,
  MigrationConfigError,
  loadAppConfig,
  loadMigrationConfigFile,
  requireAdvisorApiKey,
  validateAppConfig,
  type ConfigOverrides,
  type MigrationConfig,
} from "../config/index.js";
import { createLogger, generateRunId, type LogLevel, type Logger } from "../logging/index.js";
import {
  Orchestrator,
  RunState,
  buildReport,
  errorMessage,
  renderReport,
  writeReport,
} from "../pipeline/index.js";
import { buildMigrationPipeline } from "../stages/index.js";

// ============================================================
// IO
// ============================================================

export interface Collaborators {
  readonly shell: ShellRunner;
  readonly advisor: Advisor;
  /** Set when commands are recorded rather than run */
  readonly recorder?: DryRunShellRunner;
}

export interface MigrateIO {
  /** Base directory for relative paths */
  readonly cwd?: string;
  readonly print?: (line: string) => void;
  readonly confirm?: (question: string) => Promise<boolean>;
  /** Replace the real shell and advisor */
  readonly collaborators?: (config: Readonly<MigrationConfig>, logger: Logger) => Collaborators;
  readonly colors?: boolean;
  /** Echo log entries to the console (default true) */
  readonly consoleLogs?: boolean;
}

const HELP = `
Usage: cloud-migrate migrate [options]

Options:
  -s, --source <path>    Application repository (overrides source.rootPath)
  -c, --config <path>    Configuration file (default: ${DEFAULT_CONFIG_FILE})
  -p, --project <id>     Cloud project (overrides target.projectId)
  -r, --region <region>  Deployment region (overrides target.region)
  -m, --mode <mode>      interactive | automated
  -d, --dry-run          Record commands instead of running them
  -v, --verbose          Debug logging
  -h, --help             Show this help message
`;

async function askOnTerminal(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} [y/N] `);
    return ["y", "yes"].includes(answer.trim().toLowerCase());
  } finally {
    rl.close();
  }
}

export function createCollaborators(
  config: Readonly<MigrationConfig>,
  logger: Logger
): Collaborators {
  if (config.execution.dryRun) {
    const recorder = new DryRunShellRunner(logger.child("shell"));
    return { shell: recorder, advisor: new DryRunAdvisor(), recorder };
  }
  return {
    shell: new ProcessShellRunner(logger.child("shell")),
    advisor: new ModelAdvisor(
      config.advisor,
      createAnthropicGenerator(requireAdvisorApiKey()),
      logger.child("advisor")
    ),
  };
}

// ============================================================
// CLI Parsing
// ============================================================

interface MigrateArgs {
  configPath: string;
  overrides: ConfigOverrides;
  verbose: boolean;
  help: boolean;
}

function parseMigrateArgs(argv: readonly string[], cwd: string): MigrateArgs {
  const { values } = parseArgs({
    args: [...argv],
    options: {
      source: { type: "string", short: "s" },
      config: { type: "string", short: "c", default: DEFAULT_CONFIG_FILE },
      project: { type: "string", short: "p" },
      region: { type: "string", short: "r" },
      mode: { type: "string", short: "m" },
      "dry-run": { type: "boolean", short: "d", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const overrides: ConfigOverrides = {};
  if (values.source !== undefined) overrides.rootPath = resolve(cwd, values.source);
  if (values.project !== undefined) overrides.projectId = values.project;
  if (values.region !== undefined) overrides.region = values.region;
  if (values.mode !== undefined) {
    const mode = ExecutionMode.safeParse(values.mode);
    if (!mode.success) {
      throw new ConfigError(`Invalid mode: ${values.mode}. Must be interactive or automated.`);
    }
    overrides.mode = mode.data;
  }
  // Only an explicit flag overrides the file
  if (values["dry-run"]) overrides.dryRun = true;

  return {
    configPath: resolve(cwd, values.config ?? DEFAULT_CONFIG_FILE),
    overrides,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  };
}

// ============================================================
// Main
// ============================================================

/**
 * Run the migrate command.
 *
 * @returns the process exit code
 */
export async function runMigrate(argv: readonly string[], io: MigrateIO = {}): Promise<number> {
  const cwd = io.cwd ?? process.cwd();
  const print = io.print ?? ((line: string) => console.log(line));

  let args: MigrateArgs;
  let config: Readonly<MigrationConfig>;
  let level: LogLevel;
  let noColor: boolean;
  try {
    args = parseMigrateArgs(argv, cwd);
    if (args.help) {
      print(HELP);
      return 0;
    }
    const app = loadAppConfig();
    level = validateAppConfig(app);
    noColor = app.noColor;
    config = loadMigrationConfigFile(args.configPath, args.overrides);
  } catch (err) {
    if (err instanceof MigrationConfigError) {
      print(err.format());
      return 1;
    }
    print(`Error: ${errorMessage(err)}`);
    return 1;
  }

  const colors = io.colors ?? (process.stdout.isTTY === true && !noColor);
  const runId = generateRunId();
  const outputDir = resolve(cwd, config.execution.outputDir);
  const logger = createLogger({
    level: args.verbose ? "debug" : level,
    runId,
    logDir: join(outputDir, "logs"),
    logFile: `migration-${runId}.log`,
    console: io.consoleLogs ?? true,
  });

  if (config.execution.mode === "interactive" && !config.execution.dryRun) {
    print(`Source:  ${config.source.rootPath}`);
    print(`Project: ${config.target.projectId} (${config.target.region})`);
    const confirm = io.confirm ?? askOnTerminal;
    if (!(await confirm("Deploy to this project?"))) {
      print("Migration cancelled.");
      return 0;
    }
  }

  let collaborators: Collaborators;
  try {
    collaborators = (io.collaborators ?? createCollaborators)(config, logger);
  } catch (err) {
    print(`Error: ${errorMessage(err)}`);
    return 1;
  }

  logger.info("Migration starting", {
    projectId: config.target.projectId,
    region: config.target.region,
    dryRun: config.execution.dryRun,
    parallelDeployments: config.execution.parallelDeployments,
  });

  const state = new RunState(runId, logger);
  const orchestrator = new Orchestrator({
    state,
    logger: logger.child("orchestrator"),
    cleanupOnFailure: config.execution.cleanupOnFailure,
  });
  const outcome = await orchestrator.execute(
    buildMigrationPipeline({
      config,
      shell: collaborators.shell,
      advisor: collaborators.advisor,
      logger,
    })
  );

  const report = buildReport(state, outcome, {
    dryRunCommands: collaborators.recorder?.commands,
  });

  print("");
  for (const line of renderReport(report, { colors })) {
    print(line);
  }

  if (config.execution.generateReport) {
    const path = await writeReport(report, outputDir);
    print("");
    print(`Report: ${path}`);
  }

  return outcome.status === "success" ? 0 : 1;
}
