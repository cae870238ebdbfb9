/**
 * Shared plumbing for the migration stages: dependencies, checked shell
 * commands, best-effort advisor calls, and dry-run file placement.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import {
  extractCodeBlock,
  type Advisor,
  type AdviceRequest,
  type CommandResult,
  type RunOptions,
  type ShellRunner,
} from "../collaborators/index.js";
import { resolveAdvisorRole, type MigrationConfig, type MigrationStage } from "../config/index.js";
import { errorMessage, PipelineError, type StageContext } from "../pipeline/index.js";

export interface StageDeps {
  readonly config: Readonly<MigrationConfig>;
  readonly shell: ShellRunner;
  readonly advisor: Advisor;
}

/**
 * A shell command exited non-zero. Retryable: cloud CLIs fail transiently.
 */
export class CommandFailedError extends PipelineError {
  constructor(
    public readonly description: string,
    public readonly result: CommandResult
  ) {
    super(`${description} failed (exit ${result.exitCode}): ${firstLine(result.stderr || result.stdout)}`);
    this.name = "CommandFailedError";
  }
}

function firstLine(text: string): string {
  const line = text.trim().split(/\r?\n/).find((candidate) => candidate.trim().length > 0);
  return line?.trim() ?? "no output";
}

/**
 * Quote a value for a POSIX shell when it holds anything beyond a safe set
 * of characters.
 */
export function shellQuote(value: string): string {
  if (/^[\w@%+=:,./-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Command runner bound to one stage's timeout.
 */
export class StageShell {
  constructor(
    private readonly shell: ShellRunner,
    private readonly timeoutSeconds: number,
    private readonly dryRun = false
  ) {}

  run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    return this.shell.run(command, {
      timeoutSeconds: this.timeoutSeconds,
      ...options,
    });
  }

  /**
   * @throws CommandFailedError on a non-zero exit
   */
  async check(description: string, command: string, options: RunOptions = {}): Promise<CommandResult> {
    const result = await this.run(command, options);
    if (result.exitCode !== 0) {
      throw new CommandFailedError(description, result);
    }
    return result;
  }

  /**
   * Whether a `describe` command finds the resource. A dry run finds
   * nothing, so it records the create commands a fresh project needs.
   */
  async exists(command: string): Promise<boolean> {
    if (this.dryRun) return false;
    const result = await this.run(command);
    return result.exitCode === 0;
  }
}

export function stageShell(deps: StageDeps, stage: MigrationStage): StageShell {
  return new StageShell(
    deps.shell,
    deps.config.stages[stage].commandTimeoutSeconds,
    deps.config.execution.dryRun
  );
}

export interface Advice {
  text: string;
  warning?: string;
}

/**
 * Ask the advisor in the stage's configured role. A failed call becomes a
 * warning and an empty answer.
 */
export async function consultAdvisor(
  deps: StageDeps,
  stage: MigrationStage,
  context: StageContext,
  request: Omit<AdviceRequest, "role">
): Promise<Advice> {
  const role = resolveAdvisorRole(deps.config, stage);
  try {
    return { text: await deps.advisor.ask({ ...request, role }) };
  } catch (err) {
    const warning = `Advisor unavailable (${role}): ${errorMessage(err)}`;
    context.logger.warn(warning);
    return { text: "", warning };
  }
}

const MAX_RECOMMENDATIONS = 8;

function parseJsonOrUndefined(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Recommendations from an advisor answer: a JSON array of strings, or
 * failing that, bulleted or numbered lines.
 */
export function parseRecommendations(answer: string): string[] {
  const body = extractCodeBlock(answer);
  if (!body) return [];

  const parsed = z.array(z.string()).safeParse(parseJsonOrUndefined(body));
  if (parsed.success) {
    return parsed.data.map((item) => item.trim()).filter(Boolean).slice(0, MAX_RECOMMENDATIONS);
  }

  return body
    .split(/\r?\n/)
    .map((line) => /^\s*(?:[-*•]|\d+[.)])\s+(.+)$/.exec(line)?.[1]?.trim())
    .filter((line): line is string => Boolean(line))
    .slice(0, MAX_RECOMMENDATIONS);
}

/**
 * Where a stage writes generated files: the real target directory, or
 * `<outputDir>/generated/<stage>/` in dry runs.
 */
export function outputLocation(deps: StageDeps, stage: MigrationStage, targetDir: string): string {
  const { execution } = deps.config;
  return execution.dryRun ? join(execution.outputDir, "generated", stage) : targetDir;
}

export async function writeGeneratedFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content.endsWith("\n") ? content : `${content}\n`, "utf-8");
}

export function sourceDir(deps: StageDeps, relative: string): string {
  return join(deps.config.source.rootPath, relative);
}
