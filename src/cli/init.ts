/**
 * `init` command: write the example configuration to the working directory.
 *
 * Usage:
 *   cloud-migrate init [--force]
 */

import { copyFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";

import { DEFAULT_CONFIG_FILE } from "../config/index.js";
import { errorMessage } from "../pipeline/index.js";

export const EXAMPLE_CONFIG_PATH = fileURLToPath(
  new URL("../../config/migration.example.yaml", import.meta.url)
);

export interface InitIO {
  readonly cwd?: string;
  readonly print?: (line: string) => void;
}

/**
 * @returns the process exit code
 */
export async function runInit(argv: readonly string[], io: InitIO = {}): Promise<number> {
  const print = io.print ?? ((line: string) => console.log(line));

  let force: boolean;
  try {
    const { values } = parseArgs({
      args: [...argv],
      options: { force: { type: "boolean", short: "f", default: false } },
    });
    force = values.force ?? false;
  } catch (err) {
    print(`Error: ${errorMessage(err)}`);
    return 1;
  }

  const target = resolve(io.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
  if (existsSync(target) && !force) {
    print(`${target} already exists. Use --force to overwrite it.`);
    return 1;
  }

  await copyFile(EXAMPLE_CONFIG_PATH, target);
  print(`Wrote ${target}`);
  print("Set source.rootPath and target.projectId, then run: cloud-migrate migrate --dry-run");
  return 0;
}
