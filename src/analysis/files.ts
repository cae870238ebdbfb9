/**
 * File helpers for source scanning.
 */

import { existsSync } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";

/** Directories never worth scanning */
const IGNORED_DIRS = new Set([
  "node_modules",
  ".git",
  "target",
  "build",
  "dist",
  "out",
  ".next",
  ".gradle",
  ".idea",
]);

/**
 * All files under a directory with one of the given extensions, as paths
 * relative to the root, sorted.
 */
export async function walkFiles(root: string, extensions: readonly string[]): Promise<string[]> {
  const found: string[] = [];

  async function visit(relative: string): Promise<void> {
    const entries = await readdir(join(root, relative), { withFileTypes: true });
    for (const entry of entries) {
      const path = relative ? join(relative, entry.name) : entry.name;
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) {
          await visit(path);
        }
      } else if (entry.isFile() && extensions.includes(extname(entry.name))) {
        found.push(path);
      }
    }
  }

  if (existsSync(root)) {
    await visit("");
  }
  return found.sort();
}

/**
 * File contents, or undefined when the file does not exist.
 */
export async function readTextIfExists(path: string): Promise<string | undefined> {
  if (!existsSync(path)) {
    return undefined;
  }
  return readFile(path, "utf-8");
}
