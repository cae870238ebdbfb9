/**
 * `version` command.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

export function readPackageInfo(
  path: string = fileURLToPath(new URL("../../package.json", import.meta.url))
): PackageInfo {
  return PackageInfoSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
}

export function formatVersion(info: PackageInfo): string {
  return `${info.name} ${info.version}`;
}
