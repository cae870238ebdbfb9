/**
 * Run ids: the UTC start time to the second plus a random suffix, so ids
 * sort by start time and name the run's log file.
 */

import { randomBytes } from "node:crypto";

const RUN_ID_PATTERN = /^\d{8}-\d{6}-[0-9a-f]{4}$/;

/** e.g. "20260115-093012-a1b2" */
export function generateRunId(
  now: Date = new Date(),
  suffix: () => string = () => randomBytes(2).toString("hex")
): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "-");
  return `${stamp}-${suffix()}`;
}

export function isRunId(value: string): boolean {
  return RUN_ID_PATTERN.test(value);
}
