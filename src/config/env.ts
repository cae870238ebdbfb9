/**
 * Environment variables. A `.env` file in the working directory is loaded
 * before anything reads them.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Trimmed value, or undefined when unset or blank. */
export function readEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

/**
 * @throws ConfigError when the variable is unset or blank
 */
export function requireEnv(key: string): string {
  const value = readEnv(key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

const FLAG_VALUES = new Map<string, boolean>([
  ["true", true],
  ["1", true],
  ["yes", true],
  ["false", false],
  ["0", false],
  ["no", false],
]);

/**
 * Boolean variable: true/false, 1/0 or yes/no, in any case.
 */
export function envFlag(key: string, fallback: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return fallback;
  }
  const flag = FLAG_VALUES.get(value.toLowerCase());
  if (flag === undefined) {
    throw new ConfigError(
      `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`
    );
  }
  return flag;
}
