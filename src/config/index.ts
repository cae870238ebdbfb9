/**
 * Configuration: process environment plus the migration file.
 */

import { isLogLevel, type LogLevel } from "../logging/index.js";
import { ConfigError, envFlag, readEnv, requireEnv } from "./env.js";

export { ConfigError, envFlag, readEnv, requireEnv } from "./env.js";
export * from "./migration/index.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;

export interface AppConfig {
  /** NODE_ENV */
  readonly env: string;
  /** DEBUG forces debug logging */
  readonly debug: boolean;
  /** LOG_LEVEL */
  readonly logLevel: string;
  /** NO_COLOR disables ANSI colors in the report */
  readonly noColor: boolean;
}

export function loadAppConfig(): AppConfig {
  return {
    env: readEnv("NODE_ENV") ?? "development",
    debug: envFlag("DEBUG", false),
    logLevel: readEnv("LOG_LEVEL") ?? "info",
    noColor: readEnv("NO_COLOR") !== undefined,
  };
}

/**
 * Check the environment at startup.
 *
 * @returns the log level to run with
 */
export function validateAppConfig(config: AppConfig): LogLevel {
  if (!ENVIRONMENTS.some((env) => env === config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!isLogLevel(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  return config.debug ? "debug" : config.logLevel;
}

/**
 * API key for the advisor service. Only real runs need it.
 */
export function requireAdvisorApiKey(): string {
  return requireEnv("ANTHROPIC_API_KEY");
}
