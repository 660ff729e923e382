/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvBool } from "./env.js";
import type { LogLevel } from "../logging/index.js";

export { ConfigError } from "./env.js";

// Re-export pipeline policy configuration
export * from "./pipeline/index.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level as read from the environment */
  readonly logLevel: string;
  /** Directory for log files */
  readonly logDir: string;
  /** Application name */
  readonly appName: string;
}

/**
 * Load application configuration from the environment.
 */
export function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    appName: optionalEnv("APP_NAME", "compliance-evidence-pipeline"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Narrow a configured log level string.
 * Throws ConfigError for anything the logger does not know.
 */
export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${value}. Must be debug, info, warn, or error.`
    );
  }
  return level;
}

/**
 * Validate that all required configuration is present.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  parseLogLevel(appConfig.logLevel);
}
