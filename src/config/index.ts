/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { LOG_LEVELS, type LogLevel } from "../logging/logger.js";
import {
  ConfigError,
  optionalEnv,
  optionalEnvBool,
  optionalEnvEnum,
  optionalEnvInt,
} from "./env.js";

export { ConfigError } from "./env.js";

export const ENVIRONMENTS = ["development", "production", "test"] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: Environment;
  /** Enable debug mode (forces debug log level) */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: LogLevel;
  /** Append log lines to a file under logDir */
  readonly logToFile: boolean;
  /** Directory for log files */
  readonly logDir: string;
  /** Directory the fixture scripts read and write */
  readonly fixtureDir: string;
  /** JSON indentation of written documents; 0 writes a single line */
  readonly indent: number;
  /** Application name */
  readonly appName: string;
}

/**
 * Load and validate application configuration.
 * Fails fast on malformed values.
 */
function loadConfig(): AppConfig {
  const debug = optionalEnvBool("DEBUG", false);
  return {
    env: optionalEnvEnum("NODE_ENV", ENVIRONMENTS, "development"),
    debug,
    logLevel: debug ? "debug" : optionalEnvEnum("LOG_LEVEL", LOG_LEVELS, "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    fixtureDir: optionalEnv("FIXTURE_DIR", "fixtures"),
    indent: optionalEnvInt("FIXTURE_INDENT", 2),
    appName: optionalEnv("APP_NAME", "phi-fixtures"),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate cross-field constraints.
 * Call this at application startup to fail fast.
 */
export function validateConfig(target: AppConfig = config): void {
  if (target.indent < 0 || target.indent > 10) {
    throw new ConfigError(
      `Invalid FIXTURE_INDENT: ${target.indent}. Must be between 0 and 10.`
    );
  }

  if (target.fixtureDir.trim() === "") {
    throw new ConfigError("FIXTURE_DIR must not be blank.");
  }
}
