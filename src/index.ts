/**
 * Entry point for the phi-fixtures library.
 *
 * Re-exports the codec, the Φ result models and the fixture store.
 */

export * from "./codec/index.js";
export * from "./models/index.js";
export * from "./fixtures/index.js";
export { config, validateConfig, ConfigError, type AppConfig } from "./config/index.js";
export { createLogger, initRunId, getRunId, type Logger, type LogLevel } from "./logging/index.js";
