/**
 * Shared infrastructure for endovox services.
 */

export {
  type LogEntry,
  Logger,
  type LoggerConfig,
  LogLevel,
  type LogMetadata,
  type PerformanceTimer,
} from "./logger/Logger.js";

export {
  loadSecretsFromFiles,
  type LoadSecretsOptions,
} from "./config/loadSecrets.js";
