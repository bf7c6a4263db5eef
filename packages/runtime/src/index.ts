export { loadConfig, thresholdFallbackFromConfig } from "./config.js";
export type { Config, ThresholdFallbackConfig } from "./config.js";

export { createLogger, getLogger, setLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";

export {
  ConfigError,
  SnapshotNotFoundError,
  TableValidationError,
  errorMessage,
} from "./errors.js";
export type { ValidationResult, Violation } from "./errors.js";

export { openDatabase } from "./database.js";
