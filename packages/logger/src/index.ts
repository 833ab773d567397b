/**
 * @docweave/logger
 *
 * Structured logging with secret redaction for the docweave pipeline.
 */

export { createLogger, createChildLogger, createSilentLogger } from "./logger.js";
export type { Logger, LogLevel, CreateLoggerOptions } from "./logger.js";
export { REDACT_PATHS, maskConnectionString } from "./redact-paths.js";
