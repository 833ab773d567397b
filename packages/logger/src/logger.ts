/**
 * Pino loggers for the docweave pipeline.
 *
 * Every component logs through a child of one root logger and tags its lines
 * with a `component` binding. API keys and database passwords are censored
 * before a line is written.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./redact-paths.js";

export type Logger = PinoLogger;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface CreateLoggerOptions {
  /** Default: "debug" when NODE_ENV is "development", else "info" */
  level?: LogLevel;
  /** Written as `name` on every line. Default: "docweave" */
  service?: string;
  /** Human-readable output through pino-pretty. Default: NODE_ENV is "development" */
  pretty?: boolean;
}

const isDevelopment = (): boolean => process.env["NODE_ENV"] === "development";

const PRETTY_TRANSPORT: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pretty = options.pretty ?? isDevelopment();

  return pino({
    level: options.level ?? (isDevelopment() ? "debug" : "info"),
    name: options.service ?? "docweave",
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty ? { transport: PRETTY_TRANSPORT } : {}),
  });
}

/**
 * Child logger scoped to one pipeline component (`component` binding) plus
 * any extra bindings such as `documentId` or `provider`.
 */
export function createChildLogger(
  parent: Logger,
  component: string,
  bindings: Record<string, unknown> = {},
): Logger {
  return parent.child({ component, ...bindings });
}

/** Logger that discards everything; the default for components built without one. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
