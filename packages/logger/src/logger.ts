/**
 * Main Logger Setup
 *
 * Creates structured Pino logger instances with secret redaction, pretty
 * output in development, and an optional append-only log file.
 */

import pino, { type Logger as PinoLogger } from "pino";
import { REDACT_PATHS } from "./pii-redactor.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when NODE_ENV is "development"). */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Append human-readable log lines to this path in addition to stdout. */
  logFile?: string;
}

export type LoggerTransport = pino.TransportSingleOptions | pino.TransportMultiOptions;

const FILE_TIME_FORMAT = "SYS:yyyy-mm-dd HH:MM:ss.l";

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function prettyStdout(level: string): pino.TransportTargetOptions {
  return {
    target: "pino-pretty",
    level,
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  };
}

/**
 * Build the Pino transport configuration.
 *
 * - Without a log file, development pipes through `pino-pretty` and every
 *   other environment writes JSON to stdout with no transport at all.
 * - With a log file, stdout keeps the same format and a second `pino-pretty`
 *   target appends uncoloured `[timestamp] LEVEL (service): message` lines.
 */
export function buildTransport(level: string, logFile?: string): LoggerTransport | undefined {
  if (!logFile) {
    return isDevelopment() ? prettyStdout(level) : undefined;
  }

  const stdout: pino.TransportTargetOptions = isDevelopment()
    ? prettyStdout(level)
    : { target: "pino/file", level, options: { destination: 1 } };

  return {
    targets: [
      stdout,
      {
        target: "pino-pretty",
        level,
        options: {
          destination: logFile,
          append: true,
          mkdir: true,
          colorize: false,
          translateTime: FILE_TIME_FORMAT,
          ignore: "pid,hostname",
        },
      },
    ],
  };
}

/**
 * Create a new root Pino logger.
 *
 * @param options - Optional overrides for level, service name and log file.
 */
export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "spacefeed";

  const transport = buildTransport(level, options?.logFile);

  return pino({
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: "[REDACTED]",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(transport ? { transport } : {}),
  });
}

/**
 * Create a child logger that inherits the parent's configuration and adds
 * run-scoped bindings (e.g. `spaceKey`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
