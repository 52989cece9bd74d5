/**
 * @spacefeed/logger
 *
 * Structured logging with secret and PII redaction.
 */

export { createLogger, createChildLogger, buildTransport } from "./logger.js";
export type { Logger, CreateLoggerOptions, LoggerTransport } from "./logger.js";
export { redactValue, REDACT_PATHS } from "./pii-redactor.js";
