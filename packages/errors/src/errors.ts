import { AppError } from "./app-error.js";

export interface ErrorContext {
  requestId?: string;
  details?: Record<string, unknown>;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorContext) {
    super({
      message,
      statusCode: 404,
      code: "NOT_FOUND",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

/**
 * Credentials, username or base URL could not establish a session with a
 * remote service.
 */
export class UnauthorizedError extends AppError {
  constructor(message = "Authentication failed", options?: ErrorContext) {
    super({
      message,
      statusCode: 401,
      code: "UNAUTHORIZED",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Forbidden", options?: ErrorContext) {
    super({
      message,
      statusCode: 403,
      code: "FORBIDDEN",
      requestId: options?.requestId,
      details: options?.details,
    });
  }
}

export class RateLimitedError extends AppError {
  /** Seconds the remote service asked us to wait. */
  public readonly retryAfter: number;

  constructor(message = "Rate limited", retryAfter: number, options?: ErrorContext) {
    super({
      message,
      statusCode: 429,
      code: "RATE_LIMITED",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.retryAfter = retryAfter;
  }
}

export class ValidationError extends AppError {
  /** Field (or CLI flag) name mapped to the reason it was rejected. */
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      requestId: options?.requestId,
      details: options?.details,
    });
    this.service = service;
  }
}

/**
 * Map an HTTP status returned by a remote service onto the matching error.
 * 2xx statuses are not errors and must not be passed here.
 */
export function errorForStatus(
  service: string,
  status: number,
  message: string,
  options?: ErrorContext & { retryAfter?: number },
): AppError {
  switch (status) {
    case 401:
      return new UnauthorizedError(message, options);
    case 403:
      return new ForbiddenError(message, options);
    case 404:
      return new NotFoundError(message, options);
    case 429:
      return new RateLimitedError(message, options?.retryAfter ?? 0, options);
    default:
      return new ExternalServiceError(message, service, {
        ...options,
        details: { status, ...options?.details },
      });
  }
}
