export { AppError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  UnauthorizedError,
  ForbiddenError,
  RateLimitedError,
  ValidationError,
  ExternalServiceError,
  errorForStatus,
} from "./errors.js";
export type { ErrorContext } from "./errors.js";
