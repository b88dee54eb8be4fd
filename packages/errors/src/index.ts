export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions, SerializedAppError } from "./app-error.js";

export {
  InvalidArgumentError,
  ValidationError,
  NotFoundError,
  ConflictError,
  RetrievalDegradedError,
  GenerationFailedError,
  ExternalServiceError,
  DeadlineExceededError,
} from "./errors.js";

export { createCircuitBreaker, isBreakerOpenError } from "./circuit-breaker.js";
export type { CircuitBreakerOptions, BreakerEventListener } from "./circuit-breaker.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
