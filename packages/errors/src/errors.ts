import { AppError } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class InvalidArgumentError extends AppError {
  constructor(message = "Invalid argument", options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "INVALID_ARGUMENT", ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

/**
 * Raised by a durable backend when a compare-and-set loses to a concurrent writer.
 */
export class ConflictError extends AppError {
  constructor(message = "Conflict", options?: ErrorExtras) {
    super({ message, statusCode: 409, code: "CONFLICT", ...options });
  }
}

export class RetrievalDegradedError extends AppError {
  constructor(message = "Retrieval unavailable", options?: ErrorExtras) {
    super({ message, statusCode: 503, code: "RETRIEVAL_DEGRADED", ...options });
  }
}

export class GenerationFailedError extends AppError {
  public readonly attempts: number;

  constructor(message = "Generation failed", attempts: number, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "GENERATION_FAILED", ...options });
    this.attempts = attempts;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorExtras) {
    super({ message, statusCode: 502, code: "EXTERNAL_SERVICE_ERROR", ...options });
    this.service = service;
  }
}

export class DeadlineExceededError extends AppError {
  public readonly deadlineMs: number;

  constructor(message = "Deadline exceeded", deadlineMs: number, options?: ErrorExtras) {
    super({ message, statusCode: 504, code: "DEADLINE_EXCEEDED", ...options });
    this.deadlineMs = deadlineMs;
  }
}
