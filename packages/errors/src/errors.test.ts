import { describe, it, expect } from "vitest";
import { AppError, errorMessage } from "./app-error.js";
import {
  InvalidArgumentError,
  ValidationError,
  NotFoundError,
  ConflictError,
  RetrievalDegradedError,
  GenerationFailedError,
  ExternalServiceError,
  DeadlineExceededError,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root");
    const err = new AppError({
      message: "test error",
      statusCode: 500,
      code: "INTERNAL",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.statusCode).toBe(500);
    expect(err.code).toBe("INTERNAL");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true", () => {
    const err = new AppError({ message: "test", statusCode: 400, code: "BAD" });
    expect(err.isOperational).toBe(true);
  });

  it("serializes code, message and details only", () => {
    const err = new AppError({ message: "m", statusCode: 500, code: "X", details: { a: 1 } });
    expect(err.toJSON()).toEqual({ code: "X", message: "m", details: { a: 1 } });

    const bare = new AppError({ message: "m", statusCode: 500, code: "X" });
    expect(bare.toJSON()).toEqual({ code: "X", message: "m" });
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", statusCode: 500, code: "ERR" });

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(new Error("plain"))).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });

  it("errorMessage handles non-Error values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("Error Subclasses", () => {
  it("InvalidArgumentError has status 400 and INVALID_ARGUMENT code", () => {
    const err = new InvalidArgumentError("k must be positive");
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("INVALID_ARGUMENT");
    expect(err.message).toBe("k must be positive");
    expect(err.name).toBe("InvalidArgumentError");
    expect(err).toBeInstanceOf(AppError);
  });

  it("ValidationError carries fields", () => {
    const fields = { userId: "Required" };
    const err = new ValidationError("Validation failed", fields);
    expect(err.statusCode).toBe(400);
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.fields).toEqual(fields);
  });

  it("NotFoundError has status 404", () => {
    const err = new NotFoundError();
    expect(err.statusCode).toBe(404);
    expect(err.code).toBe("NOT_FOUND");
    expect(err.message).toBe("Resource not found");
  });

  it("ConflictError has status 409", () => {
    const err = new ConflictError("version mismatch");
    expect(err.statusCode).toBe(409);
    expect(err.code).toBe("CONFLICT");
  });

  it("RetrievalDegradedError is 503", () => {
    expect(new RetrievalDegradedError().statusCode).toBe(503);
    expect(new RetrievalDegradedError().code).toBe("RETRIEVAL_DEGRADED");
  });

  it("GenerationFailedError carries attempts", () => {
    const err = new GenerationFailedError("LLM down", 2);
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("GENERATION_FAILED");
    expect(err.attempts).toBe(2);
  });

  it("ExternalServiceError carries service", () => {
    const err = new ExternalServiceError("Cohere is down", "cohere");
    expect(err.statusCode).toBe(502);
    expect(err.code).toBe("EXTERNAL_SERVICE_ERROR");
    expect(err.service).toBe("cohere");
  });

  it("DeadlineExceededError carries the deadline", () => {
    const err = new DeadlineExceededError("turn timed out", 30_000);
    expect(err.statusCode).toBe(504);
    expect(err.code).toBe("DEADLINE_EXCEEDED");
    expect(err.deadlineMs).toBe(30_000);
  });
});
