import { randomUUID } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { AppError, NotFoundError, ValidationError } from "@groundline/errors";
import type { Logger } from "@groundline/logger";
import type { ApiError, ApiResponse } from "@groundline/types";

// Extend Express Request with the per-request id
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

const REQUEST_ID_HEADER = "x-request-id";

function getRequestId(req: Request): string {
  return req.requestId ?? "unknown";
}

export function sendData<T>(res: Response, status: number, data: T): void {
  const body: ApiResponse<T> = { success: true, data };
  res.status(status).json(body);
}

function sendError(res: Response, status: number, error: ApiError): void {
  const body: ApiResponse<never> = { success: false, error };
  res.status(status).json(body);
}

/** Reuses a caller-supplied X-Request-Id, otherwise mints one. */
export function requestId(): RequestHandler {
  return (req, res, next) => {
    const supplied = req.get(REQUEST_ID_HEADER);
    req.requestId = supplied && supplied.length <= 128 ? supplied : randomUUID();
    res.setHeader(REQUEST_ID_HEADER, req.requestId);
    next();
  };
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          requestId: getRequestId(req),
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "Request completed",
      );
    });
    next();
  };
}

/** Express 4 does not forward rejected promises, so route handlers go through this. */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    void handler(req, res).catch(next);
  };
}

export function notFound(): RequestHandler {
  return (req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  };
}

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && "body" in err;
}

/**
 * Maps errors onto the response envelope. Operational AppErrors keep their
 * status and message; anything else is a 500 with a generic message.
 */
export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const id = getRequestId(req);

    if (isMalformedJson(err)) {
      sendError(res, 400, { code: "INVALID_JSON", message: "Malformed JSON body", requestId: id });
      return;
    }

    if (AppError.isAppError(err) && err.isOperational) {
      if (err.statusCode >= 500) {
        logger.error({ err, requestId: id }, "Request failed");
      }
      sendError(res, err.statusCode, {
        code: err.code,
        message: err.message,
        requestId: id,
        ...(err instanceof ValidationError ? { details: err.fields } : {}),
      });
      return;
    }

    logger.error({ err, requestId: id }, "Unhandled error");
    sendError(res, 500, { code: "INTERNAL_ERROR", message: "Internal server error", requestId: id });
  };
}
