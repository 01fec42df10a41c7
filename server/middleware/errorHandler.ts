import type { Request, Response, NextFunction, ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { AppError, fromZodError, isOperationalError } from "../utils/errors";
import { createLogger } from "../utils/logger";

const logger = createLogger("ErrorHandler");

interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    stack?: string;
  };
}

function toResponse(error: AppError, isProduction: boolean): ErrorResponse {
  const body: ErrorResponse = {
    error: {
      message: error.message,
      code: error.code,
      details: error.details,
    },
  };
  if (!isProduction) {
    body.error.stack = error.stack;
  }
  return body;
}

function logError(error: Error, req: Request, statusCode: number): void {
  const logContext = {
    statusCode,
    path: req.path,
    method: req.method,
    errorName: error.name,
    errorMessage: error.message,
  };

  if (statusCode >= 500) {
    logger.error("Server error", { ...logContext, stack: error.stack });
  } else if (statusCode >= 400) {
    logger.warn("Client error", logContext);
  }
}

function statusFromUnknown(error: Error): number {
  const candidate: unknown = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof candidate === "number" && candidate >= 400 && candidate < 600 ? candidate : 500;
}

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const isProduction = process.env.NODE_ENV === "production";
  const appError = err instanceof ZodError ? fromZodError(err) : err;

  if (appError instanceof AppError) {
    logError(appError, req, appError.statusCode);
    if (res.headersSent) return;
    if (!isProduction || appError.isOperational) {
      res.status(appError.statusCode).json(toResponse(appError, isProduction));
    } else {
      res.status(appError.statusCode).json({
        error: { message: "Service temporarily unavailable", code: appError.code },
      });
    }
    return;
  }

  const statusCode = statusFromUnknown(err);
  logError(err, req, statusCode);

  if (!isOperationalError(err)) {
    logger.error("Unhandled error", { path: req.path, method: req.method, error: err });
  }

  if (res.headersSent) return;

  if (isProduction) {
    res.status(statusCode).json({
      error: { message: "An unexpected error occurred", code: "INTERNAL_ERROR" },
    });
  } else {
    res.status(statusCode).json({
      error: {
        message: err.message || "Internal Server Error",
        code: "INTERNAL_ERROR",
        stack: err.stack,
      },
    });
  }
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.path} not found`,
      code: "NOT_FOUND",
    },
  });
};

export const asyncHandler = <T>(fn: (req: Request, res: Response, next: NextFunction) => Promise<T>) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
