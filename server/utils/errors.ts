import type { ZodError } from "zod";

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = "INTERNAL_ERROR",
    isOperational: boolean = true,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, "VALIDATION_ERROR", true, details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource", id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(message, 404, "NOT_FOUND", true, { resource, id });
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication required") {
    super(message, 401, "AUTHENTICATION_ERROR", true);
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = "Access denied") {
    super(message, 403, "AUTHORIZATION_ERROR", true);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = "Resource conflict", details?: Record<string, unknown>) {
    super(message, 409, "CONFLICT_ERROR", true, details);
  }
}

export class BadRequestError extends AppError {
  constructor(message: string = "Bad request", details?: Record<string, unknown>) {
    super(message, 400, "BAD_REQUEST", true, details);
  }
}

/**
 * Transport, timeout or payload failure from the model gateway.
 */
export class GatewayError extends AppError {
  public readonly model?: string;
  public readonly upstreamStatus?: number;

  constructor(message: string, options: { model?: string; upstreamStatus?: number; cause?: unknown } = {}) {
    super(message, 502, "GATEWAY_ERROR", true, {
      model: options.model,
      upstreamStatus: options.upstreamStatus,
    });
    this.model = options.model;
    this.upstreamStatus = options.upstreamStatus;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class JobStoreError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 503, "JOB_STORE_UNAVAILABLE", false);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export const fromZodError = (error: ZodError, message: string = "Invalid request"): ValidationError => {
  const flattened = error.flatten();
  return new ValidationError(message, {
    fieldErrors: flattened.fieldErrors,
    formErrors: flattened.formErrors,
  });
};

export const isOperationalError = (error: Error): boolean => {
  if (error instanceof AppError) {
    return error.isOperational;
  }
  return false;
};
