/**
 * Global error handling middleware.
 *
 * Every failure leaves the API as
 * `{ "error": { "message", "code", "details" } }` with the status carried by
 * the error (`statusCode`, or `status` for body-parser and SDK errors), 500
 * when none is present.
 */
import { logger } from "@infrastructure/logging/Logger";
import { messageOf, statusCodeOf } from "@typesLocal/StatusCodeError";
import type { NextFunction, Request, Response } from "express";

export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError"
  | "NotFoundError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "DomainError", statusCode, metadata);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "NotFoundError", 404, metadata);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Maps anything thrown into an AppError. Status-carrying errors from
 * use-cases keep their status; 4xx become domain errors, the rest
 * infrastructure errors.
 */
export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const statusCode = statusCodeOf(err) ?? 500;
  const message =
    err instanceof Error && err.message ? err.message : "Internal Server Error";

  if (statusCode === 404) {
    return new NotFoundError(message);
  }
  if (statusCode >= 400 && statusCode < 500) {
    return new DomainError(message, statusCode);
  }
  return new InfrastructureError(message, statusCode);
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    method: req.method,
    path: req.originalUrl,
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
    originalError: appError === err ? undefined : messageOf(err),
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}
