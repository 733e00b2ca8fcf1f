/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorBody {
  error: string;
  stack?: string;
}

/**
 * Global error handler middleware.
 * Detection failures never get here; this covers everything else
 * (oversized bodies, unexpected middleware errors).
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const statusCode = statusCodeOf(error);
  const message = error.message || "Internal server error";

  console.error(`[http] ${statusCode} - ${message}`, {
    error: error.name,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });

  const response: ErrorBody = { error: message };

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}

/** AppErrors carry their own status; body-parser errors expose `status`. */
function statusCodeOf(error: Error): number {
  if (error instanceof AppError) return error.statusCode;
  if ("status" in error && typeof error.status === "number") return error.status;
  return 500;
}
