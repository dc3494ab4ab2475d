// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Errors and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { loadEnvironmentConfig } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'api-errors' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Base class for errors that map onto an HTTP response.
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly details?: Record<string, unknown>;
  /** Expected failures (bad input, missing data) as opposed to bugs */
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.isOperational = isOperational;
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class InternalError extends ApiError {
  constructor(message: string = 'An unexpected error occurred') {
    super(message, 500, 'INTERNAL_ERROR', undefined, false);
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// NORMALIZATION
// ─────────────────────────────────────────────────────────────────────────────────

function zodDetails(error: ZodError): Record<string, unknown> {
  const fields: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const path = issue.path.join('.') || '_root';
    (fields[path] ??= []).push(issue.message);
  }
  return { fields };
}

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) return error;

  if (error instanceof ZodError) {
    return new ValidationError('Invalid request', zodDetails(error));
  }

  if (isJsonSyntaxError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }

  return new InternalError();
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Render any error as `{ error, code, details?, timestamp }`. Non-operational
 * errors are logged, and their messages are hidden in production.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const apiError = toApiError(error);

  if (!apiError.isOperational) {
    logger.error(
      `${req.method} ${req.path} failed`,
      error instanceof Error ? error : undefined
    );
  }

  const hideDetails = !apiError.isOperational && loadEnvironmentConfig().isProduction;

  res.status(apiError.statusCode).json({
    error: hideDetails ? 'An unexpected error occurred' : apiError.message,
    code: apiError.code,
    details: hideDetails ? undefined : apiError.details,
    timestamp: new Date().toISOString(),
  });
}
