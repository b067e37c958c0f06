/**
 * Error Handling Middleware
 *
 * Centralized error handling that catches and formats different types of errors
 * into standardized API responses with appropriate HTTP status codes.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { AuthError } from '../models/auth';
import {
  NotFoundError,
  BadRequestError,
  ValidationError,
  ConflictError,
} from '../models/errors';
import {
  authenticationErrorResponse,
  notFoundErrorResponse,
  validationErrorResponse,
  conflictErrorResponse,
  internalErrorResponse,
  serviceUnavailableErrorResponse,
} from '../utils/response-formatter';
import { log, LogLevel } from '../utils/logger';
import { loadEnvironmentConfig } from '../config/environment';

/**
 * PostgreSQL SQLSTATE for unique_violation
 */
const PG_UNIQUE_VIOLATION = '23505';

/**
 * Check if error is a database connection error
 *
 * Detects common database connection error patterns:
 * - ECONNREFUSED: Connection refused
 * - ETIMEDOUT: Connection timeout
 * - ENOTFOUND: Host not found
 * - Connection terminated unexpectedly
 */
export function isDatabaseConnectionError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('enotfound') ||
    message.includes('connection terminated') ||
    message.includes('connection refused') ||
    message.includes('connect timeout')
  );
}

/**
 * Check if error is a PostgreSQL unique constraint violation
 */
export function isUniqueViolation(error: Error): boolean {
  return 'code' in error && error.code === PG_UNIQUE_VIOLATION;
}

/**
 * Handle error and format appropriate response
 *
 * Maps application errors to standardized API responses:
 * - Authentication errors (401)
 * - Not found errors (404)
 * - Validation errors (400)
 * - Conflicts and unique violations (409)
 * - Database connection errors (503)
 * - Generic errors (500)
 *
 * @example
 * ```typescript
 * try {
 *   // ... operation
 * } catch (error) {
 *   return handleError(error, requestId);
 * }
 * ```
 */
export function handleError(
  error: unknown,
  requestId: string
): APIGatewayProxyResult {
  const err = error instanceof Error ? error : new Error(String(error));

  if (err instanceof AuthError) {
    return authenticationErrorResponse(err.message, requestId);
  }

  if (err instanceof NotFoundError) {
    return notFoundErrorResponse(err.message, requestId);
  }

  if (err instanceof ValidationError) {
    return validationErrorResponse(err.message, err.details, requestId);
  }

  if (err instanceof BadRequestError) {
    return validationErrorResponse(err.message, undefined, requestId);
  }

  if (err instanceof ConflictError) {
    return conflictErrorResponse(err.message, requestId);
  }

  if (isUniqueViolation(err)) {
    return conflictErrorResponse('Resource already exists', requestId);
  }

  if (isDatabaseConnectionError(err)) {
    return serviceUnavailableErrorResponse('Database connection failed', requestId);
  }

  log(LogLevel.ERROR, 'Unhandled error', {
    request_id: requestId,
    error: err.message,
    stack: err.stack,
  });

  return internalErrorResponse(
    'Internal server error',
    loadEnvironmentConfig().nodeEnv === 'development' ? { error: err.message } : undefined,
    requestId
  );
}
