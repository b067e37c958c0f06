/**
 * Response Formatting Utilities
 *
 * Provides helper functions for creating standardized API responses.
 * All responses include request_id, timestamp, and CORS headers.
 */

import { APIGatewayProxyResult } from 'aws-lambda';
import { v4 as uuidv4 } from 'uuid';
import {
  SuccessResponse,
  ErrorResponse,
  ErrorDetails,
  HttpStatus,
  ErrorCode,
} from '../models/response';

type Headers = Record<string, string>;

/**
 * CORS headers for all responses
 */
const CORS_HEADERS: Headers = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,POST,PATCH,DELETE,OPTIONS',
};

/**
 * Generate a unique request ID (UUID v4)
 */
export function generateRequestId(): string {
  return uuidv4();
}

/**
 * Generate ISO-8601 timestamp
 */
export function generateTimestamp(): string {
  return new Date().toISOString();
}

/**
 * Create a JSON response without the standard envelope
 *
 * Used where a protocol fixes the body shape, such as the OAuth2
 * token response.
 */
export function jsonResponse(
  body: unknown,
  statusCode: HttpStatus = HttpStatus.OK,
  headers: Headers = {}
): APIGatewayProxyResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...CORS_HEADERS,
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

/**
 * Create a success response
 *
 * Wraps response data in standard envelope with request_id and timestamp.
 *
 * @example
 * ```typescript
 * return successResponse({ teams }, HttpStatus.OK, requestId);
 * ```
 */
export function successResponse<T>(
  data: T,
  statusCode: HttpStatus = HttpStatus.OK,
  requestId?: string
): APIGatewayProxyResult {
  const response: SuccessResponse<T> = {
    request_id: requestId || generateRequestId(),
    timestamp: generateTimestamp(),
    data,
  };

  return jsonResponse(response, statusCode);
}

/**
 * Create an error response
 *
 * @param code - Machine-readable error code
 * @param message - Human-readable error message
 * @param statusCode - HTTP status code
 * @param details - Optional additional error context
 * @param requestId - Optional request ID (generated if not provided)
 * @param headers - Optional extra headers
 */
export function errorResponse(
  code: ErrorCode,
  message: string,
  statusCode: HttpStatus,
  details?: Record<string, string>,
  requestId?: string,
  headers: Headers = {}
): APIGatewayProxyResult {
  const errorDetails: ErrorDetails = {
    code,
    message,
    request_id: requestId || generateRequestId(),
  };

  if (details) {
    errorDetails.details = details;
  }

  const response: ErrorResponse = {
    error: errorDetails,
  };

  return jsonResponse(response, statusCode, headers);
}

/**
 * Create a validation error response (400)
 */
export function validationErrorResponse(
  message: string,
  details?: Record<string, string>,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.VALIDATION_ERROR,
    message,
    HttpStatus.BAD_REQUEST,
    details,
    requestId
  );
}

/**
 * Create an authentication error response (401)
 *
 * Carries the WWW-Authenticate challenge for bearer tokens.
 */
export function authenticationErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.AUTHENTICATION_ERROR,
    message,
    HttpStatus.UNAUTHORIZED,
    undefined,
    requestId,
    { 'WWW-Authenticate': 'Bearer' }
  );
}

/**
 * Create a not found error response (404)
 */
export function notFoundErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.NOT_FOUND,
    message,
    HttpStatus.NOT_FOUND,
    undefined,
    requestId
  );
}

/**
 * Create a conflict error response (409)
 */
export function conflictErrorResponse(
  message: string,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.CONFLICT,
    message,
    HttpStatus.CONFLICT,
    undefined,
    requestId
  );
}

/**
 * Create an internal server error response (500)
 *
 * @param details - Optional error details (only sent in development)
 */
export function internalErrorResponse(
  message: string = 'Internal server error',
  details?: Record<string, string>,
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.INTERNAL_ERROR,
    message,
    HttpStatus.INTERNAL_SERVER_ERROR,
    details,
    requestId
  );
}

/**
 * Create a service unavailable error response (503)
 */
export function serviceUnavailableErrorResponse(
  message: string = 'Service temporarily unavailable',
  requestId?: string
): APIGatewayProxyResult {
  return errorResponse(
    ErrorCode.SERVICE_UNAVAILABLE,
    message,
    HttpStatus.SERVICE_UNAVAILABLE,
    undefined,
    requestId
  );
}
