/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the application. All logs include a timestamp and, where known, the
 * request_id. Credentials and personal data are redacted before writing.
 */

import { loadEnvironmentConfig } from '../config/environment';

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.INFO]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.ERROR]: 2,
};

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
}

/**
 * API request log entry
 */
interface RequestLogEntry extends BaseLogEntry {
  log_type: 'API_REQUEST';
  method: string;
  path: string;
  status_code: number;
  latency_ms: number;
  username?: string;
}

/**
 * Authentication log entry
 */
interface AuthenticationLogEntry extends BaseLogEntry {
  log_type: 'AUTHENTICATION';
  success: boolean;
  action: 'ISSUE_TOKEN' | 'VERIFY_TOKEN';
  reason?: string;
  username?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

type LogContext = Record<string, unknown>;

const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  bearer: /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g,
};

/**
 * Fields whose values are never written to logs
 */
const REDACTED_FIELDS = [
  'password',
  'hashed_password',
  'secret_name',
  'access_token',
  'authorization',
  'email',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.bearer, 'Bearer [TOKEN_REDACTED]');
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (value && typeof value === 'object' && !(value instanceof Date)) {
    return sanitizeObject(value);
  }
  return value;
}

/**
 * Sanitize object by redacting sensitive fields and patterns
 */
export function sanitizeObject(obj: object): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    if (REDACTED_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

function minimumLevel(): LogLevel {
  switch (loadEnvironmentConfig().logLevel.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Write log entry to console
 */
function writeLog<T extends BaseLogEntry>(entry: T): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log API request
 *
 * @example
 * ```typescript
 * logRequest({
 *   requestId: 'abc-123',
 *   method: 'GET',
 *   path: '/teams/1',
 *   statusCode: 200,
 *   latencyMs: 12
 * });
 * ```
 */
export function logRequest(params: {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  latencyMs: number;
  username?: string;
}): void {
  const entry: RequestLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.statusCode >= 500 ? LogLevel.ERROR : params.statusCode >= 400 ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'API_REQUEST',
    request_id: params.requestId,
    method: params.method,
    path: params.path,
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
    username: params.username,
  };

  writeLog(entry);
}

/**
 * Log token issuance or verification
 */
export function logAuthentication(params: {
  requestId?: string;
  success: boolean;
  action: 'ISSUE_TOKEN' | 'VERIFY_TOKEN';
  username?: string;
  reason?: string;
}): void {
  const entry: AuthenticationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHENTICATION',
    request_id: params.requestId,
    success: params.success,
    action: params.action,
    username: params.username,
    reason: params.reason,
  };

  writeLog(entry);
}

/**
 * Log database error
 *
 * The query is sanitized and truncated to its first 200 characters.
 */
export function logDatabase(params: {
  requestId?: string;
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query.replace(/\s+/g, ' ').trim());

  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    request_id: params.requestId,
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Server listening', { port: 8000 });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  writeLog({
    ...sanitizedContext,
    timestamp: new Date().toISOString(),
    level,
    message,
  });
}
