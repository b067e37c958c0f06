/**
 * Auth Lambda Handler
 *
 * OAuth2 password-flow token endpoint and the bearer-protected profile route.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { handleError } from '../middleware/error-handler';
import { BadRequestError, ValidationError } from '../models/errors';
import { HttpStatus } from '../models/response';
import {
  successResponse,
  jsonResponse,
  notFoundErrorResponse,
  generateRequestId,
} from '../utils/response-formatter';
import { logRequest } from '../utils/logger';
import { loadEnvironmentConfig } from '../config/environment';
import { AuthService } from '../services/auth-service';
import { UserRepository } from '../repositories/user-repository';

let authService: AuthService | null = null;

function getAuthService(): AuthService {
  if (!authService) {
    const config = loadEnvironmentConfig();

    if (!config.jwtSecret) {
      throw new Error('JWT_SECRET is not configured');
    }

    authService = new AuthService(new UserRepository(), {
      jwtSecret: config.jwtSecret,
      tokenTtlSeconds: config.tokenTtlSeconds,
    });
  }

  return authService;
}

/**
 * Replace the auth service (for testing only)
 * @internal
 */
export function setAuthService(replacement: AuthService | null): void {
  authService = replacement;
}

/**
 * Case-insensitive header lookup
 */
function getHeader(event: APIGatewayProxyEvent, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(event.headers || {})) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

/**
 * Parse an application/x-www-form-urlencoded body into username and password
 */
export function parseTokenForm(event: APIGatewayProxyEvent): { username: string; password: string } {
  if (!event.body) {
    throw new BadRequestError('Request body is required');
  }

  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;
  const form = new URLSearchParams(raw);

  const details: Record<string, string> = {};
  const username = form.get('username');
  const password = form.get('password');
  const grantType = form.get('grant_type');

  if (!username) {
    details.username = 'Missing required field: username';
  }
  if (!password) {
    details.password = 'Missing required field: password';
  }
  if (grantType !== null && grantType !== 'password') {
    details.grant_type = 'Must be "password"';
  }

  if (!username || !password || Object.keys(details).length > 0) {
    throw new ValidationError('Invalid token request', details);
  }

  return { username, password };
}

/**
 * Auth handler
 *
 * Routes:
 * - POST /token: form username/password → bearer token
 * - GET /users/me: Authorization: Bearer <token> → current user
 */
export async function handler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  const startTime = Date.now();
  const requestId = generateRequestId();
  const method = event.httpMethod.toUpperCase();
  const path = event.path;

  let result: APIGatewayProxyResult;
  let username: string | undefined;

  try {
    if (method === 'POST' && path === '/token') {
      const form = parseTokenForm(event);
      username = form.username;
      const token = await getAuthService().login(form.username, form.password, requestId);
      result = jsonResponse(token, HttpStatus.OK, { 'Cache-Control': 'no-store' });
    } else if (method === 'GET' && path === '/users/me') {
      const user = getAuthService().getCurrentUser(getHeader(event, 'Authorization'), requestId);
      username = user.username;
      result = successResponse({ user }, HttpStatus.OK, requestId);
    } else {
      result = notFoundErrorResponse('Route not found', requestId);
    }
  } catch (error) {
    result = handleError(error, requestId);
  }

  logRequest({
    requestId,
    method,
    path,
    statusCode: result.statusCode,
    latencyMs: Date.now() - startTime,
    username,
  });

  return result;
}
