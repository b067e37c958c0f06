/**
 * JWT Validation Middleware
 *
 * Issues and validates HS256 access tokens for the auth service.
 * Tokens carry the username as `sub` and expire after the configured TTL.
 */

import * as jwt from 'jsonwebtoken';
import { TokenClaims, AuthError, AuthErrorCode } from '../models/auth';
import { logAuthentication } from '../utils/logger';

/**
 * Extract token from Authorization header
 */
export function extractToken(authHeader: string | undefined): string {
  if (!authHeader) {
    throw new AuthError(
      AuthErrorCode.MISSING_TOKEN,
      'Authorization header is missing'
    );
  }

  const parts = authHeader.split(' ');
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer' || !parts[1]) {
    throw new AuthError(
      AuthErrorCode.INVALID_TOKEN,
      'Authorization header must be in format: Bearer <token>'
    );
  }

  return parts[1];
}

function isTokenClaims(value: unknown): value is TokenClaims {
  return (
    typeof value === 'object' && value !== null &&
    'sub' in value && typeof value.sub === 'string' &&
    'iat' in value && typeof value.iat === 'number' &&
    'exp' in value && typeof value.exp === 'number'
  );
}

/**
 * Sign an access token for a username
 */
export function issueToken(username: string, secret: string, ttlSeconds: number): string {
  return jwt.sign({ sub: username }, secret, {
    algorithm: 'HS256',
    expiresIn: ttlSeconds,
  });
}

/**
 * Validate a bearer token and extract its claims
 *
 * @param authHeader - Authorization header value (Bearer <token>)
 * @param secret - HS256 signing secret
 * @param requestId - Optional request ID for logging
 * @throws AuthError for missing, invalid, expired, or malformed tokens
 */
export function validateJWT(
  authHeader: string | undefined,
  secret: string,
  requestId?: string
): TokenClaims {
  try {
    const token = extractToken(authHeader);

    const claims = jwt.verify(token, secret, { algorithms: ['HS256'] });
    if (!isTokenClaims(claims)) {
      throw new AuthError(
        AuthErrorCode.INVALID_TOKEN,
        'Invalid token format'
      );
    }

    return claims;
  } catch (error) {
    let authError: AuthError;

    // TokenExpiredError extends JsonWebTokenError, so it is checked first
    if (error instanceof jwt.TokenExpiredError) {
      authError = new AuthError(AuthErrorCode.EXPIRED_TOKEN, 'Token has expired');
    } else if (error instanceof jwt.JsonWebTokenError) {
      authError = new AuthError(AuthErrorCode.INVALID_SIGNATURE, 'Invalid token signature');
    } else if (error instanceof AuthError) {
      authError = error;
    } else {
      authError = new AuthError(
        AuthErrorCode.INVALID_TOKEN,
        `Token validation failed: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }

    logAuthentication({
      requestId,
      success: false,
      action: 'VERIFY_TOKEN',
      reason: authError.message,
    });

    throw authError;
  }
}
