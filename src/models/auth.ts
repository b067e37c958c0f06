/**
 * Authentication Models
 * 
 * Type definitions for the static user table, issued tokens
 * and authentication errors.
 */

/**
 * User as returned by GET /users/me
 */
export interface User {
  username: string;
  email: string;
  full_name: string;
  disabled: boolean;
}

/**
 * User as stored in the user table
 */
export interface UserInDb extends User {
  hashed_password: string;
}

/**
 * Claims carried by an issued access token
 */
export interface TokenClaims {
  sub: string;                    // Username
  iat: number;                    // Issued at timestamp
  exp: number;                    // Expiration timestamp
}

/**
 * OAuth2 token response body
 */
export interface TokenResponse {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;
}

/**
 * Authentication error types
 */
export enum AuthErrorCode {
  MISSING_TOKEN = 'MISSING_TOKEN',
  INVALID_TOKEN = 'INVALID_TOKEN',
  EXPIRED_TOKEN = 'EXPIRED_TOKEN',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  UNKNOWN_USER = 'UNKNOWN_USER',
}

/**
 * Authentication error
 */
export class AuthError extends Error {
  constructor(
    public code: AuthErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'AuthError';
  }
}
