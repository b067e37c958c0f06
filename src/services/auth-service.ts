/**
 * Auth Service
 *
 * Password login against the user table and resolution of the user
 * behind a bearer token.
 */

import { UserRepository } from '../repositories/user-repository';
import { AuthError, AuthErrorCode, TokenResponse, User, UserInDb } from '../models/auth';
import { BadRequestError } from '../models/errors';
import { issueToken, validateJWT } from '../middleware/jwt-validation';
import { verifyUserPassword } from '../utils/password';
import { logAuthentication } from '../utils/logger';

const BAD_CREDENTIALS = 'incorrect username or password';

export interface AuthServiceOptions {
  jwtSecret: string;
  tokenTtlSeconds: number;
}

function toPublicUser(user: UserInDb): User {
  return {
    username: user.username,
    email: user.email,
    full_name: user.full_name,
    disabled: user.disabled,
  };
}

export class AuthService {
  constructor(
    private userRepository: UserRepository,
    private options: AuthServiceOptions
  ) {}

  /**
   * Exchange a username and password for an access token
   *
   * @throws BadRequestError for an unknown user or a wrong password
   */
  async login(username: string, password: string, requestId?: string): Promise<TokenResponse> {
    const user = this.userRepository.findByUsername(username);

    if (!user || !(await verifyUserPassword(password, user.hashed_password))) {
      logAuthentication({
        requestId,
        success: false,
        action: 'ISSUE_TOKEN',
        username,
        reason: user ? 'Wrong password' : 'Unknown user',
      });
      throw new BadRequestError(BAD_CREDENTIALS);
    }

    logAuthentication({
      requestId,
      success: true,
      action: 'ISSUE_TOKEN',
      username,
    });

    return {
      access_token: issueToken(user.username, this.options.jwtSecret, this.options.tokenTtlSeconds),
      token_type: 'bearer',
      expires_in: this.options.tokenTtlSeconds,
    };
  }

  /**
   * Resolve the active user behind an Authorization header
   *
   * @throws AuthError if the token is missing or invalid or names no user
   * @throws BadRequestError if the user is disabled
   */
  getCurrentUser(authHeader: string | undefined, requestId?: string): User {
    const claims = validateJWT(authHeader, this.options.jwtSecret, requestId);
    const user = this.userRepository.findByUsername(claims.sub);

    if (!user) {
      logAuthentication({
        requestId,
        success: false,
        action: 'VERIFY_TOKEN',
        username: claims.sub,
        reason: 'Unknown user',
      });
      throw new AuthError(AuthErrorCode.UNKNOWN_USER, 'Invalid authentication credentials');
    }

    if (user.disabled) {
      throw new BadRequestError('Inactive user');
    }

    logAuthentication({
      requestId,
      success: true,
      action: 'VERIFY_TOKEN',
      username: user.username,
    });

    return toPublicUser(user);
  }
}
