/**
 * Auth Handler Tests
 */

import * as jwt from 'jsonwebtoken';
import { handler, setAuthService, parseTokenForm } from '../../src/handlers/auth-handler';
import { ValidationError } from '../../src/models/errors';
import { createEvent } from '../helpers/events';

const FORM = { 'Content-Type': 'application/x-www-form-urlencoded' };

async function requestToken(username: string, password: string) {
  const body = new URLSearchParams({ grant_type: 'password', username, password }).toString();
  return handler(createEvent('POST', '/token', body, FORM));
}

describe('Auth Handler', () => {
  const logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

  beforeEach(() => {
    process.env.JWT_SECRET = 'test-secret';
    process.env.TOKEN_TTL_SECONDS = '1800';
    setAuthService(null);
  });

  afterAll(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  describe('POST /token', () => {
    it('should return an OAuth2 token body for alice', async () => {
      const result = await requestToken('alice', 'secret2');
      const body = JSON.parse(result.body);

      expect(result.statusCode).toBe(200);
      expect(result.headers).toMatchObject({ 'Cache-Control': 'no-store' });
      expect(body.token_type).toBe('bearer');
      expect(body.expires_in).toBe(1800);
      const claims = jwt.verify(body.access_token, 'test-secret');
      expect(typeof claims === 'object' && claims.sub).toBe('alice');
    });

    it('should reject a wrong password with 400', async () => {
      const result = await requestToken('alice', 'wrong');

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).error.message).toBe('incorrect username or password');
    });

    it('should report missing form fields', async () => {
      const result = await handler(createEvent('POST', '/token', 'username=alice', FORM));

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).error.details).toEqual({
        password: 'Missing required field: password',
      });
    });

    it('should fail with 500 when no signing secret is configured', async () => {
      delete process.env.JWT_SECRET;

      const result = await requestToken('alice', 'secret2');

      expect(result.statusCode).toBe(500);
    });
  });

  describe('GET /users/me', () => {
    async function me(authorization?: string) {
      const headers: Record<string, string> = authorization ? { authorization } : {};
      const result = await handler(createEvent('GET', '/users/me', undefined, headers));
      return { statusCode: result.statusCode, headers: result.headers, body: JSON.parse(result.body) };
    }

    it('should return the current user for a valid token', async () => {
      const token = JSON.parse((await requestToken('alice', 'secret2')).body).access_token;

      const { statusCode, body } = await me(`Bearer ${token}`);

      expect(statusCode).toBe(200);
      expect(body.data.user).toEqual({
        username: 'alice',
        email: 'alice@example.com',
        full_name: 'Alice Wonderson',
        disabled: false,
      });
    });

    it('should issue johndoe a token but reject the account as inactive', async () => {
      const tokenResult = await requestToken('johndoe', 'secret');
      expect(tokenResult.statusCode).toBe(200);
      const token = JSON.parse(tokenResult.body).access_token;

      const { statusCode, body } = await me(`Bearer ${token}`);

      expect(statusCode).toBe(400);
      expect(body.error.message).toBe('Inactive user');
    });

    it('should challenge a request without a token', async () => {
      const { statusCode, headers, body } = await me();

      expect(statusCode).toBe(401);
      expect(headers).toMatchObject({ 'WWW-Authenticate': 'Bearer' });
      expect(body.error.message).toBe('Authorization header is missing');
    });

    it('should reject a token signed with another secret', async () => {
      const token = jwt.sign({ sub: 'alice' }, 'another-secret', { expiresIn: 60 });

      expect((await me(`Bearer ${token}`)).statusCode).toBe(401);
    });

    it('should challenge a valid token whose subject is not a known user', async () => {
      const token = jwt.sign({ sub: 'mallory' }, 'test-secret', { expiresIn: 60 });

      const { statusCode, headers, body } = await me(`Bearer ${token}`);

      expect(statusCode).toBe(401);
      expect(headers).toMatchObject({ 'WWW-Authenticate': 'Bearer' });
      expect(body.error).toMatchObject({
        code: 'AUTHENTICATION_ERROR',
        message: 'Invalid authentication credentials',
      });
    });
  });

  it('should return 404 for other routes', async () => {
    const result = await handler(createEvent('GET', '/token'));

    expect(result.statusCode).toBe(404);
  });

  describe('parseTokenForm', () => {
    it('should reject a grant type other than password', () => {
      expect(() =>
        parseTokenForm(createEvent('POST', '/token', 'grant_type=client_credentials&username=a&password=b'))
      ).toThrow(ValidationError);
    });

    it('should decode percent-encoded values', () => {
      expect(parseTokenForm(createEvent('POST', '/token', 'username=al%20ice&password=p%26w'))).toEqual({
        username: 'al ice',
        password: 'p&w',
      });
    });
  });
});
