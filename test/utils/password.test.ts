/**
 * Password hashing tests
 */

import bcrypt from 'bcrypt';
import { hashHeroPassword, verifyUserPassword } from '../../src/utils/password';
import users from '../../src/config/users.json';

describe('hashHeroPassword', () => {
  it('should return the SHA-256 hex digest', () => {
    expect(hashHeroPassword('test-password')).toBe(
      'c638833f69bbfb3c267afa0a74434812436b8f08a81fd263c6be6871de4f1265'
    );
  });

  it('should be deterministic and distinguish passwords', () => {
    expect(hashHeroPassword('shared-password')).toBe(hashHeroPassword('shared-password'));
    expect(hashHeroPassword('shared-password')).not.toBe(hashHeroPassword('other-password'));
  });
});

describe('verifyUserPassword', () => {
  it('should accept the passwords of the bundled users', async () => {
    await expect(verifyUserPassword('secret', users.johndoe.hashed_password)).resolves.toBe(true);
    await expect(verifyUserPassword('secret2', users.alice.hashed_password)).resolves.toBe(true);
  });

  it('should reject a wrong password', async () => {
    await expect(verifyUserPassword('secret', users.alice.hashed_password)).resolves.toBe(false);
  });

  it('should verify a freshly hashed password', async () => {
    const hashed = await bcrypt.hash('test-password', 4);

    await expect(verifyUserPassword('test-password', hashed)).resolves.toBe(true);
    await expect(verifyUserPassword('test-passwore', hashed)).resolves.toBe(false);
  });

  it('should store bcrypt hashes with their own salts', () => {
    expect(users.johndoe.hashed_password).toMatch(/^\$2b\$10\$/);
    expect(users.johndoe.hashed_password).not.toBe(users.alice.hashed_password);
  });
});
