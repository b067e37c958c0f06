/**
 * Password hashing helpers
 *
 * Hero passwords use an unsalted SHA-256 digest: heroes must hold distinct
 * passwords, and uniqueness is checked by comparing digests, so the hash
 * has to be deterministic. User passwords are bcrypt hashes.
 */

import { createHash } from 'crypto';
import bcrypt from 'bcrypt';

/**
 * Deterministic digest of a hero password (hex)
 */
export function hashHeroPassword(password: string): string {
  return createHash('sha256').update(password, 'utf8').digest('hex');
}

/**
 * Check a candidate password against a stored bcrypt hash
 */
export async function verifyUserPassword(password: string, hashedPassword: string): Promise<boolean> {
  return bcrypt.compare(password, hashedPassword);
}
