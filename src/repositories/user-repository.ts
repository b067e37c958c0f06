/**
 * User Repository
 *
 * Read-only access to the static user table bundled with the service.
 */

import users from '../config/users.json';
import { UserInDb } from '../models/auth';

const USERS: Record<string, UserInDb> = users;

export class UserRepository {
  constructor(private table: Record<string, UserInDb> = USERS) {}

  /**
   * Find a user by username
   *
   * @returns User with password hash if found, null otherwise
   */
  findByUsername(username: string): UserInDb | null {
    return Object.hasOwn(this.table, username) ? this.table[username] : null;
  }
}
