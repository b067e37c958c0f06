/**
 * Database Migration Runner
 *
 * Creates the teams and heroes tables and their indexes.
 * Can be invoked from the migration handler, at server startup, or run locally.
 */

import { transaction } from '../config/database';
import { log, LogLevel } from '../utils/logger';

export interface MigrationResult {
  success: boolean;
  message: string;
  error?: string;
}

const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS teams (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    headquarters VARCHAR(255) NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS heroes (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL,
    secret_name VARCHAR(255) NOT NULL,
    hashed_password VARCHAR(64) NOT NULL UNIQUE,
    age INTEGER,
    team_id INTEGER REFERENCES teams(id) ON DELETE SET NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_teams_name ON teams(name)',
  'CREATE INDEX IF NOT EXISTS idx_heroes_name ON heroes(name)',
  'CREATE INDEX IF NOT EXISTS idx_heroes_age ON heroes(age)',
  'CREATE INDEX IF NOT EXISTS idx_heroes_team_id ON heroes(team_id)',
];

/**
 * Run database migrations
 *
 * All statements run in one transaction, so a failure leaves the schema untouched.
 */
export async function runMigrations(): Promise<MigrationResult> {
  try {
    log(LogLevel.INFO, 'Starting database migrations');

    await transaction(async (client) => {
      for (const statement of STATEMENTS) {
        await client.query(statement);
      }
    });

    log(LogLevel.INFO, 'Database migrations completed', { statements: STATEMENTS.length });

    return {
      success: true,
      message: 'Database migrations completed successfully',
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    log(LogLevel.ERROR, 'Migration failed', { error: message });
    return {
      success: false,
      message: 'Migration failed',
      error: message,
    };
  }
}

if (require.main === module) {
  runMigrations()
    .then((result) => {
      process.exit(result.success ? 0 : 1);
    })
    .catch((error: unknown) => {
      log(LogLevel.ERROR, 'Fatal error', { error: String(error) });
      process.exit(1);
    });
}
