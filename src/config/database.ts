/**
 * Database Connection Pool Module
 *
 * Provides PostgreSQL connection pooling shared by every handler.
 * The pool is created once per process and reused across Lambda
 * invocations. Offers parameterized queries and transaction support.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { loadEnvironmentConfig } from './environment';
import { logDatabase, log, LogLevel } from '../utils/logger';

// Global pool instance for Lambda warm starts
let pool: Pool | null = null;
let cachedCredentials: DatabaseCredentials | null = null;

interface DatabaseCredentials {
  username: string;
  password: string;
}

/**
 * Database connection pool configuration
 */
interface PoolConfig {
  min: number;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

const DEFAULT_POOL_CONFIG: PoolConfig = {
  min: 2,
  max: 10,
  idleTimeoutMillis: 30000, // 30 seconds
  connectionTimeoutMillis: 5000, // 5 seconds
};

function isDatabaseCredentials(value: unknown): value is DatabaseCredentials {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'username' in value && typeof value.username === 'string' &&
    'password' in value && typeof value.password === 'string'
  );
}

/**
 * Fetch database credentials from AWS Secrets Manager
 */
async function getCredentialsFromSecretsManager(secretArn: string): Promise<DatabaseCredentials> {
  if (cachedCredentials) {
    return cachedCredentials;
  }

  const client = new SecretsManagerClient({ region: process.env.AWS_REGION || 'us-east-1' });

  try {
    const command = new GetSecretValueCommand({ SecretId: secretArn });
    const response = await client.send(command);

    if (!response.SecretString) {
      throw new Error('Secret value is empty');
    }

    const secret: unknown = JSON.parse(response.SecretString);
    if (!isDatabaseCredentials(secret)) {
      throw new Error('Secret must contain username and password');
    }

    cachedCredentials = {
      username: secret.username,
      password: secret.password,
    };

    return cachedCredentials;
  } catch (error) {
    throw new Error(`Failed to fetch database credentials: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }
}

/**
 * Resolve credentials from Secrets Manager when a secret ARN is configured,
 * otherwise from DB_USER / DB_PASSWORD
 */
async function resolveCredentials(): Promise<DatabaseCredentials> {
  const config = loadEnvironmentConfig();

  if (config.dbSecretArn) {
    return getCredentialsFromSecretsManager(config.dbSecretArn);
  }

  return { username: config.dbUser, password: config.dbPassword };
}

/**
 * Get or create the database connection pool
 */
export async function getPool(): Promise<Pool> {
  if (!pool) {
    const config = loadEnvironmentConfig();
    const credentials = await resolveCredentials();

    pool = new Pool({
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: credentials.username,
      password: credentials.password,
      min: DEFAULT_POOL_CONFIG.min,
      max: DEFAULT_POOL_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POOL_CONFIG.connectionTimeoutMillis,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    });

    pool.on('error', (err) => {
      logDatabase({
        errorMessage: err.message,
        query: 'Pool error',
        operation: 'POOL_ERROR',
      });
    });
  }

  return pool;
}

/**
 * Execute a parameterized query
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Parameter values
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> {
  const activePool = await getPool();

  try {
    return await activePool.query<T>(text, params);
  } catch (error) {
    logDatabase({
      errorMessage: error instanceof Error ? error.message : String(error),
      query: text,
      operation: text.trim().split(/\s+/)[0].toUpperCase(),
    });
    throw error;
  }
}

/**
 * Transaction helper for atomic operations
 * Automatically handles BEGIN, COMMIT, and ROLLBACK
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const activePool = await getPool();
  const client = await activePool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Close the database pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Reset pool and credential cache (for testing only)
 * @internal
 */
export function resetPool(): void {
  pool = null;
  cachedCredentials = null;
}

/**
 * Check if pool is healthy
 */
export async function isPoolHealthy(): Promise<boolean> {
  try {
    const result = await query<{ health_check: number }>('SELECT 1 as health_check');
    return result.rows.length === 1 && result.rows[0].health_check === 1;
  } catch (error) {
    log(LogLevel.WARN, 'Pool health check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
