/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

export interface EnvironmentConfig {
  // Database configuration
  dbHost: string;
  dbPort: number;
  dbName: string;
  dbUser: string;
  dbPassword: string;
  dbSecretArn: string;
  dbSsl: boolean;

  // Auth configuration
  jwtSecret: string;
  tokenTtlSeconds: number;

  // Application configuration
  port: number;
  logLevel: string;
  nodeEnv: string;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dbHost: process.env.DB_HOST || 'localhost',
    dbPort: parseInteger(process.env.DB_PORT, 5432),
    dbName: process.env.DB_NAME || 'heroes',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSecretArn: process.env.DB_SECRET_ARN || '',
    dbSsl: process.env.DB_SSL === 'true',
    jwtSecret: process.env.JWT_SECRET || '',
    tokenTtlSeconds: parseInteger(process.env.TOKEN_TTL_SECONDS, 1800),
    port: parseInteger(process.env.PORT, 8000),
    logLevel: process.env.LOG_LEVEL || 'info',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

/**
 * Validate that all required environment variables are set
 *
 * Database credentials come either from Secrets Manager (DB_SECRET_ARN)
 * or from DB_USER, so one of the two must be present.
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = [
    'dbHost',
    'dbName',
    'jwtSecret',
  ];

  const missingFields: string[] = requiredFields.filter((field) => !config[field]);

  if (!config.dbSecretArn && !config.dbUser) {
    missingFields.push('dbSecretArn or dbUser');
  }

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }
}
