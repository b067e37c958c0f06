import { APIGatewayProxyResult } from 'aws-lambda';
import { runMigrations } from '../scripts/run-migrations';
import { jsonResponse } from '../utils/response-formatter';
import { HttpStatus } from '../models/response';
import { log, LogLevel } from '../utils/logger';

/**
 * Standalone Lambda entry for schema migrations (deploy hooks, scheduled jobs)
 */
export async function handler(): Promise<APIGatewayProxyResult> {
  log(LogLevel.INFO, 'Migration handler invoked');
  const result = await runMigrations();
  return jsonResponse(
    result,
    result.success ? HttpStatus.OK : HttpStatus.INTERNAL_SERVER_ERROR
  );
}
