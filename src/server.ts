/**
 * Local HTTP host
 *
 * Serves the Lambda handlers over Express: each request becomes an API
 * Gateway proxy event and the handler result is written back as-is.
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { handler as apiHandler } from './handlers/api-handler';
import { handler as authHandler } from './handlers/auth-handler';
import { handler as docsHandler } from './handlers/docs-handler';
import { toProxyEvent } from './utils/proxy-event';
import { internalErrorResponse } from './utils/response-formatter';
import { loadEnvironmentConfig, validateEnvironmentConfig } from './config/environment';
import { runMigrations } from './scripts/run-migrations';
import { closePool } from './config/database';
import { log, LogLevel } from './utils/logger';

type LambdaHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

const AUTH_PATHS = ['/token', '/users/me'];

/**
 * Pick the Lambda handler that owns a path
 */
export function selectHandler(path: string): LambdaHandler {
  if (AUTH_PATHS.includes(path)) {
    return authHandler;
  }
  if (path === '/api-docs' || path.startsWith('/api-docs/')) {
    return docsHandler;
  }
  return apiHandler;
}

function writeResult(res: Response, result: APIGatewayProxyResult): void {
  res.status(result.statusCode);
  for (const [name, value] of Object.entries(result.headers || {})) {
    res.setHeader(name, String(value));
  }
  res.send(result.isBase64Encoded ? Buffer.from(result.body, 'base64') : result.body);
}

export function createApp(): Express {
  const app = express();

  app.disable('x-powered-by');
  // Handlers parse their own bodies (JSON or form), so keep the raw text
  app.use(express.text({ type: '*/*', limit: '1mb' }));

  app.all('*', (req: Request, res: Response, next: NextFunction) => {
    const url = new URL(req.originalUrl, 'http://localhost');
    const event = toProxyEvent({
      method: req.method,
      path: url.pathname,
      headers: req.headers,
      query: url.searchParams,
      body: typeof req.body === 'string' ? req.body : null,
      sourceIp: req.ip,
    });

    selectHandler(url.pathname)(event)
      .then((result) => writeResult(res, result))
      .catch(next);
  });

  app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
    log(LogLevel.ERROR, 'Unhandled host error', { error: error.message });
    writeResult(res, internalErrorResponse());
  });

  return app;
}

async function main(): Promise<void> {
  const config = loadEnvironmentConfig();
  validateEnvironmentConfig(config);

  const migration = await runMigrations();
  if (!migration.success) {
    throw new Error(`Migrations failed: ${migration.error}`);
  }

  const server = createApp().listen(config.port, () => {
    log(LogLevel.INFO, 'Server listening', { port: config.port });
  });

  const shutdown = (signal: string) => {
    log(LogLevel.INFO, 'Shutting down', { signal });
    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          log(LogLevel.ERROR, 'Failed to close pool', { error: String(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log(LogLevel.ERROR, 'Server failed to start', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
