import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import * as fs from 'fs';
import * as path from 'path';
import { errorResponse, notFoundErrorResponse } from '../utils/response-formatter';
import { ErrorCode, HttpStatus } from '../models/response';
import { log, LogLevel } from '../utils/logger';

// src/handlers under ts-jest, dist/src/handlers once compiled
const DOCS_DIR = [
  path.join(__dirname, '../../docs'),
  path.join(__dirname, '../../../docs'),
].find((dir) => fs.existsSync(dir)) ?? path.join(__dirname, '../../docs');

const DOCUMENTS: Record<string, { file: string; contentType: string }> = {
  '/api-docs': { file: 'api-docs.html', contentType: 'text/html' },
  '/api-docs/': { file: 'api-docs.html', contentType: 'text/html' },
  '/api-docs/openapi.json': { file: 'openapi.json', contentType: 'application/json' },
};

/**
 * Lambda handler for serving API documentation
 *
 * Serves the Swagger UI page and the OpenAPI description under /api-docs.
 */
export const handler = async (
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> => {
  const document = Object.hasOwn(DOCUMENTS, event.path) ? DOCUMENTS[event.path] : undefined;

  if (!document) {
    return notFoundErrorResponse('Documentation resource not found');
  }

  try {
    const body = await fs.promises.readFile(path.join(DOCS_DIR, document.file), 'utf-8');
    return {
      statusCode: HttpStatus.OK,
      headers: {
        'Content-Type': document.contentType,
        'Cache-Control': 'public, max-age=3600',
      },
      body,
    };
  } catch (error) {
    log(LogLevel.ERROR, 'Error serving documentation', {
      file: document.file,
      error: error instanceof Error ? error.message : String(error),
    });
    return errorResponse(
      ErrorCode.INTERNAL_ERROR,
      'Failed to serve documentation',
      HttpStatus.INTERNAL_SERVER_ERROR
    );
  }
};
