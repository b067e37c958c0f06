/**
 * Heroes Backend API
 *
 * Lambda entry points. Deploy each handler behind its API Gateway routes.
 */

export { handler as apiHandler } from './handlers/api-handler';
export { handler as authHandler } from './handlers/auth-handler';
export { handler as docsHandler } from './handlers/docs-handler';
export { handler as migrationHandler } from './handlers/migration-handler';
export { createApp } from './server';
export * from './config/environment';
