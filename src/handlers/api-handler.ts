/**
 * Main Lambda Handler Entry Point
 *
 * Handles all API Gateway requests for teams and heroes with routing,
 * body validation, error handling, and structured logging.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { handleError } from '../middleware/error-handler';
import { BadRequestError } from '../models/errors';
import { HttpStatus, MessageBody } from '../models/response';
import {
  successResponse,
  notFoundErrorResponse,
  generateRequestId,
} from '../utils/response-formatter';
import {
  validateTeamCreate,
  validateTeamUpdate,
  validateHeroCreate,
  validateHeroUpdate,
  MAX_INTEGER,
} from '../utils/request-validation';
import { logRequest } from '../utils/logger';
import { isPoolHealthy } from '../config/database';
import { runMigrations } from '../scripts/run-migrations';

import { TeamService } from '../services/team-service';
import { HeroService } from '../services/hero-service';
import { TeamRepository } from '../repositories/team-repository';
import { HeroRepository } from '../repositories/hero-repository';

/**
 * Route handler function type
 *
 * @param params - Path segments captured by the route pattern
 */
type RouteHandler = (
  event: APIGatewayProxyEvent,
  params: string[],
  requestId: string
) => Promise<APIGatewayProxyResult>;

/**
 * Route definition
 */
interface Route {
  method: string;
  pathPattern: RegExp;
  handler: RouteHandler;
}

export interface ApiServices {
  teamService: TeamService;
  heroService: HeroService;
}

/**
 * Services are created once per container (warm starts reuse them)
 */
let services: ApiServices | null = null;

function getServices(): ApiServices {
  if (!services) {
    const teamRepository = new TeamRepository();
    const heroRepository = new HeroRepository();

    services = {
      teamService: new TeamService(teamRepository),
      heroService: new HeroService(heroRepository, teamRepository),
    };
  }

  return services;
}

/**
 * Replace the services used by the handler (for testing only)
 * @internal
 */
export function setServices(replacement: ApiServices | null): void {
  services = replacement;
}

/**
 * Parse a path id into a positive integer
 */
export function parseId(value: string, name: string): number {
  const id = /^[1-9]\d*$/.test(value) ? Number(value) : NaN;

  if (!Number.isSafeInteger(id) || id > MAX_INTEGER) {
    throw new BadRequestError(`Invalid ${name}: ${value}`);
  }

  return id;
}

/**
 * Parse request body
 */
function parseBody(event: APIGatewayProxyEvent): unknown {
  if (!event.body) {
    throw new BadRequestError('Request body is required');
  }

  const raw = event.isBase64Encoded
    ? Buffer.from(event.body, 'base64').toString('utf8')
    : event.body;

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new BadRequestError('Invalid JSON in request body');
  }
}

function message(text: string): MessageBody {
  return { message: text };
}

/**
 * Route handlers
 */

// POST /teams
async function createTeam(event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const { teamService } = getServices();
  const input = validateTeamCreate(parseBody(event));
  const team = await teamService.createTeam(input);
  return successResponse({ team }, HttpStatus.CREATED, requestId);
}

// GET /teams
async function getTeams(_event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const { teamService } = getServices();
  const teams = await teamService.getTeams();
  return successResponse({ teams }, HttpStatus.OK, requestId);
}

// GET /teams/{teamId}
async function getTeamById(_event: APIGatewayProxyEvent, params: string[], requestId: string) {
  const { teamService } = getServices();
  const team = await teamService.getTeamById(parseId(params[0], 'team id'));
  return successResponse({ team }, HttpStatus.OK, requestId);
}

// PATCH /teams/{teamId}
async function updateTeam(event: APIGatewayProxyEvent, params: string[], requestId: string) {
  const { teamService } = getServices();
  const teamId = parseId(params[0], 'team id');
  const input = validateTeamUpdate(parseBody(event));
  const team = await teamService.updateTeam(teamId, input);
  return successResponse({ team }, HttpStatus.OK, requestId);
}

// DELETE /teams/{teamId}
async function deleteTeam(_event: APIGatewayProxyEvent, params: string[], requestId: string) {
  const { teamService } = getServices();
  const text = await teamService.deleteTeam(parseId(params[0], 'team id'));
  return successResponse(message(text), HttpStatus.OK, requestId);
}

// DELETE /teams
async function deleteAllTeams(_event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const { teamService } = getServices();
  const text = await teamService.deleteAllTeams();
  return successResponse(message(text), HttpStatus.OK, requestId);
}

// POST /heroes
async function createHero(event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const { heroService } = getServices();
  const input = validateHeroCreate(parseBody(event));
  const hero = await heroService.createHero(input);
  return successResponse({ hero }, HttpStatus.CREATED, requestId);
}

// GET /heroes
async function getHeroes(_event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const { heroService } = getServices();
  const heroes = await heroService.getHeroes();
  return successResponse({ heroes }, HttpStatus.OK, requestId);
}

// GET /heroes/{heroId}
async function getHeroById(_event: APIGatewayProxyEvent, params: string[], requestId: string) {
  const { heroService } = getServices();
  const hero = await heroService.getHeroById(parseId(params[0], 'hero id'));
  return successResponse({ hero }, HttpStatus.OK, requestId);
}

// PATCH /heroes/{heroId}
async function updateHero(event: APIGatewayProxyEvent, params: string[], requestId: string) {
  const { heroService } = getServices();
  const heroId = parseId(params[0], 'hero id');
  const input = validateHeroUpdate(parseBody(event));
  const hero = await heroService.updateHero(heroId, input);
  return successResponse({ hero }, HttpStatus.OK, requestId);
}

// DELETE /heroes/{heroId}
async function deleteHero(_event: APIGatewayProxyEvent, params: string[], requestId: string) {
  const { heroService } = getServices();
  const text = await heroService.deleteHero(parseId(params[0], 'hero id'));
  return successResponse(message(text), HttpStatus.OK, requestId);
}

// DELETE /heroes
async function deleteAllHeroes(_event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const { heroService } = getServices();
  const text = await heroService.deleteAllHeroes();
  return successResponse(message(text), HttpStatus.OK, requestId);
}

// GET /health
async function getHealth(_event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const database = await isPoolHealthy();
  return successResponse(
    { status: database ? 'ok' : 'degraded', database },
    database ? HttpStatus.OK : HttpStatus.SERVICE_UNAVAILABLE,
    requestId
  );
}

// POST /admin/migrate
async function migrate(_event: APIGatewayProxyEvent, _params: string[], requestId: string) {
  const result = await runMigrations();
  const statusCode = result.success ? HttpStatus.OK : HttpStatus.INTERNAL_SERVER_ERROR;
  return successResponse(result, statusCode, requestId);
}

/**
 * Route definitions
 */
const routes: Route[] = [
  { method: 'POST', pathPattern: /^\/teams\/?$/, handler: createTeam },
  { method: 'GET', pathPattern: /^\/teams\/?$/, handler: getTeams },
  { method: 'DELETE', pathPattern: /^\/teams\/?$/, handler: deleteAllTeams },
  { method: 'GET', pathPattern: /^\/teams\/([^/]+)$/, handler: getTeamById },
  { method: 'PATCH', pathPattern: /^\/teams\/([^/]+)$/, handler: updateTeam },
  { method: 'DELETE', pathPattern: /^\/teams\/([^/]+)$/, handler: deleteTeam },
  { method: 'POST', pathPattern: /^\/heroes\/?$/, handler: createHero },
  { method: 'GET', pathPattern: /^\/heroes\/?$/, handler: getHeroes },
  { method: 'DELETE', pathPattern: /^\/heroes\/?$/, handler: deleteAllHeroes },
  { method: 'GET', pathPattern: /^\/heroes\/([^/]+)$/, handler: getHeroById },
  { method: 'PATCH', pathPattern: /^\/heroes\/([^/]+)$/, handler: updateHero },
  { method: 'DELETE', pathPattern: /^\/heroes\/([^/]+)$/, handler: deleteHero },
  { method: 'GET', pathPattern: /^\/health$/, handler: getHealth },
  { method: 'POST', pathPattern: /^\/admin\/migrate$/, handler: migrate },
];

/**
 * Find matching route for request
 *
 * @returns The route and its captured path segments, or null
 */
function findRoute(method: string, path: string): { route: Route; params: string[] } | null {
  for (const route of routes) {
    if (route.method !== method) {
      continue;
    }
    const match = route.pathPattern.exec(path);
    if (match) {
      // Segments stay percent-encoded: ids are digits only
      return { route, params: match.slice(1) };
    }
  }
  return null;
}

/**
 * Main Lambda handler
 *
 * This handler:
 * 1. Generates a unique request_id for tracing
 * 2. Routes requests to the team or hero service by method and path
 * 3. Handles errors and formats responses
 * 4. Logs every request with structured logging
 */
export async function handler(
  event: APIGatewayProxyEvent
): Promise<APIGatewayProxyResult> {
  const startTime = Date.now();
  const requestId = generateRequestId();
  const method = event.httpMethod.toUpperCase();
  const path = event.path;

  let result: APIGatewayProxyResult;

  try {
    if (method === 'OPTIONS') {
      result = successResponse({}, HttpStatus.OK, requestId);
    } else {
      const matched = findRoute(method, path);
      result = matched
        ? await matched.route.handler(event, matched.params, requestId)
        : notFoundErrorResponse('Route not found', requestId);
    }
  } catch (error) {
    result = handleError(error, requestId);
  }

  logRequest({
    requestId,
    method,
    path,
    statusCode: result.statusCode,
    latencyMs: Date.now() - startTime,
  });

  return result;
}
