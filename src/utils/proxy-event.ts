/**
 * API Gateway Event Builder
 *
 * Turns a plain HTTP request into the proxy event shape the Lambda
 * handlers take, so the same handlers serve the local Express host.
 */

import { APIGatewayProxyEvent } from 'aws-lambda';
import { generateRequestId } from './response-formatter';

export interface ProxyRequest {
  method: string;
  path: string;
  headers?: Record<string, string | string[] | undefined>;
  query?: URLSearchParams;
  body?: string | null;
  sourceIp?: string;
}

function splitHeaders(headers: ProxyRequest['headers'] = {}) {
  const single: Record<string, string> = {};
  const multi: Record<string, string[]> = {};

  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    const values = Array.isArray(value) ? value : [value];
    single[name] = values.join(', ');
    multi[name] = values;
  }

  return { single, multi };
}

function splitQuery(query: URLSearchParams | undefined) {
  if (!query || [...query.keys()].length === 0) {
    return { single: null, multi: null };
  }

  const single: Record<string, string> = {};
  const multi: Record<string, string[]> = {};

  for (const [name, value] of query) {
    // API Gateway keeps the last value in the single-value map
    single[name] = value;
    multi[name] = [...(multi[name] || []), value];
  }

  return { single, multi };
}

export function toProxyEvent(request: ProxyRequest): APIGatewayProxyEvent {
  const method = request.method.toUpperCase();
  const headers = splitHeaders(request.headers);
  const query = splitQuery(request.query);
  const body = request.body ? request.body : null;

  return {
    httpMethod: method,
    path: request.path,
    resource: request.path,
    headers: headers.single,
    multiValueHeaders: headers.multi,
    queryStringParameters: query.single,
    multiValueQueryStringParameters: query.multi,
    pathParameters: null,
    stageVariables: null,
    body,
    isBase64Encoded: false,
    requestContext: {
      accountId: 'local',
      apiId: 'local',
      authorizer: null,
      protocol: 'HTTP/1.1',
      httpMethod: method,
      path: request.path,
      stage: 'local',
      requestId: generateRequestId(),
      requestTimeEpoch: Date.now(),
      resourceId: 'local',
      resourcePath: request.path,
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: request.sourceIp || '127.0.0.1',
        user: null,
        userAgent: headers.single['user-agent'] || null,
        userArn: null,
      },
    },
  };
}
