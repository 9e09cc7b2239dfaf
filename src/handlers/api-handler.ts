/**
 * Main Lambda Handler Entry Point
 *
 * Routes API Gateway requests to the token endpoints and the access
 * introspection endpoints, with authentication, permission checks,
 * error handling and structured logging.
 */

import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { isPoolHealthy } from '../config/database';
import { buildAuthConfig, loadEnvironmentConfig, validateEnvironmentConfig } from '../config/environment';
import { assertAuthenticated, JWTTokenBackend } from '../middleware/jwt-authentication';
import { handleError } from '../middleware/error-handler';
import { BadRequestError, NotFoundError } from '../models/errors';
import { HttpStatus } from '../models/response';
import { Principal, PrincipalStore, toPrincipal } from '../models/user';
import { AuthorizationRepository } from '../repositories/authorization-repository';
import { RefreshTokenRepository } from '../repositories/refresh-token-repository';
import { UserRepository } from '../repositories/user-repository';
import { AuthService } from '../services/auth-service';
import { AuthorizationManager } from '../services/authorization-manager';
import { TokensManager } from '../services/tokens-manager';
import { logRequest } from '../utils/logger';
import { parseLoginRequest, parseRefreshTokenRequest } from '../utils/request-validation';
import {
  generateRequestId,
  notFoundErrorResponse,
  serviceUnavailableErrorResponse,
  successResponse,
} from '../utils/response-formatter';

export interface ApiDependencies {
  authService: AuthService;
  authenticationBackend: JWTTokenBackend;
  authorizationManager: AuthorizationManager;
  users: PrincipalStore;
  checkHealth: () => Promise<boolean>;
}

export type ApiHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

interface RouteContext {
  event: APIGatewayProxyEvent;
  params: Record<string, string>;
  requestId: string;
  deps: ApiDependencies;
}

/**
 * Route definition
 * Authenticated routes receive the resolved principal.
 */
type Route =
  | {
      access: 'public';
      method: string;
      pathPattern: RegExp;
      handler: (context: RouteContext) => Promise<APIGatewayProxyResult>;
    }
  | {
      access: 'authenticated';
      method: string;
      pathPattern: RegExp;
      requiredPermission?: string;
      handler: (context: RouteContext, principal: Principal) => Promise<APIGatewayProxyResult>;
    };

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

/**
 * Route handlers
 */

// GET /
async function healthCheck({ requestId, deps }: RouteContext): Promise<APIGatewayProxyResult> {
  if (!(await deps.checkHealth())) {
    return serviceUnavailableErrorResponse('Database connection failed', requestId);
  }
  return successResponse({ status: 'healthy' }, HttpStatus.OK, requestId);
}

// POST /tokens
async function login({ event, requestId, deps }: RouteContext): Promise<APIGatewayProxyResult> {
  const { email, password } = parseLoginRequest(parseBody(event));
  const tokens = await deps.authService.login(email, password, requestId);
  return successResponse(tokens, HttpStatus.OK, requestId);
}

// PUT /tokens
async function refresh({ event, requestId, deps }: RouteContext): Promise<APIGatewayProxyResult> {
  const { refresh_token } = parseRefreshTokenRequest(parseBody(event));
  const tokens = await deps.authService.refresh(refresh_token, requestId);
  return successResponse(tokens, HttpStatus.OK, requestId);
}

// DELETE /tokens
async function logout({ event, requestId, deps }: RouteContext): Promise<APIGatewayProxyResult> {
  const { refresh_token } = parseRefreshTokenRequest(parseBody(event));
  const revoked = await deps.authService.logout(refresh_token);
  return successResponse({ revoked }, HttpStatus.OK, requestId);
}

// GET /users/me
async function getCurrentUser(
  { requestId, deps }: RouteContext,
  principal: Principal
): Promise<APIGatewayProxyResult> {
  const access = await deps.authorizationManager.describeAccess(principal);
  return successResponse({ user: principal, ...access }, HttpStatus.OK, requestId);
}

// GET /users/{userId}/permissions
async function getUserPermissions({ params, requestId, deps }: RouteContext): Promise<APIGatewayProxyResult> {
  const user = await deps.users.findById(params.userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }

  const access = await deps.authorizationManager.describeAccess(toPrincipal(user));
  return successResponse({ user_id: user.id, ...access }, HttpStatus.OK, requestId);
}

/**
 * Route definitions
 * Note: API Gateway stage is /v1/, so paths received don't include /v1/ prefix
 */
const routes: Route[] = [
  { access: 'public', method: 'GET', pathPattern: /^\/$/, handler: healthCheck },
  { access: 'public', method: 'POST', pathPattern: /^\/tokens$/, handler: login },
  { access: 'public', method: 'PUT', pathPattern: /^\/tokens$/, handler: refresh },
  { access: 'public', method: 'DELETE', pathPattern: /^\/tokens$/, handler: logout },
  { access: 'authenticated', method: 'GET', pathPattern: /^\/users\/me$/, handler: getCurrentUser },
  {
    access: 'authenticated',
    method: 'GET',
    pathPattern: /^\/users\/(?<userId>[^/]+)\/permissions$/,
    requiredPermission: 'user:read',
    handler: getUserPermissions,
  },
];

/**
 * Find matching route for request, with named path parameters
 */
function findRoute(method: string, path: string): { route: Route; params: Record<string, string> } | null {
  for (const route of routes) {
    if (route.method !== method) {
      continue;
    }

    const match = route.pathPattern.exec(path);
    if (match) {
      return { route, params: { ...match.groups } };
    }
  }

  return null;
}

/**
 * Build a Lambda handler over explicit dependencies
 *
 * This handler:
 * 1. Generates a unique request_id for tracing
 * 2. Routes requests based on HTTP method and path
 * 3. Authenticates the bearer token and checks permissions where the route requires it
 * 4. Handles errors and formats responses
 * 5. Logs every request with structured logging
 */
export function createApiHandler(deps: ApiDependencies): ApiHandler {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    const startTime = Date.now();
    const requestId = generateRequestId();
    const method = event.httpMethod;
    const path = event.path;
    let userId: string | undefined;

    let result: APIGatewayProxyResult;
    try {
      const match = findRoute(method, path);

      if (!match) {
        result = notFoundErrorResponse('Route not found', requestId);
      } else {
        const { route, params } = match;
        const context: RouteContext = { event, params, requestId, deps };

        if (route.access === 'public') {
          result = await route.handler(context);
        } else {
          const authentication = await deps.authenticationBackend.authenticate({
            headers: event.headers,
            requestId,
          });
          const principal = assertAuthenticated(authentication);
          userId = principal.id;

          if (route.requiredPermission) {
            await deps.authorizationManager.requirePermission(principal, route.requiredPermission, requestId);
          }

          result = await route.handler(context, principal);
        }
      }
    } catch (error) {
      result = handleError(error, requestId);
    }

    logRequest({
      requestId,
      method,
      path,
      userId,
      statusCode: result.statusCode,
      latencyMs: Date.now() - startTime,
    });

    return result;
  };
}

/**
 * Wire the production dependencies from the environment
 *
 * @throws Error if the environment configuration is incomplete
 */
export function buildDefaultDependencies(): ApiDependencies {
  const environment = loadEnvironmentConfig();
  validateEnvironmentConfig(environment);
  const authConfig = buildAuthConfig(environment);

  const users = new UserRepository();
  const tokensManager = new TokensManager(authConfig);

  return {
    authService: new AuthService(users, new RefreshTokenRepository(), tokensManager),
    authenticationBackend: new JWTTokenBackend(tokensManager, users, {
      schemePrefix: authConfig.schemePrefix,
    }),
    authorizationManager: new AuthorizationManager(new AuthorizationRepository()),
    users,
    checkHealth: isPoolHealthy,
  };
}

let defaultHandler: ApiHandler | null = null;

/**
 * Main Lambda handler
 * Dependencies are built on the first invocation and reused on warm starts.
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  if (!defaultHandler) {
    defaultHandler = createApiHandler(buildDefaultDependencies());
  }
  return defaultHandler(event);
}
