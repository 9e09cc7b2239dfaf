/**
 * Wishlist Backend
 *
 * Main entry point for the Lambda function and the public authentication API.
 */

export { handler, createApiHandler, buildDefaultDependencies } from './handlers/api-handler';
export type { ApiDependencies, ApiHandler } from './handlers/api-handler';

export * from './config/environment';
export * from './models/auth';
export * from './models/errors';
export * from './models/user';
export * from './models/authorization';
export * from './models/refresh-token';

export { TokenCodec } from './utils/token-codec';
export type { Clock, TokenCodecOptions } from './utils/token-codec';
export { TokensManager } from './services/tokens-manager';
export { JWTTokenBackend, assertAuthenticated } from './middleware/jwt-authentication';
export { AuthorizationManager } from './services/authorization-manager';
export { AuthService } from './services/auth-service';
