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
  dbSsl: boolean;

  // Token configuration
  tokensSecretKey: string;
  tokensIssuer: string;
  tokensAccessLifetimeSeconds: number;
  tokensRefreshLifetimeSeconds: number;
  authSchemePrefix: string;

  // Application configuration
  nodeEnv: string;
}

/**
 * Settings injected into the tokens manager and the authentication backend.
 * Built once at startup and never mutated.
 */
export interface AuthConfig {
  readonly secretKey: string;
  readonly issuer: string;
  readonly accessLifetimeSeconds: number;
  readonly refreshLifetimeSeconds: number;
  readonly schemePrefix: string;
}

const DEFAULT_ACCESS_LIFETIME_SECONDS = 60 * 60; // 1 hour
const DEFAULT_REFRESH_LIFETIME_SECONDS = 30 * 24 * 60 * 60; // 30 days

/**
 * Load and validate environment configuration
 */
export function loadEnvironmentConfig(): EnvironmentConfig {
  return {
    dbHost: process.env.DB_HOST || '',
    dbPort: parseInt(process.env.DB_PORT || '5432', 10),
    dbName: process.env.DB_NAME || '',
    dbUser: process.env.DB_USER || '',
    dbPassword: process.env.DB_PASSWORD || '',
    dbSsl: process.env.DB_SSL === 'true',
    tokensSecretKey: process.env.TOKENS_SECRET_KEY || '',
    tokensIssuer: process.env.TOKENS_ISSUER || 'wishlist-backend',
    tokensAccessLifetimeSeconds: parseInt(
      process.env.TOKENS_ACCESS_LIFETIME_SECONDS || String(DEFAULT_ACCESS_LIFETIME_SECONDS),
      10
    ),
    tokensRefreshLifetimeSeconds: parseInt(
      process.env.TOKENS_REFRESH_LIFETIME_SECONDS || String(DEFAULT_REFRESH_LIFETIME_SECONDS),
      10
    ),
    authSchemePrefix: process.env.AUTH_SCHEME_PREFIX || 'Bearer',
    nodeEnv: process.env.NODE_ENV || 'development',
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate that all required environment variables are set
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  const requiredFields: (keyof EnvironmentConfig)[] = [
    'dbHost',
    'dbName',
    'dbUser',
    'tokensSecretKey',
  ];

  const missingFields = requiredFields.filter((field) => !config[field]);

  if (missingFields.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missingFields.join(', ')}`
    );
  }

  if (!isPositiveInteger(config.tokensAccessLifetimeSeconds)) {
    throw new Error('TOKENS_ACCESS_LIFETIME_SECONDS must be a positive integer');
  }

  if (!isPositiveInteger(config.tokensRefreshLifetimeSeconds)) {
    throw new Error('TOKENS_REFRESH_LIFETIME_SECONDS must be a positive integer');
  }

  if (/\s/.test(config.authSchemePrefix)) {
    throw new Error('AUTH_SCHEME_PREFIX must be a single word');
  }
}

/**
 * Extract the frozen auth settings from the environment configuration
 */
export function buildAuthConfig(config: EnvironmentConfig): AuthConfig {
  return Object.freeze({
    secretKey: config.tokensSecretKey,
    issuer: config.tokensIssuer,
    accessLifetimeSeconds: config.tokensAccessLifetimeSeconds,
    refreshLifetimeSeconds: config.tokensRefreshLifetimeSeconds,
    schemePrefix: config.authSchemePrefix,
  });
}
