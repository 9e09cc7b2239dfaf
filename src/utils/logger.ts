/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the application. All logs include request_id and timestamp where known.
 * Implements PII sanitization to exclude sensitive data.
 */

/**
 * Log levels
 */
export enum LogLevel {
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

type LogContext = Record<string, unknown>;

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  request_id?: string;
  user_id?: string;
}

/**
 * API request log entry
 */
interface RequestLogEntry extends BaseLogEntry {
  log_type: 'API_REQUEST';
  method: string;
  path: string;
  status_code: number;
  latency_ms: number;
}

/**
 * Authentication log entry
 */
interface AuthenticationLogEntry extends BaseLogEntry {
  log_type: 'AUTHENTICATION';
  success: boolean;
  reason?: string;
  code?: string;
}

/**
 * Authorization log entry
 */
interface AuthorizationLogEntry extends BaseLogEntry {
  log_type: 'AUTHORIZATION';
  success: boolean;
  permission: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

/**
 * Security violation log entry
 */
interface SecurityLogEntry extends BaseLogEntry {
  log_type: 'SECURITY_VIOLATION';
  violation_type: string;
  severity: 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';
  context: LogContext;
}

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII or secrets and should be excluded
 */
const PII_FIELDS = [
  'email',
  'first_name',
  'last_name',
  'full_name',
  'password',
  'password_hash',
  'phone',
  'phone_number',
  'address',
  'access_token',
  'refresh_token',
  'token',
  'authorization',
];

/**
 * Sanitize string by removing PII patterns
 */
function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function isLogContext(value: unknown): value is LogContext {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (isLogContext(value)) {
    return sanitizeObject(value);
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
function sanitizeObject(obj: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    // Skip PII fields entirely
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }

    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

/**
 * Write log entry to stdout (INFO/WARN) or stderr (ERROR)
 */
function writeLog(entry: BaseLogEntry): void {
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log API request
 *
 * @example
 * ```typescript
 * logRequest({
 *   requestId: 'abc-123',
 *   method: 'POST',
 *   path: '/tokens',
 *   statusCode: 200,
 *   latencyMs: 45
 * });
 * ```
 */
export function logRequest(params: {
  requestId: string;
  method: string;
  path: string;
  userId?: string;
  statusCode: number;
  latencyMs: number;
}): void {
  const entry: RequestLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.statusCode >= 500 ? LogLevel.ERROR : params.statusCode >= 400 ? LogLevel.WARN : LogLevel.INFO,
    log_type: 'API_REQUEST',
    request_id: params.requestId,
    user_id: params.userId,
    method: params.method,
    path: params.path,
    status_code: params.statusCode,
    latency_ms: params.latencyMs,
  };

  writeLog(entry);
}

/**
 * Log authentication attempt
 *
 * Logs both successful and failed authentication attempts. Failure
 * reasons carry the internal detail that is never returned to clients.
 *
 * @example
 * ```typescript
 * logAuthentication({
 *   requestId: 'abc-123',
 *   success: false,
 *   code: 'EXPIRED_TOKEN',
 *   reason: 'Token has expired'
 * });
 * ```
 */
export function logAuthentication(params: {
  requestId?: string;
  success: boolean;
  userId?: string;
  code?: string;
  reason?: string;
}): void {
  const entry: AuthenticationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHENTICATION',
    request_id: params.requestId,
    user_id: params.userId,
    success: params.success,
    code: params.code,
    reason: params.reason !== undefined ? sanitizeString(params.reason) : undefined,
  };

  writeLog(entry);
}

/**
 * Log authorization decision
 *
 * @example
 * ```typescript
 * logAuthorization({
 *   requestId: 'abc-123',
 *   userId: 'user-456',
 *   success: false,
 *   permission: 'wish:create'
 * });
 * ```
 */
export function logAuthorization(params: {
  requestId?: string;
  userId?: string;
  success: boolean;
  permission: string;
}): void {
  const entry: AuthorizationLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.WARN,
    log_type: 'AUTHORIZATION',
    request_id: params.requestId,
    user_id: params.userId,
    success: params.success,
    permission: params.permission,
  };

  writeLog(entry);
}

/**
 * Log database error
 *
 * Logs database errors with sanitized query preview and error message.
 */
export function logDatabase(params: {
  requestId?: string;
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query);

  // Truncate query for logging (first 200 characters)
  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    request_id: params.requestId,
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog(entry);
}

/**
 * Log security violation
 *
 * @example
 * ```typescript
 * logSecurity({
 *   userId: 'user-456',
 *   violationType: 'REFRESH_TOKEN_REUSE',
 *   severity: 'HIGH',
 *   context: { token_id: 42 }
 * });
 * ```
 */
export function logSecurity(params: {
  requestId?: string;
  userId?: string;
  violationType: string;
  severity: 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';
  context: LogContext;
}): void {
  const entry: SecurityLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'SECURITY_VIOLATION',
    request_id: params.requestId,
    user_id: params.userId,
    violation_type: params.violationType,
    severity: params.severity,
    context: sanitizeObject(params.context),
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 * Automatically sanitizes context to remove PII.
 */
export function log(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}
