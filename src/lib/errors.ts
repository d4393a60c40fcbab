/**
 * Error classes for the MCP client
 *
 * Every failure surfaced by McpClient is an McpError subclass. The `retriable`
 * flag marks transient failures (network, timeout, 5xx, 429) that the retry
 * loop may attempt again; everything else is raised to the caller immediately.
 */

/**
 * Discriminator for McpError subclasses
 */
export type McpErrorKind =
  | 'configuration'
  | 'validation'
  | 'authentication'
  | 'permission'
  | 'not_found'
  | 'api'
  | 'rate_limit'
  | 'server'
  | 'connection'
  | 'timeout'
  | 'invalid_response'
  | 'cancelled'
  | 'retries_exhausted'
  | 'closed';

export interface McpErrorOptions {
  /** HTTP status, when the failure came from a response */
  status?: number;
  details?: unknown;
  cause?: unknown;
}

/**
 * Base error class for all MCP client errors
 */
export class McpError extends Error {
  public readonly kind: McpErrorKind;
  public readonly status?: number;
  public readonly details?: unknown;
  public readonly retriable: boolean;

  constructor(message: string, kind: McpErrorKind, retriable: boolean, options: McpErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.kind = kind;
    this.retriable = retriable;
    this.status = options.status;
    this.details = options.details;

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to a plain object for structured logs and JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
      retriable: this.retriable,
      details: this.details,
    };
  }
}

/**
 * Invalid or missing client configuration (API key, endpoint, numeric limits)
 */
export class ConfigurationError extends McpError {
  public readonly setting?: string;

  constructor(message: string, setting?: string, options: McpErrorOptions = {}) {
    super(message, 'configuration', false, options);
    this.setting = setting;
  }
}

/**
 * Request rejected locally before anything was sent
 */
export class RequestValidationError extends McpError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: McpErrorOptions = {}) {
    super(message, 'validation', false, { details: issues, ...options });
    this.issues = issues;
  }
}

/**
 * 401: the API key is missing, invalid or revoked
 */
export class AuthenticationError extends McpError {
  constructor(message: string, options: McpErrorOptions = {}) {
    super(message, 'authentication', false, options);
  }
}

/**
 * 403: the API key is valid but not allowed to perform the request
 */
export class PermissionDeniedError extends McpError {
  constructor(message: string, options: McpErrorOptions = {}) {
    super(message, 'permission', false, options);
  }
}

/**
 * 404: the endpoint path or the requested model does not exist
 */
export class NotFoundError extends McpError {
  constructor(message: string, options: McpErrorOptions = {}) {
    super(message, 'not_found', false, options);
  }
}

/**
 * Any other non-retriable 4xx (400, 409, 422, ...)
 */
export class ApiError extends McpError {
  constructor(message: string, options: McpErrorOptions = {}) {
    super(message, 'api', false, options);
  }
}

/**
 * 429: rate limited. Retried, honouring Retry-After when the service sends one
 */
export class RateLimitError extends McpError {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, options: McpErrorOptions = {}) {
    super(message, 'rate_limit', true, options);
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * 5xx from the service
 */
export class ServerError extends McpError {
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, options: McpErrorOptions = {}) {
    super(message, 'server', true, options);
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Network-level failure: DNS, refused or reset connection, TLS handshake
 */
export class ConnectionError extends McpError {
  constructor(message: string, options: McpErrorOptions = {}) {
    super(message, 'connection', true, options);
  }
}

/**
 * No response within the per-attempt timeout
 */
export class TimeoutError extends McpError {
  public readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options: McpErrorOptions = {}) {
    super(message, 'timeout', true, options);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * 2xx response whose body is not a JSON object
 */
export class InvalidResponseError extends McpError {
  constructor(message: string, options: McpErrorOptions = {}) {
    super(message, 'invalid_response', false, options);
  }
}

/**
 * The caller aborted the request through its AbortSignal
 */
export class CancelledError extends McpError {
  constructor(message = 'Request was cancelled', options: McpErrorOptions = {}) {
    super(message, 'cancelled', false, options);
  }
}

/**
 * Every attempt failed with a transient error. `lastError` is also the `cause`
 */
export class RetriesExhaustedError extends McpError {
  public readonly attempts: number;
  public readonly lastError: McpError;

  constructor(attempts: number, lastError: McpError) {
    super(
      `Request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      'retries_exhausted',
      false,
      { status: lastError.status, cause: lastError, details: { lastError: lastError.toJSON() } }
    );
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * send() was called after close()
 */
export class ClientClosedError extends McpError {
  constructor(message = 'Client has been closed') {
    super(message, 'closed', false);
  }
}

/**
 * Type guard to check if an error is an McpError
 */
export function isMcpError(error: unknown): error is McpError {
  return error instanceof McpError;
}

/**
 * Convert any error to an McpError
 * Unknown errors become ConnectionError, since anything the transport throws
 * without classification is a failure to complete the exchange
 */
export function toMcpError(error: unknown): McpError {
  if (isMcpError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ConnectionError(error.message, { cause: error, details: { originalError: error.name } });
  }

  return new ConnectionError(String(error));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Extract a human-readable message from an error response body.
 * Understands {"error": "..."}, {"error": {"message": "..."}}, {"message": "..."} and {"detail": "..."}
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (!isRecord(body)) {
    return undefined;
  }
  const error = body.error;
  if (typeof error === 'string') {
    return error;
  }
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  if (typeof body.message === 'string') {
    return body.message;
  }
  if (typeof body.detail === 'string') {
    return body.detail;
  }
  return undefined;
}

/**
 * Map a non-2xx HTTP status to the matching error class
 *
 * @param status - HTTP status code (>= 300)
 * @param body - Parsed JSON body if any, otherwise the raw text
 * @param retryAfterMs - Delay parsed from the Retry-After header
 */
export function errorFromStatus(status: number, body: unknown, retryAfterMs?: number): McpError {
  const serverMessage = extractErrorMessage(body);
  const suffix = serverMessage ? `: ${serverMessage}` : '';
  const options: McpErrorOptions = { status, details: body };

  if (status === 401) {
    return new AuthenticationError(`Invalid or missing API key${suffix}`, options);
  }
  if (status === 403) {
    return new PermissionDeniedError(`Permission denied${suffix}`, options);
  }
  if (status === 404) {
    return new NotFoundError(`Resource not found${suffix}`, options);
  }
  if (status === 429) {
    return new RateLimitError(`Rate limit exceeded${suffix}`, retryAfterMs, options);
  }
  if (status >= 500) {
    return new ServerError(`Server error (HTTP ${status})${suffix}`, retryAfterMs, options);
  }
  return new ApiError(`Request rejected (HTTP ${status})${suffix}`, options);
}

/**
 * Format error for display to user
 */
export function formatError(error: unknown, verbose = false): string {
  const mcpError = toMcpError(error);

  let output = `Error: ${mcpError.message}`;

  if (verbose && mcpError.details) {
    output += `\n\nDetails:\n${JSON.stringify(mcpError.details, null, 2)}`;
  }

  if (verbose && mcpError.stack) {
    output += `\n\nStack trace:\n${mcpError.stack}`;
  }

  return output;
}
