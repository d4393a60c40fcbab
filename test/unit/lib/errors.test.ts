/**
 * Unit tests for error classes
 */

import {
  McpError,
  ApiError,
  AuthenticationError,
  CancelledError,
  ClientClosedError,
  ConfigurationError,
  ConnectionError,
  InvalidResponseError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitError,
  RequestValidationError,
  RetriesExhaustedError,
  ServerError,
  TimeoutError,
  errorFromStatus,
  extractErrorMessage,
  formatError,
  isMcpError,
  toMcpError,
} from '../../../src/lib/errors';

describe('McpError', () => {
  it('should create an error with message, kind and retriable flag', () => {
    const error = new McpError('Test error', 'api', false);
    expect(error.message).toBe('Test error');
    expect(error.kind).toBe('api');
    expect(error.retriable).toBe(false);
    expect(error.name).toBe('McpError');
  });

  it('should include optional status, details and cause', () => {
    const cause = new Error('root');
    const error = new McpError('Test error', 'server', true, { status: 502, details: { foo: 'bar' }, cause });
    expect(error.status).toBe(502);
    expect(error.details).toEqual({ foo: 'bar' });
    expect(error.cause).toBe(cause);
  });

  it('should have a proper stack trace', () => {
    const error = new McpError('Test error', 'api', false);
    expect(error.stack).toBeDefined();
    expect(error.stack).toContain('McpError');
  });

  it('should be an instance of Error', () => {
    expect(new McpError('Test error', 'api', false)).toBeInstanceOf(Error);
  });

  it('should serialize to JSON', () => {
    const error = new McpError('Test error', 'server', true, { status: 500, details: { foo: 'bar' } });
    expect(error.toJSON()).toEqual({
      error: 'McpError',
      kind: 'server',
      message: 'Test error',
      status: 500,
      retriable: true,
      details: { foo: 'bar' },
    });
  });
});

describe('error subclasses', () => {
  it.each([
    [new ConfigurationError('x'), 'configuration', false],
    [new RequestValidationError('x'), 'validation', false],
    [new AuthenticationError('x'), 'authentication', false],
    [new PermissionDeniedError('x'), 'permission', false],
    [new NotFoundError('x'), 'not_found', false],
    [new ApiError('x'), 'api', false],
    [new RateLimitError('x'), 'rate_limit', true],
    [new ServerError('x'), 'server', true],
    [new ConnectionError('x'), 'connection', true],
    [new TimeoutError('x', 1000), 'timeout', true],
    [new InvalidResponseError('x'), 'invalid_response', false],
    [new CancelledError(), 'cancelled', false],
    [new ClientClosedError(), 'closed', false],
  ])('%p should have kind %s and retriable %s', (error, kind, retriable) => {
    expect(error).toBeInstanceOf(McpError);
    expect(error.kind).toBe(kind);
    expect(error.retriable).toBe(retriable);
    expect(error.name).toBe(error.constructor.name);
  });

  it('should keep the failing setting on ConfigurationError', () => {
    expect(new ConfigurationError('API key is required', 'apiKey').setting).toBe('apiKey');
  });

  it('should keep issues on RequestValidationError', () => {
    const error = new RequestValidationError('Invalid request', ['model: model is required']);
    expect(error.issues).toEqual(['model: model is required']);
    expect(error.details).toEqual(['model: model is required']);
  });

  it('should describe RetriesExhaustedError from its last error', () => {
    const lastError = new ServerError('Server error (HTTP 502)', undefined, { status: 502 });
    const error = new RetriesExhaustedError(4, lastError);
    expect(error.message).toBe('Request failed after 4 attempts: Server error (HTTP 502)');
    expect(error.attempts).toBe(4);
    expect(error.status).toBe(502);
    expect(error.cause).toBe(lastError);
    expect(error.retriable).toBe(false);
  });

  it('should use singular "attempt" for one attempt', () => {
    const error = new RetriesExhaustedError(1, new ConnectionError('reset'));
    expect(error.message).toBe('Request failed after 1 attempt: reset');
  });
});

describe('isMcpError', () => {
  it('should return true for McpError instances', () => {
    expect(isMcpError(new McpError('test', 'api', false))).toBe(true);
    expect(isMcpError(new TimeoutError('test', 10))).toBe(true);
  });

  it('should return false for other values', () => {
    expect(isMcpError(new Error('test'))).toBe(false);
    expect(isMcpError('error')).toBe(false);
    expect(isMcpError(null)).toBe(false);
  });
});

describe('toMcpError', () => {
  it('should return McpError as is', () => {
    const original = new AuthenticationError('test');
    expect(toMcpError(original)).toBe(original);
  });

  it('should wrap a regular Error as ConnectionError', () => {
    const original = new TypeError('fetch failed');
    const converted = toMcpError(original);
    expect(converted).toBeInstanceOf(ConnectionError);
    expect(converted.message).toBe('fetch failed');
    expect(converted.details).toEqual({ originalError: 'TypeError' });
    expect(converted.cause).toBe(original);
  });

  it('should wrap non-Error values', () => {
    const converted = toMcpError('string error');
    expect(converted).toBeInstanceOf(ConnectionError);
    expect(converted.message).toBe('string error');
  });
});

describe('extractErrorMessage', () => {
  it.each([
    [{ error: 'bad key' }, 'bad key'],
    [{ error: { message: 'nested' } }, 'nested'],
    [{ message: 'top-level' }, 'top-level'],
    [{ detail: 'fastapi style' }, 'fastapi style'],
    [{ errors: ['a'] }, undefined],
    ['plain text', undefined],
    [null, undefined],
    [['array'], undefined],
  ])('should extract from %p', (body, expected) => {
    expect(extractErrorMessage(body)).toBe(expected);
  });
});

describe('errorFromStatus', () => {
  it('should map 401 to AuthenticationError', () => {
    const error = errorFromStatus(401, { error: 'bad key' });
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.message).toBe('Invalid or missing API key: bad key');
    expect(error.status).toBe(401);
    expect(error.details).toEqual({ error: 'bad key' });
  });

  it('should map 403 and 404', () => {
    expect(errorFromStatus(403, undefined)).toBeInstanceOf(PermissionDeniedError);
    expect(errorFromStatus(404, undefined).message).toBe('Resource not found');
  });

  it('should map 429 to RateLimitError with retryAfterMs', () => {
    const error = errorFromStatus(429, undefined, 3000);
    expect(error).toBeInstanceOf(RateLimitError);
    expect((error as RateLimitError).retryAfterMs).toBe(3000);
    expect(error.retriable).toBe(true);
  });

  it('should map 5xx to ServerError', () => {
    const error = errorFromStatus(504, { message: 'gateway timeout' });
    expect(error).toBeInstanceOf(ServerError);
    expect(error.message).toBe('Server error (HTTP 504): gateway timeout');
  });

  it('should map other statuses to ApiError', () => {
    const error = errorFromStatus(422, { detail: 'context too long' });
    expect(error).toBeInstanceOf(ApiError);
    expect(error.message).toBe('Request rejected (HTTP 422): context too long');
    expect(error.retriable).toBe(false);
  });
});

describe('formatError', () => {
  it('should format a basic error message', () => {
    expect(formatError(new AuthenticationError('Invalid or missing API key'))).toBe(
      'Error: Invalid or missing API key'
    );
  });

  it('should include details in verbose mode', () => {
    const formatted = formatError(new ApiError('Request rejected', { details: { field: 'model' } }), true);
    expect(formatted).toContain('Details:');
    expect(formatted).toContain('"field": "model"');
    expect(formatted).toContain('Stack trace:');
  });

  it('should not include details in non-verbose mode', () => {
    const formatted = formatError(new ApiError('Request rejected', { details: { field: 'model' } }), false);
    expect(formatted).toBe('Error: Request rejected');
  });

  it('should handle non-McpError values', () => {
    expect(formatError(new Error('Regular error'))).toBe('Error: Regular error');
  });
});
