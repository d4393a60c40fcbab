/**
 * MCP client
 * Sends requests to the Media Control Protocol HTTP API with retries and typed errors
 */

import type { ClientConfig, ClientConfigInput, ClientInfo, McpRequest, McpResponse, SendOptions } from '../lib/types.js';
import { createLogger, createNoOpLogger, parseLogLevel, type Logger } from '../lib/logger.js';
import {
  CancelledError,
  ClientClosedError,
  ConnectionError,
  InvalidResponseError,
  RequestValidationError,
  TimeoutError,
  errorFromStatus,
  isMcpError,
  type McpError,
} from '../lib/errors.js';
import { loadConfig, loadConfigFile, resolveClientConfig, type LoadConfigOptions } from '../lib/config.js';
import { buildRequestBody, validateRequest } from '../lib/validation.js';
import {
  abortable,
  buildRequestUrl,
  generateRequestId,
  isJsonObject,
  maskApiKey,
  mergeHeaders,
  parseJson,
  parseRetryAfter,
  truncate,
} from '../lib/utils.js';
import { UndiciTransport, type HttpTransport, type TransportResponse } from './transport.js';
import { computeBackoffDelay, withRetry, type SleepFunction } from './retry.js';
import { clientInfoHeaders, defaultClientInfo, mergeClientInfo, userAgent } from './client-info.js';

/**
 * Options for creating an MCP client
 */
export interface McpClientOptions {
  /**
   * Logger to use for client operations (default: no-op)
   */
  logger?: Logger;
  /**
   * Transport override; by default an UndiciTransport is created from the config
   * and closed by close(). A transport passed here is not closed by the client.
   */
  transport?: HttpTransport;
  /**
   * Fields overriding the default client identification
   */
  clientInfo?: Partial<ClientInfo>;
  /**
   * Backoff sleep; tests inject one that resolves immediately
   */
  sleep?: SleepFunction;
  /**
   * Jitter source in [0, 1)
   */
  random?: () => number;
}

/**
 * Describe a network failure, including the system error code undici attaches as `cause`
 */
function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause instanceof Error) {
    return 'code' in cause && typeof cause.code === 'string' ? `${cause.message} (${cause.code})` : cause.message;
  }
  return error.message;
}

/**
 * Error bodies are usually JSON; anything else is kept as (truncated) text
 */
function parseErrorBody(body: string): unknown {
  try {
    return parseJson(body);
  } catch {
    return truncate(body, 1000);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * MCP client class
 *
 * Safe to share: concurrent send() calls only share the frozen config and the
 * transport's connection pool.
 */
export class McpClient {
  private readonly _config: Readonly<ClientConfig>;
  private readonly transport: HttpTransport;
  private readonly ownsTransport: boolean;
  private readonly logger: Logger;
  private readonly sleep?: SleepFunction;
  private readonly random?: () => number;
  private info: ClientInfo;
  private isClosed = false;

  /**
   * @throws ConfigurationError if the configuration is invalid
   */
  constructor(config: ClientConfigInput, options: McpClientOptions = {}) {
    this._config = resolveClientConfig(config);
    this.logger = options.logger || createNoOpLogger();
    this.info = mergeClientInfo(defaultClientInfo(), options.clientInfo);
    this.sleep = options.sleep;
    this.random = options.random;

    if (options.transport) {
      this.transport = options.transport;
      this.ownsTransport = false;
    } else {
      this.transport = new UndiciTransport({
        verifySsl: this._config.verifySsl,
        proxy: this._config.proxy,
        logger: this.logger,
      });
      this.ownsTransport = true;
    }

    this.logger.debug(
      `Created client for ${this._config.endpoint} (key ${maskApiKey(this._config.apiKey)}, ` +
        `timeout ${this._config.timeoutMs}ms, max retries ${this._config.maxRetries})`
    );
  }

  /**
   * Create a client from a JSON or YAML config file
   */
  static async fromConfigFile(configPath: string, options: McpClientOptions = {}): Promise<McpClient> {
    const config = await loadConfigFile(configPath);
    return new McpClient(config, options);
  }

  /**
   * Create a client from the first config source found: explicit file, default
   * file locations, then MCP_* environment variables.
   * MCP_LOG_LEVEL, when set and no logger is given, turns on stderr logging for
   * this client only; the process-wide log level is left alone.
   */
  static async load(loadOptions: LoadConfigOptions = {}, options: McpClientOptions = {}): Promise<McpClient> {
    const config = await loadConfig(loadOptions);
    const env = loadOptions.env ?? process.env;
    const level = parseLogLevel(env.MCP_LOG_LEVEL);

    const logger = options.logger ?? (level ? createLogger('mcp-client', level) : undefined);

    return new McpClient(config, { ...options, logger });
  }

  /**
   * Resolved configuration (frozen)
   */
  get config(): Readonly<ClientConfig> {
    return this._config;
  }

  get clientInfo(): ClientInfo {
    return { ...this.info };
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Update client identification; undefined fields are ignored
   */
  updateClientInfo(updates: Partial<ClientInfo>): void {
    this.info = mergeClientInfo(this.info, updates);
  }

  /**
   * Send a request and return the service's JSON object unchanged
   *
   * @throws RequestValidationError if the request is invalid (nothing is sent)
   * @throws AuthenticationError, PermissionDeniedError, NotFoundError, ApiError on non-retriable 4xx
   * @throws InvalidResponseError if a 2xx body is not a JSON object
   * @throws RetriesExhaustedError after maxRetries + 1 transient failures
   * @throws CancelledError if options.signal aborts
   * @throws ClientClosedError after close()
   */
  async send(request: McpRequest, options: SendOptions = {}): Promise<McpResponse> {
    if (this.isClosed) {
      throw new ClientClosedError();
    }

    const validated = validateRequest(request);
    const timeoutMs = options.timeoutMs ?? this._config.timeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RequestValidationError(`Invalid timeout: ${timeoutMs}`, ['timeoutMs: must be a positive number']);
    }

    const requestId = generateRequestId();
    const url = buildRequestUrl(this._config.endpoint, this._config.path);
    const headers = this.buildHeaders(requestId, options.headers);
    const body = JSON.stringify(buildRequestBody(validated));

    this.logger.debug(`Sending ${requestId} (model: ${validated.model})`);

    try {
      const response = await withRetry(
        (attempt) => this.attempt({ url, headers, body, timeoutMs, signal: options.signal, attempt, requestId }),
        {
          maxRetries: this._config.maxRetries,
          delayFor: (retry, error) =>
            computeBackoffDelay(
              retry,
              error,
              { factorSeconds: this._config.retryBackoffFactor, maxDelayMs: this._config.retryBackoffMaxMs },
              this.random
            ),
          sleep: this.sleep,
          signal: options.signal,
          onRetry: (retry, error, delayMs) => {
            this.logger.warn(
              `${requestId} attempt ${retry} failed (${error.message}), retrying in ${delayMs}ms ` +
                `(${retry}/${this._config.maxRetries})`
            );
          },
        }
      );
      this.logger.debug(`${requestId} completed`);
      return response;
    } catch (error) {
      this.logger.debug(`${requestId} failed:`, error);
      throw error;
    }
  }

  /**
   * Release pooled connections. Later send() calls, and pending retries of calls
   * already in flight, throw ClientClosedError.
   */
  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;

    if (this.ownsTransport && this.transport.close) {
      this.logger.debug('Closing transport...');
      await this.transport.close();
    }
  }

  private buildHeaders(requestId: string, extra: Record<string, string> = {}): Record<string, string> {
    return mergeHeaders(
      {
        'Content-Type': 'application/json',
        Accept: 'application/json',
        'User-Agent': userAgent(this.info),
        ...clientInfoHeaders(this.info),
        'X-Request-ID': requestId,
        Authorization: `Bearer ${this._config.apiKey}`,
      },
      this._config.headers,
      extra
    );
  }

  /**
   * One HTTP exchange, bounded by timeoutMs
   */
  private async attempt(params: {
    url: string;
    headers: Record<string, string>;
    body: string;
    timeoutMs: number;
    signal?: AbortSignal;
    attempt: number;
    requestId: string;
  }): Promise<McpResponse> {
    const { url, headers, body, timeoutMs, signal, attempt, requestId } = params;

    // close() may run while a retry is backing off
    if (this.isClosed) {
      throw new ClientClosedError();
    }
    if (signal?.aborted) {
      throw new CancelledError(undefined, { cause: signal.reason });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    const startedAt = Date.now();
    let response: TransportResponse;
    try {
      this.logger.debug(`${requestId} POST ${url} (attempt ${attempt})`);
      // Transports are not trusted to honour the signal
      response = await abortable(
        this.transport.post({ url, headers, body, signal: controller.signal }),
        controller.signal
      );
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(undefined, { cause: error });
      }
      if (timedOut) {
        throw new TimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs, { cause: error });
      }
      if (isMcpError(error)) {
        throw error;
      }
      throw new ConnectionError(`Failed to connect to ${this._config.endpoint}: ${describeNetworkError(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    this.logger.debug(`${requestId} HTTP ${response.status} in ${Date.now() - startedAt}ms`);
    return this.handleResponse(response);
  }

  private handleResponse(response: TransportResponse): McpResponse {
    const { status, body } = response;

    if (status < 200 || status >= 300) {
      throw this.errorFromResponse(response);
    }

    if (!body.trim()) {
      throw new InvalidResponseError(`Empty response body (HTTP ${status})`, { status });
    }

    let parsed: unknown;
    try {
      parsed = parseJson(body);
    } catch (error) {
      throw new InvalidResponseError(`Response is not valid JSON: ${truncate(body, 200)}`, { status, cause: error });
    }

    if (!isJsonObject(parsed)) {
      throw new InvalidResponseError(`Expected a JSON object in response, got ${describeType(parsed)}`, {
        status,
        details: parsed,
      });
    }

    return parsed;
  }

  private errorFromResponse(response: TransportResponse): McpError {
    const { status, body, headers } = response;

    const details = body.trim() ? parseErrorBody(body) : undefined;
    const retryAfterMs = status === 429 || status === 503 ? parseRetryAfter(headers['retry-after']) : undefined;
    return errorFromStatus(status, details, retryAfterMs);
  }
}
