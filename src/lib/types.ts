/**
 * Type definitions for the Media Control Protocol client
 */

/**
 * Any value that survives a JSON round trip
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A JSON object (the only top-level shape the service accepts or returns)
 */
export type JsonObject = { [key: string]: JsonValue };

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Free-form request settings (temperature, max_tokens, ...)
 * No schema is enforced beyond JSON-serializability
 */
export type RequestSettings = Record<string, JsonValue>;

/**
 * A request sent to the MCP service
 */
export interface McpRequest {
  /** Model identifier, e.g. "gpt-4" */
  model: string;
  /** Prompt or media context for the model */
  context: string;
  settings?: RequestSettings;
  /** Forwarded to the service unchanged */
  metadata?: Record<string, JsonValue>;
}

/**
 * Response returned by the MCP service: any JSON object, passed through unchanged
 */
export type McpResponse = Record<string, unknown>;

/**
 * Fully resolved client configuration.
 * Frozen by McpClient at construction; defaults live in lib/config.ts.
 */
export interface ClientConfig {
  apiKey: string;
  /** Base URL, always http(s) and without trailing slash */
  endpoint: string;
  /** Path appended to the endpoint for POST requests ('' posts to the endpoint itself) */
  path: string;
  /** Per-attempt timeout */
  timeoutMs: number;
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number;
  /** Backoff base in seconds; retry n waits factor * 2^(n-1) seconds */
  retryBackoffFactor: number;
  retryBackoffMaxMs: number;
  verifySsl: boolean;
  /** Proxy URL (http:// or https://) */
  proxy?: string;
  /** Extra headers sent with every request */
  headers: Record<string, string>;
}

/**
 * Configuration accepted by McpClient: only apiKey and endpoint are required
 */
export type ClientConfigInput = Pick<ClientConfig, 'apiKey' | 'endpoint'> &
  Partial<Omit<ClientConfig, 'apiKey' | 'endpoint'>>;

/**
 * Per-call options for McpClient.send()
 */
export interface SendOptions {
  /** Aborts the in-flight request or pending backoff; surfaces CancelledError */
  signal?: AbortSignal;
  /** Headers merged over the configured ones for this call only */
  headers?: Record<string, string>;
  /** Overrides the configured per-attempt timeout */
  timeoutMs?: number;
}

/**
 * Identification of the calling client, sent as X-Client-* headers
 */
export interface ClientInfo {
  name: string;
  version: string;
  platform: string;
  environment: string;
  language: string;
  languageVersion: string;
  sdkVersion: string;
  clientId?: string;
}
