/**
 * Utility functions for the MCP client
 * Endpoint handling, path helpers, timing and JSON helpers
 */

import { randomUUID } from 'crypto';
import { homedir } from 'os';
import { join, resolve, isAbsolute } from 'path';
import { access, constants } from 'fs/promises';
import { CancelledError } from './errors.js';

/**
 * Expand tilde (~) to home directory in paths
 */
export function expandHome(filepath: string): string {
  if (filepath.startsWith('~/') || filepath === '~') {
    return join(homedir(), filepath.slice(1));
  }
  return filepath;
}

/**
 * Resolve a path, expanding home directory and making absolute
 */
export function resolvePath(filepath: string, basePath?: string): string {
  const expanded = expandHome(filepath);
  if (isAbsolute(expanded)) {
    return resolve(expanded);
  }
  return resolve(basePath || process.cwd(), expanded);
}

/**
 * Check if a file or directory exists
 */
export async function fileExists(filepath: string): Promise<boolean> {
  try {
    await access(filepath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate if a string is a valid URL with http:// or https:// scheme
 */
export function isValidHttpUrl(str: string): boolean {
  try {
    const url = new URL(str);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Normalize an MCP endpoint URL.
 * The scheme is mandatory; the hostname is lowercased, credentials and hash are
 * dropped and trailing slashes are removed, so `${endpoint}${path}` never doubles a slash.
 *
 * @throws Error if the URL is not a valid http(s) URL
 */
export function normalizeEndpoint(str: string): string {
  const trimmed = str.trim();
  if (!isValidHttpUrl(trimmed)) {
    throw new Error(`Invalid MCP endpoint: ${str} (must start with http:// or https://)`);
  }

  const url = new URL(trimmed);
  url.hostname = url.hostname.toLowerCase();
  url.username = '';
  url.password = '';
  url.hash = '';

  let result = url.toString();
  if (!url.search) {
    result = result.replace(/\/+$/, '');
  }
  return result;
}

/**
 * Join the endpoint and a request path with exactly one slash between them
 */
export function buildRequestUrl(endpoint: string, path: string): string {
  if (!path) {
    return endpoint;
  }
  // Join on the pathname so a query string on the endpoint stays at the end
  const url = new URL(endpoint);
  url.pathname = `${url.pathname.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  return url.toString();
}

/**
 * Merge header maps left to right. Names compare case-insensitively; the last
 * source wins and its spelling of the name is kept.
 */
export function mergeHeaders(...sources: Array<Record<string, string>>): Record<string, string> {
  const merged = new Map<string, [string, string]>();
  for (const source of sources) {
    for (const [name, value] of Object.entries(source)) {
      merged.set(name.toLowerCase(), [name, value]);
    }
  }
  return Object.fromEntries(merged.values());
}

/**
 * Mask an API key for logs and error output, keeping only the first and last 4 characters
 */
export function maskApiKey(apiKey: string): string {
  if (apiKey.length <= 8) {
    return '****';
  }
  return `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}`;
}

/**
 * Sleep for a specified number of milliseconds.
 * Rejects with CancelledError as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new CancelledError('Request was cancelled during backoff', { cause: signal.reason }));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError('Request was cancelled during backoff', { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it aborts,
 * whichever comes first. A later settlement of `promise` is ignored.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Parse a Retry-After header value (delta seconds or HTTP date) into milliseconds
 *
 * @param value - Header value
 * @param now - Current time in ms, for HTTP-date values
 * @returns Delay in ms (never negative), or undefined if missing or unparseable
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value) {
    return undefined;
  }
  const trimmed = value.trim();

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.max(0, date - now);
}

/**
 * Check that a value is a plain JSON object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Copy a record without its undefined entries
 */
export function omitUndefined<T>(record: Record<string, T | undefined>): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Safely parse JSON with error handling
 */
export function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new Error(`Invalid JSON: ${(error as Error).message}`);
  }
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) {
    return str;
  }
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Generate a unique request ID, sent as X-Request-ID and kept across retries
 */
export function generateRequestId(): string {
  return `req_${randomUUID()}`;
}
