/**
 * HTTP transport for the MCP client
 *
 * A transport performs one POST and returns the raw status, headers and body.
 * It never interprets the status code and never retries; McpClient does both.
 */

import { Agent, ProxyAgent, fetch, type Dispatcher } from 'undici';
import { createNoOpLogger, type Logger } from '../lib/logger.js';

export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
  /** Aborted on timeout or caller cancellation */
  signal: AbortSignal;
}

export interface TransportResponse {
  status: number;
  /** Header names are lowercase */
  headers: Record<string, string>;
  body: string;
}

/**
 * Pluggable transport, mainly so tests can run without a network
 */
export interface HttpTransport {
  post(request: TransportRequest): Promise<TransportResponse>;
  close?(): Promise<void>;
}

export interface UndiciTransportOptions {
  /** Reject self-signed or otherwise unverifiable certificates (default: true) */
  verifySsl?: boolean;
  /** Route requests through this HTTP(S) proxy */
  proxy?: string;
  /** Max sockets per origin; undefined means no limit */
  connections?: number;
  /** Use this dispatcher (e.g. an undici MockAgent) instead of creating one; it is not closed by close() */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Default transport built on undici's fetch.
 * One dispatcher per transport: keep-alive sockets are pooled and shared by
 * concurrent requests.
 */
export class UndiciTransport implements HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly logger: Logger;

  constructor(options: UndiciTransportOptions = {}) {
    this.logger = options.logger || createNoOpLogger();
    this.ownsDispatcher = !options.dispatcher;
    const rejectUnauthorized = options.verifySsl ?? true;

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      return;
    }

    if (!rejectUnauthorized) {
      this.logger.warn('TLS certificate verification is disabled');
    }

    if (options.proxy) {
      this.logger.debug(`Using proxy: ${options.proxy}`);
      this.dispatcher = new ProxyAgent({
        uri: options.proxy,
        connections: options.connections,
        requestTls: { rejectUnauthorized },
      });
    } else {
      this.dispatcher = new Agent({
        connections: options.connections,
        connect: { rejectUnauthorized },
      });
    }
  }

  async post(request: TransportRequest): Promise<TransportResponse> {
    const response = await fetch(request.url, {
      method: 'POST',
      headers: request.headers,
      body: request.body,
      signal: request.signal,
      dispatcher: this.dispatcher,
    });

    // Read the body under the same signal so the timeout covers slow bodies too
    const body = await response.text();

    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });

    return { status: response.status, headers, body };
  }

  /**
   * Close pooled connections. In-flight requests are allowed to finish.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
