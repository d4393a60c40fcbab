/**
 * Client identification sent with every request (X-Client-* headers and User-Agent)
 */

import { z } from 'zod';
import type { ClientInfo } from '../lib/types.js';
import { ConfigurationError } from '../lib/errors.js';
import { formatZodIssues } from '../lib/validation.js';

export const SDK_NAME = 'media-control-client';
// Keep in sync with package.json
export const SDK_VERSION = '0.1.0';

const ClientInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  platform: z.string().min(1),
  environment: z.string().min(1),
  language: z.string().min(1),
  languageVersion: z.string().min(1),
  sdkVersion: z.string().min(1),
  clientId: z.string().min(1).optional(),
});

/**
 * Defaults describing this SDK on the current Node.js process
 */
export function defaultClientInfo(): ClientInfo {
  return {
    name: SDK_NAME,
    version: SDK_VERSION,
    platform: process.platform,
    environment: process.env.NODE_ENV || 'production',
    language: 'node',
    languageVersion: process.versions.node,
    sdkVersion: SDK_VERSION,
  };
}

/**
 * Merge fields over a base ClientInfo. Undefined fields keep the base value.
 *
 * @throws ConfigurationError if a field ends up empty
 */
export function mergeClientInfo(base: ClientInfo, updates: Partial<ClientInfo> = {}): ClientInfo {
  const defined = Object.fromEntries(Object.entries(updates).filter(([, value]) => value !== undefined));
  const result = ClientInfoSchema.safeParse({ ...base, ...defined });
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigurationError(`Invalid client info: ${issues.join('; ')}`, 'clientInfo', { details: issues });
  }
  return result.data;
}

/**
 * X-Client-* identification headers
 */
export function clientInfoHeaders(info: ClientInfo): Record<string, string> {
  const headers: Record<string, string> = {
    'X-Client-Name': info.name,
    'X-Client-Version': info.version,
    'X-Client-Platform': info.platform,
    'X-Client-Environment': info.environment,
    'X-Client-Language': info.language,
    'X-Client-Language-Version': info.languageVersion,
    'X-Client-SDK-Version': info.sdkVersion,
  };
  if (info.clientId) {
    headers['X-Client-ID'] = info.clientId;
  }
  return headers;
}

/**
 * User-Agent value, e.g. "media-control-client/0.1.0 (node 20.11.0; linux)"
 */
export function userAgent(info: ClientInfo): string {
  return `${info.name}/${info.version} (${info.language} ${info.languageVersion}; ${info.platform})`;
}
