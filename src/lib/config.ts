/**
 * Client configuration: defaults, validation and loading
 *
 * Configuration can be passed directly to McpClient, read from a JSON or YAML
 * file, or taken from MCP_* environment variables. Files and the environment
 * use snake_case keys with the timeout in seconds; the resolved ClientConfig
 * is camelCase with the timeout in milliseconds.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import type { ClientConfig, ClientConfigInput } from './types.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';
import { fileExists, isJsonObject, isValidHttpUrl, normalizeEndpoint, omitUndefined, resolvePath } from './utils.js';
import { formatZodIssues } from './validation.js';

const logger = createLogger('config');

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
/** Seconds; retry n waits factor * 2^(n-1) seconds before jitter */
export const DEFAULT_RETRY_BACKOFF_FACTOR = 0.5;
export const DEFAULT_RETRY_BACKOFF_MAX_MS = 30_000;

/**
 * Files searched by loadConfig() when no explicit path is given, in order
 */
export const DEFAULT_CONFIG_PATHS = [
  'mcp_config.json',
  'mcp_config.yaml',
  '~/.mcp/config.json',
  '~/.mcp/config.yaml',
];

export const ClientConfigSchema = z.object({
  apiKey: z
    .string({ required_error: 'API key is required', invalid_type_error: 'API key must be a string' })
    .min(1, 'API key is required'),
  endpoint: z
    .string({ required_error: 'Endpoint is required', invalid_type_error: 'Endpoint must be a string' })
    .trim()
    .min(1, 'Endpoint is required')
    .refine(isValidHttpUrl, 'Endpoint must start with http:// or https://')
    .transform(normalizeEndpoint),
  path: z.string().default(''),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  maxRetries: z.number().int().nonnegative().default(DEFAULT_MAX_RETRIES),
  retryBackoffFactor: z.number().nonnegative().default(DEFAULT_RETRY_BACKOFF_FACTOR),
  retryBackoffMaxMs: z.number().nonnegative().default(DEFAULT_RETRY_BACKOFF_MAX_MS),
  verifySsl: z.boolean().default(true),
  proxy: z
    .string({ invalid_type_error: 'Proxy must be a string' })
    .trim()
    .refine(isValidHttpUrl, 'Proxy must start with http:// or https://')
    .optional(),
  headers: z.record(z.string()).default({}),
});

/**
 * Validate a config object, apply defaults and freeze the result
 *
 * @throws ConfigurationError naming the first offending setting
 */
export function resolveClientConfig(input: ClientConfigInput | Record<string, unknown>): Readonly<ClientConfig> {
  const result = ClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    const setting = result.error.issues[0]?.path.join('.');
    throw new ConfigurationError(`Invalid client configuration: ${issues.join('; ')}`, setting || undefined, {
      details: issues,
    });
  }

  return Object.freeze({
    ...result.data,
    headers: Object.freeze({ ...result.data.headers }),
  });
}

/**
 * On-disk configuration format (snake_case, timeout in seconds)
 */
const FileConfigSchema = z.object({
  api_key: z.string().optional(),
  endpoint: z.string().optional(),
  path: z.string().optional(),
  timeout: z.number().positive().optional(),
  max_retries: z.number().int().nonnegative().optional(),
  retry_backoff_factor: z.number().nonnegative().optional(),
  verify_ssl: z.boolean().optional(),
  // Either a single URL or a per-scheme map ({ https: ..., http: ... })
  proxy: z.union([z.string(), z.object({ http: z.string().optional(), https: z.string().optional() })]).optional(),
  headers: z.record(z.string()).optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

function fromFileConfig(file: FileConfig): Record<string, unknown> {
  const proxy = typeof file.proxy === 'string' ? file.proxy : file.proxy?.https ?? file.proxy?.http;
  const input: Record<string, unknown> = {
    apiKey: file.api_key,
    endpoint: file.endpoint,
    path: file.path,
    timeoutMs: file.timeout === undefined ? undefined : Math.round(file.timeout * 1000),
    maxRetries: file.max_retries,
    retryBackoffFactor: file.retry_backoff_factor,
    verifySsl: file.verify_ssl,
    proxy,
    headers: file.headers,
  };
  // Leave unset keys out so schema defaults apply
  return omitUndefined(input);
}

function parseConfigContent(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return yaml.load(content);
  }
  return JSON.parse(content);
}

/**
 * Load and validate a JSON or YAML config file
 *
 * @param configPath - Path to the config file (~ is expanded)
 * @throws ConfigurationError if the file cannot be read, parsed or validated
 */
export async function loadConfigFile(configPath: string): Promise<Readonly<ClientConfig>> {
  const absolutePath = resolvePath(configPath);

  let raw: unknown;
  try {
    logger.debug(`Loading config from: ${absolutePath}`);
    const content = await readFile(absolutePath, 'utf-8');
    raw = parseConfigContent(content, absolutePath);
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found: ${absolutePath}`, undefined, { cause: error });
    }
    if (error instanceof SyntaxError || error instanceof yaml.YAMLException) {
      throw new ConfigurationError(`Invalid syntax in config file: ${absolutePath}\n${error.message}`, undefined, {
        cause: error,
      });
    }
    throw new ConfigurationError(
      `Failed to load config file: ${absolutePath}\n${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (!isJsonObject(raw)) {
    throw new ConfigurationError(`Invalid config file format: ${absolutePath}\nExpected a mapping of settings`);
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigurationError(`Invalid config file: ${absolutePath}\n${issues.join('\n')}`, undefined, {
      details: issues,
    });
  }

  const config = resolveClientConfig(fromFileConfig(parsed.data));
  logger.debug(`Loaded config for endpoint ${config.endpoint}`);
  return config;
}

function parseEnvNumber(env: NodeJS.ProcessEnv, name: string, integer: boolean): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || (integer && !Number.isInteger(parsed))) {
    throw new ConfigurationError(`Invalid ${name}: ${value} (expected ${integer ? 'an integer' : 'a number'})`, name);
  }
  return parsed;
}

/**
 * Build a config from MCP_* environment variables
 *
 * @returns The resolved config, or undefined when MCP_API_KEY or MCP_ENDPOINT is unset
 * @throws ConfigurationError if a variable is set but invalid
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ClientConfig> | undefined {
  const apiKey = env.MCP_API_KEY;
  const endpoint = env.MCP_ENDPOINT;
  if (!apiKey || !endpoint) {
    return undefined;
  }

  const timeout = parseEnvNumber(env, 'MCP_TIMEOUT', false);
  const verifySsl = env.MCP_VERIFY_SSL;

  const input: Record<string, unknown> = {
    apiKey,
    endpoint,
    timeoutMs: timeout === undefined ? undefined : Math.round(timeout * 1000),
    maxRetries: parseEnvNumber(env, 'MCP_MAX_RETRIES', true),
    retryBackoffFactor: parseEnvNumber(env, 'MCP_RETRY_BACKOFF_FACTOR', false),
    verifySsl: verifySsl === undefined ? undefined : verifySsl.trim().toLowerCase() === 'true',
    proxy: env.MCP_PROXY || undefined,
  };

  logger.debug('Loaded config from environment');
  return resolveClientConfig(omitUndefined(input));
}

export interface LoadConfigOptions {
  /** Explicit config file; an error if it does not exist */
  configPath?: string;
  /** Files tried in order when configPath is not given */
  searchPaths?: string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration from, in order: the explicit file, the first existing
 * default file, then the environment
 *
 * @throws ConfigurationError if nothing is found or what is found is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Readonly<ClientConfig>> {
  if (options.configPath) {
    return loadConfigFile(options.configPath);
  }

  for (const candidate of options.searchPaths ?? DEFAULT_CONFIG_PATHS) {
    const absolutePath = resolvePath(candidate);
    if (await fileExists(absolutePath)) {
      return loadConfigFile(absolutePath);
    }
  }

  const envConfig = loadEnvConfig(options.env);
  if (envConfig) {
    return envConfig;
  }

  throw new ConfigurationError(
    'No configuration found. Provide a config file (mcp_config.json, mcp_config.yaml, ~/.mcp/config.json ' +
      'or ~/.mcp/config.yaml) or set MCP_API_KEY and MCP_ENDPOINT.'
  );
}
