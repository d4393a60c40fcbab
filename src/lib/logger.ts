/**
 * Leveled logging for the MCP client
 *
 * Library code never writes to the console unless asked to: McpClient defaults
 * to a no-op logger, and callers opt in with `createLogger()` (or their own
 * Logger subclass). Output goes to stderr so it never mixes with program output.
 */

import type { LogLevel } from './types.js';

/**
 * Global verbose flag
 */
let isVerbose = false;

/**
 * Set verbose mode
 */
export function setVerbose(verbose: boolean): void {
  isVerbose = verbose;
  if (verbose) {
    currentLogLevel = 'debug';
  }
}

/**
 * Check if verbose mode is enabled
 */
export function getVerbose(): boolean {
  return isVerbose;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLogLevel: LogLevel = 'info';

/**
 * Set the minimum level that reaches stderr
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Parse a level name (e.g. from MCP_LOG_LEVEL), ignoring case
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function shouldLog(level: LogLevel): boolean {
  // Debug logs only shown in verbose mode
  if (level === 'debug' && !isVerbose) {
    return false;
  }

  return LOG_LEVELS[level] >= LOG_LEVELS[currentLogLevel];
}

/**
 * Prefix with timestamp and level, in verbose mode only
 */
function formatMessage(level: LogLevel, message: string): string {
  if (isVerbose) {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  }
  return message;
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  console.error(formatMessage(level, message), ...args);
}

/**
 * Log a debug message (only in verbose mode)
 */
export function debug(message: string, ...args: unknown[]): void {
  if (shouldLog('debug')) {
    emit('debug', message, args);
  }
}

/**
 * Log an info message to stderr
 */
export function info(message: string, ...args: unknown[]): void {
  if (shouldLog('info')) {
    emit('info', message, args);
  }
}

/**
 * Log a warning message to stderr
 */
export function warn(message: string, ...args: unknown[]): void {
  if (shouldLog('warn')) {
    emit('warn', message, args);
  }
}

/**
 * Log an error message to stderr
 */
export function error(message: string, ...args: unknown[]): void {
  if (shouldLog('error')) {
    emit('error', message, args);
  }
}

/**
 * Logger bound to a context, printed as a "[context]" prefix.
 * With a `level`, it filters on that level alone and ignores the global
 * verbose flag and log level.
 */
export class Logger {
  constructor(
    private readonly context?: string,
    private readonly level?: LogLevel
  ) {}

  private write(level: LogLevel, message: string, args: unknown[]): void {
    const enabled = this.level ? LOG_LEVELS[level] >= LOG_LEVELS[this.level] : shouldLog(level);
    if (enabled) {
      emit(level, this.context ? `[${this.context}] ${message}` : message, args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }
}

/**
 * Create a logger with a specific context, optionally with its own level
 */
export function createLogger(context: string, level?: LogLevel): Logger {
  return new Logger(context, level);
}

class NoOpLogger extends Logger {
  override debug(): void {}
  override info(): void {}
  override warn(): void {}
  override error(): void {}
}

/**
 * Create a logger that discards everything (McpClient's default)
 */
export function createNoOpLogger(): Logger {
  return new NoOpLogger();
}
