/**
 * Shared library module
 * Contains types, errors, logging, configuration and utilities
 */

// Export all types
export * from './types.js';

// Export all errors
export * from './errors.js';

// Export logger
export * from './logger.js';

// Export configuration loading
export * from './config.js';

// Export request validation
export * from './validation.js';

// Export utilities
export * from './utils.js';
