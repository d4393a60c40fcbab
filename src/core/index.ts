/**
 * Core client module
 * Provides the MCP client, its HTTP transport and the retry loop
 */

// Export client
export * from './client.js';

// Export transports
export * from './transport.js';

// Export retry helpers
export * from './retry.js';

// Export client identification
export * from './client-info.js';
