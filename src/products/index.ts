/**
 * Typed product clients built on McpClient.send()
 */

// Export text generation
export * from './text.js';

// Export image operations
export * from './image.js';

export type { RequestSender } from './parse.js';
