/**
 * Media Control Protocol client SDK
 *
 * @example
 * ```ts
 * import { ImageClient, McpClient } from 'media-control-client';
 *
 * const client = new McpClient({ apiKey: 'my-key', endpoint: 'https://mcp.example.com/api/v1/process' });
 * const result = await client.send({ model: 'gpt-4', context: 'hi', settings: { temperature: 0.7 } });
 *
 * const images = new ImageClient(client);
 * const { images: [png] = [] } = await images.generate('a lighthouse at dusk', { size: '512x512' });
 * await client.close();
 * ```
 */

export * from './core/index.js';
export * from './lib/index.js';
export * from './products/index.js';
