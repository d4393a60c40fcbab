/**
 * Text generation over McpClient.send()
 */

import { z } from 'zod';
import type { McpRequest, SendOptions } from '../lib/types.js';
import { omitUndefined } from '../lib/utils.js';
import { JsonObjectSchema } from '../lib/validation.js';
import { parseProductRequest, parseProductResponse, type RequestSender } from './parse.js';

export const DEFAULT_TEXT_MODEL = 'gpt-4';

export const TextRequestSchema = z
  .object({
    prompt: z
      .string({ required_error: 'prompt is required', invalid_type_error: 'prompt must be a string' })
      .regex(/\S/, 'prompt must not be empty'),
    model: z.string().regex(/\S/, 'model must not be empty').default(DEFAULT_TEXT_MODEL),
    temperature: z.number().min(0).max(1).default(0.7),
    maxTokens: z.number().int().positive().default(150),
    topP: z.number().min(0).max(1).optional(),
    frequencyPenalty: z.number().min(-2).max(2).optional(),
    presencePenalty: z.number().min(-2).max(2).optional(),
    stop: z.array(z.string()).optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .strict();

export type TextRequest = z.input<typeof TextRequestSchema>;

export interface TextResponse {
  id: string;
  model: string;
  content: string;
  createdAt: string;
  /** Token counts, e.g. { prompt_tokens: 12, completion_tokens: 40 } */
  usage: Record<string, number>;
  metadata?: Record<string, unknown>;
}

const TextResponseSchema = z
  .object({
    id: z.string(),
    model: z.string(),
    content: z.string(),
    created_at: z.string(),
    usage: z.record(z.number().int()),
    metadata: z.record(z.unknown()).optional(),
  })
  .transform(
    (raw): TextResponse => ({
      id: raw.id,
      model: raw.model,
      content: raw.content,
      createdAt: raw.created_at,
      usage: raw.usage,
      ...(raw.metadata === undefined ? {} : { metadata: raw.metadata }),
    })
  );

/**
 * Map a text request onto the generic request: the prompt is the context and
 * the sampling parameters travel as snake_case settings.
 */
export function toTextMcpRequest(request: TextRequest): McpRequest {
  const parsed = parseProductRequest(TextRequestSchema, request, 'text');
  return {
    model: parsed.model,
    context: parsed.prompt,
    settings: omitUndefined({
      temperature: parsed.temperature,
      max_tokens: parsed.maxTokens,
      top_p: parsed.topP,
      frequency_penalty: parsed.frequencyPenalty,
      presence_penalty: parsed.presencePenalty,
      stop: parsed.stop,
    }),
    ...(parsed.metadata === undefined ? {} : { metadata: parsed.metadata }),
  };
}

export class TextClient {
  constructor(private readonly client: RequestSender) {}

  /**
   * Generate text from a prompt
   *
   * @throws RequestValidationError if a parameter is out of range (nothing is sent)
   * @throws InvalidResponseError if the service's answer lacks id, model, content, created_at or usage
   */
  async generate(
    prompt: string,
    options: Omit<TextRequest, 'prompt'> = {},
    sendOptions?: SendOptions
  ): Promise<TextResponse> {
    const response = await this.client.send(toTextMcpRequest({ ...options, prompt }), sendOptions);
    return parseProductResponse(TextResponseSchema, response, 'text');
  }
}
