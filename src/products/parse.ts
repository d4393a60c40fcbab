/**
 * Validation shared by the product clients
 */

import type { z } from 'zod';
import type { McpClient } from '../core/client.js';
import { InvalidResponseError, RequestValidationError } from '../lib/errors.js';
import type { McpResponse } from '../lib/types.js';
import { formatZodIssues } from '../lib/validation.js';

/**
 * The part of McpClient a product client needs
 */
export type RequestSender = Pick<McpClient, 'send'>;

/**
 * @throws RequestValidationError listing every problem found
 */
export function parseProductRequest<S extends z.ZodTypeAny>(schema: S, input: unknown, product: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new RequestValidationError(`Invalid ${product} request: ${issues.join('; ')}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * @throws InvalidResponseError if the service's object does not match the schema
 */
export function parseProductResponse<S extends z.ZodTypeAny>(
  schema: S,
  response: McpResponse,
  product: string
): z.output<S> {
  const result = schema.safeParse(response);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new InvalidResponseError(`Invalid ${product} response: ${issues.join('; ')}`, {
      details: issues,
      cause: result.error,
    });
  }
  return result.data;
}
