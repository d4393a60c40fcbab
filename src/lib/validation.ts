/**
 * Zod schemas for MCP requests
 *
 * `settings` and `metadata` carry no schema beyond JSON-serializability:
 * values must be strings, finite numbers, booleans, null, arrays or objects
 * of those. `undefined`, functions, bigints and NaN/Infinity are rejected
 * because JSON.stringify would drop or rewrite them silently.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue, McpRequest } from './types.js';
import { RequestValidationError } from './errors.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const McpRequestSchema = z
  .object({
    model: z
      .string({ required_error: 'model is required', invalid_type_error: 'model must be a string' })
      .regex(/\S/, 'model must not be empty'),
    context: z.string({ required_error: 'context is required', invalid_type_error: 'context must be a string' }),
    settings: JsonObjectSchema.optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .strict();

/**
 * Render zod issues as "path: message" lines
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate a request before it is sent
 *
 * @throws RequestValidationError listing every problem found
 */
export function validateRequest(input: unknown): McpRequest {
  const result = McpRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new RequestValidationError(`Invalid request: ${issues.join('; ')}`, issues, { cause: result.error });
  }
  return result.data;
}

/**
 * Build the JSON body posted to the service: {model, context, settings[, metadata]}
 */
export function buildRequestBody(request: McpRequest): JsonObject {
  const body: JsonObject = {
    model: request.model,
    context: request.context,
    settings: request.settings ?? {},
  };
  if (request.metadata !== undefined) {
    body.metadata = request.metadata;
  }
  return body;
}
