/**
 * Image operations over McpClient.send()
 *
 * Every operation is one request: the prompt (if any) is the context and the
 * operation with its parameters travels in settings. Images and masks are
 * base64 strings.
 */

import { z } from 'zod';
import type { JsonValue, McpRequest, SendOptions } from '../lib/types.js';
import { InvalidResponseError } from '../lib/errors.js';
import { omitUndefined } from '../lib/utils.js';
import { JsonObjectSchema } from '../lib/validation.js';
import { parseProductRequest, parseProductResponse, type RequestSender } from './parse.js';

export const IMAGE_OPERATIONS = ['generate', 'edit', 'variation', 'analyze', 'caption', 'resize', 'style'] as const;
export type ImageOperation = (typeof IMAGE_OPERATIONS)[number];

export const ANALYSIS_TYPES = ['general', 'objects', 'faces', 'text', 'colors', 'nsfw'] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const DEFAULT_IMAGE_MODEL = 'dall-e-3';

const PROMPT_REQUIRED: readonly ImageOperation[] = ['generate', 'edit'];
const IMAGE_REQUIRED: readonly ImageOperation[] = ['edit', 'variation', 'analyze', 'caption', 'resize', 'style'];
const IMAGES_RETURNED: readonly ImageOperation[] = ['generate', 'edit', 'variation', 'resize', 'style'];

export const ImageRequestSchema = z
  .object({
    operation: z.enum(IMAGE_OPERATIONS),
    prompt: z.string().optional(),
    image: z.string().optional(),
    model: z.string().regex(/\S/, 'model must not be empty').default(DEFAULT_IMAGE_MODEL),
    size: z.string().min(1).default('1024x1024'),
    quality: z.string().min(1).default('standard'),
    style: z.string().optional(),
    n: z.number().int().min(1).max(4).default(1),
    analysisType: z.enum(ANALYSIS_TYPES).default('general'),
    maxLength: z.number().int().min(10).max(1000).default(100),
    mask: z.string().optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .strict()
  .superRefine((request, ctx) => {
    if (PROMPT_REQUIRED.includes(request.operation) && !request.prompt?.trim()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['prompt'],
        message: `prompt is required for the ${request.operation} operation`,
      });
    }
    if (IMAGE_REQUIRED.includes(request.operation) && !request.image) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['image'],
        message: `image is required for the ${request.operation} operation`,
      });
    }
    if (request.operation === 'style' && !request.style?.trim()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['style'], message: 'style is required for the style operation' });
    }
  });

export type ImageRequest = z.input<typeof ImageRequestSchema>;

/**
 * Parameters shared by every ImageClient method
 */
export type ImageOptions = Omit<ImageRequest, 'operation' | 'prompt' | 'image'>;

export interface AnalysisResult {
  objects?: string[];
  scene?: string;
  colors?: string[];
  confidence?: number;
  faces?: number;
  textContent?: string;
  nsfwScore?: number;
  tags?: string[];
}

export interface ImageResponse {
  id: string;
  model: string;
  /** Base64 images, for operations that produce images */
  images?: string[];
  createdAt?: string;
  usage: Record<string, number>;
  metadata?: Record<string, unknown>;
  caption?: string;
  analysis?: AnalysisResult;
  /** Set by the service when the operation failed without an HTTP error */
  error?: string;
}

const AnalysisResultSchema = z
  .object({
    objects: z.array(z.string()).optional(),
    scene: z.string().optional(),
    colors: z.array(z.string()).optional(),
    confidence: z.number().optional(),
    faces: z.number().int().optional(),
    text_content: z.string().optional(),
    nsfw_score: z.number().optional(),
    tags: z.array(z.string()).optional(),
  })
  .transform(
    (raw): AnalysisResult => ({
      objects: raw.objects,
      scene: raw.scene,
      colors: raw.colors,
      confidence: raw.confidence,
      faces: raw.faces,
      textContent: raw.text_content,
      nsfwScore: raw.nsfw_score,
      tags: raw.tags,
    })
  );

const ImageResponseSchema = z
  .object({
    id: z.string(),
    model: z.string(),
    images: z.array(z.string()).optional(),
    created_at: z.string().optional(),
    usage: z.record(z.number().int()).default({}),
    metadata: z.record(z.unknown()).optional(),
    caption: z.string().optional(),
    analysis: AnalysisResultSchema.optional(),
    error: z.string().optional(),
  })
  .transform(
    (raw): ImageResponse => ({
      id: raw.id,
      model: raw.model,
      images: raw.images,
      createdAt: raw.created_at,
      usage: raw.usage,
      metadata: raw.metadata,
      caption: raw.caption,
      analysis: raw.analysis,
      error: raw.error,
    })
  );

/**
 * Map an image request onto the generic request. `analysis_type` is only sent
 * for analyze and `max_length` only for caption.
 */
export function toImageMcpRequest(request: ImageRequest): McpRequest {
  const parsed = parseProductRequest(ImageRequestSchema, request, 'image');
  const settings: Record<string, JsonValue | undefined> = {
    operation: parsed.operation,
    image: parsed.image,
    mask: parsed.mask,
    size: parsed.size,
    quality: parsed.quality,
    style: parsed.style,
    n: parsed.n,
    analysis_type: parsed.operation === 'analyze' ? parsed.analysisType : undefined,
    max_length: parsed.operation === 'caption' ? parsed.maxLength : undefined,
  };
  return {
    model: parsed.model,
    context: parsed.prompt ?? '',
    settings: omitUndefined(settings),
    ...(parsed.metadata === undefined ? {} : { metadata: parsed.metadata }),
  };
}

/**
 * Check that the response carries what the operation produces, unless the
 * service reported an error instead
 */
function checkImageResponse(operation: ImageOperation, response: ImageResponse): ImageResponse {
  if (response.error) {
    return response;
  }
  if (IMAGES_RETURNED.includes(operation) && !response.images?.length) {
    throw new InvalidResponseError(`Images are required in the ${operation} response`, { details: response });
  }
  if (operation === 'caption' && !response.caption) {
    throw new InvalidResponseError('Caption is required in the caption response', { details: response });
  }
  if (operation === 'analyze' && !response.analysis) {
    throw new InvalidResponseError('Analysis is required in the analyze response', { details: response });
  }
  return response;
}

export class ImageClient {
  constructor(private readonly client: RequestSender) {}

  /**
   * Generate images from a text prompt
   */
  generate(prompt: string, options: ImageOptions = {}, sendOptions?: SendOptions): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'generate', prompt }, sendOptions);
  }

  /**
   * Edit an image as the prompt describes; `options.mask` limits the edited area
   */
  edit(image: string, prompt: string, options: ImageOptions = {}, sendOptions?: SendOptions): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'edit', image, prompt }, sendOptions);
  }

  variation(image: string, options: ImageOptions = {}, sendOptions?: SendOptions): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'variation', image }, sendOptions);
  }

  /**
   * @param size - Target size, e.g. "512x512"
   */
  resize(image: string, size: string, options: ImageOptions = {}, sendOptions?: SendOptions): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'resize', image, size }, sendOptions);
  }

  /**
   * @param style - e.g. "cartoon" or "oil-painting"
   */
  applyStyle(
    image: string,
    style: string,
    options: ImageOptions = {},
    sendOptions?: SendOptions
  ): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'style', image, style }, sendOptions);
  }

  analyze(image: string, options: ImageOptions = {}, sendOptions?: SendOptions): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'analyze', image }, sendOptions);
  }

  caption(image: string, options: ImageOptions = {}, sendOptions?: SendOptions): Promise<ImageResponse> {
    return this.run({ ...options, operation: 'caption', image }, sendOptions);
  }

  private async run(request: ImageRequest, sendOptions?: SendOptions): Promise<ImageResponse> {
    const mcpRequest = toImageMcpRequest(request);
    const response = await this.client.send(mcpRequest, sendOptions);
    return checkImageResponse(request.operation, parseProductResponse(ImageResponseSchema, response, 'image'));
  }
}
