/**
 * Unit tests for request validation
 */

import { buildRequestBody, validateRequest } from '../../../src/lib/validation';
import { RequestValidationError } from '../../../src/lib/errors';

function issuesOf(input: unknown): string[] {
  try {
    validateRequest(input);
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('validateRequest', () => {
  it('should accept a minimal request', () => {
    expect(validateRequest({ model: 'gpt-4', context: 'hello' })).toEqual({ model: 'gpt-4', context: 'hello' });
  });

  it('should accept nested JSON settings and metadata', () => {
    const request = {
      model: 'gpt-4',
      context: '',
      settings: { temperature: 0.7, stop: ['\n'], tools: { enabled: true, names: null } },
      metadata: { user: 'u-1' },
    };
    expect(validateRequest(request)).toEqual(request);
  });

  it('should report a missing model', () => {
    expect(issuesOf({ context: 'hello' })).toEqual(['model: model is required']);
  });

  it('should report a blank model', () => {
    expect(issuesOf({ model: '   ', context: 'hello' })).toEqual(['model: model must not be empty']);
  });

  it('should report wrong types', () => {
    expect(issuesOf({ model: 5, context: 'hello' })).toEqual(['model: model must be a string']);
    expect(issuesOf({ model: 'gpt-4', context: 42 })).toEqual(['context: context must be a string']);
  });

  it('should report every problem at once', () => {
    expect(issuesOf({})).toEqual(['model: model is required', 'context: context is required']);
  });

  it('should include all issues in the message', () => {
    expect(() => validateRequest({})).toThrow(
      'Invalid request: model: model is required; context: context is required'
    );
  });

  it('should reject unknown top-level keys', () => {
    expect(issuesOf({ model: 'gpt-4', context: 'hello', temperature: 1 })).toEqual([
      "Unrecognized key(s) in object: 'temperature'",
    ]);
  });

  it('should reject values that are not JSON', () => {
    expect(issuesOf({ model: 'gpt-4', context: 'hello', settings: { a: undefined } })[0]).toMatch(/^settings\.a: /);
    expect(issuesOf({ model: 'gpt-4', context: 'hello', settings: { a: Number.NaN } })[0]).toMatch(/^settings\.a: /);
    expect(issuesOf({ model: 'gpt-4', context: 'hello', settings: { a: () => 1 } })[0]).toMatch(/^settings\.a: /);
  });

  it('should reject settings that are not an object', () => {
    expect(issuesOf({ model: 'gpt-4', context: 'hello', settings: [1, 2] })).toHaveLength(1);
    expect(issuesOf({ model: 'gpt-4', context: 'hello', settings: [1, 2] })[0]).toMatch(/^settings: /);
  });

  it('should reject non-object requests', () => {
    expect(() => validateRequest(null)).toThrow(RequestValidationError);
    expect(() => validateRequest('gpt-4')).toThrow(RequestValidationError);
  });
});

describe('buildRequestBody', () => {
  it('should default settings to an empty object', () => {
    expect(buildRequestBody({ model: 'gpt-4', context: 'hello' })).toEqual({
      model: 'gpt-4',
      context: 'hello',
      settings: {},
    });
  });

  it('should include metadata only when present', () => {
    const body = buildRequestBody({ model: 'gpt-4', context: 'hello', settings: { k: 1 }, metadata: { trace: 't' } });
    expect(body).toEqual({ model: 'gpt-4', context: 'hello', settings: { k: 1 }, metadata: { trace: 't' } });
    expect(Object.keys(buildRequestBody({ model: 'gpt-4', context: 'hello' }))).toEqual([
      'model',
      'context',
      'settings',
    ]);
  });
});
