import { afterEach, describe, test, expect } from '@jest/globals';
import OpenAI from 'openai';
import { ModelInvocationError } from '../errors';
import { DEFAULT_MODEL, OpenAIModelClient, toModelInvocationError } from '../llm/openaiModelClient';

describe('toModelInvocationError', () => {
  test('should treat rate limits and server errors as transient', () => {
    const rateLimit = toModelInvocationError(new OpenAI.APIError(429, undefined, 'rate', undefined));
    const serverError = toModelInvocationError(new OpenAI.APIError(503, undefined, 'down', undefined));

    expect(rateLimit.kind).toBe('transient');
    expect(rateLimit.status).toBe(429);
    expect(serverError.kind).toBe('transient');
  });

  test('should treat client errors as permanent', () => {
    const error = toModelInvocationError(new OpenAI.APIError(400, undefined, 'bad', undefined));

    expect(error.kind).toBe('permanent');
    expect(error.status).toBe(400);
  });

  test('should treat connection failures as transient', () => {
    const error = toModelInvocationError(new OpenAI.APIConnectionError({ message: 'socket hang up' }));

    expect(error.kind).toBe('transient');
    expect(error.message).toBe('connection failed: socket hang up');
  });

  test('should not retry aborted requests', () => {
    expect(toModelInvocationError(new OpenAI.APIUserAbortError()).kind).toBe('permanent');
  });

  test('should keep model errors and wrap anything else as permanent', () => {
    const original = new ModelInvocationError('already mapped', 'transient');

    expect(toModelInvocationError(original)).toBe(original);
    expect(toModelInvocationError(new TypeError('oops'))).toMatchObject({
      kind: 'permanent',
      message: 'oops',
      status: null,
    });
  });
});

describe('OpenAIModelClient', () => {
  const previousModel = process.env.TODO_EXTRACTION_MODEL;

  afterEach(() => {
    if (previousModel === undefined) {
      delete process.env.TODO_EXTRACTION_MODEL;
    } else {
      process.env.TODO_EXTRACTION_MODEL = previousModel;
    }
  });

  test('should prefer the explicit model, then the environment, then the default', () => {
    process.env.TODO_EXTRACTION_MODEL = 'gpt-4o-mini';

    expect(new OpenAIModelClient({ apiKey: 'test-secret', model: 'gpt-4.1' }).model).toBe('gpt-4.1');
    expect(new OpenAIModelClient({ apiKey: 'test-secret' }).model).toBe('gpt-4o-mini');

    delete process.env.TODO_EXTRACTION_MODEL;
    expect(new OpenAIModelClient({ apiKey: 'test-secret' }).model).toBe(DEFAULT_MODEL);
  });
});
