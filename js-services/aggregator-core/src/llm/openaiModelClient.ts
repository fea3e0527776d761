import OpenAI from 'openai';
import { classifyHttpStatus, errorMessage, ModelInvocationError } from '../errors';
import type { ModelClient, ModelRequest } from './modelClient';

export const DEFAULT_MODEL = 'gpt-4o';

export interface OpenAIModelClientOptions {
  apiKey?: string;
  /** Defaults to TODO_EXTRACTION_MODEL, then gpt-4o */
  model?: string;
  /** Pre-built client, mainly for tests */
  client?: OpenAI;
}

/**
 * Map SDK errors onto transient/permanent model failures
 */
export function toModelInvocationError(error: unknown): ModelInvocationError {
  if (error instanceof ModelInvocationError) {
    return error;
  }
  if (error instanceof OpenAI.APIUserAbortError) {
    return new ModelInvocationError('model request aborted', 'permanent', { cause: error });
  }
  // Includes timeouts
  if (error instanceof OpenAI.APIConnectionError) {
    return new ModelInvocationError(`connection failed: ${error.message}`, 'transient', {
      cause: error,
    });
  }
  if (error instanceof OpenAI.APIError) {
    const status = typeof error.status === 'number' ? error.status : null;
    return new ModelInvocationError(
      error.message,
      status === null ? 'transient' : classifyHttpStatus(status),
      { cause: error, status }
    );
  }
  return new ModelInvocationError(errorMessage(error), 'permanent', { cause: error });
}

/**
 * ModelClient backed by OpenAI chat completions in JSON mode
 */
export class OpenAIModelClient implements ModelClient {
  private openai: OpenAI;
  readonly model: string;

  constructor(options: OpenAIModelClientOptions = {}) {
    this.openai =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        // Backoff is applied by the pipeline
        maxRetries: 0,
      });
    this.model = options.model || process.env.TODO_EXTRACTION_MODEL || DEFAULT_MODEL;
  }

  async complete(request: ModelRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.prompt },
          ],
          response_format: { type: 'json_object' },
          temperature: 0,
          max_tokens: request.maxTokens ?? 4000,
        },
        { signal: request.signal }
      );
      content = response.choices[0]?.message?.content;
    } catch (error) {
      throw toModelInvocationError(error);
    }

    if (!content) {
      throw new ModelInvocationError('model returned an empty response', 'permanent');
    }
    return content;
  }
}
