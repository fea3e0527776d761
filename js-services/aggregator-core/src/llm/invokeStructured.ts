import { z } from 'zod';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import { withRetry, type RetryOptions, type Sleep } from '../utils/retry';
import type { ModelClient, ModelRequest } from './modelClient';
import { parseStructuredItems } from './structuredOutput';

export type StructuredOutcome<T> =
  | { status: 'ok' | 'partial'; items: T[]; warnings: string[]; attempts: number }
  | { status: 'failed'; reason: string; cause: unknown; attempts: number };

export interface StructuredInvocation<S extends z.ZodTypeAny> {
  model: ModelClient;
  request: ModelRequest;
  schema: S;
  collectionKeys: readonly string[];
  retry: RetryOptions;
  sleep?: Sleep;
}

/**
 * One model call (plus retries of transient failures) parsed into validated items
 */
export async function invokeStructured<S extends z.ZodTypeAny>(
  invocation: StructuredInvocation<S>
): Promise<StructuredOutcome<z.infer<S>>> {
  const { model, request, schema, collectionKeys } = invocation;

  const result = await withRetry(() => model.complete(request), {
    ...invocation.retry,
    sleep: invocation.sleep,
    signal: request.signal,
    onRetry: (error, attempt, delayMs) => {
      logger.warn('Transient model failure, retrying', {
        purpose: request.purpose,
        attempt,
        delayMs,
        error: errorMessage(error),
      });
    },
  });

  if (!result.ok) {
    return {
      status: 'failed',
      reason: `model call failed after ${result.attempts} attempt(s): ${errorMessage(result.error)}`,
      cause: result.error,
      attempts: result.attempts,
    };
  }

  // Log at debug level since responses contain message content
  logger.debug('Raw model response', {
    purpose: request.purpose,
    responseLength: result.value.length,
    responsePreview: result.value.substring(0, 500),
  });

  const parsed = parseStructuredItems(result.value, schema, collectionKeys);
  switch (parsed.status) {
    case 'ok':
      return { status: 'ok', items: parsed.items, warnings: [], attempts: result.attempts };
    case 'partial':
      return {
        status: 'partial',
        items: parsed.items,
        warnings: parsed.warnings,
        attempts: result.attempts,
      };
    case 'error':
      return {
        status: 'failed',
        reason: `unusable model response: ${parsed.reason}`,
        cause: null,
        attempts: result.attempts,
      };
  }
}
