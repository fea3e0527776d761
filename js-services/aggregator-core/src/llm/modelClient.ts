export type ModelPurpose = 'todo-extraction' | 'completion-detection';

export interface ModelRequest {
  purpose: ModelPurpose;
  /** Standing instructions for the model */
  system: string;
  /** The run-specific content */
  prompt: string;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Text completion backend used by both model stages.
 *
 * Implementations return the raw model text and throw ModelInvocationError
 * (kind transient or permanent) on failure. They must not retry on their own;
 * callers apply backoff.
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<string>;
}
