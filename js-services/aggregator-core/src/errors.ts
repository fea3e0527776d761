/**
 * Error taxonomy for aggregation runs.
 *
 * Fatal errors (configuration, snapshot, abort) end a run as failed. The rest
 * are recorded as warnings or per-operation failures in the run report.
 */

export type AggregatorErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'COLLECTION_ERROR'
  | 'EXTRACTION_FAILED'
  | 'COMPLETION_DETECTION_FAILED'
  | 'STORE_APPLY_ERROR'
  | 'SNAPSHOT_UNAVAILABLE'
  | 'RUN_ABORTED'
  | 'MODEL_INVOCATION_ERROR';

export class AggregatorError extends Error {
  readonly code: AggregatorErrorCode;

  constructor(code: AggregatorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends AggregatorError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_ERROR', message);
    this.issues = issues;
  }
}

export class CollectionError extends AggregatorError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('COLLECTION_ERROR', message, options);
    this.source = source;
  }
}

export class ExtractionFailed extends AggregatorError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
    this.attempts = attempts;
  }
}

export class CompletionDetectionFailed extends AggregatorError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('COMPLETION_DETECTION_FAILED', message, options);
    this.attempts = attempts;
  }
}

export class StoreApplyError extends AggregatorError {
  /** Id of the task the op targeted, null for creates */
  readonly taskId: string | null;

  constructor(message: string, taskId: string | null, options?: { cause?: unknown }) {
    super('STORE_APPLY_ERROR', message, options);
    this.taskId = taskId;
  }
}

export class SnapshotUnavailableError extends AggregatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SNAPSHOT_UNAVAILABLE', message, options);
  }
}

export class RunAbortedError extends AggregatorError {
  constructor(message = 'Run aborted before operations were applied') {
    super('RUN_ABORTED', message);
  }
}

export type ModelFailureKind = 'transient' | 'permanent';

/**
 * Raised by ModelClient implementations. Transient failures are retried.
 */
export class ModelInvocationError extends AggregatorError {
  readonly kind: ModelFailureKind;
  readonly status: number | null;

  constructor(
    message: string,
    kind: ModelFailureKind,
    options?: { cause?: unknown; status?: number | null }
  ) {
    super('MODEL_INVOCATION_ERROR', message, options);
    this.kind = kind;
    this.status = options?.status ?? null;
  }
}

/**
 * Transient = worth retrying. Rate limits, timeouts, conflicts and server errors.
 */
export function classifyHttpStatus(status: number): ModelFailureKind {
  if (status === 408 || status === 409 || status === 429 || status >= 500) {
    return 'transient';
  }
  return 'permanent';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
