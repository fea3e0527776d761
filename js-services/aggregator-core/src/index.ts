export * from './types';
export * from './errors';
export {
  createRunConfig,
  runConfigInputFromEnv,
  RunConfigSchema,
  DEFAULT_HIGH_PRIORITY_KEYWORDS,
  type RunConfig,
  type RunConfigInput,
  type FeatureFlags,
  type Thresholds,
  type RetrySettings,
} from './config';
export { logger } from './logger';

export {
  RawContentItemSchema,
  ChatMessageSchema,
  EmailMessageSchema,
  MeetingSegmentSchema,
  StoreNoteSchema,
  type RawContentItem,
  type ChatMessage,
  type EmailMessage,
  type MeetingSegment,
  type StoreNote,
} from './normalizer/rawContent';
export { normalizeContent, type NormalizeOptions } from './normalizer/contentNormalizer';
export { extractTodos, type ExtractionDeps, type ExtractionOutcome } from './extraction/extractionInvoker';
export { dedupeCandidates, type DedupeOptions, type DedupeResult } from './dedupe/dedupeEngine';
export {
  detectCompletions,
  classifyCompletion,
  type CompletionDeps,
  type CompletionDetectionOutcome,
} from './completion/completionDetector';
export { planReconciliation, type PlanOptions } from './planning/reconciliationPlanner';
export { deduplicateOperations, validateUniqueTaskIds } from './planning/operationGuards';

export type { ModelClient, ModelRequest, ModelPurpose } from './llm/modelClient';
export { OpenAIModelClient, DEFAULT_MODEL, type OpenAIModelClientOptions } from './llm/openaiModelClient';

export type { TaskStore } from './store/taskStore';
export { InMemoryTaskStore, type StoredTask } from './store/InMemoryTaskStore';
export { NotionTaskStore, type NotionTaskStoreOptions } from './store/NotionTaskStore';

export { type ContentCollector, StaticContentCollector } from './pipeline/collector';
export { type RunNotifier, LoggingRunNotifier } from './pipeline/notifier';
export {
  AggregationPipeline,
  type AggregationPipelineOptions,
  type RunOptions,
  type RunReport,
  type RunSummary,
  type RunWarning,
  type RunStage,
} from './pipeline/AggregationPipeline';

export { computeFingerprint, normalizeTaskText } from './utils/fingerprint';
export { textSimilarity } from './utils/similarity';
export { lookbackWindow } from './utils/freshness';
