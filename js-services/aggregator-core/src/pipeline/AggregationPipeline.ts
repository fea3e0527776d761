/**
 * One aggregation run: collect, normalize, extract, dedupe, detect
 * completions, plan and apply.
 *
 * Stages hand each other values. Only configuration, the task snapshot and
 * cancellation can end a run early; every other failure becomes a warning
 * and the remaining stages carry on with what they have.
 */

import { randomUUID } from 'node:crypto';
import { detectCompletions } from '../completion/completionDetector';
import type { RunConfig } from '../config';
import { createRunConfig } from '../config';
import { dedupeCandidates } from '../dedupe/dedupeEngine';
import {
  AggregatorError,
  CollectionError,
  errorMessage,
  RunAbortedError,
  SnapshotUnavailableError,
  StoreApplyError,
} from '../errors';
import { extractTodos } from '../extraction/extractionInvoker';
import type { ModelClient } from '../llm/modelClient';
import { LogContext, logger } from '../logger';
import { normalizeContent } from '../normalizer/contentNormalizer';
import type { RawContentItem } from '../normalizer/rawContent';
import { deduplicateOperations, validateUniqueTaskIds } from '../planning/operationGuards';
import { planReconciliation } from '../planning/reconciliationPlanner';
import type { TaskStore } from '../store/taskStore';
import type {
  ContentSource,
  ContentUnit,
  ExistingTask,
  LookbackWindow,
  OpResult,
  ReconciliationOp,
} from '../types';
import { OperationAction } from '../types';
import { lookbackWindow } from '../utils/freshness';
import { isOwnedByIdentity } from '../utils/identity';
import type { Sleep } from '../utils/retry';
import type { ContentCollector } from './collector';
import type { RunNotifier } from './notifier';

export type RunStage = 'collection' | 'extraction' | 'completion' | 'planning';

export interface RunWarning {
  stage: RunStage;
  message: string;
  /** The typed error behind the warning, null for model-response notes */
  error: AggregatorError | null;
}

export interface RunSummary {
  created: number;
  /** Candidates dropped as duplicates of open tasks or of each other */
  skippedDuplicates: number;
  completed: number;
  tentativelyCompleted: number;
  unchanged: number;
  failedOperations: number;
  contentUnits: number;
  unitsBySource: Record<ContentSource, number>;
  durationMs: number;
}

export interface RunReport {
  runId: string;
  status: 'succeeded' | 'failed';
  startedAt: string;
  summary: RunSummary;
  warnings: RunWarning[];
  /** Errors that ended the run; empty for a succeeded run */
  failures: Error[];
  operations: ReconciliationOp[];
  results: OpResult[];
}

export interface AggregationPipelineOptions {
  model: ModelClient;
  store: TaskStore;
  collectors: readonly ContentCollector[];
  notifier?: RunNotifier;
  clock?: () => Date;
  sleep?: Sleep;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Everything a run has produced so far. Lives for one run only.
 */
interface RunProgress {
  runId: string;
  startedAt: Date;
  warnings: RunWarning[];
  units: ContentUnit[];
  skippedDuplicates: number;
  operations: ReconciliationOp[];
  results: OpResult[];
}

function emptyUnitCounts(): Record<ContentSource, number> {
  return { chat: 0, email: 0, meeting: 0, 'store-note': 0 };
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RunAbortedError();
  }
}

function targetTaskId(op: ReconciliationOp): string | null {
  return op.action === OperationAction.CREATE ? null : op.taskId;
}

export class AggregationPipeline {
  readonly name = 'todo-aggregation';

  private model: ModelClient;
  private store: TaskStore;
  private collectors: readonly ContentCollector[];
  private notifier: RunNotifier | null;
  private clock: () => Date;
  private sleep: Sleep | undefined;

  constructor(options: AggregationPipelineOptions) {
    this.model = options.model;
    this.store = options.store;
    this.collectors = options.collectors;
    this.notifier = options.notifier ?? null;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep;
  }

  async run(configInput: unknown, options: RunOptions = {}): Promise<RunReport> {
    const runId = randomUUID();
    return LogContext.run({ runId, operation: this.name }, () =>
      this.execute(runId, configInput, options.signal)
    );
  }

  private async execute(
    runId: string,
    configInput: unknown,
    signal: AbortSignal | undefined
  ): Promise<RunReport> {
    const progress: RunProgress = {
      runId,
      startedAt: this.clock(),
      warnings: [],
      units: [],
      skippedDuplicates: 0,
      operations: [],
      results: [],
    };

    let failure: Error | null = null;
    try {
      const config = createRunConfig(configInput);
      await this.reconcile(config, progress, signal);
    } catch (error) {
      failure = error instanceof Error ? error : new Error(errorMessage(error));
      logger.error('Aggregation run ended early', failure);
    }

    const report = this.buildReport(progress, failure);
    await this.notify(report);
    return report;
  }

  private async reconcile(
    config: RunConfig,
    progress: RunProgress,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const now = this.clock();
    const window = lookbackWindow(now, config.lookbackHours);
    logger.info('Starting aggregation run', {
      windowStart: window.start.toISOString(),
      windowEnd: window.end.toISOString(),
      collectors: this.collectors.map((collector) => collector.source),
    });

    const items = await this.collect(window, progress, signal);
    throwIfAborted(signal);

    progress.units = normalizeContent(items, { window, maxUnitChars: config.maxUnitChars });

    const extraction = await extractTodos(progress.units, config.identity, {
      model: this.model,
      config,
      now,
      sleep: this.sleep,
      signal,
    });
    for (const message of extraction.warnings) {
      progress.warnings.push({ stage: 'extraction', message, error: null });
    }
    if (extraction.failure) {
      progress.warnings.push({
        stage: 'extraction',
        message: extraction.failure.message,
        error: extraction.failure,
      });
    }
    throwIfAborted(signal);

    let candidates = extraction.candidates;
    if (config.features.ownershipFilter) {
      candidates = candidates.filter((candidate) => isOwnedByIdentity(candidate, config.identity));
      const dropped = extraction.candidates.length - candidates.length;
      if (dropped > 0) {
        logger.info('Dropped todos owned by someone else', { dropped });
      }
    }

    const existing = await this.readSnapshot();

    const dedupe = dedupeCandidates(candidates, existing, {
      similarityThreshold: config.thresholds.similarity,
    });
    progress.skippedDuplicates = dedupe.duplicatesOfExisting + dedupe.mergedWithinRun;

    const completion = await detectCompletions(existing, progress.units, {
      model: this.model,
      config,
      sleep: this.sleep,
      signal,
    });
    for (const message of completion.warnings) {
      progress.warnings.push({ stage: 'completion', message, error: null });
    }
    if (completion.failure) {
      progress.warnings.push({
        stage: 'completion',
        message: completion.failure.message,
        error: completion.failure,
      });
    }

    const planned = planReconciliation(dedupe.candidates, completion.verdicts, {
      existingMatches: dedupe.existingMatches,
    });
    progress.operations = deduplicateOperations(planned);

    const validation = validateUniqueTaskIds(progress.operations);
    if (!validation.isValid) {
      const message = `operations repeat task ids: ${validation.duplicateTaskIds.join(', ')}`;
      logger.error('Operation guard found repeated task ids', undefined, {
        duplicateTaskIds: validation.duplicateTaskIds,
        duplicateCount: validation.duplicateCount,
      });
      progress.warnings.push({ stage: 'planning', message, error: null });
    }

    // Last point of no return: nothing is written once this passes
    throwIfAborted(signal);

    progress.results = await this.apply(progress.operations);
  }

  private async collect(
    window: LookbackWindow,
    progress: RunProgress,
    signal: AbortSignal | undefined
  ): Promise<RawContentItem[]> {
    const batches = await Promise.all(
      this.collectors.map((collector) =>
        LogContext.run({ source: collector.source }, async () => {
          try {
            const items = await collector.collect(window, signal);
            logger.debug('Collector finished', { items: items.length });
            return items;
          } catch (error) {
            const collectionError = new CollectionError(
              collector.source,
              `${collector.source} collector failed: ${errorMessage(error)}`,
              { cause: error }
            );
            logger.warn('Collector failed, continuing without its content', {
              error: collectionError.message,
            });
            progress.warnings.push({
              stage: 'collection',
              message: collectionError.message,
              error: collectionError,
            });
            return [];
          }
        })
      )
    );
    return batches.flat();
  }

  private async readSnapshot(): Promise<ExistingTask[]> {
    try {
      const tasks = await this.store.listOpenTasks();
      logger.info('Read open task snapshot', { openTasks: tasks.length });
      return tasks;
    } catch (error) {
      throw new SnapshotUnavailableError(`could not read open tasks: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async apply(operations: ReconciliationOp[]): Promise<OpResult[]> {
    if (operations.length === 0) {
      return [];
    }

    try {
      return await this.store.applyOps(operations);
    } catch (error) {
      logger.error('Task store rejected the whole batch', error, { operations: operations.length });
      return operations.map(
        (op): OpResult => ({
          op,
          status: 'failed',
          error: new StoreApplyError(
            `batch apply failed: ${errorMessage(error)}`,
            targetTaskId(op),
            { cause: error }
          ),
        })
      );
    }
  }

  private buildReport(progress: RunProgress, failure: Error | null): RunReport {
    const unitsBySource = emptyUnitCounts();
    for (const unit of progress.units) {
      unitsBySource[unit.source]++;
    }

    const summary: RunSummary = {
      created: 0,
      skippedDuplicates: progress.skippedDuplicates,
      completed: 0,
      tentativelyCompleted: 0,
      unchanged: 0,
      failedOperations: 0,
      contentUnits: progress.units.length,
      unitsBySource,
      durationMs: this.clock().getTime() - progress.startedAt.getTime(),
    };

    for (const result of progress.results) {
      if (result.status === 'failed') {
        summary.failedOperations++;
        continue;
      }
      switch (result.op.action) {
        case OperationAction.CREATE:
          summary.created++;
          break;
        case OperationAction.COMPLETE:
          summary.completed++;
          break;
        case OperationAction.TENTATIVELY_COMPLETE:
          summary.tentativelyCompleted++;
          break;
        case OperationAction.NO_OP:
          summary.unchanged++;
          break;
      }
    }

    return {
      runId: progress.runId,
      status: failure ? 'failed' : 'succeeded',
      startedAt: progress.startedAt.toISOString(),
      summary,
      warnings: progress.warnings,
      failures: failure ? [failure] : [],
      operations: progress.operations,
      results: progress.results,
    };
  }

  private async notify(report: RunReport): Promise<void> {
    if (!this.notifier) {
      return;
    }
    try {
      await this.notifier.notify(report);
    } catch (error) {
      logger.error('Run notifier failed', error, { status: report.status });
    }
  }
}
