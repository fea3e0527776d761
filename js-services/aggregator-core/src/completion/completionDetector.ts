/**
 * Completion Detector
 *
 * Decides for each open task whether recent content shows it was finished.
 * Tasks without related content are settled locally; everything else goes
 * to the model in one batched call.
 */

import { z } from 'zod';
import type { RunConfig, Thresholds } from '../config';
import { CompletionDetectionFailed } from '../errors';
import { invokeStructured } from '../llm/invokeStructured';
import type { ModelClient } from '../llm/modelClient';
import { logger } from '../logger';
import { buildCompletionDetectionPrompt, type CompletionCheck } from '../prompts/completionDetection';
import type { CompletionState, CompletionVerdict, ContentUnit, ExistingTask } from '../types';
import { isOpenTask } from '../types';
import { normalizeConfidence } from '../utils/confidence';
import type { Sleep } from '../utils/retry';
import { RelatedContentMatcher } from './relatedContent';

export const CompletionItemSchema = z.object({
  todo_id: z.union([z.string().min(1), z.number()]).transform(String),
  is_completed: z.boolean().optional(),
  confidence: z.unknown().optional(),
  evidence: z.string().nullish().catch(null),
});

export interface CompletionDeps {
  model: ModelClient;
  config: Pick<RunConfig, 'thresholds' | 'retry'>;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export interface CompletionDetectionOutcome {
  /** One verdict per open task, in task input order */
  verdicts: CompletionVerdict[];
  warnings: string[];
  failure: CompletionDetectionFailed | null;
  modelCalls: number;
}

/**
 * Map a completion confidence onto a verdict. Both thresholds are inclusive.
 */
export function classifyCompletion(
  confidence: number,
  thresholds: Pick<Thresholds, 'done' | 'tentative'>
): CompletionState {
  if (confidence >= thresholds.done) {
    return 'done';
  }
  if (confidence >= thresholds.tentative) {
    return 'tentative';
  }
  return 'still_open';
}

function stillOpen(taskId: string, relatedUnits: number): CompletionVerdict {
  return { taskId, verdict: 'still_open', confidence: 0, evidence: null, relatedUnits };
}

export async function detectCompletions(
  tasks: readonly ExistingTask[],
  units: readonly ContentUnit[],
  deps: CompletionDeps
): Promise<CompletionDetectionOutcome> {
  const { thresholds, retry } = deps.config;
  const openTasks = tasks.filter(isOpenTask);
  const matcher = new RelatedContentMatcher(units, thresholds.minTokenOverlap);

  const checks: CompletionCheck[] = [];
  const relatedCounts = new Map<string, number>();
  for (const task of openTasks) {
    const relatedUnits = matcher.relatedUnits(task);
    relatedCounts.set(task.id, relatedUnits.length);
    if (relatedUnits.length > 0) {
      checks.push({ task, relatedUnits });
    }
  }

  const allStillOpen = () =>
    openTasks.map((task) => stillOpen(task.id, relatedCounts.get(task.id) ?? 0));

  if (checks.length === 0) {
    logger.info('No open task has related content, skipping completion detection', {
      openTasks: openTasks.length,
    });
    return { verdicts: allStillOpen(), warnings: [], failure: null, modelCalls: 0 };
  }

  logger.info('Detecting completions', {
    openTasks: openTasks.length,
    tasksWithRelatedContent: checks.length,
  });

  const { system, prompt } = buildCompletionDetectionPrompt(checks);
  const outcome = await invokeStructured({
    model: deps.model,
    request: { purpose: 'completion-detection', system, prompt, signal: deps.signal },
    schema: CompletionItemSchema,
    collectionKeys: ['completions', 'verdicts', 'todos'],
    retry,
    sleep: deps.sleep,
  });

  if (outcome.status === 'failed') {
    const failure = new CompletionDetectionFailed(outcome.reason, outcome.attempts, {
      cause: outcome.cause,
    });
    logger.error('Completion detection failed', failure, { attempts: outcome.attempts });
    return { verdicts: allStillOpen(), warnings: [], failure, modelCalls: outcome.attempts };
  }

  const warnings = [...outcome.warnings];
  const checkedIds = new Set(checks.map(({ task }) => task.id));
  const answers = new Map<string, { confidence: number; evidence: string | null }>();

  for (const item of outcome.items) {
    if (!checkedIds.has(item.todo_id)) {
      warnings.push(`completion for unknown todo "${item.todo_id}" ignored`);
      continue;
    }
    if (answers.has(item.todo_id)) {
      warnings.push(`repeated completion for todo "${item.todo_id}" ignored`);
      continue;
    }
    const confidence = item.is_completed === false ? 0 : normalizeConfidence(item.confidence, 0);
    answers.set(item.todo_id, { confidence, evidence: item.evidence?.trim() || null });
  }

  const verdicts = openTasks.map((task): CompletionVerdict => {
    const relatedUnits = relatedCounts.get(task.id) ?? 0;
    const answer = answers.get(task.id);
    if (!answer) {
      return stillOpen(task.id, relatedUnits);
    }
    return {
      taskId: task.id,
      verdict: classifyCompletion(answer.confidence, thresholds),
      confidence: answer.confidence,
      evidence: answer.evidence,
      relatedUnits,
    };
  });

  logger.info('Completion detection finished', {
    done: verdicts.filter((v) => v.verdict === 'done').length,
    tentative: verdicts.filter((v) => v.verdict === 'tentative').length,
    warningCount: warnings.length,
  });

  return { verdicts, warnings, failure: null, modelCalls: outcome.attempts };
}
