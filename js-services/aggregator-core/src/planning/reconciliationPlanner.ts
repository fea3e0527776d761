import type {
  CandidateTodo,
  CompletionVerdict,
  ExistingTaskMatch,
  ExistingTaskOp,
  ReconciliationOp,
  SourceRef,
} from '../types';
import { OperationAction } from '../types';

export interface PlanOptions {
  /** Dedupe side channel: sources of candidates that matched existing tasks */
  existingMatches?: readonly ExistingTaskMatch[];
}

function toExistingTaskOp(verdict: CompletionVerdict, additionalSources: SourceRef[]): ExistingTaskOp {
  switch (verdict.verdict) {
    case 'done':
      return {
        action: OperationAction.COMPLETE,
        taskId: verdict.taskId,
        confidence: verdict.confidence,
        evidence: verdict.evidence,
        additionalSources,
      };
    case 'tentative':
      return {
        action: OperationAction.TENTATIVELY_COMPLETE,
        taskId: verdict.taskId,
        confidence: verdict.confidence,
        evidence: verdict.evidence,
        additionalSources,
      };
    case 'still_open':
      return {
        action: OperationAction.NO_OP,
        taskId: verdict.taskId,
        confidence: verdict.confidence,
        additionalSources,
      };
  }
}

/**
 * Turn dedupe survivors and completion verdicts into an ordered op batch.
 *
 * Existing-task ops come first, in verdict order, one per task id. Tasks that
 * only appear in the dedupe side channel get a trailing NO_OP. Then one
 * CREATE per candidate, in input order. Pure; thresholds were already applied
 * when the verdicts were made.
 */
export function planReconciliation(
  candidates: readonly CandidateTodo[],
  verdicts: readonly CompletionVerdict[],
  options: PlanOptions = {}
): ReconciliationOp[] {
  const sourcesByTask = new Map<string, SourceRef[]>();
  for (const match of options.existingMatches ?? []) {
    sourcesByTask.set(match.taskId, [...(sourcesByTask.get(match.taskId) ?? []), ...match.sources]);
  }

  const ops: ReconciliationOp[] = [];
  const planned = new Set<string>();

  for (const verdict of verdicts) {
    if (planned.has(verdict.taskId)) continue;
    planned.add(verdict.taskId);
    ops.push(toExistingTaskOp(verdict, sourcesByTask.get(verdict.taskId) ?? []));
  }

  for (const [taskId, additionalSources] of sourcesByTask) {
    if (planned.has(taskId)) continue;
    planned.add(taskId);
    ops.push({ action: OperationAction.NO_OP, taskId, confidence: 0, additionalSources });
  }

  for (const candidate of candidates) {
    ops.push({ action: OperationAction.CREATE, candidate });
  }

  return ops;
}
