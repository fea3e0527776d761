/**
 * Safety net over reconciliation ops before they reach the store
 *
 * Ensures that each task id appears at most once in the operations array
 */

import { mergeSources } from '../dedupe/dedupeEngine';
import type { ExistingTaskOp, ReconciliationOp } from '../types';
import { isExistingTaskOp, OperationAction } from '../types';

const STRENGTH: Record<ExistingTaskOp['action'], number> = {
  [OperationAction.NO_OP]: 0,
  [OperationAction.TENTATIVELY_COMPLETE]: 1,
  [OperationAction.COMPLETE]: 2,
};

/**
 * Deduplicate operations to ensure each task id appears at most once
 *
 * Strategy:
 * - CREATE operations are never deduplicated (they create new tasks)
 * - For operations on the same task id, the strongest one is kept in the
 *   position of the first (COMPLETE > TENTATIVELY_COMPLETE > NO_OP, first wins
 *   among equals) and the additional sources of all of them are merged
 */
export function deduplicateOperations(operations: readonly ReconciliationOp[]): ReconciliationOp[] {
  const deduplicated: ReconciliationOp[] = [];
  const positions = new Map<string, number>();

  for (const op of operations) {
    if (!isExistingTaskOp(op)) {
      deduplicated.push(op);
      continue;
    }

    const position = positions.get(op.taskId);
    const existing = position === undefined ? undefined : deduplicated[position];
    if (position === undefined || !existing || !isExistingTaskOp(existing)) {
      positions.set(op.taskId, deduplicated.length);
      deduplicated.push(op);
      continue;
    }

    const keep = STRENGTH[op.action] > STRENGTH[existing.action] ? op : existing;
    deduplicated[position] = {
      ...keep,
      additionalSources: mergeSources(existing.additionalSources, op.additionalSources),
    };
  }

  return deduplicated;
}

/**
 * Validate that no task id appears more than once in the operations
 */
export function validateUniqueTaskIds(operations: readonly ReconciliationOp[]): {
  isValid: boolean;
  duplicateTaskIds: string[];
  duplicateCount: number;
} {
  const taskIdCounts = new Map<string, number>();

  for (const op of operations) {
    if (isExistingTaskOp(op)) {
      taskIdCounts.set(op.taskId, (taskIdCounts.get(op.taskId) || 0) + 1);
    }
  }

  const duplicateTaskIds: string[] = [];
  let duplicateCount = 0;

  for (const [taskId, count] of taskIdCounts.entries()) {
    if (count > 1) {
      duplicateTaskIds.push(taskId);
      duplicateCount += count - 1; // Count extra occurrences
    }
  }

  return {
    isValid: duplicateTaskIds.length === 0,
    duplicateTaskIds,
    duplicateCount,
  };
}
