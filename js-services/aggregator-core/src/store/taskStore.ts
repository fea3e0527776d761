import type { ExistingTask, OpResult, ReconciliationOp } from '../types';

/**
 * The external task list. The core reads one snapshot per run and hands
 * back one batch of ops; the store decides how each op is written.
 */
export interface TaskStore {
  /** Tasks with status open or in_progress */
  listOpenTasks(): Promise<ExistingTask[]>;

  /**
   * Apply each op independently. One result per op, in op order; a failed
   * op never prevents the others.
   */
  applyOps(ops: readonly ReconciliationOp[]): Promise<OpResult[]>;
}
