import { mergeSources } from '../dedupe/dedupeEngine';
import { errorMessage, StoreApplyError } from '../errors';
import type {
  ExistingTask,
  OpResult,
  ReconciliationOp,
  SourceRef,
  TaskStatus,
  TodoCategory,
} from '../types';
import { isOpenTask, OperationAction } from '../types';
import { computeFingerprint } from '../utils/fingerprint';
import {
  formatAlsoMentionedComment,
  formatCompletionComment,
  formatSourceComment,
} from './comments';
import type { TaskStore } from './taskStore';

export interface StoredTask {
  id: string;
  task: string;
  assignee: string | null;
  dueDate: string | null;
  priority: ExistingTask['priority'];
  category: TodoCategory[];
  status: TaskStatus;
  fingerprint: string;
  createdAt: string;
  sources: SourceRef[];
  /** Candidate confidence on create, completion confidence afterwards */
  confidence: number | null;
  completedAt: string | null;
  comments: string[];
}

export interface InMemoryTaskStoreOptions {
  clock?: () => Date;
}

function toExistingTask(task: StoredTask): ExistingTask {
  return {
    id: task.id,
    task: task.task,
    assignee: task.assignee,
    dueDate: task.dueDate,
    priority: task.priority,
    category: [...task.category],
    status: task.status,
    fingerprint: task.fingerprint,
    createdAt: task.createdAt,
    sources: [...task.sources],
  };
}

/**
 * TaskStore over an in-process map. Used for dry runs and tests.
 */
export class InMemoryTaskStore implements TaskStore {
  private tasks = new Map<string, StoredTask>();
  private nextId = 1;
  private clock: () => Date;

  constructor(seed: readonly ExistingTask[] = [], options: InMemoryTaskStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    for (const task of seed) {
      this.tasks.set(task.id, {
        ...task,
        fingerprint: task.fingerprint || computeFingerprint(task.task),
        category: [...task.category],
        sources: [...task.sources],
        confidence: null,
        completedAt: null,
        comments: [],
      });
    }
  }

  async listOpenTasks(): Promise<ExistingTask[]> {
    return [...this.tasks.values()].map(toExistingTask).filter(isOpenTask);
  }

  async applyOps(ops: readonly ReconciliationOp[]): Promise<OpResult[]> {
    return ops.map((op): OpResult => {
      try {
        return { op, status: 'applied', taskId: this.apply(op) };
      } catch (error) {
        const taskId = op.action === OperationAction.CREATE ? null : op.taskId;
        const storeError =
          error instanceof StoreApplyError
            ? error
            : new StoreApplyError(errorMessage(error), taskId, { cause: error });
        return { op, status: 'failed', error: storeError };
      }
    });
  }

  getTask(id: string): StoredTask | undefined {
    return this.tasks.get(id);
  }

  allTasks(): StoredTask[] {
    return [...this.tasks.values()];
  }

  private apply(op: ReconciliationOp): string {
    if (op.action === OperationAction.CREATE) {
      const { candidate } = op;
      let id = `task-${this.nextId++}`;
      while (this.tasks.has(id)) {
        id = `task-${this.nextId++}`;
      }
      const sourceComment = formatSourceComment(candidate);
      this.tasks.set(id, {
        id,
        task: candidate.task,
        assignee: candidate.assignee,
        dueDate: candidate.dueDate,
        priority: candidate.priority,
        category: [...candidate.category],
        status: 'open',
        fingerprint: candidate.fingerprint,
        createdAt: this.clock().toISOString(),
        sources: [...candidate.sources],
        confidence: candidate.confidence,
        completedAt: null,
        comments: sourceComment ? [sourceComment] : [],
      });
      return id;
    }

    const task = this.tasks.get(op.taskId);
    if (!task) {
      throw new StoreApplyError(`task ${op.taskId} not found`, op.taskId);
    }

    task.sources = mergeSources(task.sources, op.additionalSources);
    const alsoMentioned = formatAlsoMentionedComment(op.additionalSources);

    if (op.action !== OperationAction.NO_OP) {
      task.status = op.action === OperationAction.COMPLETE ? 'done' : 'tentatively_done';
      task.confidence = op.confidence;
      task.completedAt = this.clock().toISOString().slice(0, 10);
      task.comments.push(formatCompletionComment(op));
    }
    if (alsoMentioned) task.comments.push(alsoMentioned);
    return task.id;
  }
}
