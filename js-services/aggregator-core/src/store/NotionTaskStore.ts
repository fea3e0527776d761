import { Client } from '@notionhq/client';
import type {
  CreatePageParameters,
  UpdatePageParameters,
} from '@notionhq/client/build/src/api-endpoints';
import { errorMessage, StoreApplyError } from '../errors';
import { logger } from '../logger';
import type {
  CandidateTodo,
  CompleteTaskOp,
  ExistingTask,
  OpResult,
  ReconciliationOp,
  TentativelyCompleteTaskOp,
} from '../types';
import { OperationAction } from '../types';
import { formatAlsoMentionedComment, formatCompletionComment, formatSourceComment } from './comments';
import {
  capitalize,
  NotionProperty,
  parseTodoPage,
  SOURCE_LABELS,
  STATUS_NAMES,
} from './notionSchema';
import type { TaskStore } from './taskStore';

export interface NotionTaskStoreOptions {
  databaseId: string;
  /** Either a ready client or an integration token */
  client?: Client;
  auth?: string;
  clock?: () => Date;
}

const PAGE_SIZE = 100;

/**
 * Build page properties for a new todo
 */
export function buildCreateProperties(candidate: CandidateTodo): CreatePageParameters['properties'] {
  const sourceLabels = [...new Set(candidate.sources.map((ref) => SOURCE_LABELS[ref.source]))];
  const link = candidate.sources.find((ref) => ref.link !== null)?.link ?? null;

  return {
    [NotionProperty.task]: { title: [{ text: { content: candidate.task } }] },
    [NotionProperty.status]: { select: { name: STATUS_NAMES.open } },
    [NotionProperty.source]: { multi_select: sourceLabels.map((name) => ({ name })) },
    [NotionProperty.priority]: { select: { name: capitalize(candidate.priority) } },
    [NotionProperty.category]: { multi_select: candidate.category.map((name) => ({ name })) },
    [NotionProperty.confidence]: { number: candidate.confidence },
    [NotionProperty.dedupeHash]: { rich_text: [{ text: { content: candidate.fingerprint } }] },
    ...(link ? { [NotionProperty.sourceUrl]: { url: link } } : {}),
    ...(candidate.dueDate ? { [NotionProperty.dueDate]: { date: { start: candidate.dueDate } } } : {}),
    ...(candidate.assignee
      ? { [NotionProperty.assignee]: { rich_text: [{ text: { content: candidate.assignee } }] } }
      : {}),
  };
}

/**
 * Build page properties that mark a todo done or tentatively done
 */
export function buildCompletionProperties(
  op: CompleteTaskOp | TentativelyCompleteTaskOp,
  completedOn: string
): UpdatePageParameters['properties'] {
  const status = op.action === OperationAction.COMPLETE ? STATUS_NAMES.done : STATUS_NAMES.tentatively_done;
  return {
    [NotionProperty.status]: { select: { name: status } },
    [NotionProperty.completed]: { date: { start: completedOn } },
    [NotionProperty.confidence]: { number: op.confidence },
  };
}

/**
 * TaskStore backed by a Notion database
 */
export class NotionTaskStore implements TaskStore {
  private client: Client;
  private databaseId: string;
  private clock: () => Date;

  constructor(options: NotionTaskStoreOptions) {
    this.client = options.client ?? new Client({ auth: options.auth });
    this.databaseId = options.databaseId;
    this.clock = options.clock ?? (() => new Date());
  }

  async listOpenTasks(): Promise<ExistingTask[]> {
    const tasks: ExistingTask[] = [];
    let cursor: string | undefined;
    let skipped = 0;

    do {
      const response = await this.client.databases.query({
        database_id: this.databaseId,
        filter: {
          or: [
            { property: NotionProperty.status, select: { equals: STATUS_NAMES.open } },
            { property: NotionProperty.status, select: { equals: STATUS_NAMES.in_progress } },
          ],
        },
        start_cursor: cursor,
        page_size: PAGE_SIZE,
      });

      for (const page of response.results) {
        const task = parseTodoPage(page);
        if (task) {
          tasks.push(task);
        } else {
          skipped++;
        }
      }
      cursor = response.has_more ? response.next_cursor ?? undefined : undefined;
    } while (cursor);

    if (skipped > 0) {
      logger.warn('Skipped Notion pages that are not todo pages', { skipped });
    }
    logger.info('Loaded open todos from Notion', { count: tasks.length });
    return tasks;
  }

  async applyOps(ops: readonly ReconciliationOp[]): Promise<OpResult[]> {
    const results: OpResult[] = [];
    // Sequential: Notion rate-limits integrations to a few requests per second
    for (const op of ops) {
      try {
        results.push({ op, status: 'applied', taskId: await this.apply(op) });
      } catch (error) {
        const taskId = op.action === OperationAction.CREATE ? null : op.taskId;
        logger.error('Failed to apply operation to Notion', error, { action: op.action, taskId });
        results.push({
          op,
          status: 'failed',
          error: new StoreApplyError(errorMessage(error), taskId, { cause: error }),
        });
      }
    }
    return results;
  }

  private async apply(op: ReconciliationOp): Promise<string | null> {
    switch (op.action) {
      case OperationAction.CREATE: {
        const page = await this.client.pages.create({
          parent: { database_id: this.databaseId },
          properties: buildCreateProperties(op.candidate),
        });
        await this.addComment(page.id, formatSourceComment(op.candidate));
        return page.id;
      }
      case OperationAction.COMPLETE:
      case OperationAction.TENTATIVELY_COMPLETE: {
        const completedOn = this.clock().toISOString().slice(0, 10);
        await this.client.pages.update({
          page_id: op.taskId,
          properties: buildCompletionProperties(op, completedOn),
        });
        await this.addComment(op.taskId, formatCompletionComment(op));
        await this.addComment(op.taskId, formatAlsoMentionedComment(op.additionalSources));
        return op.taskId;
      }
      case OperationAction.NO_OP:
        await this.addComment(op.taskId, formatAlsoMentionedComment(op.additionalSources));
        return op.taskId;
    }
  }

  /**
   * Comments are informational; a failed comment does not fail the op
   */
  private async addComment(pageId: string, text: string | null): Promise<void> {
    if (!text) {
      return;
    }
    try {
      await this.client.comments.create({
        parent: { page_id: pageId },
        rich_text: [{ text: { content: text } }],
      });
    } catch (error) {
      logger.warn('Could not add Notion comment', { pageId, error: errorMessage(error) });
    }
  }
}
