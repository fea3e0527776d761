/**
 * Core types for the todo aggregation pipeline
 */

import { z } from 'zod';
import type { StoreApplyError } from './errors';

/**
 * Where a piece of content came from. Declaration order is the order the
 * normalizer emits sources in.
 */
export const ContentSourceSchema = z.enum(['chat', 'email', 'meeting', 'store-note']);
export type ContentSource = z.infer<typeof ContentSourceSchema>;
export const CONTENT_SOURCES: readonly ContentSource[] = ContentSourceSchema.options;

export const TodoPrioritySchema = z.enum(['high', 'medium', 'low']);
export type TodoPriority = z.infer<typeof TodoPrioritySchema>;

export const TodoCategorySchema = z.enum([
  'follow-up',
  'review',
  'meeting',
  'finance',
  'hr',
  'technical',
  'communication',
  'other',
]);
export type TodoCategory = z.infer<typeof TodoCategorySchema>;

export const TaskStatusSchema = z.enum(['open', 'in_progress', 'done', 'tentatively_done']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

/**
 * Pointer back to the content a todo was found in
 */
export interface SourceRef {
  source: ContentSource;
  /** Unique within its source (channel:ts, message id, meeting:segment, page id) */
  sourceId: string;
  link: string | null;
}

/**
 * One normalized piece of raw source material. Built fresh for every run.
 */
export interface ContentUnit {
  readonly text: string;
  readonly source: ContentSource;
  readonly sourceId: string;
  readonly link: string | null;
  /** Sender and recipients, used for assignment inference and related-content matching */
  readonly participants: readonly string[];
  /** Epoch milliseconds, when the source item carried a parsable timestamp */
  readonly timestamp: number | null;
}

/**
 * A todo extracted during this run, not yet reconciled against the store
 */
export interface CandidateTodo {
  /** Imperative description */
  task: string;
  assignee: string | null;
  /** YYYY-MM-DD */
  dueDate: string | null;
  priority: TodoPriority;
  category: TodoCategory[];
  /** Certainty that the todo belongs to the identity, 0..1 */
  confidence: number;
  /** Never empty; unique by source + sourceId */
  sources: SourceRef[];
  /** Derived locally from `task`, see utils/fingerprint */
  fingerprint: string;
  /** Short excerpt of the message the todo came from */
  context: string | null;
  kind: 'explicit' | 'implicit' | null;
}

/**
 * A task already present in the external store when the run started.
 * The store owns it; the core only references it by id.
 */
export interface ExistingTask {
  readonly id: string;
  readonly task: string;
  readonly assignee: string | null;
  readonly dueDate: string | null;
  readonly priority: TodoPriority;
  readonly category: readonly TodoCategory[];
  readonly status: TaskStatus;
  readonly fingerprint: string;
  /** ISO 8601 */
  readonly createdAt: string;
  readonly sources: readonly SourceRef[];
}

/**
 * Only open and in-progress tasks take part in dedupe and completion detection
 */
export function isOpenTask(task: ExistingTask): boolean {
  return task.status === 'open' || task.status === 'in_progress';
}

export type CompletionState = 'still_open' | 'done' | 'tentative';

export interface CompletionVerdict {
  taskId: string;
  verdict: CompletionState;
  confidence: number;
  evidence: string | null;
  /** Number of content units that were judged related to the task */
  relatedUnits: number;
}

/**
 * Sources of candidates that turned out to duplicate an existing task
 */
export interface ExistingTaskMatch {
  taskId: string;
  sources: SourceRef[];
  matchedBy: 'fingerprint' | 'similarity';
  /** 1 for fingerprint matches */
  similarity: number;
}

/**
 * Kind of store mutation a reconciliation op requests
 */
export enum OperationAction {
  CREATE = 'CREATE',
  COMPLETE = 'COMPLETE',
  TENTATIVELY_COMPLETE = 'TENTATIVELY_COMPLETE',
  NO_OP = 'NO_OP',
}

export interface CreateTaskOp {
  action: OperationAction.CREATE;
  candidate: CandidateTodo;
}

export interface CompleteTaskOp {
  action: OperationAction.COMPLETE;
  taskId: string;
  confidence: number;
  evidence: string | null;
  additionalSources: SourceRef[];
}

export interface TentativelyCompleteTaskOp {
  action: OperationAction.TENTATIVELY_COMPLETE;
  taskId: string;
  confidence: number;
  evidence: string | null;
  additionalSources: SourceRef[];
}

export interface NoOp {
  action: OperationAction.NO_OP;
  taskId: string;
  confidence: number;
  additionalSources: SourceRef[];
}

export type ExistingTaskOp = CompleteTaskOp | TentativelyCompleteTaskOp | NoOp;
export type ReconciliationOp = CreateTaskOp | ExistingTaskOp;

export type OpResult =
  | { op: ReconciliationOp; status: 'applied'; taskId: string | null }
  | { op: ReconciliationOp; status: 'failed'; error: StoreApplyError };

export function isExistingTaskOp(op: ReconciliationOp): op is ExistingTaskOp {
  return op.action !== OperationAction.CREATE;
}

/**
 * Who the run extracts todos for
 */
export interface IdentityFilters {
  /** Name variants; the first one is used as the primary name in prompts */
  names: readonly string[];
  email: string | null;
  chatHandle: string | null;
}

export interface LookbackWindow {
  start: Date;
  end: Date;
}
