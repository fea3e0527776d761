import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import {
  ContentSourceSchema,
  computeFingerprint,
  RawContentItemSchema,
  TaskStatusSchema,
  TodoCategorySchema,
  TodoPrioritySchema,
  type ExistingTask,
  type RawContentItem,
} from '@todo-aggregator/aggregator-core';

const SourceRefFileSchema = z.object({
  source: ContentSourceSchema,
  sourceId: z.string().min(1),
  link: z.string().nullable().default(null),
});

const ExistingTaskFileSchema = z.object({
  id: z.string().min(1),
  task: z.string().trim().min(1),
  assignee: z.string().nullable().default(null),
  dueDate: z.string().nullable().default(null),
  priority: TodoPrioritySchema.default('medium'),
  category: z.array(TodoCategorySchema).default([]),
  status: TaskStatusSchema.default('open'),
  fingerprint: z.string().optional(),
  createdAt: z.string().default(() => new Date().toISOString()),
  sources: z.array(SourceRefFileSchema).default([]),
});

function readJson(path: string): unknown {
  const fullPath = resolve(path);
  let content: string;
  try {
    content = readFileSync(fullPath, 'utf-8');
  } catch (error) {
    throw new Error(`Cannot read ${fullPath}`, { cause: error });
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new Error(`${fullPath} is not valid JSON`, { cause: error });
  }
}

function describeIssues(path: string, error: z.ZodError): string {
  const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return `Invalid ${path}: ${issues.join('; ')}`;
}

/**
 * Load raw content items from a JSON array file
 */
export function loadContentFile(path: string): RawContentItem[] {
  const parsed = z.array(RawContentItemSchema).safeParse(readJson(path));
  if (!parsed.success) {
    throw new Error(describeIssues(path, parsed.error));
  }
  return parsed.data;
}

/**
 * Load open tasks for a dry run. Missing fingerprints are derived from the task text.
 */
export function loadExistingTasks(path: string): ExistingTask[] {
  const parsed = z.array(ExistingTaskFileSchema).safeParse(readJson(path));
  if (!parsed.success) {
    throw new Error(describeIssues(path, parsed.error));
  }
  return parsed.data.map(({ fingerprint, ...task }) => ({
    ...task,
    fingerprint: fingerprint || computeFingerprint(task.task),
  }));
}
