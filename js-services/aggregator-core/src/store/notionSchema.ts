/**
 * Layout of the Notion todo database and conversion of its pages
 */

import { z } from 'zod';
import type { ContentSource, ExistingTask, SourceRef, TaskStatus, TodoCategory, TodoPriority } from '../types';
import { CONTENT_SOURCES, TaskStatusSchema, TodoCategorySchema, TodoPrioritySchema } from '../types';
import { computeFingerprint } from '../utils/fingerprint';

export const NotionProperty = {
  task: 'Task',
  status: 'Status',
  source: 'Source',
  sourceUrl: 'Source URL',
  dueDate: 'Due Date',
  completed: 'Completed',
  confidence: 'Confidence',
  dedupeHash: 'Dedupe Hash',
  priority: 'Priority',
  category: 'Category',
  assignee: 'Assignee',
} as const;

export const STATUS_NAMES: Record<TaskStatus, string> = {
  open: 'Open',
  in_progress: 'In Progress',
  done: 'Done',
  tentatively_done: 'Done?',
};

export const SOURCE_LABELS: Record<ContentSource, string> = {
  chat: 'Chat',
  email: 'Email',
  meeting: 'Meeting',
  'store-note': 'Notes',
};

const RichTextSchema = z.array(z.object({ plain_text: z.string() }));
const SelectSchema = z.object({ name: z.string() }).nullable();
const MultiSelectSchema = z.array(z.object({ name: z.string() }));

export const NotionTodoPageSchema = z.object({
  object: z.literal('page'),
  id: z.string(),
  created_time: z.string(),
  url: z.string().optional(),
  properties: z.object({
    [NotionProperty.task]: z.object({ title: RichTextSchema }),
    [NotionProperty.status]: z.object({ select: SelectSchema }).optional(),
    [NotionProperty.source]: z.object({ multi_select: MultiSelectSchema }).optional(),
    [NotionProperty.sourceUrl]: z.object({ url: z.string().nullable() }).optional(),
    [NotionProperty.dueDate]: z
      .object({ date: z.object({ start: z.string() }).nullable() })
      .optional(),
    [NotionProperty.dedupeHash]: z.object({ rich_text: RichTextSchema }).optional(),
    [NotionProperty.priority]: z.object({ select: SelectSchema }).optional(),
    [NotionProperty.category]: z.object({ multi_select: MultiSelectSchema }).optional(),
    [NotionProperty.assignee]: z.object({ rich_text: RichTextSchema }).optional(),
  }),
});

export type NotionTodoPage = z.infer<typeof NotionTodoPageSchema>;

function plainText(richText: { plain_text: string }[] | undefined): string {
  return (richText ?? []).map((part) => part.plain_text).join('').trim();
}

export function statusFromName(name: string | undefined): TaskStatus {
  return TaskStatusSchema.options.find((status) => STATUS_NAMES[status] === name) ?? 'open';
}

function sourceFromLabel(label: string): ContentSource | undefined {
  return CONTENT_SOURCES.find((source) => SOURCE_LABELS[source] === label);
}

function priorityFromName(name: string | undefined): TodoPriority {
  const parsed = TodoPrioritySchema.safeParse(name?.toLowerCase());
  return parsed.success ? parsed.data : 'medium';
}

function categoriesFromNames(names: { name: string }[] | undefined): TodoCategory[] {
  const categories: TodoCategory[] = [];
  for (const { name } of names ?? []) {
    const parsed = TodoCategorySchema.safeParse(name.toLowerCase());
    if (parsed.success && !categories.includes(parsed.data)) {
      categories.push(parsed.data);
    }
  }
  return categories;
}

/**
 * Convert a database page into an ExistingTask.
 * Returns null for anything that is not a full todo page.
 */
export function parseTodoPage(page: unknown): ExistingTask | null {
  const parsed = NotionTodoPageSchema.safeParse(page);
  if (!parsed.success) {
    return null;
  }

  const { id, created_time: createdAt, url, properties } = parsed.data;
  const task = plainText(properties[NotionProperty.task].title);
  if (!task) {
    return null;
  }

  const labels = properties[NotionProperty.source]?.multi_select ?? [];
  const firstSource = labels
    .map(({ name }) => sourceFromLabel(name))
    .find((source) => source !== undefined);
  const sourceUrl = properties[NotionProperty.sourceUrl]?.url ?? null;

  // The page itself is a source: notes collected from the store point back at it
  const sources: SourceRef[] = [{ source: 'store-note', sourceId: id, link: url ?? null }];
  if (sourceUrl) {
    sources.push({ source: firstSource ?? 'store-note', sourceId: sourceUrl, link: sourceUrl });
  }

  const assignee = plainText(properties[NotionProperty.assignee]?.rich_text);

  return {
    id,
    task,
    assignee: assignee || null,
    dueDate: properties[NotionProperty.dueDate]?.date?.start ?? null,
    priority: priorityFromName(properties[NotionProperty.priority]?.select?.name),
    category: categoriesFromNames(properties[NotionProperty.category]?.multi_select),
    status: statusFromName(properties[NotionProperty.status]?.select?.name),
    fingerprint: plainText(properties[NotionProperty.dedupeHash]?.rich_text) || computeFingerprint(task),
    createdAt,
    sources,
  };
}

export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
