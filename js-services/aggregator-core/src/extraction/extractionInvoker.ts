/**
 * Extraction Invoker
 *
 * One model call per run turns all content units into candidate todos.
 * The model output is validated item by item; anything the model gets wrong
 * (unknown priority, bad dates, dangling source references) is normalized or
 * dropped with a warning instead of failing the run.
 */

import { z } from 'zod';
import type { RunConfig } from '../config';
import { ExtractionFailed } from '../errors';
import { invokeStructured } from '../llm/invokeStructured';
import type { ModelClient } from '../llm/modelClient';
import { mergeSources } from '../dedupe/dedupeEngine';
import { logger } from '../logger';
import { buildTodoExtractionPrompt } from '../prompts/todoExtraction';
import type {
  CandidateTodo,
  ContentUnit,
  IdentityFilters,
  SourceRef,
  TodoCategory,
  TodoPriority,
} from '../types';
import { ContentSourceSchema, TodoCategorySchema, TodoPrioritySchema } from '../types';
import { normalizeConfidence } from '../utils/confidence';
import { computeFingerprint } from '../utils/fingerprint';
import type { Sleep } from '../utils/retry';

export const ExtractedTodoSchema = z.object({
  task: z.string().trim().min(1),
  assigned_to: z.string().nullish().catch(null),
  due_date: z.unknown().optional(),
  priority: z.unknown().optional(),
  category: z.unknown().optional(),
  source_ids: z.unknown().optional(),
  source_id: z.unknown().optional(),
  source: z.unknown().optional(),
  source_context: z.string().nullish().catch(null),
  confidence: z.unknown().optional(),
  type: z.unknown().optional(),
});

export type ExtractedTodo = z.infer<typeof ExtractedTodoSchema>;

export interface ExtractionDeps {
  model: ModelClient;
  config: Pick<RunConfig, 'features' | 'thresholds' | 'retry' | 'highPriorityKeywords'>;
  now: Date;
  sleep?: Sleep;
  signal?: AbortSignal;
}

export interface ExtractionOutcome {
  candidates: CandidateTodo[];
  warnings: string[];
  failure: ExtractionFailed | null;
  modelCalls: number;
}

const UNASSIGNED = new Set(['', 'null', 'none', 'unassigned', 'n/a']);

export function normalizePriority(value: unknown): TodoPriority {
  if (typeof value !== 'string') {
    return 'medium';
  }
  const parsed = TodoPrioritySchema.safeParse(value.trim().toLowerCase());
  return parsed.success ? parsed.data : 'medium';
}

/**
 * Categories outside the vocabulary become 'other'
 */
export function normalizeCategories(value: unknown): TodoCategory[] {
  const raw = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  const categories: TodoCategory[] = [];

  for (const entry of raw) {
    if (typeof entry !== 'string' || entry.trim() === '') continue;
    const parsed = TodoCategorySchema.safeParse(entry.trim().toLowerCase());
    const category = parsed.success ? parsed.data : 'other';
    if (!categories.includes(category)) {
      categories.push(category);
    }
  }
  return categories;
}

/**
 * YYYY-MM-DD of a real calendar day, otherwise null
 */
export function normalizeDueDate(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, year, month, day] = match.map(Number);
  if (year === undefined || month === undefined || day === undefined) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  const isCalendarDay =
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
  return isCalendarDay ? trimmed : null;
}

function normalizeAssignee(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return UNASSIGNED.has(trimmed.toLowerCase()) ? null : trimmed;
}

function normalizeKind(value: unknown): CandidateTodo['kind'] {
  if (value === 'explicit' || value === 'implicit') {
    return value;
  }
  return null;
}

function collectMarkerIds(item: ExtractedTodo): number[] {
  const raw: unknown[] = [];
  for (const value of [item.source_ids, item.source_id]) {
    if (Array.isArray(value)) {
      raw.push(...value);
    } else if (value !== undefined && value !== null) {
      raw.push(value);
    }
  }

  const ids: number[] = [];
  for (const value of raw) {
    const text = typeof value === 'string' ? value.replace(/^\s*\[?SOURCE:/i, '').replace(/\]\s*$/, '') : value;
    const id = typeof text === 'number' ? text : typeof text === 'string' ? Number(text.trim()) : NaN;
    if (Number.isInteger(id) && !ids.includes(id)) {
      ids.push(id);
    }
  }
  return ids;
}

/**
 * Resolve [SOURCE:n] references to source refs, unique by source and id
 */
function resolveSources(item: ExtractedTodo, markers: readonly ContentUnit[]): SourceRef[] {
  const sources: SourceRef[] = [];
  for (const id of collectMarkerIds(item)) {
    const unit = markers[id];
    if (!unit) continue;
    const duplicate = sources.some(
      (ref) => ref.source === unit.source && ref.sourceId === unit.sourceId
    );
    if (!duplicate) {
      sources.push({ source: unit.source, sourceId: unit.sourceId, link: unit.link });
    }
  }
  return sources;
}

/**
 * Attribution for a todo the model gave no usable marker for: the units of
 * the platform it names, otherwise every unit of the run
 */
function fallbackSources(item: ExtractedTodo, markers: readonly ContentUnit[]): SourceRef[] {
  const named = ContentSourceSchema.safeParse(
    typeof item.source === 'string' ? item.source.trim().toLowerCase() : item.source
  );
  const fromPlatform = named.success ? markers.filter((unit) => unit.source === named.data) : [];
  const units = fromPlatform.length > 0 ? fromPlatform : markers;
  return mergeSources(units.map((unit) => ({ source: unit.source, sourceId: unit.sourceId, link: unit.link })));
}

/**
 * Convert one validated model item into a candidate. A todo without a
 * usable source reference is kept with a fallback attribution and a warning.
 */
export function toCandidate(
  item: ExtractedTodo,
  markers: readonly ContentUnit[],
  defaultConfidence: number
): { candidate: CandidateTodo; warning?: string } {
  let sources = resolveSources(item, markers);
  let warning: string | undefined;
  if (sources.length === 0) {
    sources = fallbackSources(item, markers);
    warning = `todo "${item.task}" has no resolvable source reference, attributed to ${sources.length} unit(s)`;
  }

  const context = item.source_context?.trim();
  return {
    ...(warning ? { warning } : {}),
    candidate: {
      task: item.task,
      assignee: normalizeAssignee(item.assigned_to),
      dueDate: normalizeDueDate(item.due_date),
      priority: normalizePriority(item.priority),
      category: normalizeCategories(item.category),
      confidence: normalizeConfidence(item.confidence, defaultConfidence),
      sources,
      fingerprint: computeFingerprint(item.task),
      context: context ? context : null,
      kind: normalizeKind(item.type),
    },
  };
}

export async function extractTodos(
  units: readonly ContentUnit[],
  identity: IdentityFilters,
  deps: ExtractionDeps
): Promise<ExtractionOutcome> {
  if (units.length === 0) {
    logger.info('No content to extract todos from');
    return { candidates: [], warnings: [], failure: null, modelCalls: 0 };
  }

  const { config } = deps;
  const { system, prompt, markers } = buildTodoExtractionPrompt({
    units,
    identity,
    features: config.features,
    highPriorityKeywords: config.highPriorityKeywords,
    now: deps.now,
  });

  logger.info('Extracting todos', { units: units.length });

  const outcome = await invokeStructured({
    model: deps.model,
    request: { purpose: 'todo-extraction', system, prompt, signal: deps.signal },
    schema: ExtractedTodoSchema,
    collectionKeys: ['todos', 'items'],
    retry: config.retry,
    sleep: deps.sleep,
  });

  if (outcome.status === 'failed') {
    const failure = new ExtractionFailed(outcome.reason, outcome.attempts, { cause: outcome.cause });
    logger.error('Todo extraction failed', failure, { attempts: outcome.attempts });
    return { candidates: [], warnings: [], failure, modelCalls: outcome.attempts };
  }

  const warnings = [...outcome.warnings];
  const candidates: CandidateTodo[] = [];

  for (const item of outcome.items) {
    const result = toCandidate(item, markers, config.thresholds.defaultCandidateConfidence);
    if (result.warning) {
      warnings.push(result.warning);
    }

    const candidate = result.candidate;
    // Disabled features fall back to neutral values whatever the model says
    if (!config.features.priorityScoring) candidate.priority = 'medium';
    if (!config.features.categoryTagging) candidate.category = [];
    candidates.push(candidate);
  }

  if (warnings.length > 0) {
    logger.warn('Extraction produced warnings', { warningCount: warnings.length });
  }
  logger.info('Extracted candidate todos', {
    candidates: candidates.length,
    modelItems: outcome.items.length,
    status: outcome.status,
  });

  return { candidates, warnings, failure: null, modelCalls: outcome.attempts };
}
