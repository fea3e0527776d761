/**
 * Dedupe Engine
 *
 * Matches candidates against the open tasks of the store and against each
 * other. Exact matches go through fingerprints; near matches through text
 * similarity. Deterministic, and a second pass over its own output changes
 * nothing.
 */

import { logger } from '../logger';
import type { CandidateTodo, ExistingTask, ExistingTaskMatch, SourceRef, TodoCategory } from '../types';
import { isOpenTask } from '../types';
import { computeFingerprint } from '../utils/fingerprint';
import { DEFAULT_SIMILARITY_THRESHOLD, textSimilarity } from '../utils/similarity';

export interface DedupeOptions {
  similarityThreshold: number;
}

export interface DedupeResult {
  /** Candidates that still need a CREATE */
  candidates: CandidateTodo[];
  /** Per existing task, the sources of candidates that duplicated it */
  existingMatches: ExistingTaskMatch[];
  duplicatesOfExisting: number;
  mergedWithinRun: number;
}

function sourceKey(ref: SourceRef): string {
  return `${ref.source}\u0000${ref.sourceId}`;
}

/**
 * Union of source lists in first-seen order
 */
export function mergeSources(...lists: ReadonlyArray<readonly SourceRef[]>): SourceRef[] {
  const seen = new Set<string>();
  const merged: SourceRef[] = [];
  for (const list of lists) {
    for (const ref of list) {
      const key = sourceKey(ref);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(ref);
      }
    }
  }
  return merged;
}

function mergeCategories(a: readonly TodoCategory[], b: readonly TodoCategory[]): TodoCategory[] {
  return [...new Set([...a, ...b])];
}

/**
 * Merge two duplicate candidates. The more confident one supplies the
 * descriptive fields; on a tie the earlier one (a) wins.
 */
export function mergeCandidates(a: CandidateTodo, b: CandidateTodo): CandidateTodo {
  const winner = b.confidence > a.confidence ? b : a;
  return {
    task: winner.task,
    assignee: winner.assignee,
    dueDate: winner.dueDate,
    priority: winner.priority,
    category: mergeCategories(a.category, b.category),
    confidence: Math.max(a.confidence, b.confidence),
    sources: mergeSources(a.sources, b.sources),
    fingerprint: computeFingerprint(winner.task),
    context: winner.context,
    kind: winner.kind,
  };
}

class ExistingTaskIndex {
  private byFingerprint = new Map<string, string>();

  constructor(private readonly tasks: readonly ExistingTask[]) {
    // Earlier tasks win on fingerprint collisions
    for (const task of tasks) {
      for (const fingerprint of [task.fingerprint, computeFingerprint(task.task)]) {
        if (fingerprint && !this.byFingerprint.has(fingerprint)) {
          this.byFingerprint.set(fingerprint, task.id);
        }
      }
    }
  }

  find(
    candidate: CandidateTodo,
    threshold: number
  ): { taskId: string; matchedBy: 'fingerprint' | 'similarity'; similarity: number } | null {
    const taskId = this.byFingerprint.get(candidate.fingerprint);
    if (taskId !== undefined) {
      return { taskId, matchedBy: 'fingerprint', similarity: 1 };
    }

    let best: { taskId: string; similarity: number } | null = null;
    for (const task of this.tasks) {
      const similarity = textSimilarity(candidate.task, task.task);
      // Strictly greater keeps the earliest task on ties
      if (similarity >= threshold && (best === null || similarity > best.similarity)) {
        best = { taskId: task.id, similarity };
      }
    }
    return best ? { ...best, matchedBy: 'similarity' } : null;
  }
}

function findDuplicatePair(
  candidates: readonly CandidateTodo[],
  isDuplicate: (a: CandidateTodo, b: CandidateTodo) => boolean
): [number, number] | null {
  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const a = candidates[i];
      const b = candidates[j];
      if (a && b && isDuplicate(a, b)) {
        return [i, j];
      }
    }
  }
  return null;
}

function recordMatch(
  matches: Map<string, ExistingTaskMatch>,
  match: { taskId: string; matchedBy: 'fingerprint' | 'similarity'; similarity: number },
  sources: readonly SourceRef[]
): void {
  const existing = matches.get(match.taskId);
  if (!existing) {
    matches.set(match.taskId, { ...match, sources: mergeSources(sources) });
    return;
  }
  existing.sources = mergeSources(existing.sources, sources);
  existing.similarity = Math.max(existing.similarity, match.similarity);
  if (match.matchedBy === 'fingerprint') {
    existing.matchedBy = 'fingerprint';
  }
}

export function dedupeCandidates(
  candidates: readonly CandidateTodo[],
  existingTasks: readonly ExistingTask[],
  options: Partial<DedupeOptions> = {}
): DedupeResult {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const index = new ExistingTaskIndex(existingTasks.filter(isOpenTask));
  const matches = new Map<string, ExistingTaskMatch>();
  const survivors: CandidateTodo[] = [];
  let duplicatesOfExisting = 0;

  for (const original of candidates) {
    // Fingerprints are always derived here, never trusted from upstream
    const candidate = { ...original, fingerprint: computeFingerprint(original.task) };
    const match = index.find(candidate, threshold);
    if (match) {
      recordMatch(matches, match, candidate.sources);
      duplicatesOfExisting++;
      logger.debug('Candidate duplicates an existing task', {
        taskId: match.taskId,
        matchedBy: match.matchedBy,
        similarity: match.similarity,
      });
    } else {
      survivors.push(candidate);
    }
  }

  let mergedWithinRun = 0;
  for (;;) {
    const pair =
      findDuplicatePair(survivors, (a, b) => a.fingerprint === b.fingerprint) ??
      findDuplicatePair(survivors, (a, b) => textSimilarity(a.task, b.task) >= threshold);
    if (!pair) break;

    const [i, j] = pair;
    const a = survivors[i];
    const b = survivors[j];
    if (!a || !b) break;

    survivors[i] = mergeCandidates(a, b);
    survivors.splice(j, 1);
    mergedWithinRun++;
  }

  logger.info('Deduplicated candidates', {
    input: candidates.length,
    remaining: survivors.length,
    duplicatesOfExisting,
    mergedWithinRun,
  });

  return {
    candidates: survivors,
    existingMatches: [...matches.values()],
    duplicatesOfExisting,
    mergedWithinRun,
  };
}
