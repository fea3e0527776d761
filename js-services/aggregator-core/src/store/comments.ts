import type { CandidateTodo, CompleteTaskOp, SourceRef, TentativelyCompleteTaskOp } from '../types';
import { OperationAction } from '../types';

const MAX_EVIDENCE_CHARS = 200;
const MAX_CONTEXT_CHARS = 500;

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function formatPercent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

/**
 * "Auto-completed (90%): "evidence"" or "Needs review (60%): "evidence""
 */
export function formatCompletionComment(op: CompleteTaskOp | TentativelyCompleteTaskOp): string {
  const label = op.action === OperationAction.COMPLETE ? 'Auto-completed' : 'Needs review';
  const prefix = `${label} (${formatPercent(op.confidence)})`;
  return op.evidence ? `${prefix}: "${clip(op.evidence, MAX_EVIDENCE_CHARS)}"` : prefix;
}

/**
 * Context comment posted on a newly created task, null without context
 */
export function formatSourceComment(candidate: CandidateTodo): string | null {
  if (!candidate.context) {
    return null;
  }
  const source = candidate.sources[0]?.source ?? 'unknown';
  return `Source (${source}): ${clip(candidate.context, MAX_CONTEXT_CHARS)}`;
}

export function describeSource(ref: SourceRef): string {
  return `${ref.source} ${ref.link ?? ref.sourceId}`;
}

/**
 * Comment listing where an existing task was mentioned again, null when nowhere
 */
export function formatAlsoMentionedComment(sources: readonly SourceRef[]): string | null {
  if (sources.length === 0) {
    return null;
  }
  return `Also mentioned in: ${sources.map(describeSource).join(', ')}`;
}
