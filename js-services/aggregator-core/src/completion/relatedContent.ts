import type { ContentUnit, ExistingTask } from '../types';
import { tokenizeTask } from '../utils/fingerprint';
import { matchesIdentity } from '../utils/identity';

export type RelationReason = 'source' | 'reference' | 'participant' | 'token-overlap';

interface PreparedUnit {
  unit: ContentUnit;
  tokens: Set<string>;
}

/**
 * Finds the content units that could say something about a task.
 * Unit tokens are computed once and reused across tasks.
 */
export class RelatedContentMatcher {
  private prepared: PreparedUnit[];

  constructor(
    units: readonly ContentUnit[],
    private readonly minTokenOverlap: number
  ) {
    this.prepared = units.map((unit) => ({ unit, tokens: new Set(tokenizeTask(unit.text)) }));
  }

  /**
   * Why a unit relates to a task, or null when it does not
   */
  relationOf(task: ExistingTask, unit: ContentUnit, unitTokens?: Set<string>): RelationReason | null {
    const sharesSource = task.sources.some(
      (ref) =>
        (ref.source === unit.source && ref.sourceId === unit.sourceId) ||
        (ref.link !== null && ref.link === unit.link)
    );
    if (sharesSource) {
      return 'source';
    }

    if (unit.text.includes(task.id)) {
      return 'reference';
    }

    const assignee = task.assignee;
    if (
      assignee &&
      unit.participants.some((participant) =>
        matchesIdentity(participant, { names: [assignee], email: null, chatHandle: null })
      )
    ) {
      return 'participant';
    }

    const taskTokens = new Set(tokenizeTask(task.task));
    if (taskTokens.size === 0) {
      return null;
    }
    const tokens = unitTokens ?? new Set(tokenizeTask(unit.text));
    let overlap = 0;
    for (const token of taskTokens) {
      if (tokens.has(token)) overlap++;
    }
    return overlap >= Math.min(this.minTokenOverlap, taskTokens.size) ? 'token-overlap' : null;
  }

  relatedUnits(task: ExistingTask): ContentUnit[] {
    return this.prepared
      .filter(({ unit, tokens }) => this.relationOf(task, unit, tokens) !== null)
      .map(({ unit }) => unit);
  }
}
