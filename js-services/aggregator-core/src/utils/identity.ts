/**
 * Matching free-form person references (names, handles, emails) against the
 * identity a run extracts todos for
 */

import type { CandidateTodo, IdentityFilters } from '../types';

function normalizeReference(value: string): string {
  return value
    .normalize('NFKC')
    .toLowerCase()
    .trim()
    .replace(/^@/, '');
}

function toWords(value: string): string {
  return value
    .replace(/[^\p{L}\p{N}@.]+/gu, ' ')
    .trim();
}

/**
 * Whether a person reference points at the identity.
 *
 * Matches, case-insensitively:
 * 1. Email address or chat handle (exact, leading @ ignored)
 * 2. A name variant (exact, or as whole words inside the reference, so
 *    "Alex Kim (PM)" matches the variant "Alex Kim")
 * 3. The first name of a multi-word variant ("alex" matches "Alex Kim")
 */
export function matchesIdentity(
  reference: string | null | undefined,
  identity: IdentityFilters
): boolean {
  if (!reference) {
    return false;
  }

  const normalized = normalizeReference(reference);
  if (!normalized) {
    return false;
  }

  if (identity.email && normalized === normalizeReference(identity.email)) {
    return true;
  }
  if (identity.chatHandle && normalized === normalizeReference(identity.chatHandle)) {
    return true;
  }

  const referenceWords = ` ${toWords(normalized)} `;

  return identity.names.some((name) => {
    const variant = normalizeReference(name);
    if (!variant) {
      return false;
    }
    if (variant === normalized || referenceWords.includes(` ${toWords(variant)} `)) {
      return true;
    }
    const firstName = variant.split(/\s+/)[0];
    return firstName !== undefined && firstName !== variant && firstName === normalized;
  });
}

/**
 * Keep unassigned candidates and those assigned to the identity
 */
export function isOwnedByIdentity(candidate: CandidateTodo, identity: IdentityFilters): boolean {
  if (candidate.assignee === null || candidate.assignee.trim() === '') {
    return true;
  }
  return matchesIdentity(candidate.assignee, identity);
}

/**
 * Name used to address the identity in prompts
 */
export function primaryName(identity: IdentityFilters): string {
  return identity.names[0] ?? 'the user';
}
