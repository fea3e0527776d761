/**
 * Content fingerprints for exact-duplicate detection.
 *
 * Two task descriptions that differ only in case, whitespace, punctuation,
 * apostrophes or filler words hash to the same fingerprint.
 */

import crypto from 'node:crypto';

export const FINGERPRINT_LENGTH = 16;

const APOSTROPHES = /['‘’`]/g;
const NON_WORD = /[^\p{L}\p{N}\s]+/gu;

const STOP_WORDS = new Set([
  'a',
  'an',
  'the',
  'to',
  'for',
  'of',
  'on',
  'in',
  'at',
  'by',
  'with',
  'and',
  'or',
  'please',
]);

/**
 * Split a task description into normalized tokens.
 * Stop words are dropped unless nothing else is left.
 */
export function tokenizeTask(text: string): string[] {
  const tokens = text
    .normalize('NFKC')
    .toLowerCase()
    .replace(APOSTROPHES, '')
    .replace(NON_WORD, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);

  const meaningful = tokens.filter((token) => !STOP_WORDS.has(token));
  return meaningful.length > 0 ? meaningful : tokens;
}

export function normalizeTaskText(text: string): string {
  return tokenizeTask(text).join(' ');
}

export function computeFingerprint(text: string): string {
  return crypto
    .createHash('sha256')
    .update(normalizeTaskText(text))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}
