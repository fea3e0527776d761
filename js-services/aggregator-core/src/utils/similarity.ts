import { tokenizeTask } from './fingerprint';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;

/**
 * Calculate Levenshtein distance between two strings
 */
export function levenshteinDistance(str1: string, str2: string): number {
  if (str1 === str2) return 0;
  if (str1.length === 0) return str2.length;
  if (str2.length === 0) return str1.length;

  // Two rolling rows instead of the full matrix
  let previous = Array.from({ length: str1.length + 1 }, (_, j) => j);
  let current = new Array<number>(str1.length + 1).fill(0);

  for (let i = 1; i <= str2.length; i++) {
    current[0] = i;
    for (let j = 1; j <= str1.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (str2.charAt(i - 1) === str1.charAt(j - 1) ? 0 : 1);
      current[j] = Math.min(substitution, (current[j - 1] ?? 0) + 1, (previous[j] ?? 0) + 1);
    }
    [previous, current] = [current, previous];
  }

  return previous[str1.length] ?? 0;
}

/**
 * Edit-distance similarity between 0 (completely different) and 1 (identical)
 */
export function levenshteinRatio(str1: string, str2: string): number {
  if (str1 === str2) return 1;

  const longer = Math.max(str1.length, str2.length);
  if (longer === 0) return 1;

  return (longer - levenshteinDistance(str1, str2)) / longer;
}

/** Minimum edit ratio for two different words to count as the same word */
export const TOKEN_MATCH_RATIO = 0.8;

const MIN_FUZZY_TOKEN_LENGTH = 4;
const HAS_DIGIT = /\p{N}/u;

/**
 * Whether two different words may be spelling variants of each other.
 * Short words and words carrying digits (ids, amounts, dates) never are.
 */
function canMatchFuzzily(a: string, b: string): boolean {
  return (
    a.length >= MIN_FUZZY_TOKEN_LENGTH &&
    b.length >= MIN_FUZZY_TOKEN_LENGTH &&
    !HAS_DIGIT.test(a) &&
    !HAS_DIGIT.test(b)
  );
}

/**
 * Jaccard overlap of two token sets where spelling variants of a word
 * ("report"/"reports") count as a partial match weighted by their edit ratio.
 * Each token is matched at most once; pairing is order independent.
 */
export function fuzzyJaccard(tokens1: readonly string[], tokens2: readonly string[]): number {
  const set1 = new Set(tokens1);
  const set2 = new Set(tokens2);
  if (set1.size === 0 && set2.size === 0) return 1;

  const rest1: string[] = [];
  let matches = 0;
  let weight = 0;
  for (const token of set1) {
    if (set2.has(token)) {
      matches++;
      weight += 1;
    } else {
      rest1.push(token);
    }
  }
  const rest2 = [...set2].filter((token) => !set1.has(token));

  const pairs: { a: string; b: string; ratio: number; key: string }[] = [];
  for (const a of rest1) {
    for (const b of rest2) {
      if (!canMatchFuzzily(a, b)) continue;
      const ratio = levenshteinRatio(a, b);
      if (ratio >= TOKEN_MATCH_RATIO) {
        pairs.push({ a, b, ratio, key: a < b ? `${a} ${b}` : `${b} ${a}` });
      }
    }
  }
  pairs.sort((x, y) => y.ratio - x.ratio || (x.key < y.key ? -1 : x.key > y.key ? 1 : 0));

  const used = new Set<string>();
  for (const { a, b, ratio } of pairs) {
    if (used.has(`1:${a}`) || used.has(`2:${b}`)) continue;
    used.add(`1:${a}`);
    used.add(`2:${b}`);
    matches++;
    weight += ratio;
  }

  return weight / (set1.size + set2.size - matches);
}

/**
 * Similarity of two task descriptions in [0, 1] over their normalized tokens.
 * Symmetric; identical normalized text scores 1. Tasks that differ in an
 * identifier or a short name ("invoice 1042" / "invoice 1043", "Bob" / "Rob")
 * share only the remaining words and stay well apart.
 */
export function textSimilarity(text1: string, text2: string): number {
  return fuzzyJaccard(tokenizeTask(text1), tokenizeTask(text2));
}
