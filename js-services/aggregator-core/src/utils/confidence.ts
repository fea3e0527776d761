/**
 * Confidence in [0, 1]. Values in (1, 100] are read as percentages;
 * anything else falls back to the default.
 */
export function normalizeConfidence(value: unknown, fallback: number): number {
  let numeric: number | null = null;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim().replace(/%$/, ''));
    numeric = Number.isNaN(parsed) ? null : parsed;
  }

  if (numeric === null || !Number.isFinite(numeric) || numeric < 0) {
    return fallback;
  }
  if (numeric <= 1) {
    return numeric;
  }
  if (numeric <= 100) {
    return numeric / 100;
  }
  return fallback;
}
