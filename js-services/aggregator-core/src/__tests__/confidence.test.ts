import { describe, test, expect } from '@jest/globals';
import { normalizeConfidence } from '../utils/confidence';

describe('normalizeConfidence', () => {
  test('should keep values already in [0, 1]', () => {
    expect(normalizeConfidence(0.9, 0.5)).toBe(0.9);
    expect(normalizeConfidence(0, 0.5)).toBe(0);
    expect(normalizeConfidence(1, 0.5)).toBe(1);
  });

  test('should read larger values as percentages', () => {
    expect(normalizeConfidence(85, 0)).toBe(0.85);
    expect(normalizeConfidence('85%', 0)).toBe(0.85);
    expect(normalizeConfidence(' 0.7 ', 0)).toBe(0.7);
  });

  test('should fall back for values that are not a confidence', () => {
    expect(normalizeConfidence(150, 0.5)).toBe(0.5);
    expect(normalizeConfidence(-0.1, 0.5)).toBe(0.5);
    expect(normalizeConfidence('high', 0.5)).toBe(0.5);
    expect(normalizeConfidence(undefined, 0.5)).toBe(0.5);
    expect(normalizeConfidence('', 0.5)).toBe(0.5);
  });
});
