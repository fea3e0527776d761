import { describe, test, expect } from '@jest/globals';
import { coerceTimestampToMillis, isWithinWindow, lookbackWindow } from '../utils/freshness';

const NOON = Date.UTC(2024, 5, 10, 12);

describe('coerceTimestampToMillis', () => {
  test('should read small numbers as epoch seconds', () => {
    expect(coerceTimestampToMillis(NOON / 1000)).toBe(NOON);
  });

  test('should keep epoch milliseconds as they are', () => {
    expect(coerceTimestampToMillis(NOON + 123)).toBe(NOON + 123);
  });

  test('should read chat ts strings as seconds with a fraction', () => {
    expect(coerceTimestampToMillis(`${NOON / 1000}.000100`)).toBe(NOON);
  });

  test('should parse ISO strings', () => {
    expect(coerceTimestampToMillis('2024-06-10T12:00:00Z')).toBe(NOON);
  });

  test('should parse space-separated UTC strings', () => {
    expect(coerceTimestampToMillis('2024-06-10 12:00:00 UTC')).toBe(NOON);
  });

  test('should accept Date instances', () => {
    expect(coerceTimestampToMillis(new Date(NOON))).toBe(NOON);
  });

  test('should return null for values without a usable time', () => {
    expect(coerceTimestampToMillis('')).toBeNull();
    expect(coerceTimestampToMillis(null)).toBeNull();
    expect(coerceTimestampToMillis(Number.NaN)).toBeNull();
    expect(coerceTimestampToMillis(new Date('invalid'))).toBeNull();
    expect(coerceTimestampToMillis({ seconds: 5 })).toBeNull();
  });
});

describe('lookbackWindow', () => {
  test('should end at now and start the given hours earlier', () => {
    const window = lookbackWindow(new Date(NOON), 24);

    expect(window.start.toISOString()).toBe('2024-06-09T12:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-06-10T12:00:00.000Z');
  });
});

describe('isWithinWindow', () => {
  const window = lookbackWindow(new Date(NOON), 1);

  test('should include both ends', () => {
    expect(isWithinWindow(NOON - 60 * 60 * 1000, window)).toBe(true);
    expect(isWithinWindow(NOON, window)).toBe(true);
  });

  test('should exclude times outside the window', () => {
    expect(isWithinWindow(NOON - 60 * 60 * 1000 - 1, window)).toBe(false);
    expect(isWithinWindow(NOON + 1, window)).toBe(false);
  });
});
