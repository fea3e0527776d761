import type { LookbackWindow } from '../types';

const MILLIS_THRESHOLD = 1_000_000_000_000; // 1e12, roughly Sat Sep 09 2001

const HOUR_MS = 60 * 60 * 1000;

function parseNumericTimestamp(value: number): number | null {
  if (!Number.isFinite(value)) {
    return null;
  }

  return value > MILLIS_THRESHOLD ? Math.trunc(value) : Math.trunc(value * 1000);
}

function parseStringTimestamp(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  // Chat timestamps ("1718035200.000100" = seconds.microseconds) and plain epoch values
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return parseNumericTimestamp(Number(trimmed));
  }

  const directParse = Date.parse(trimmed);
  if (!Number.isNaN(directParse)) {
    return directParse;
  }

  const candidate = trimmed.replace(/\sUTC$/i, 'Z').replace(' ', 'T');
  const isoLikeParse = Date.parse(candidate.endsWith('Z') ? candidate : `${candidate}Z`);
  if (!Number.isNaN(isoLikeParse)) {
    return isoLikeParse;
  }

  return null;
}

/**
 * Best-effort conversion of the timestamp shapes the sources use
 * (Date, epoch seconds or millis, chat ts strings, ISO and RFC 2822 strings)
 * into epoch milliseconds
 */
export function coerceTimestampToMillis(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isFinite(time) ? time : null;
  }

  if (typeof value === 'number') {
    return parseNumericTimestamp(value);
  }

  if (typeof value === 'string') {
    return parseStringTimestamp(value);
  }

  return null;
}

export function lookbackWindow(now: Date, lookbackHours: number): LookbackWindow {
  return {
    start: new Date(now.getTime() - lookbackHours * HOUR_MS),
    end: now,
  };
}

/**
 * Both ends inclusive
 */
export function isWithinWindow(timestampMs: number, window: LookbackWindow): boolean {
  return timestampMs >= window.start.getTime() && timestampMs <= window.end.getTime();
}
