/**
 * Content Normalizer
 *
 * Turns raw collector output into ContentUnits: one text layout per source,
 * stable source ids, truncation of oversized text, lookback filtering,
 * duplicate removal and a deterministic order. Pure; no I/O.
 */

import { logger } from '../logger';
import type { ContentSource, ContentUnit, LookbackWindow } from '../types';
import { CONTENT_SOURCES } from '../types';
import { coerceTimestampToMillis, isWithinWindow } from '../utils/freshness';
import type {
  ChatMessage,
  EmailMessage,
  MeetingSegment,
  RawContentItem,
  StoreNote,
} from './rawContent';

export interface NormalizeOptions {
  /** Items with a parsable timestamp outside this window are dropped; null keeps everything */
  window: LookbackWindow | null;
  maxUnitChars: number;
}

interface UnitDraft {
  /** The message body on its own, used for the emptiness check */
  body: string;
  text: string;
  source: ContentSource;
  sourceId: string;
  link: string | null;
  participants: string[];
  timestamp: number | null;
}

function formatTime(timestamp: number | null, fallback: string): string {
  return timestamp === null ? fallback : new Date(timestamp).toISOString();
}

function fromChat(item: ChatMessage): UnitDraft {
  const timestamp = coerceTimestampToMillis(item.ts);
  const thread = item.threadTs && item.threadTs !== item.ts ? ` (thread ${item.threadTs})` : '';
  return {
    body: item.text,
    text: `#${item.channel}${thread}\n[${formatTime(timestamp, item.ts)}] @${item.user}: ${item.text.trim()}`,
    source: 'chat',
    sourceId: `${item.channel}:${item.ts}`,
    link: item.permalink ?? null,
    participants: item.user ? [item.user] : [],
    timestamp,
  };
}

function fromEmail(item: EmailMessage): UnitDraft {
  const timestamp = coerceTimestampToMillis(item.date);
  const cc = item.cc ?? [];
  const header = [
    `Subject: ${item.subject}`,
    `From: ${item.from}`,
    `To: ${item.to.join(', ')}`,
    ...(cc.length > 0 ? [`Cc: ${cc.join(', ')}`] : []),
    `Date: ${formatTime(timestamp, String(item.date))}`,
  ].join('\n');
  return {
    body: item.body,
    text: `${header}\n\n${item.body.trim()}`,
    source: 'email',
    sourceId: item.messageId,
    link: item.link ?? null,
    participants: [item.from, ...item.to, ...cc].filter((person) => person.length > 0),
    timestamp,
  };
}

function fromMeeting(item: MeetingSegment): UnitDraft {
  const timestamp = coerceTimestampToMillis(item.startedAt);
  return {
    body: item.transcript,
    text: `Meeting: ${item.title}\nAttendees: ${item.attendees.join(', ')}\n\n${item.transcript.trim()}`,
    source: 'meeting',
    sourceId: `${item.meetingId}:${item.segmentId}`,
    link: item.link ?? null,
    participants: item.attendees.filter((person) => person.length > 0),
    timestamp,
  };
}

function fromStoreNote(item: StoreNote): UnitDraft {
  return {
    body: item.content,
    text: `Note: ${item.title}\n\n${item.content.trim()}`,
    source: 'store-note',
    sourceId: item.pageId,
    link: item.url ?? null,
    participants: [],
    timestamp: coerceTimestampToMillis(item.createdTime),
  };
}

function toDraft(item: RawContentItem): UnitDraft {
  switch (item.source) {
    case 'chat':
      return fromChat(item);
    case 'email':
      return fromEmail(item);
    case 'meeting':
      return fromMeeting(item);
    case 'store-note':
      return fromStoreNote(item);
  }
}

/**
 * Cut text to maxChars and say how much was cut
 */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }
  return `${text.slice(0, maxChars)}\n[truncated ${text.length - maxChars} characters]`;
}

function compareUnits(a: ContentUnit, b: ContentUnit): number {
  const bySource = CONTENT_SOURCES.indexOf(a.source) - CONTENT_SOURCES.indexOf(b.source);
  if (bySource !== 0) return bySource;

  if (a.timestamp === null || b.timestamp === null) {
    if (a.timestamp === b.timestamp) return 0;
    return a.timestamp === null ? 1 : -1;
  }
  return a.timestamp - b.timestamp;
}

export function normalizeContent(
  items: readonly RawContentItem[],
  options: NormalizeOptions
): ContentUnit[] {
  const seen = new Set<string>();
  const units: ContentUnit[] = [];
  let emptyDropped = 0;
  let staleDropped = 0;
  let duplicatesDropped = 0;

  for (const item of items) {
    const draft = toDraft(item);

    if (draft.body.trim() === '') {
      emptyDropped++;
      continue;
    }

    if (
      options.window !== null &&
      draft.timestamp !== null &&
      !isWithinWindow(draft.timestamp, options.window)
    ) {
      staleDropped++;
      continue;
    }

    const key = `${draft.source}\u0000${draft.sourceId}`;
    if (seen.has(key)) {
      duplicatesDropped++;
      continue;
    }
    seen.add(key);

    units.push(
      Object.freeze({
        text: truncateText(draft.text, options.maxUnitChars),
        source: draft.source,
        sourceId: draft.sourceId,
        link: draft.link,
        participants: Object.freeze([...draft.participants]),
        timestamp: draft.timestamp,
      })
    );
  }

  // Array.prototype.sort is stable, so equal keys keep input order
  units.sort(compareUnits);

  logger.debug('Normalized content', {
    inputItems: items.length,
    units: units.length,
    emptyDropped,
    staleDropped,
    duplicatesDropped,
  });

  return units;
}
