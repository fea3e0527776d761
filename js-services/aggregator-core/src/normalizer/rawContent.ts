/**
 * Raw items as collectors hand them over, one shape per source
 */

import { z } from 'zod';

const timestampValue = z.union([z.string(), z.number()]);

export const ChatMessageSchema = z.object({
  source: z.literal('chat'),
  channel: z.string().min(1),
  /** Chat timestamp, e.g. "1718035200.000100" */
  ts: z.string().min(1),
  user: z.string(),
  text: z.string(),
  permalink: z.string().nullish(),
  threadTs: z.string().nullish(),
});

export const EmailMessageSchema = z.object({
  source: z.literal('email'),
  messageId: z.string().min(1),
  subject: z.string(),
  from: z.string(),
  to: z.array(z.string()),
  cc: z.array(z.string()).optional(),
  body: z.string(),
  date: timestampValue,
  link: z.string().nullish(),
});

export const MeetingSegmentSchema = z.object({
  source: z.literal('meeting'),
  meetingId: z.string().min(1),
  segmentId: z.string().min(1),
  title: z.string(),
  attendees: z.array(z.string()),
  transcript: z.string(),
  startedAt: timestampValue,
  link: z.string().nullish(),
});

export const StoreNoteSchema = z.object({
  source: z.literal('store-note'),
  pageId: z.string().min(1),
  title: z.string(),
  content: z.string(),
  createdTime: timestampValue,
  url: z.string().nullish(),
});

export const RawContentItemSchema = z.discriminatedUnion('source', [
  ChatMessageSchema,
  EmailMessageSchema,
  MeetingSegmentSchema,
  StoreNoteSchema,
]);

export type ChatMessage = z.infer<typeof ChatMessageSchema>;
export type EmailMessage = z.infer<typeof EmailMessageSchema>;
export type MeetingSegment = z.infer<typeof MeetingSegmentSchema>;
export type StoreNote = z.infer<typeof StoreNoteSchema>;
export type RawContentItem = z.infer<typeof RawContentItemSchema>;
