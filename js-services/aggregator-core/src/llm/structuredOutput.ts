/**
 * Parsing of model responses into validated items.
 *
 * Models wrap JSON in code fences, emit trailing commas or cut an array short.
 * The parser strips fences, repairs what jsonrepair can, validates each item
 * on its own and reports the result as a tagged value instead of throwing.
 */

import { jsonrepair } from 'jsonrepair';
import { z } from 'zod';

export type ParseResult<T> =
  | { status: 'ok'; items: T[] }
  | { status: 'partial'; items: T[]; warnings: string[] }
  | { status: 'error'; reason: string };

/**
 * Strip markdown code fences if present
 */
export function stripCodeFences(text: string): string {
  let content = text.trim();
  if (content.includes('```json')) {
    const inner = content.split('```json')[1]?.split('```')[0];
    if (inner !== undefined) {
      content = inner.trim();
    }
  } else if (content.includes('```')) {
    const inner = content.split('```')[1];
    if (inner !== undefined) {
      content = inner.trim();
    }
  }
  return content;
}

/**
 * Repair common JSON errors from LLM output
 * (trailing commas, missing quotes, unescaped characters, truncation)
 */
export function repairJson(jsonStr: string): string {
  try {
    return jsonrepair(jsonStr);
  } catch {
    // Unrepairable input is returned as-is; JSON.parse reports it
    return jsonStr;
  }
}

function tryParse(content: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(content) };
  } catch {
    return null;
  }
}

function parseJson(content: string): { value: unknown; repaired: boolean } | null {
  const direct = tryParse(content);
  if (direct) {
    return { value: direct.value, repaired: false };
  }

  const repaired = tryParse(repairJson(content));
  return repaired ? { value: repaired.value, repaired: true } : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function locateItems(value: unknown, collectionKeys: readonly string[]): unknown[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (!isRecord(value)) {
    return null;
  }
  for (const key of collectionKeys) {
    const collection = value[key];
    if (Array.isArray(collection)) {
      return collection;
    }
  }
  // A lone object is treated as a single item
  return [value];
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Parse model text into schema-validated items
 *
 * @param collectionKeys - keys under which an object response may carry the item array
 */
export function parseStructuredItems<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  collectionKeys: readonly string[]
): ParseResult<z.infer<S>> {
  const content = stripCodeFences(text);
  if (!content) {
    return { status: 'error', reason: 'empty response' };
  }

  const parsed = parseJson(content);
  if (!parsed) {
    return { status: 'error', reason: 'response is not valid JSON' };
  }

  const rawItems = locateItems(parsed.value, collectionKeys);
  if (!rawItems) {
    return { status: 'error', reason: 'response is neither an array nor an object' };
  }

  const warnings: string[] = [];
  if (parsed.repaired) {
    warnings.push('response JSON was malformed and has been repaired');
  }

  const items: z.infer<S>[] = [];
  rawItems.forEach((rawItem, index) => {
    const result = schema.safeParse(rawItem);
    if (result.success) {
      items.push(result.data);
    } else {
      warnings.push(`item ${index} dropped: ${describeIssues(result.error)}`);
    }
  });

  // An empty collection is a valid answer; a collection of nothing but invalid items is not
  if (rawItems.length > 0 && items.length === 0) {
    const dropped = warnings.filter((warning) => warning.startsWith('item '));
    return { status: 'error', reason: `no valid item in response (${dropped.join('; ')})` };
  }

  return warnings.length > 0 ? { status: 'partial', items, warnings } : { status: 'ok', items };
}
