import { z } from 'zod';

import type { ExtractionRecord } from '../extract/types';

export type StructuredResult = {
  readonly quotes: readonly string[];
  readonly speakers: readonly string[];
  readonly province: string | null;
  readonly city: string | null;
};

export type ParsedRow = {
  id: string;
  date: string;
  sourceUrl: string;
  quote: string;
  speaker: string;
  province: string | null;
  city: string | null;
};

export const EMPTY_RESULT: StructuredResult = Object.freeze({
  quotes: Object.freeze([]),
  speakers: Object.freeze([]),
  province: null,
  city: null,
});

const PLACEHOLDER_VALUES = new Set(['', 'null', 'none', 'n/a', 'na', '-', 'tidak ada', 'unknown']);

const stringList = z
  .array(z.string())
  .nullish()
  .transform((items) => (items ?? []).map((item) => item.trim()));

const location = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim() ?? '';
    return PLACEHOLDER_VALUES.has(trimmed.toLowerCase()) ? null : trimmed;
  });

const structuredResultSchema = z.object({
  quotes: stringList,
  speakers: stringList,
  province: location,
  city: location,
});

/**
 * Validates a decoded model response. Returns `null` when the shape is wrong
 * (not an object, or quotes/speakers not lists of strings). Quote and speaker
 * lists of different length are cut to the shorter one.
 */
export function normaliseStructuredResult(value: unknown): StructuredResult | null {
  const parsed = structuredResultSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }

  const { quotes, speakers, province, city } = parsed.data;
  const pairs = Math.min(quotes.length, speakers.length);

  return {
    quotes: quotes.slice(0, pairs),
    speakers: speakers.slice(0, pairs),
    province,
    city,
  };
}

export function toParsedRows(record: ExtractionRecord, result: StructuredResult): ParsedRow[] {
  return result.quotes.map((quote, index) => ({
    id: record.id,
    date: record.dateArticle,
    sourceUrl: record.sourceUrl,
    quote,
    speaker: result.speakers[index],
    province: result.province,
    city: result.city,
  }));
}
