import type { ExtractionRecord } from '../extract/types';
import type { CheckpointWriter } from '../utils/checkpoint';
import { mapWithConcurrency } from '../utils/concurrency';
import { describeError } from '../utils/retry';
import type { ParseOutcome, StructuredParser } from './structuredParser';
import { EMPTY_RESULT, toParsedRows, type ParsedRow, type StructuredResult } from './structuredResult';

export type ParsedArticle = {
  record: ExtractionRecord;
  result: StructuredResult;
  failure?: string;
};

export type ParsingBatchResult = {
  articles: ParsedArticle[];
  rows: ParsedRow[];
};

export type ParsingSummary = {
  articles: number;
  withQuotes: number;
  withProvince: number;
  withCity: number;
  failed: number;
  totalQuotes: number;
  averageQuotes: number;
};

export type ParsingBatchOptions = {
  threads?: number;
  /** Receives the finished articles in input order, gaps left by unfinished ones closed up. */
  checkpoint?: CheckpointWriter<ParsedArticle>;
};

/**
 * Parses records with up to `threads` provider calls in flight. Rows come back
 * in input order, quotes in the order the provider gave them.
 */
export async function runParsingBatch(
  records: readonly ExtractionRecord[],
  parser: Pick<StructuredParser, 'parseDetailed'>,
  options: ParsingBatchOptions = {},
): Promise<ParsingBatchResult> {
  const threads = Math.max(1, Math.floor(options.threads ?? 1));

  const finished = new Array<ParsedArticle | undefined>(records.length);

  const articles = await mapWithConcurrency(records, threads, async (record, index) => {
    const article = await parseOne(record, index, records.length, parser);
    finished[index] = article;
    await options.checkpoint?.record(finished.filter((item): item is ParsedArticle => item !== undefined));
    return article;
  });

  const rows = articles.flatMap((article) => toParsedRows(article.record, article.result));
  return { articles, rows };
}

async function parseOne(
  record: ExtractionRecord,
  index: number,
  total: number,
  parser: Pick<StructuredParser, 'parseDetailed'>,
): Promise<ParsedArticle> {
  console.log(`[parse] ${index + 1}/${total}`, { id: record.id });

  let outcome: ParseOutcome;
  try {
    outcome = await parser.parseDetailed(record.content, { id: record.id, sourceUrl: record.sourceUrl });
  } catch (err) {
    console.error('[parse] Unexpected failure; using empty result', {
      id: record.id,
      error: describeError(err),
    });
    return { record, result: EMPTY_RESULT, failure: 'unexpected' };
  }

  return { record, result: outcome.result, failure: outcome.failure };
}

export function summarizeParsing(articles: readonly ParsedArticle[]): ParsingSummary {
  let withQuotes = 0;
  let withProvince = 0;
  let withCity = 0;
  let failed = 0;
  let totalQuotes = 0;

  for (const { result, failure } of articles) {
    totalQuotes += result.quotes.length;
    if (result.quotes.length > 0) withQuotes += 1;
    if (result.province !== null) withProvince += 1;
    if (result.city !== null) withCity += 1;
    if (failure) failed += 1;
  }

  return {
    articles: articles.length,
    withQuotes,
    withProvince,
    withCity,
    failed,
    totalQuotes,
    averageQuotes: articles.length ? Math.round((totalQuotes / articles.length) * 100) / 100 : 0,
  };
}
