import { describeError } from '../utils/retry';
import type { CheckpointWriter } from '../utils/checkpoint';
import { noopRateLimiter, withSlot, type RateLimiter } from '../utils/rateLimiter';
import { formatTimestamp } from '../utils/timing';
import type { ContentFetcher, FetchOutcome, FetchReport } from './contentFetcher';
import type { ArticleInput, ExtractionRecord } from './types';

export type ExtractionBatchResult = {
  records: ExtractionRecord[];
  reports: FetchReport[];
};

export type ExtractionSummary = {
  total: number;
  succeeded: number;
  failed: number;
  pages: number;
  words: number;
  byMethod: Record<string, number>;
};

export type ExtractionBatchOptions = {
  /** Held for each URL; the next URL waits a full interval after the previous one finished. */
  urlLimiter?: RateLimiter;
  checkpoint?: CheckpointWriter<ExtractionRecord>;
  now?: () => Date;
};

/**
 * Fetches every input in order, one URL at a time. Always yields exactly one
 * record per input; a URL that cannot be fetched gets empty content.
 */
export async function runExtractionBatch(
  inputs: readonly ArticleInput[],
  fetcher: Pick<ContentFetcher, 'fetch'>,
  options: ExtractionBatchOptions = {},
): Promise<ExtractionBatchResult> {
  const urlLimiter = options.urlLimiter ?? noopRateLimiter;
  const now = options.now ?? (() => new Date());
  const records: ExtractionRecord[] = [];
  const reports: FetchReport[] = [];

  for (const [index, input] of inputs.entries()) {
    const outcome = await withSlot(urlLimiter, async (): Promise<FetchOutcome> => {
      console.log(`[extract] ${index + 1}/${inputs.length}`, { id: input.id, url: input.sourceUrl });
      try {
        return await fetcher.fetch(input);
      } catch (err) {
        console.error('[extract] Unexpected failure; emitting empty record', {
          id: input.id,
          url: input.sourceUrl,
          error: describeError(err),
        });
        return {
          record: {
            id: input.id,
            dateArticle: input.date,
            ingestionTime: formatTimestamp(now()),
            sourceUrl: input.sourceUrl,
            content: '',
          },
          report: {
            id: input.id,
            url: input.sourceUrl,
            pages: 0,
            method: null,
            words: 0,
            failure: describeError(err),
          },
        };
      }
    });

    records.push(outcome.record);
    reports.push(outcome.report);
    await options.checkpoint?.record(records);
  }

  return { records, reports };
}

export function summarizeExtraction(reports: readonly FetchReport[]): ExtractionSummary {
  const byMethod: Record<string, number> = {};
  let succeeded = 0;
  let pages = 0;
  let words = 0;

  for (const report of reports) {
    pages += report.pages;
    words += report.words;
    if (report.method) {
      succeeded += 1;
      byMethod[report.method] = (byMethod[report.method] ?? 0) + 1;
    }
  }

  return {
    total: reports.length,
    succeeded,
    failed: reports.length - succeeded,
    pages,
    words,
    byMethod,
  };
}
