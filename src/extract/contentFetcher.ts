import { RetryPolicy, describeError } from '../utils/retry';
import { noopRateLimiter, withSlot, type RateLimiter } from '../utils/rateLimiter';
import { formatTimestamp } from '../utils/timing';
import { nextPageCandidates, resolveUrl } from './pagination';
import {
  classifyFetchError,
  failureClass,
  type ArticleInput,
  type ExtractedPage,
  type ExtractionRecord,
  type PageExtractor,
} from './types';

export const PAGE_SEPARATOR = '\n\n---PAGE BREAK---\n\n';

export type FetchReport = {
  id: string;
  url: string;
  pages: number;
  /** Extractor that produced the first page, `null` when the article could not be fetched. */
  method: string | null;
  words: number;
  failure?: string;
};

export type FetchOutcome = {
  record: ExtractionRecord;
  report: FetchReport;
};

export interface ContentFetcherOptions {
  /** Tried in order for every page: primary first, then fallbacks. */
  extractors: PageExtractor[];
  retryPolicy: RetryPolicy;
  maxPages: number;
  /** Gate held for every page request; the next page waits a full interval after it. */
  pageLimiter?: RateLimiter;
  now?: () => Date;
}

type PageAttempt =
  | { ok: true; page: ExtractedPage; method: string }
  | { ok: false; failure: string };

export class ContentFetcher {
  private readonly extractors: PageExtractor[];
  private readonly retryPolicy: RetryPolicy;
  private readonly maxPages: number;
  private readonly pageLimiter: RateLimiter;
  private readonly now: () => Date;

  constructor(options: ContentFetcherOptions) {
    if (options.extractors.length === 0) {
      throw new Error('ContentFetcher requires at least one extractor');
    }
    this.extractors = options.extractors;
    this.retryPolicy = options.retryPolicy;
    this.maxPages = Math.max(1, Math.floor(options.maxPages));
    this.pageLimiter = options.pageLimiter ?? noopRateLimiter;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(input: ArticleInput): Promise<FetchOutcome> {
    const texts: string[] = [];
    const visited = new Set<string>([resolveUrl(input.sourceUrl) ?? input.sourceUrl]);

    const first = await this.fetchPage(input.sourceUrl);
    let method: string | null = null;
    let failure: string | undefined;

    if (first.ok) {
      method = first.method;
      texts.push(first.page.text);

      let current = first.page;
      while (texts.length < this.maxPages) {
        const nextUrl = nextPageCandidates({
          firstPageUrl: input.sourceUrl,
          page: current,
          pageNumber: texts.length,
        }).find((candidate) => !visited.has(candidate));
        if (!nextUrl) {
          break;
        }
        visited.add(nextUrl);

        const next = await this.fetchPage(nextUrl);
        if (!next.ok) {
          console.log('[ContentFetcher] Stopping pagination; next page unavailable', {
            id: input.id,
            url: nextUrl,
            failure: next.failure,
          });
          break;
        }
        if (next.page.text === texts[texts.length - 1]) {
          console.log('[ContentFetcher] Stopping pagination; page repeats the previous one', {
            id: input.id,
            url: nextUrl,
          });
          break;
        }

        texts.push(next.page.text);
        current = next.page;
      }
    } else {
      failure = first.failure;
      console.warn('[ContentFetcher] All extractors failed; keeping empty content', {
        id: input.id,
        url: input.sourceUrl,
        failure,
      });
    }

    const content = texts.join(PAGE_SEPARATOR);
    const record: ExtractionRecord = {
      id: input.id,
      dateArticle: input.date,
      ingestionTime: formatTimestamp(this.now()),
      sourceUrl: input.sourceUrl,
      content,
    };

    return {
      record,
      report: {
        id: input.id,
        url: input.sourceUrl,
        pages: texts.length,
        method,
        words: texts.reduce((sum, text) => sum + countWords(text), 0),
        failure,
      },
    };
  }

  private fetchPage(url: string): Promise<PageAttempt> {
    return withSlot(this.pageLimiter, () => this.tryExtractors(url));
  }

  private async tryExtractors(url: string): Promise<PageAttempt> {
    const failures: string[] = [];
    for (const extractor of this.extractors) {
      try {
        const page = await this.retryPolicy.execute(
          () => extractor.extract(url),
          classifyFetchError,
          {
            label: `${extractor.name} ${url}`,
            onRetry: ({ attempt, delayMs, error }) => {
              console.warn('[ContentFetcher] Retrying page request', {
                extractor: extractor.name,
                url,
                attempt,
                maxAttempts: this.retryPolicy.maxAttempts,
                delayMs,
                error: describeError(error),
              });
            },
          },
        );
        if (page.text.trim()) {
          return { ok: true, page, method: extractor.name };
        }
        failures.push(`${extractor.name}: empty text`);
      } catch (err) {
        console.warn('[ContentFetcher] Extractor failed', {
          extractor: extractor.name,
          url,
          failure: failureClass(err),
          error: describeError(err),
        });
        failures.push(`${extractor.name}: ${failureClass(err)}`);
      }
    }

    return { ok: false, failure: failures.join('; ') };
  }
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}
