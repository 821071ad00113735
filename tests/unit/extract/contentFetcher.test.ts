import { ContentFetcher, PAGE_SEPARATOR } from 'src/extract/contentFetcher';
import {
  PermanentFetchError,
  TransientFetchError,
  type ExtractedPage,
  type PageExtractor,
} from 'src/extract/types';
import { RetryPolicy } from 'src/utils/retry';

class ScriptedExtractor implements PageExtractor {
  readonly calls: string[] = [];

  constructor(
    readonly name: string,
    private readonly respond: (url: string, call: number) => ExtractedPage | Error,
  ) {}

  async extract(url: string): Promise<ExtractedPage> {
    this.calls.push(url);
    const outcome = this.respond(url, this.calls.length);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }
}

const ARTICLE_URL = 'https://news.example.com/2024/10/19/banjir';
const input = { id: '1', date: '2024-10-19', sourceUrl: ARTICLE_URL };
const fixedNow = () => new Date(Date.UTC(2024, 9, 19, 8, 30, 5));

function buildFetcher(extractors: PageExtractor[], options: { maxPages?: number } = {}) {
  const sleep = jest.fn(async (_ms: number) => undefined);
  const releasePage = jest.fn();
  const pageLimiter = { acquire: jest.fn(async () => releasePage) };
  const fetcher = new ContentFetcher({
    extractors,
    maxPages: options.maxPages ?? 5,
    retryPolicy: new RetryPolicy({ maxAttempts: 3, delay: { kind: 'fixed', delayMs: 5000 }, sleep }),
    pageLimiter,
    now: fixedNow,
  });
  return { fetcher, sleep, pageLimiter, releasePage };
}

const forbidden = () => new TransientFetchError('HTTP 403', { status: 403 });
const notFound = () => new PermanentFetchError('HTTP 404', { status: 404 });

describe('ContentFetcher', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('falls back after the primary is forbidden on every attempt', async () => {
    // a single-page article: the page-number guess for page 2 is a 404
    const primary = new ScriptedExtractor('diffbot', (url) => (url === ARTICLE_URL ? forbidden() : notFound()));
    const fallback = new ScriptedExtractor('readability', (url) => (url === ARTICLE_URL ? { url, text: 'T' } : notFound()));
    const { fetcher, sleep } = buildFetcher([primary, fallback]);

    const { record, report } = await fetcher.fetch(input);

    expect(record).toEqual({
      id: '1',
      dateArticle: '2024-10-19',
      ingestionTime: '2024-10-19 08:30:05',
      sourceUrl: ARTICLE_URL,
      content: 'T',
    });
    expect(primary.calls.filter((url) => url === ARTICLE_URL)).toHaveLength(3);
    expect(fallback.calls).toEqual([ARTICLE_URL, `${ARTICLE_URL}?page=2`]);
    expect(sleep.mock.calls).toEqual([[5000], [5000]]);
    expect(report).toMatchObject({ pages: 1, method: 'readability', words: 1 });
  });

  it('keeps the record with empty content when every extractor fails', async () => {
    const primary = new ScriptedExtractor('diffbot', forbidden);
    const fallback = new ScriptedExtractor('readability', () => new PermanentFetchError('no content'));
    const { fetcher } = buildFetcher([primary, fallback]);

    const { record, report } = await fetcher.fetch(input);

    expect(record.content).toBe('');
    expect(record.id).toBe('1');
    expect(report.method).toBeNull();
    expect(report.pages).toBe(0);
    expect(report.failure).toBe('diffbot: TransientFetchError 403 (retries exhausted); readability: PermanentFetchError');
  });

  it('does not retry permanent failures', async () => {
    const primary = new ScriptedExtractor('diffbot', notFound);
    const fallback = new ScriptedExtractor('readability', (url) => ({ url, text: 'body' }));
    const { fetcher, sleep } = buildFetcher([primary, fallback]);

    const { record } = await fetcher.fetch(input);

    expect(record.content).toBe('body');
    // page 2 is tried once too, and ends the walk by repeating page 1
    expect(primary.calls).toEqual([ARTICLE_URL, `${ARTICLE_URL}?page=2`]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('follows next-page hints in order and joins pages with the separator', async () => {
    const pages: Record<string, ExtractedPage> = {
      [ARTICLE_URL]: { url: ARTICLE_URL, text: 'satu', nextPageUrls: [`${ARTICLE_URL}?page=2`] },
      [`${ARTICLE_URL}?page=2`]: { url: `${ARTICLE_URL}?page=2`, text: 'dua', nextPageUrls: [`${ARTICLE_URL}?page=3#top`] },
      [`${ARTICLE_URL}?page=3`]: { url: `${ARTICLE_URL}?page=3`, text: 'tiga', nextPageUrls: [ARTICLE_URL] },
    };
    const primary = new ScriptedExtractor('diffbot', (url) => pages[url] ?? new PermanentFetchError('unknown page'));
    const { fetcher, pageLimiter, releasePage } = buildFetcher([primary]);

    const { record, report } = await fetcher.fetch(input);

    expect(record.content).toBe(['satu', 'dua', 'tiga'].join(PAGE_SEPARATOR));
    expect(primary.calls).toEqual([
      ARTICLE_URL,
      `${ARTICLE_URL}?page=2`,
      `${ARTICLE_URL}?page=3`,
      `${ARTICLE_URL}?page=4`,
    ]);
    expect(pageLimiter.acquire).toHaveBeenCalledTimes(4);
    expect(releasePage).toHaveBeenCalledTimes(4);
    expect(report).toMatchObject({ pages: 3, method: 'diffbot', words: 3 });
  });

  it('stops at the page limit', async () => {
    const primary = new ScriptedExtractor('diffbot', (url, call) => ({
      url,
      text: `page ${call}`,
      nextPageUrls: [`${ARTICLE_URL}?page=${call + 1}`],
    }));
    const { fetcher } = buildFetcher([primary], { maxPages: 2 });

    const { record } = await fetcher.fetch(input);

    expect(record.content).toBe(`page 1${PAGE_SEPARATOR}page 2`);
    expect(primary.calls).toHaveLength(2);
  });

  it('stops when the next page repeats the previous one', async () => {
    const primary = new ScriptedExtractor('diffbot', (url, call) => ({
      url,
      text: 'same text',
      nextPageUrls: [`${ARTICLE_URL}?page=${call + 1}`],
    }));
    const { fetcher } = buildFetcher([primary]);

    const { record, report } = await fetcher.fetch(input);

    expect(record.content).toBe('same text');
    expect(primary.calls).toHaveLength(2);
    expect(report.pages).toBe(1);
  });

  it('guesses page-numbered URLs when the page gives no next link', async () => {
    const texts: Record<string, string> = {
      [ARTICLE_URL]: 'satu',
      [`${ARTICLE_URL}?page=2`]: 'dua',
    };
    const primary = new ScriptedExtractor('diffbot', (url) => {
      const text = texts[url];
      return text === undefined ? notFound() : { url, text };
    });
    const { fetcher } = buildFetcher([primary]);

    const { record, report } = await fetcher.fetch(input);

    expect(record.content).toBe(`satu${PAGE_SEPARATOR}dua`);
    expect(primary.calls).toEqual([ARTICLE_URL, `${ARTICLE_URL}?page=2`, `${ARTICLE_URL}?page=3`]);
    expect(report.pages).toBe(2);
  });

  it('walks tribunnews pages through the site rule and keeps partial content', async () => {
    const tribunUrl = 'https://www.tribunnews.com/nasional/2024/10/19/berita';
    const primary = new ScriptedExtractor('diffbot', (url, call) =>
      call <= 2 ? { url, text: `bagian ${call}` } : new PermanentFetchError('HTTP 404', { status: 404 }),
    );
    const { fetcher } = buildFetcher([primary]);

    const { record } = await fetcher.fetch({ ...input, sourceUrl: tribunUrl });

    expect(record.content).toBe(`bagian 1${PAGE_SEPARATOR}bagian 2`);
    expect(primary.calls).toEqual([
      tribunUrl,
      `${tribunUrl}?page=2&s=paging_new`,
      `${tribunUrl}?page=3&s=paging_new`,
    ]);
  });
});
