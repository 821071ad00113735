import { Readability } from '@mozilla/readability';
import axios from 'axios';
import { parseHTML } from 'linkedom';

import {
  PermanentFetchError,
  fetchErrorForStatus,
  type ExtractedPage,
  type HttpGetter,
  type PageExtractor,
} from './types';
import { extractRetryAfterSeconds } from '../utils/retry';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export interface ReadabilityExtractorOptions {
  timeoutMs: number;
  http?: HttpGetter;
  userAgent?: string;
}

/**
 * Fallback extractor: downloads the page itself and pulls the main text out
 * with Mozilla Readability. The markup is returned so pagination can read it.
 */
export class ReadabilityExtractor implements PageExtractor {
  readonly name = 'readability';
  private readonly timeoutMs: number;
  private readonly http: HttpGetter;
  private readonly userAgent: string;

  constructor(options: ReadabilityExtractorOptions) {
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? axios;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async extract(url: string): Promise<ExtractedPage> {
    const response = await this.http.get<unknown>(url, {
      responseType: 'text',
      timeout: this.timeoutMs,
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'text/html,application/xhtml+xml',
      },
      validateStatus: () => true,
    });

    if (response.status < 200 || response.status >= 300) {
      throw fetchErrorForStatus(
        response.status,
        `readability: HTTP ${response.status} for ${url}`,
        extractRetryAfterSeconds({ headers: response.headers }),
      );
    }

    const contentType = String(response.headers['content-type'] ?? '');
    if (contentType && !contentType.includes('html')) {
      throw new PermanentFetchError(`readability: unsupported content type '${contentType}' for ${url}`);
    }
    if (typeof response.data !== 'string' || !response.data.trim()) {
      throw new PermanentFetchError(`readability: empty body for ${url}`);
    }

    const html = response.data;
    const text = extractMainText(html);
    if (!text) {
      throw new PermanentFetchError(`readability: no article content found for ${url}`);
    }

    return { url, text, html };
  }
}

export function extractMainText(html: string): string {
  const { document } = parseHTML(html);
  // Readability mutates the tree it is given
  const clone = document.cloneNode(true) as Document;
  const article = new Readability(clone).parse();
  return normaliseWhitespace(article?.textContent ?? '');
}

function normaliseWhitespace(text: string): string {
  return text
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}
