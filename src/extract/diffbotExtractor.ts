import axios from 'axios';
import { z } from 'zod';

import {
  PermanentFetchError,
  fetchErrorForStatus,
  type ExtractedPage,
  type HttpGetter,
  type PageExtractor,
} from './types';

const DIFFBOT_ARTICLE_URL = 'https://api.diffbot.com/v3/article';
const DIFFBOT_FIELDS = 'title,text,author,date,siteName,nextPages';

const diffbotResponseSchema = z.object({
  errorCode: z.number().optional(),
  error: z.string().optional(),
  objects: z
    .array(
      z.object({
        text: z.string().optional(),
        nextPage: z.string().optional(),
        nextPages: z.array(z.string()).optional(),
      }),
    )
    .optional(),
});

export interface DiffbotExtractorOptions {
  token: string;
  timeoutMs: number;
  http?: HttpGetter;
  endpoint?: string;
}

export class DiffbotExtractor implements PageExtractor {
  readonly name = 'diffbot';
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly http: HttpGetter;
  private readonly endpoint: string;

  constructor(options: DiffbotExtractorOptions) {
    this.token = options.token;
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? axios;
    this.endpoint = options.endpoint ?? DIFFBOT_ARTICLE_URL;
  }

  async extract(url: string): Promise<ExtractedPage> {
    const response = await this.http.get<unknown>(this.endpoint, {
      params: {
        token: this.token,
        url,
        fields: DIFFBOT_FIELDS,
        // Diffbot's own download budget, kept below the client timeout.
        timeout: Math.max(1_000, this.timeoutMs - 5_000),
        paging: false,
      },
      timeout: this.timeoutMs,
      validateStatus: () => true,
    });

    if (response.status !== 200) {
      throw fetchErrorForStatus(response.status, `diffbot: HTTP ${response.status} for ${url}`);
    }

    const parsed = diffbotResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new PermanentFetchError(`diffbot: unexpected response body for ${url}`, { cause: parsed.error });
    }

    const body = parsed.data;
    if (body.error !== undefined || body.errorCode !== undefined) {
      const message = body.error ?? `error code ${body.errorCode}`;
      throw fetchErrorForStatus(statusForBodyError(body.errorCode, message), `diffbot: ${message}`);
    }

    const article = body.objects?.[0];
    const text = article?.text?.trim() ?? '';
    if (!article || !text) {
      throw new PermanentFetchError(`diffbot: no article content found for ${url}`);
    }

    const nextPageUrls = [...(article.nextPages ?? []), ...(article.nextPage ? [article.nextPage] : [])];

    return {
      url,
      text,
      nextPageUrls: nextPageUrls.length ? nextPageUrls : undefined,
    };
  }
}

/** Diffbot reports upstream failures inside a 200 body; recover an HTTP-like status from them. */
export function statusForBodyError(errorCode: number | undefined, message: string): number {
  const lower = message.toLowerCase();
  if (lower.includes('rate limit') || lower.includes('429')) {
    return 429;
  }
  if (lower.includes('403') || lower.includes('forbidden')) {
    return 403;
  }
  if (lower.includes('timeout') || lower.includes('timed out')) {
    return 408;
  }
  if (errorCode !== undefined && errorCode >= 400 && errorCode < 600) {
    return errorCode;
  }
  // e.g. "Could not download page": not worth retrying on this extractor
  return 400;
}
