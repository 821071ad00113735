import type { AxiosInstance } from 'axios';

import {
  extractRetryAfterSeconds,
  getHttpStatus,
  isNetworkFailure,
  isNetworkTimeout,
  RetryExhaustedError,
  type ErrorClassification,
} from '../utils/retry';

export type ArticleInput = {
  id: string;
  date: string;
  sourceUrl: string;
};

export type ExtractionRecord = {
  id: string;
  dateArticle: string;
  ingestionTime: string;
  sourceUrl: string;
  content: string;
};

export type ExtractedPage = {
  url: string;
  text: string;
  /** Raw markup, when the extractor downloaded the page itself. */
  html?: string;
  /** Next-page URLs the extractor already knows about. */
  nextPageUrls?: string[];
};

export interface PageExtractor {
  readonly name: string;
  extract(url: string): Promise<ExtractedPage>;
}

/** The subset of axios both extractors use, so tests can hand in a stub. */
export type HttpGetter = Pick<AxiosInstance, 'get'>;

export class TransientFetchError extends Error {
  readonly status?: number;
  readonly retryAfterSeconds?: number;

  constructor(message: string, options: { status?: number; retryAfterSeconds?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientFetchError';
    this.status = options.status;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

export class PermanentFetchError extends Error {
  readonly status?: number;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PermanentFetchError';
    this.status = options.status;
  }
}

export function fetchErrorForStatus(status: number, message: string, retryAfterSeconds?: number): Error {
  if (isRetryableStatus(status)) {
    return new TransientFetchError(message, { status, retryAfterSeconds });
  }
  return new PermanentFetchError(message, { status });
}

function isRetryableStatus(status: number): boolean {
  return status === 403 || status === 408 || status === 429 || status >= 500;
}

export function classifyFetchError(err: unknown): ErrorClassification {
  if (err instanceof TransientFetchError) {
    return { retryable: true, retryAfterSeconds: err.retryAfterSeconds };
  }
  if (err instanceof PermanentFetchError) {
    return { retryable: false };
  }

  const status = getHttpStatus(err);
  if (status !== undefined) {
    return isRetryableStatus(status)
      ? { retryable: true, retryAfterSeconds: extractRetryAfterSeconds(err) }
      : { retryable: false };
  }

  return { retryable: isNetworkTimeout(err) || isNetworkFailure(err) };
}

export function failureClass(err: unknown): string {
  if (err instanceof RetryExhaustedError) {
    return `${failureClass(err.cause)} (retries exhausted)`;
  }
  if (err instanceof TransientFetchError || err instanceof PermanentFetchError) {
    return err.status !== undefined ? `${err.name} ${err.status}` : err.name;
  }
  return err instanceof Error ? err.name : 'UnknownError';
}
