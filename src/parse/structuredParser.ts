import { isLlmError, toLlmError, type LlmClient } from '../llm/llmClient';
import { noopRateLimiter, withSlot, type RateLimiter } from '../utils/rateLimiter';
import {
  RetryExhaustedError,
  RetryPolicy,
  describeError,
  extractRetryAfterSeconds,
  type ErrorClassification,
} from '../utils/retry';
import { parseModelJson } from './jsonRepair';
import { buildExtractionPrompt, truncateContent } from './prompt';
import { EMPTY_RESULT, normaliseStructuredResult, type StructuredResult } from './structuredResult';

export type ParseFailure =
  | 'safety_block'
  | 'retries_exhausted'
  | 'malformed'
  | 'timeout'
  | 'rate_limit'
  | 'other'
  | 'unparseable_json'
  | 'invalid_shape';

export type ParseOutcome = {
  result: StructuredResult;
  attempts: number;
  failure?: ParseFailure;
};

export type ParseContext = {
  id?: string;
  sourceUrl?: string;
};

export interface StructuredParserOptions {
  client: LlmClient;
  retryPolicy: RetryPolicy;
  maxContentChars: number;
  maxOutputTokens: number;
  temperature?: number;
  /** Gate held for every provider request; share one instance across workers. */
  requestLimiter?: RateLimiter;
}

export function classifyLlmError(err: unknown): ErrorClassification {
  if (!isLlmError(err)) {
    return { retryable: false };
  }
  if (err.kind === 'rate_limit' || err.kind === 'timeout') {
    return { retryable: true, retryAfterSeconds: extractRetryAfterSeconds(err.cause) };
  }
  return { retryable: false };
}

export class StructuredParser {
  private readonly client: LlmClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxContentChars: number;
  private readonly maxOutputTokens: number;
  private readonly temperature?: number;
  private readonly requestLimiter: RateLimiter;

  constructor(options: StructuredParserOptions) {
    this.client = options.client;
    this.retryPolicy = options.retryPolicy;
    this.maxContentChars = Math.max(1, Math.floor(options.maxContentChars));
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature;
    this.requestLimiter = options.requestLimiter ?? noopRateLimiter;
  }

  async parse(content: string, context: ParseContext = {}): Promise<StructuredResult> {
    const outcome = await this.parseDetailed(content, context);
    return outcome.result;
  }

  /** Never rejects: every failure is logged and resolves to EMPTY_RESULT. */
  async parseDetailed(content: string, context: ParseContext = {}): Promise<ParseOutcome> {
    if (!content.trim()) {
      return { result: EMPTY_RESULT, attempts: 0 };
    }

    const messages = buildExtractionPrompt(truncateContent(content, this.maxContentChars));
    let attempts = 0;
    let raw: string;

    try {
      const response = await this.retryPolicy.execute(
        async (attempt) => {
          attempts = attempt;
          return withSlot(this.requestLimiter, async () => {
            try {
              return await this.client.generate({
                messages,
                temperature: this.temperature,
                maxOutputTokens: this.maxOutputTokens,
                jsonOutput: true,
              });
            } catch (err) {
              throw toLlmError(this.client.name, err);
            }
          });
        },
        classifyLlmError,
        {
          label: `${this.client.name} extraction`,
          onRetry: ({ attempt, delayMs, error }) => {
            console.warn('[StructuredParser] Retrying provider call', {
              ...context,
              provider: this.client.name,
              attempt,
              maxAttempts: this.retryPolicy.maxAttempts,
              delayMs,
              error: describeError(error),
            });
          },
        },
      );
      raw = response.text;
    } catch (err) {
      const failure = failureOf(err);
      const details = {
        ...context,
        provider: this.client.name,
        failure,
        attempts,
        error: describeError(err),
      };
      if (failure === 'safety_block') {
        console.log('[StructuredParser] Provider blocked the article; using empty result', details);
      } else {
        console.warn('[StructuredParser] Provider call degraded to empty result', details);
      }
      return { result: EMPTY_RESULT, attempts, failure };
    }

    const decoded = parseModelJson(raw);
    if (decoded === null) {
      console.warn('[StructuredParser] Response is not JSON; using empty result', {
        ...context,
        provider: this.client.name,
        attempts,
        preview: raw.slice(0, 120),
      });
      return { result: EMPTY_RESULT, attempts, failure: 'unparseable_json' };
    }

    const result = normaliseStructuredResult(decoded);
    if (!result) {
      console.warn('[StructuredParser] Response has the wrong shape; using empty result', {
        ...context,
        provider: this.client.name,
        attempts,
      });
      return { result: EMPTY_RESULT, attempts, failure: 'invalid_shape' };
    }

    return { result, attempts };
  }
}

function failureOf(err: unknown): ParseFailure {
  if (err instanceof RetryExhaustedError) {
    return 'retries_exhausted';
  }
  return isLlmError(err) ? err.kind : 'other';
}
