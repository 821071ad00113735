import { sleep as defaultSleep } from './timing';

export type DelayStrategy =
  | { kind: 'fixed'; delayMs: number }
  | { kind: 'exponential'; baseMs: number; capMs: number };

export type ErrorClassification = {
  retryable: boolean;
  retryAfterSeconds?: number;
};

export type ErrorClassifier = (error: unknown) => ErrorClassification;

export type RetryPolicyOptions = {
  maxAttempts: number;
  delay: DelayStrategy;
  sleep?: (ms: number) => Promise<void>;
};

export type RetryContext = {
  label: string;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
};

/**
 * Raised when every attempt failed with a retryable error.
 * The last failure is kept as `cause`.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;

  constructor(label: string, attempts: number, lastError: unknown) {
    super(`${label} failed after ${attempts} attempt(s): ${describeError(lastError)}`, {
      cause: lastError,
    });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly delay: DelayStrategy;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.delay = options.delay;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Runs `operation` until it succeeds, fails with an error `classify` marks as
   * non-retryable (re-thrown as is), or runs out of attempts (RetryExhaustedError).
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    classify: ErrorClassifier,
    context: RetryContext = { label: 'operation' },
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await operation(attempt);
      } catch (err) {
        const { retryable, retryAfterSeconds } = classify(err);
        if (!retryable) {
          throw err;
        }
        lastError = err;

        if (attempt < this.maxAttempts) {
          const delayMs = this.pickDelayMs(attempt, retryAfterSeconds);
          context.onRetry?.({ attempt, delayMs, error: err });
          await this.sleep(delayMs);
        }
      }
    }

    throw new RetryExhaustedError(context.label, this.maxAttempts, lastError);
  }

  pickDelayMs(attempt: number, retryAfterSeconds?: number): number {
    const cap = this.delay.kind === 'fixed' ? Number.POSITIVE_INFINITY : this.delay.capMs;

    if (retryAfterSeconds !== undefined && Number.isFinite(retryAfterSeconds)) {
      return Math.min(Math.max(0, retryAfterSeconds * 1_000), cap);
    }

    if (this.delay.kind === 'fixed') {
      return Math.max(0, this.delay.delayMs);
    }

    return Math.min(cap, Math.max(0, this.delay.baseMs) * Math.pow(2, attempt - 1));
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readPath(value: unknown, ...path: string[]): unknown {
  let current: unknown = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

export function getHttpStatus(err: unknown): number | undefined {
  const candidates = [
    readPath(err, '$metadata', 'httpStatusCode'),
    readPath(err, 'statusCode'),
    readPath(err, 'status'),
    readPath(err, 'response', 'status'),
  ];
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export function extractRetryAfterSeconds(err: unknown): number | undefined {
  const headers = readPath(err, 'response', 'headers') ?? readPath(err, 'headers');
  const candidates = [
    readPath(err, 'retryAfter'),
    readPath(err, 'retryAfterSeconds'),
    readHeader(headers, 'retry-after'),
  ];

  for (const candidate of candidates) {
    const parsed = parseRetryAfter(candidate);
    if (parsed !== undefined) {
      return parsed;
    }
  }

  return undefined;
}

function readHeader(headers: unknown, name: string): unknown {
  if (!isRecord(headers)) {
    return undefined;
  }
  // fetch-style Headers objects
  const getter = headers.get;
  if (typeof getter === 'function') {
    return getter.call(headers, name);
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return value;
    }
  }
  return undefined;
}

function parseRetryAfter(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.max(0, value) : undefined;
  }

  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!trimmed) {
      return undefined;
    }

    const numeric = Number(trimmed);
    if (Number.isFinite(numeric)) {
      return Math.max(0, numeric);
    }

    const dateMillis = Date.parse(trimmed);
    if (!Number.isNaN(dateMillis)) {
      const diffSeconds = (dateMillis - Date.now()) / 1_000;
      return diffSeconds > 0 ? diffSeconds : 0;
    }
  }

  return undefined;
}

export function isNetworkTimeout(err: unknown): boolean {
  const name = stringField(err, 'name').toLowerCase();
  const code = stringField(err, 'code').toLowerCase();
  const message = stringField(err, 'message').toLowerCase();

  return (
    name.includes('timeout') ||
    code.includes('timeout') ||
    code === 'econnaborted' ||
    code === 'etimedout' ||
    message.includes('timeout') ||
    message.includes('timed out')
  );
}

export function isNetworkFailure(err: unknown): boolean {
  const code = stringField(err, 'code').toUpperCase();
  return ['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'ERR_NETWORK'].includes(code);
}

function stringField(value: unknown, key: string): string {
  const field = isRecord(value) ? value[key] : undefined;
  return typeof field === 'string' ? field : '';
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
