import { getHttpStatus, isNetworkTimeout, isRecord } from '../utils/retry';

export type LlmRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

export interface LlmGenerationOptions {
  temperature?: number;
  maxOutputTokens?: number;
  /** Ask the provider for a bare JSON body where it supports a JSON output mode. */
  jsonOutput?: boolean;
}

export interface LlmGenerateRequest extends LlmGenerationOptions {
  messages: LlmMessage[];
}

export interface LlmGenerateResponse {
  text: string;
  raw?: unknown;
}

export interface LlmClient {
  readonly name: string;
  generate(request: LlmGenerateRequest): Promise<LlmGenerateResponse>;
}

/**
 * Provider-independent failure classes. Every client maps its SDK errors onto
 * one of these before they leave `generate`.
 */
export type LlmErrorKind = 'rate_limit' | 'safety_block' | 'timeout' | 'malformed' | 'other';

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status?: number;

  constructor(kind: LlmErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'LlmError';
    this.kind = kind;
    this.status = options.status;
  }
}

export function isLlmError(value: unknown): value is LlmError {
  return value instanceof LlmError;
}

/** Status codes and error shapes shared by the HTTP-based provider SDKs. */
export function toLlmError(provider: string, err: unknown): LlmError {
  if (isLlmError(err)) {
    return err;
  }

  const status = getHttpStatus(err);
  const message = `${provider}: ${err instanceof Error ? err.message : String(err)}`;

  if (status === 429 || status === 503 || mentionsQuota(err)) {
    return new LlmError('rate_limit', message, { status, cause: err });
  }
  if (status === 408 || status === 504 || isNetworkTimeout(err)) {
    return new LlmError('timeout', message, { status, cause: err });
  }
  return new LlmError('other', message, { status, cause: err });
}

function mentionsQuota(err: unknown): boolean {
  const message = isRecord(err) && typeof err.message === 'string' ? err.message.toLowerCase() : '';
  return message.includes('resource_exhausted') || message.includes('quota');
}
