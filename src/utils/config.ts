import type { ProviderConfig } from '../llm/providerConfig';

export type Env = Record<string, string | undefined>;

/** `self-content` parses a user-uploaded content CSV instead of the extraction output. */
export type Stage = 'extract' | 'parse' | 'all' | 'self-content';

const STAGES: readonly Stage[] = ['extract', 'parse', 'all', 'self-content'];

export function parseStage(value: unknown): Stage {
  const stage = STAGES.find((candidate) => candidate === value);
  if (!stage) {
    throw new ConfigurationError(`Invalid stage '${String(value)}'. Use one of: ${STAGES.join(', ')}`);
  }
  return stage;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type FetchConfig = {
  diffbotToken: string;
  maxPages: number;
  delayBetweenUrlsMs: number;
  delayBetweenPagesMs: number;
  maxRetries: number;
  retryDelayMs: number;
  requestTimeoutMs: number;
};

export type ParseConfig = {
  provider: ProviderConfig;
  maxContentChars: number;
  delayMs: number;
  maxRetries: number;
  maxOutputTokens: number;
  threads: number;
};

export type StorageConfig = {
  bucket?: string;
  region: string;
  endpoint?: string;
  localRoot: string;
  inputPrefix: string;
  extractionPrefix: string;
  outputPrefix: string;
  selfContentPrefix: string;
  whitelistPrefix: string;
  extractionCheckpointPrefix: string;
  parsingCheckpointPrefix: string;
  /** Finished items between checkpoint writes; 0 disables them. */
  checkpointEvery: number;
};

export type Config = {
  readonly stage: Stage;
  readonly fetch?: Readonly<FetchConfig>;
  readonly parse?: Readonly<ParseConfig>;
  readonly storage: Readonly<StorageConfig>;
};

const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

/**
 * Builds the run configuration once, before any record is touched. Only the
 * sections the requested stage needs are resolved (and required).
 */
export function resolveConfig(env: Env, stage: Stage): Config {
  const storage = resolveStorageConfig(env);
  const fetchConfig = stage === 'extract' || stage === 'all' ? resolveFetchConfig(env) : undefined;
  const parseConfig = stage === 'extract' ? undefined : resolveParseConfig(env);

  return Object.freeze({
    stage,
    storage: Object.freeze(storage),
    fetch: fetchConfig && Object.freeze(fetchConfig),
    parse: parseConfig && Object.freeze(parseConfig),
  });
}

export function resolveFetchConfig(env: Env): FetchConfig {
  const diffbotToken = stringFromEnv(env, 'DIFFBOT_TOKEN');
  if (!diffbotToken) {
    throw new ConfigurationError('DIFFBOT_TOKEN environment variable is required');
  }

  return {
    diffbotToken,
    maxPages: Math.max(1, Math.floor(numberFromEnv(env, 'MAX_PAGES', 5))),
    delayBetweenUrlsMs: secondsToMs(Math.max(0, numberFromEnv(env, 'DELAY_BETWEEN_URLS', 13))),
    delayBetweenPagesMs: secondsToMs(Math.max(0, numberFromEnv(env, 'DELAY_BETWEEN_PAGES', 8))),
    maxRetries: Math.max(1, Math.floor(numberFromEnv(env, 'MAX_RETRIES', 3))),
    retryDelayMs: secondsToMs(Math.max(0, numberFromEnv(env, 'RETRY_DELAY', 5))),
    requestTimeoutMs: secondsToMs(Math.max(1, numberFromEnv(env, 'FETCH_TIMEOUT', 45))),
  };
}

export function resolveParseConfig(env: Env): ParseConfig {
  const providerName = (stringFromEnv(env, 'AI_PROVIDER') ?? 'gemini').toLowerCase();
  const temperature = Math.min(2, Math.max(0, numberFromEnv(env, 'AI_TEMPERATURE', 0.1)));
  const timeoutMs = secondsToMs(Math.max(1, numberFromEnv(env, 'AI_TIMEOUT', 60)));

  let provider: ProviderConfig;
  if (providerName === 'gemini') {
    const apiKey = stringFromEnv(env, 'GEMINI_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError('GEMINI_API_KEY environment variable is required for AI_PROVIDER=gemini');
    }
    provider = {
      kind: 'gemini',
      apiKey,
      model: stringFromEnv(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
      temperature,
      timeoutMs,
    };
  } else if (providerName === 'openai') {
    const apiKey = stringFromEnv(env, 'OPENAI_API_KEY');
    if (!apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY environment variable is required for AI_PROVIDER=openai');
    }
    provider = {
      kind: 'openai',
      apiKey,
      model: stringFromEnv(env, 'OPENAI_MODEL') ?? DEFAULT_OPENAI_MODEL,
      temperature,
      timeoutMs,
    };
  } else if (providerName === 'fake') {
    provider = {
      kind: 'fake',
      cannedText: stringFromEnv(env, 'FAKE_LLM_RESPONSE'),
    };
  } else {
    throw new ConfigurationError(
      `Invalid AI_PROVIDER '${providerName}'. Use one of: gemini, openai, fake`,
    );
  }

  return {
    provider,
    maxContentChars: Math.max(1, Math.floor(numberFromEnv(env, 'AI_MAX_CONTENT', 6000))),
    delayMs: secondsToMs(Math.max(0, numberFromEnv(env, 'AI_DELAY', 1))),
    maxRetries: Math.max(1, Math.floor(numberFromEnv(env, 'AI_MAX_RETRIES', 3))),
    maxOutputTokens: Math.max(256, Math.floor(numberFromEnv(env, 'AI_MAX_OUTPUT_TOKENS', 2048))),
    threads: Math.max(1, Math.floor(numberFromEnv(env, 'PARSING_THREADS', 1))),
  };
}

export function resolveStorageConfig(env: Env): StorageConfig {
  return {
    bucket: stringFromEnv(env, 'BATCH_BUCKET'),
    region: stringFromEnv(env, 'AWS_REGION') ?? 'ap-southeast-1',
    endpoint: stringFromEnv(env, 'AWS_ENDPOINT_URL'),
    localRoot: stringFromEnv(env, 'DATA_DIR') ?? '.',
    inputPrefix: stringFromEnv(env, 'INPUT_PREFIX') ?? 'link_input',
    extractionPrefix: stringFromEnv(env, 'EXTRACTION_PREFIX') ?? 'text_output',
    outputPrefix: stringFromEnv(env, 'OUTPUT_PREFIX') ?? 'final_output',
    selfContentPrefix: stringFromEnv(env, 'SELF_CONTENT_PREFIX') ?? 'self_content_input',
    whitelistPrefix: stringFromEnv(env, 'WHITELIST_PREFIX') ?? 'whitelist_input',
    extractionCheckpointPrefix: stringFromEnv(env, 'EXTRACTION_CHECKPOINT_PREFIX') ?? 'checkpoint_extraction',
    parsingCheckpointPrefix: stringFromEnv(env, 'PARSING_CHECKPOINT_PREFIX') ?? 'checkpoint_parsing',
    checkpointEvery: Math.max(0, Math.floor(numberFromEnv(env, 'CHECKPOINT_EVERY', 100))),
  };
}

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1_000);
}

function stringFromEnv(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  return trimmed.length ? trimmed : undefined;
}

function numberFromEnv(env: Env, name: string, defaultValue: number): number {
  const raw = stringFromEnv(env, name);
  if (raw === undefined) {
    return defaultValue;
  }
  const value = Number(raw);
  if (Number.isFinite(value)) {
    return value;
  }
  console.warn(`[config] Invalid numeric env ${name}: ${raw}`);
  return defaultValue;
}
