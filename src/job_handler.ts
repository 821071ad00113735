import { S3Client } from '@aws-sdk/client-s3';

import { ContentFetcher } from './extract/contentFetcher';
import { DiffbotExtractor } from './extract/diffbotExtractor';
import { ReadabilityExtractor } from './extract/readabilityExtractor';
import { runExtractionBatch, summarizeExtraction, type ExtractionSummary } from './extract/runExtractionBatch';
import type { ExtractionRecord, PageExtractor } from './extract/types';
import {
  LocalBatchStorage,
  S3BatchStorage,
  checkpointNameFor,
  outputNameFor,
  type BatchStorage,
} from './io/batchStorage';
import {
  formatExtractionCsv,
  formatParsedCsv,
  parseArticleInputs,
  parseExtractionRecords,
  parseWhitelistEntries,
} from './io/csv';
import type { LlmClient } from './llm/llmClient';
import { createLlmClient, providerTemperature } from './llm/providerConfig';
import {
  runParsingBatch,
  summarizeParsing,
  type ParsedArticle,
  type ParsingSummary,
} from './parse/runParsingBatch';
import { SpeakerWhitelist } from './parse/speakerWhitelist';
import { StructuredParser } from './parse/structuredParser';
import { toParsedRows } from './parse/structuredResult';
import { getS3ClientConfig } from './utils/aws';
import { CheckpointWriter } from './utils/checkpoint';
import {
  parseStage,
  resolveConfig,
  type Env,
  type FetchConfig,
  type ParseConfig,
  type StorageConfig,
} from './utils/config';
import { createRateLimiter, type RateLimiter } from './utils/rateLimiter';
import { RetryPolicy } from './utils/retry';

const AI_RETRY_CAP_MS = 60_000;

export type JobEvent = {
  stage?: string;
};

/** Collaborators a caller (or a test) may supply instead of the real ones. */
export type JobDependencies = {
  env?: Env;
  storage?: BatchStorage;
  extractors?: PageExtractor[];
  llmClient?: LlmClient;
  createRateLimiter?: (intervalMs: number) => RateLimiter;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

export type StageReport<TSummary> = {
  input: string;
  output: string;
  summary: TSummary;
};

export type JobSummary = {
  stage: string;
  extraction?: StageReport<ExtractionSummary>;
  parsing?: StageReport<ParsingSummary>;
};

export async function handler(event: JobEvent = {}, deps: JobDependencies = {}): Promise<JobSummary> {
  const stage = parseStage(event.stage ?? 'all');
  // Configuration problems abort here, before any record is read.
  const config = resolveConfig(deps.env ?? process.env, stage);
  const storage = deps.storage ?? createBatchStorage(config.storage);
  const now = deps.now ?? (() => new Date());
  const summary: JobSummary = { stage };

  let extracted: { name: string; records: ExtractionRecord[] } | undefined;

  if (config.fetch) {
    const input = await storage.readLatest(config.storage.inputPrefix);
    if (!input) {
      console.warn('[handler] No input CSV found', { prefix: config.storage.inputPrefix });
      return summary;
    }

    const inputs = await parseArticleInputs(input.body);
    console.log('[handler] Extraction input loaded', { location: input.location, articles: inputs.length });

    const checkpoint = new CheckpointWriter<ExtractionRecord>({
      every: config.storage.checkpointEvery,
      save: async (records, checkpointNumber) =>
        storage.write(
          config.storage.extractionCheckpointPrefix,
          checkpointNameFor(input.name, 'extraction', checkpointNumber, now()),
          await formatExtractionCsv(records),
        ),
    });

    const { records, reports } = await runExtractionBatch(inputs, buildFetcher(config.fetch, deps), {
      urlLimiter: (deps.createRateLimiter ?? createRateLimiter)(config.fetch.delayBetweenUrlsMs),
      checkpoint,
      now,
    });

    const name = outputNameFor(input.name, 'text_output', now());
    const output = await storage.write(config.storage.extractionPrefix, name, await formatExtractionCsv(records));
    const extractionSummary = summarizeExtraction(reports);
    console.log('[handler] Extraction finished', { output, ...extractionSummary });

    summary.extraction = { input: input.location, output, summary: extractionSummary };
    extracted = { name, records };
  }

  if (config.parse) {
    const selfContent = stage === 'self-content';
    let source: { name: string; location: string; records: ExtractionRecord[] } | undefined;
    if (extracted && summary.extraction) {
      source = { name: extracted.name, location: summary.extraction.output, records: extracted.records };
    } else {
      const prefix = selfContent ? config.storage.selfContentPrefix : config.storage.extractionPrefix;
      const batch = await storage.readLatest(prefix);
      if (!batch) {
        console.warn('[handler] No content CSV found', { prefix });
        return summary;
      }
      source = {
        name: batch.name,
        location: batch.location,
        records: await parseExtractionRecords(batch.body, selfContent ? 'self-content' : 'extraction'),
      };
    }
    console.log('[handler] Parsing input loaded', { location: source.location, articles: source.records.length });

    const whitelist = await loadWhitelist(storage, config.storage.whitelistPrefix);
    const sourceName = source.name;
    const checkpoint = new CheckpointWriter<ParsedArticle>({
      every: config.storage.checkpointEvery,
      save: async (articles, checkpointNumber) =>
        storage.write(
          config.storage.parsingCheckpointPrefix,
          checkpointNameFor(sourceName, 'parsing', checkpointNumber, now()),
          await formatParsedCsv(
            articles.flatMap((article) => toParsedRows(article.record, article.result)),
            whitelist,
          ),
        ),
    });

    const { articles, rows } = await runParsingBatch(source.records, buildParser(config.parse, deps), {
      threads: config.parse.threads,
      checkpoint,
    });

    const name = outputNameFor(source.name, selfContent ? 'self_final_output' : 'final_output', now());
    const output = await storage.write(config.storage.outputPrefix, name, await formatParsedCsv(rows, whitelist));
    const parsingSummary = summarizeParsing(articles);
    console.log('[handler] Parsing finished', { output, rows: rows.length, ...parsingSummary });

    summary.parsing = { input: source.location, output, summary: parsingSummary };
  }

  return summary;
}

/** Latest speaker whitelist, or undefined when none was uploaded. */
export async function loadWhitelist(storage: BatchStorage, prefix: string): Promise<SpeakerWhitelist | undefined> {
  const file = await storage.readLatest(prefix);
  if (!file) {
    console.log('[handler] No speaker whitelist; output keeps the base columns', { prefix });
    return undefined;
  }
  const whitelist = new SpeakerWhitelist(await parseWhitelistEntries(file.body));
  console.log('[handler] Speaker whitelist loaded', { location: file.location, entries: whitelist.size });
  return whitelist;
}

export function createBatchStorage(storage: StorageConfig): BatchStorage {
  if (storage.bucket) {
    return new S3BatchStorage({ client: new S3Client(getS3ClientConfig(storage)), bucket: storage.bucket });
  }
  return new LocalBatchStorage({ root: storage.localRoot });
}

function buildFetcher(fetchConfig: Readonly<FetchConfig>, deps: JobDependencies): ContentFetcher {
  const extractors = deps.extractors ?? [
    new DiffbotExtractor({ token: fetchConfig.diffbotToken, timeoutMs: fetchConfig.requestTimeoutMs }),
    new ReadabilityExtractor({ timeoutMs: fetchConfig.requestTimeoutMs }),
  ];

  return new ContentFetcher({
    extractors,
    maxPages: fetchConfig.maxPages,
    retryPolicy: new RetryPolicy({
      maxAttempts: fetchConfig.maxRetries,
      delay: { kind: 'fixed', delayMs: fetchConfig.retryDelayMs },
      sleep: deps.sleep,
    }),
    pageLimiter: (deps.createRateLimiter ?? createRateLimiter)(fetchConfig.delayBetweenPagesMs),
    now: deps.now,
  });
}

function buildParser(parseConfig: Readonly<ParseConfig>, deps: JobDependencies): StructuredParser {
  return new StructuredParser({
    client: deps.llmClient ?? createLlmClient(parseConfig.provider),
    maxContentChars: parseConfig.maxContentChars,
    maxOutputTokens: parseConfig.maxOutputTokens,
    temperature: providerTemperature(parseConfig.provider),
    retryPolicy: new RetryPolicy({
      maxAttempts: parseConfig.maxRetries,
      delay: { kind: 'exponential', baseMs: parseConfig.delayMs, capMs: AI_RETRY_CAP_MS },
      sleep: deps.sleep,
    }),
    // One gate shared by every worker.
    requestLimiter: (deps.createRateLimiter ?? createRateLimiter)(parseConfig.delayMs),
  });
}
