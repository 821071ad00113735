import { parse } from 'csv-parse';
import { stringify } from 'csv-stringify';
import { z } from 'zod';

import type { ArticleInput, ExtractionRecord } from '../extract/types';
import { WHITELIST_COLUMNS, type SpeakerWhitelist, type WhitelistEntry } from '../parse/speakerWhitelist';
import type { ParsedRow } from '../parse/structuredResult';

export class InputFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputFormatError';
  }
}

export const INPUT_COLUMNS = ['ID', 'date', 'source'] as const;
export const EXTRACTION_COLUMNS = ['ID', 'date_article', 'ingestion_time', 'source', 'content'] as const;
export const PARSED_COLUMNS = ['id', 'date', 'source', 'quote', 'speaker', 'province', 'city'] as const;
export const WHITELIST_INPUT_COLUMNS = ['nama', 'alias'] as const;

const rowsSchema = z.array(z.array(z.string()));

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const URL_PATTERN = /^https?:\/\//i;

export async function parseArticleInputs(text: string): Promise<ArticleInput[]> {
  const table = await readTable(text, INPUT_COLUMNS, 'input');
  const inputs: ArticleInput[] = [];

  for (const [index, row] of table.rows.entries()) {
    const line = index + 2;
    const id = row.get('ID') ?? '';
    const date = row.get('date') ?? '';
    const sourceUrl = (row.get('source') ?? '').replace(/^["']+|["']+$/g, '').trim();

    if (!id) {
      console.warn('[csv] Skipping input row without ID', { line });
      continue;
    }
    if (!URL_PATTERN.test(sourceUrl)) {
      console.warn('[csv] Skipping input row with invalid source URL', { line, id, source: sourceUrl });
      continue;
    }
    if (!DATE_PATTERN.test(date)) {
      console.warn('[csv] Keeping input row with unrecognised date', { line, id, date });
    }

    inputs.push({ id, date, sourceUrl });
  }

  return inputs;
}

/** Also reads self-content uploads, which share the columns but may lack `ingestion_time`. */
export async function parseExtractionRecords(text: string, label = 'extraction'): Promise<ExtractionRecord[]> {
  const table = await readTable(text, ['ID', 'source', 'content'], label);

  return table.rows
    .map((row) => ({
      id: row.get('ID') ?? '',
      dateArticle: row.get('date_article') ?? '',
      ingestionTime: row.get('ingestion_time') ?? '',
      sourceUrl: row.get('source') ?? '',
      content: row.get('content') ?? '',
    }))
    .filter((record) => record.id !== '');
}

export function formatExtractionCsv(records: readonly ExtractionRecord[]): Promise<string> {
  return writeTable(
    EXTRACTION_COLUMNS,
    records.map((record) => [record.id, record.dateArticle, record.ingestionTime, record.sourceUrl, record.content]),
  );
}

/** Whitelist columns are appended only when a whitelist is given. */
export function formatParsedCsv(rows: readonly ParsedRow[], whitelist?: SpeakerWhitelist): Promise<string> {
  const columns = whitelist ? [...PARSED_COLUMNS, ...WHITELIST_COLUMNS] : [...PARSED_COLUMNS];

  return writeTable(
    columns,
    rows.map((row) => {
      const cells = [row.id, row.date, row.sourceUrl, row.quote, row.speaker, row.province ?? '', row.city ?? ''];
      if (!whitelist) {
        return cells;
      }
      const match = whitelist.match(row.speaker);
      return [...cells, match.jabatan, match.category, match.alias, match.fullname];
    }),
  );
}

export async function parseWhitelistEntries(text: string): Promise<WhitelistEntry[]> {
  const table = await readTable(text, WHITELIST_INPUT_COLUMNS, 'whitelist');

  return table.rows.map((row) => ({
    fullname: row.get('nama') ?? '',
    jabatan: row.get('jabatan') ?? '',
    category: row.get('category') ?? '',
    alias: (row.get('alias') ?? '').toLowerCase(),
  }));
}

type Table = {
  header: string[];
  rows: Array<Map<string, string>>;
};

async function readTable(text: string, required: readonly string[], label: string): Promise<Table> {
  const raw = await new Promise<unknown>((resolve, reject) => {
    parse(
      text,
      { bom: true, skip_empty_lines: true, relax_column_count: true, trim: true },
      (err, records: unknown) => (err ? reject(err) : resolve(records)),
    );
  });

  const parsed = rowsSchema.safeParse(raw);
  if (!parsed.success || parsed.data.length === 0) {
    throw new InputFormatError(`${label} CSV is empty`);
  }

  const [header, ...body] = parsed.data;
  const missing = required.filter((column) => !header.includes(column));
  if (missing.length) {
    throw new InputFormatError(
      `${label} CSV is missing column(s) ${missing.join(', ')}; found ${header.join(', ') || '(none)'}`,
    );
  }

  return {
    header,
    rows: body.map((cells) => new Map(header.map((column, index) => [column, cells[index] ?? '']))),
  };
}

function writeTable(columns: readonly string[], rows: string[][]): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    stringify(
      [[...columns], ...rows],
      { quoted: true, quoted_empty: true },
      (err, output) => (err ? reject(err) : resolve(output)),
    );
  });
}
