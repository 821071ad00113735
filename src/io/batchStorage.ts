import { mkdir, readFile, readdir, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { S3Client } from '@aws-sdk/client-s3';

import { fetchObjectText, formatS3Uri, listObjects, uploadText } from '../utils/s3';
import { compactTimestamp } from '../utils/timing';

export type StoredBatch = {
  /** File name without folder, e.g. `input_2024-10-19.csv`. */
  name: string;
  location: string;
  body: string;
};

export interface BatchStorage {
  /** Newest `.csv` under `prefix`, or null when there is none. */
  readLatest(prefix: string): Promise<StoredBatch | null>;
  /** Writes `body` as `prefix/name` and returns where it went. */
  write(prefix: string, name: string, body: string): Promise<string>;
}

function isBatchFile(name: string): boolean {
  return name.length > 0 && !name.startsWith('.') && name.toLowerCase().endsWith('.csv');
}

function joinKey(prefix: string, name: string): string {
  const folder = prefix.replace(/^\/+|\/+$/g, '');
  return folder ? `${folder}/${name}` : name;
}

export class S3BatchStorage implements BatchStorage {
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: { client: S3Client; bucket: string }) {
    this.client = options.client;
    this.bucket = options.bucket;
  }

  async readLatest(prefix: string): Promise<StoredBatch | null> {
    const folder = joinKey(prefix, '');
    const objects = await listObjects(this.client, this.bucket, folder);

    const candidates = objects
      .filter((object) => object.Key !== undefined && isBatchFile(path.posix.basename(object.Key)))
      .sort((a, b) => {
        const byTime = (b.LastModified?.getTime() ?? 0) - (a.LastModified?.getTime() ?? 0);
        return byTime !== 0 ? byTime : (b.Key ?? '').localeCompare(a.Key ?? '');
      });

    const key = candidates[0]?.Key;
    if (key === undefined) {
      return null;
    }

    const body = await fetchObjectText(this.client, this.bucket, key);
    return { name: path.posix.basename(key), location: formatS3Uri(this.bucket, key), body };
  }

  async write(prefix: string, name: string, body: string): Promise<string> {
    const key = joinKey(prefix, name);
    await uploadText({ client: this.client, bucket: this.bucket, key, body, contentType: 'text/csv; charset=utf-8' });
    return formatS3Uri(this.bucket, key);
  }
}

export class LocalBatchStorage implements BatchStorage {
  private readonly root: string;

  constructor(options: { root: string }) {
    this.root = path.resolve(options.root);
  }

  async readLatest(prefix: string): Promise<StoredBatch | null> {
    const folder = path.join(this.root, prefix);

    let entries: string[];
    try {
      entries = await readdir(folder);
    } catch (err) {
      if (isMissingPath(err)) {
        return null;
      }
      throw err;
    }

    const candidates: Array<{ name: string; mtimeMs: number }> = [];
    for (const name of entries.filter(isBatchFile)) {
      const info = await stat(path.join(folder, name));
      if (info.isFile()) {
        candidates.push({ name, mtimeMs: info.mtimeMs });
      }
    }
    candidates.sort((a, b) => b.mtimeMs - a.mtimeMs || b.name.localeCompare(a.name));

    const latest = candidates[0];
    if (!latest) {
      return null;
    }

    const location = path.join(folder, latest.name);
    return { name: latest.name, location, body: await readFile(location, 'utf8') };
  }

  async write(prefix: string, name: string, body: string): Promise<string> {
    const folder = path.join(this.root, prefix);
    await mkdir(folder, { recursive: true });
    const location = path.join(folder, name);
    await writeFile(location, body, 'utf8');
    return location;
  }
}

function isMissingPath(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export type OutputBase = 'text_output' | 'final_output' | 'self_final_output';

// File name prefix each output derives its suffix from; self-content outputs are always timestamped.
const SOURCE_PREFIX: Record<OutputBase, string | undefined> = {
  text_output: 'input_',
  final_output: 'text_output_',
  self_final_output: undefined,
};

/**
 * Output file name derived from the file a stage read: `input_x.csv` becomes
 * `text_output_x.csv`, `text_output_x.csv` becomes `final_output_x.csv`. Other
 * names get `<outputBase>_<YYYYMMDD_HHMMSS>.csv`.
 */
export function outputNameFor(inputName: string, outputBase: OutputBase, now: Date): string {
  const suffix = suffixAfter(inputName, SOURCE_PREFIX[outputBase]);
  return suffix ? `${outputBase}_${suffix}` : `${outputBase}_${compactTimestamp(now)}.csv`;
}

/**
 * `checkpoint_<x>_<NNN>_<YYYYMMDD_HHMMSS>.csv` for extraction of `input_<x>.csv`,
 * `checkpoint_final_<x>_...` for parsing of `text_output_<x>.csv`.
 */
export function checkpointNameFor(
  inputName: string,
  kind: 'extraction' | 'parsing',
  checkpointNumber: number,
  now: Date,
): string {
  const base = kind === 'extraction' ? 'checkpoint' : 'checkpoint_final';
  const suffix = suffixAfter(inputName, kind === 'extraction' ? 'input_' : 'text_output_');
  const stem = suffix ? `${base}_${suffix.replace(/\.csv$/i, '')}` : base;
  return `${stem}_${String(checkpointNumber).padStart(3, '0')}_${compactTimestamp(now)}.csv`;
}

function suffixAfter(name: string, prefix: string | undefined): string | undefined {
  if (prefix === undefined || !name.startsWith(prefix) || name.length <= prefix.length) {
    return undefined;
  }
  return name.slice(prefix.length);
}
