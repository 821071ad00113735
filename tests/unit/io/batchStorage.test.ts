import { mkdtemp, readFile, rm, utimes, writeFile, mkdir } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3';

import { LocalBatchStorage, S3BatchStorage, checkpointNameFor, outputNameFor } from 'src/io/batchStorage';

describe('LocalBatchStorage', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'batch-storage-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('returns null for a missing or empty folder', async () => {
    const storage = new LocalBatchStorage({ root });

    await expect(storage.readLatest('link_input')).resolves.toBeNull();
    await mkdir(path.join(root, 'link_input'));
    await expect(storage.readLatest('link_input')).resolves.toBeNull();
  });

  it('picks the newest csv and ignores other files', async () => {
    const folder = path.join(root, 'link_input');
    await mkdir(folder);
    const files: Array<[string, string, number]> = [
      ['input_old.csv', 'old', 1_700_000_000],
      ['input_new.csv', 'new', 1_700_000_500],
      ['.draft.csv', 'hidden', 1_700_000_900],
      ['notes.txt', 'notes', 1_700_000_900],
    ];
    for (const [name, body, mtime] of files) {
      await writeFile(path.join(folder, name), body);
      await utimes(path.join(folder, name), mtime, mtime);
    }

    const latest = await new LocalBatchStorage({ root }).readLatest('link_input');

    expect(latest).toEqual({ name: 'input_new.csv', location: path.join(folder, 'input_new.csv'), body: 'new' });
  });

  it('creates the folder on write', async () => {
    const storage = new LocalBatchStorage({ root });

    const location = await storage.write('text_output', 'text_output_a.csv', 'ID\n');

    expect(location).toBe(path.join(root, 'text_output', 'text_output_a.csv'));
    await expect(readFile(location, 'utf8')).resolves.toBe('ID\n');
  });
});

describe('S3BatchStorage', () => {
  function fakeS3() {
    const send = jest.fn(async (command: unknown) => {
      if (command instanceof ListObjectsV2Command) {
        if (command.input.ContinuationToken === undefined) {
          return {
            Contents: [
              { Key: 'link_input/input_old.csv', LastModified: new Date('2024-01-01T00:00:00Z') },
              { Key: 'link_input/.draft.csv', LastModified: new Date('2024-03-01T00:00:00Z') },
              { Key: 'link_input/readme.txt', LastModified: new Date('2024-03-01T00:00:00Z') },
            ],
            IsTruncated: true,
            NextContinuationToken: 'page-2',
          };
        }
        return {
          Contents: [{ Key: 'link_input/input_new.csv', LastModified: new Date('2024-02-01T00:00:00Z') }],
          IsTruncated: false,
        };
      }
      if (command instanceof GetObjectCommand) {
        return { Body: { transformToString: async () => `body of ${command.input.Key}` } };
      }
      if (command instanceof PutObjectCommand) {
        return {};
      }
      throw new Error('unexpected command');
    });
    return { client: { send } as unknown as S3Client, send };
  }

  it('lists every page and reads the newest csv', async () => {
    const { client, send } = fakeS3();
    const storage = new S3BatchStorage({ client, bucket: 'test-bucket' });

    const latest = await storage.readLatest('link_input');

    expect(latest).toEqual({
      name: 'input_new.csv',
      location: 's3://test-bucket/link_input/input_new.csv',
      body: 'body of link_input/input_new.csv',
    });
    const listCalls = send.mock.calls.filter(([command]) => command instanceof ListObjectsV2Command);
    expect(listCalls).toHaveLength(2);
    expect(listCalls[0][0]).toMatchObject({ input: { Bucket: 'test-bucket', Prefix: 'link_input/' } });
  });

  it('uploads csv with its content type', async () => {
    const { client, send } = fakeS3();
    const storage = new S3BatchStorage({ client, bucket: 'test-bucket' });

    const location = await storage.write('/final_output/', 'final_output_a.csv', 'id\n');

    expect(location).toBe('s3://test-bucket/final_output/final_output_a.csv');
    expect(send.mock.calls[0][0]).toMatchObject({
      input: {
        Bucket: 'test-bucket',
        Key: 'final_output/final_output_a.csv',
        Body: 'id\n',
        ContentType: 'text/csv; charset=utf-8',
      },
    });
  });
});

describe('outputNameFor', () => {
  const now = new Date(Date.UTC(2024, 9, 19, 8, 30, 5));

  it('carries the input suffix over', () => {
    expect(outputNameFor('input_2024-10-19.csv', 'text_output', now)).toBe('text_output_2024-10-19.csv');
    expect(outputNameFor('text_output_2024-10-19.csv', 'final_output', now)).toBe('final_output_2024-10-19.csv');
  });

  it('falls back to a timestamped name', () => {
    expect(outputNameFor('links.csv', 'text_output', now)).toBe('text_output_20241019_083005.csv');
    expect(outputNameFor('input_2024.csv', 'final_output', now)).toBe('final_output_20241019_083005.csv');
  });

  it('always timestamps self-content output', () => {
    expect(outputNameFor('text_output_2024-10-19.csv', 'self_final_output', now)).toBe(
      'self_final_output_20241019_083005.csv',
    );
  });
});

describe('checkpointNameFor', () => {
  const now = new Date(Date.UTC(2024, 9, 19, 8, 30, 5));

  it('numbers extraction checkpoints after the input suffix', () => {
    expect(checkpointNameFor('input_2024-10-19.csv', 'extraction', 1, now)).toBe(
      'checkpoint_2024-10-19_001_20241019_083005.csv',
    );
    expect(checkpointNameFor('links.csv', 'extraction', 12, now)).toBe('checkpoint_012_20241019_083005.csv');
  });

  it('marks parsing checkpoints as final', () => {
    expect(checkpointNameFor('text_output_2024-10-19.csv', 'parsing', 3, now)).toBe(
      'checkpoint_final_2024-10-19_003_20241019_083005.csv',
    );
    expect(checkpointNameFor('konten.csv', 'parsing', 1, now)).toBe('checkpoint_final_001_20241019_083005.csv');
  });
});
