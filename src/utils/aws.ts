// utils/aws.ts
import type { S3ClientConfig } from '@aws-sdk/client-s3';

import type { StorageConfig } from './config';

function looksLocal(value?: string): boolean {
  if (!value) return false;
  const normalized = value.toLowerCase();
  return (
    normalized.includes('localhost') ||
    normalized.includes('127.0.0.1') ||
    normalized.includes('localstack') ||
    normalized.includes('minio')
  );
}

/**
 * S3 client settings for the batch bucket. Local emulators get path-style
 * addressing and placeholder credentials; real AWS uses the default chain.
 */
export function getS3ClientConfig(storage: Pick<StorageConfig, 'region' | 'endpoint'>): S3ClientConfig {
  const { region, endpoint } = storage;
  if (!endpoint) {
    return { region };
  }

  const isLocal = looksLocal(endpoint);
  return {
    region,
    endpoint,
    forcePathStyle: isLocal ? true : undefined,
    credentials: isLocal ? { accessKeyId: 'test', secretAccessKey: 'test' } : undefined,
  };
}
