import {
  GetObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
  type _Object,
} from '@aws-sdk/client-s3';

export function formatS3Uri(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}

/**
 * Fetch an object as UTF-8 text.
 * Throws if the body is empty.
 */
export async function fetchObjectText(client: S3Client, bucket: string, key: string): Promise<string> {
  const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
  const body = response.Body;
  if (body === undefined) {
    throw new Error(`Empty object body for ${formatS3Uri(bucket, key)}`);
  }
  return body.transformToString('utf-8');
}

export async function uploadText(params: {
  client: S3Client;
  bucket: string;
  key: string;
  body: string;
  contentType?: string;
}): Promise<void> {
  const { client, bucket, key, body, contentType } = params;

  await client.send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: contentType ?? 'text/plain; charset=utf-8',
    }),
  );
}

/** Every object under `prefix`, following continuation tokens. */
export async function listObjects(client: S3Client, bucket: string, prefix: string): Promise<_Object[]> {
  const objects: _Object[] = [];
  let continuationToken: string | undefined;

  do {
    const page = await client.send(
      new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken }),
    );
    objects.push(...(page.Contents ?? []));
    continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
  } while (continuationToken);

  return objects;
}
