/**
 * Bucket name resolution
 */

import fs from 'node:fs';
import path from 'node:path';
import { UsageError } from './errors';

export const DEFAULT_BUCKET_FILENAME = 'default_bucket';

export type DefaultBucketProvider = () => string | undefined;

/**
 * Reads the default bucket from `default_bucket` in `dir`. A missing or
 * blank file yields undefined.
 */
export function createDefaultBucketProvider(dir: string): DefaultBucketProvider {
  const filePath = path.join(dir, DEFAULT_BUCKET_FILENAME);

  return () => {
    if (!fs.existsSync(filePath)) {
      return undefined;
    }
    const name = fs.readFileSync(filePath, 'utf8').trim();
    return name || undefined;
  };
}

export function resolveBucket(
  cliBucket: string | undefined,
  defaultBucket: DefaultBucketProvider,
): string {
  const bucket = cliBucket !== undefined ? cliBucket.trim() : defaultBucket();
  if (!bucket) {
    throw new UsageError(
      `invalid bucket name: pass --bucket or create a ${DEFAULT_BUCKET_FILENAME} file`,
    );
  }
  return bucket;
}
