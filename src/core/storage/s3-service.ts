/**
 * S3 Storage Service
 * Wraps the AWS SDK client for bucket listing and object downloads
 */

import { createWriteStream } from 'node:fs';
import { Readable, Transform } from 'node:stream';
import type { TransformCallback } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  S3Client,
} from '@aws-sdk/client-s3';
import * as logger from '../../utils/logger';
import type {
  DownloadToFileResult,
  ProgressCallback,
  RemoteItem,
  StorageConfig,
  StorageServiceOptions,
} from '../../interfaces/storage';

/**
 * The part of the SDK client the service talks to
 */
export type S3Sender = Pick<S3Client, 'send'>;

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    region: config.region,
    endpoint: config.endpoint,
    forcePathStyle: config.forcePathStyle,
  });
}

/**
 * Counts bytes flowing through and reports them to the progress callback
 */
function createProgressCounter(
  totalBytes: number,
  onProgress?: ProgressCallback,
) {
  let bytesSoFar = 0;

  const counter = new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      bytesSoFar += chunk.length;
      onProgress?.(bytesSoFar, totalBytes);
      callback(null, chunk);
    },
  });

  return { counter, getBytes: () => bytesSoFar };
}

export function createStorageService(
  client: S3Sender,
  bucket: string,
  options: StorageServiceOptions = {},
) {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;

  /**
   * Fails when the bucket is missing or not accessible with the current credentials
   */
  const checkBucket = async (): Promise<void> => {
    logger.verbose(`Checking bucket ${bucket}`, verbosity);
    await client.send(new HeadBucketCommand({ Bucket: bucket }));
  };

  /**
   * List every object in the bucket, following continuation tokens.
   * Folder placeholder keys (ending in "/") are left out.
   */
  const listItems = async (): Promise<RemoteItem[]> => {
    const items: RemoteItem[] = [];
    let continuationToken: string | undefined;
    let page = 0;

    do {
      const response = await client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ContinuationToken: continuationToken,
        }),
      );
      page++;

      for (const object of response.Contents ?? []) {
        if (!object.Key || object.Key.endsWith('/')) {
          continue;
        }
        items.push({ name: object.Key, size: object.Size ?? 0 });
      }

      logger.verbose(
        `Listed page ${page} of ${bucket}: ${response.KeyCount ?? 0} keys`,
        verbosity,
      );

      continuationToken = response.IsTruncated
        ? response.NextContinuationToken
        : undefined;
    } while (continuationToken);

    return items;
  };

  /**
   * Stream an object's bytes into a local file
   */
  const downloadToFile = async (
    key: string,
    localPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadToFileResult> => {
    const response = await client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key }),
    );

    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new Error(`Object body for ${key} is not a readable stream`);
    }

    const totalBytes = response.ContentLength ?? 0;
    const { counter, getBytes } = createProgressCounter(totalBytes, onProgress);

    logger.verbose(`Writing ${key} to ${localPath}`, verbosity);
    await pipeline(body, counter, createWriteStream(localPath));

    return { key, localPath, bytesWritten: getBytes() };
  };

  return { checkBucket, listItems, downloadToFile };
}

export type StorageService = ReturnType<typeof createStorageService>;
