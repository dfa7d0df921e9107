/**
 * Plain-text rendering of bucket contents and transfer sizes
 */

import type { Named } from '../filter/filter-engine';

const BYTES_PER_MIB = 1024 * 1024;

export function formatBucket(
  bucketName: string,
  items: readonly Named[],
): string {
  return `[Bucket ${bucketName}, ${items.length} items]`;
}

export function formatContents(items: readonly Named[]): string {
  return items.map((item) => `* ${item.name}`).join('\n');
}

export function bytesToMebibytes(numBytes: number): number {
  return numBytes / BYTES_PER_MIB;
}

export function formatBytes(numBytes: number): string {
  return `${bytesToMebibytes(numBytes).toFixed(2)}MiB`;
}

export function percentComplete(bytesSoFar: number, totalBytes: number): number {
  if (totalBytes <= 0) {
    return 100;
  }
  return Math.floor((100 * bytesSoFar) / totalBytes);
}

export function formatPercent(bytesSoFar: number, totalBytes: number): string {
  return `${percentComplete(bytesSoFar, totalBytes)}%...`;
}
