/**
 * Storage related interfaces
 */

/**
 * An object in the bucket as returned by a listing
 */
export interface RemoteItem {
  readonly name: string;
  readonly size: number;
}

/**
 * Called while an object is transferred. May fire zero or more times.
 */
export type ProgressCallback = (bytesSoFar: number, totalBytes: number) => void;

export interface StorageServiceOptions {
  verbosity?: number;
}

export interface StorageConfig {
  region: string;
  endpoint?: string;
  forcePathStyle: boolean;
}

export interface DownloadToFileResult {
  key: string;
  localPath: string;
  bytesWritten: number;
}
