import path from 'node:path';
import * as logger from '../../utils/logger';
import type { StorageService } from '../storage/s3-service';
import type { TransferProgress } from './transfer-progress';
import { safeExtract } from '../archive/safe-extractor';
import type { RemoteItem } from '../../interfaces/storage';

export interface DownloaderDeps {
  storageService: StorageService;
  progress: TransferProgress;
  extract?: typeof safeExtract;
}

export interface DownloadKeyResult {
  localPath: string;
  entries: string[];
}

/**
 * Local file name for a key: its last path segment
 */
export function localNameForKey(key: string): string {
  const name = path.posix.basename(key);
  if (!name || key.endsWith('/') || name === '.' || name === '..') {
    throw new Error(`Cannot derive a file name from key: ${key}`);
  }
  return name;
}

export function createDownloader(
  workingDir: string,
  verbosity: number,
  deps: DownloaderDeps,
) {
  const { storageService, progress } = deps;
  const extract = deps.extract ?? safeExtract;

  /**
   * Download the item next to the working directory and unpack it there
   */
  const downloadKey = async (item: RemoteItem): Promise<DownloadKeyResult> => {
    const localPath = path.join(workingDir, localNameForKey(item.name));

    progress.start(item.size);
    await storageService.downloadToFile(item.name, localPath, (cur, total) =>
      progress.update(cur, total),
    );
    progress.finish();

    logger.verbose(`Saved ${item.name} to ${localPath}`, verbosity);

    const { entries } = await extract(localPath, workingDir, { verbosity });
    logger.success(
      `Extracted ${entries.length} entries from ${path.basename(localPath)}`,
      verbosity,
    );

    return { localPath, entries };
  };

  return { downloadKey };
}

export type Downloader = ReturnType<typeof createDownloader>;
