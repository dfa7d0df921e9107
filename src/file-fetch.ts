import * as logger from './utils/logger';
import { Verbosity } from './interfaces/logger';
import type { FetchOptions } from './interfaces/fetch';
import type { Terminal } from './interfaces/terminal';
import type { StorageService } from './core/storage/s3-service';
import { createDownloader, type Downloader } from './core/download/downloader';
import { createTransferProgress } from './core/download/transfer-progress';
import {
  createNarrowingLoop,
  type LoopResult,
} from './core/narrowing/narrowing-loop';

export interface FetchDeps {
  storageService: StorageService;
  terminal: Terminal;
  downloader?: Downloader;
}

/**
 * Connect to the bucket, narrow its listing interactively and fetch the
 * remaining archive into the working directory.
 */
export async function fetchFiles(
  options: FetchOptions,
  deps: FetchDeps,
): Promise<LoopResult> {
  const { storageService, terminal } = deps;
  const verbosity = options.verbose ? Verbosity.Verbose : Verbosity.Normal;

  logger.info('Connecting...', verbosity);
  await storageService.checkBucket();

  const items = await storageService.listItems();
  logger.verbose(`Found ${items.length} objects in ${options.bucket}`, verbosity);
  if (options.filters.length > 0) {
    logger.verbose(`Startup filters: ${options.filters.join(', ')}`, verbosity);
  }

  const downloader =
    deps.downloader ??
    createDownloader(options.workingDir, verbosity, {
      storageService,
      progress: createTransferProgress((line) => terminal.print(line), verbosity),
    });

  const loop = createNarrowingLoop(options.bucket, {
    terminal,
    download: async (item) => {
      await downloader.downloadKey(item);
    },
  });

  const result = await loop.run(items, options.filters);

  if (result.outcome === 'empty') {
    logger.warning('Nothing to download.', verbosity);
  } else if (result.outcome === 'declined') {
    logger.verbose('Download skipped.', verbosity);
  }

  return result;
}
