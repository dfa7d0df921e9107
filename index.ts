#!/usr/bin/env tsx

import fs from 'node:fs';
import { parseArgs } from 'node:util';
import { fileURLToPath } from 'node:url';
import { fetchFiles } from './src/file-fetch';
import { createS3Client, createStorageService } from './src/core/storage/s3-service';
import type { StorageService } from './src/core/storage/s3-service';
import { getStorageConfig } from './src/utils/env-utils';
import {
  createDefaultBucketProvider,
  resolveBucket,
} from './src/utils/bucket-config';
import type { DefaultBucketProvider } from './src/utils/bucket-config';
import { createConsoleTerminal } from './src/utils/terminal';
import type { Terminal } from './src/interfaces/terminal';
import { UsageError } from './src/utils/errors';
import * as logger from './src/utils/logger';
import { bold, red } from './src/utils/logger';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(new URL('./package.json', import.meta.url), 'utf8'),
    );
    if (typeof raw === 'object' && raw !== null && 'version' in raw) {
      return typeof raw.version === 'string' ? raw.version : 'unknown';
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

const VERSION = readVersion();

export interface CliArgs {
  bucket?: string;
  filters: string[];
  help: boolean;
  version: boolean;
  verbose: boolean;
}

export function parseCliArgs(args: string[]): CliArgs {
  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        bucket: { type: 'string', short: 'b' },
        verbose: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
      },
      allowPositionals: true,
    });

    return {
      bucket: values.bucket,
      filters: positionals,
      help: values.help ?? false,
      version: values.version ?? false,
      verbose: values.verbose ?? false,
    };
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new UsageError(errorMessage);
  }
}

export function usage(): string {
  return `
${bold(`keyfisher v${VERSION} - Narrow down an S3 bucket and fetch one archive`)}

${bold('Usage: keyfisher [-b <bucket>] [filter ...]')}

${bold('Arguments:')}
  filter                  Only list keys containing every one of these terms

${bold('Options:')}
  -b, --bucket=<name>     S3 bucket name (default: contents of ./default_bucket)
  --verbose               Show detailed output
  -h, --help              Show this help message
  --version               Show version information

${bold('Environment:')}
  AWS_REGION              Bucket region (default: us-east-1)
  KEYFISHER_S3_ENDPOINT   Custom S3-compatible endpoint, path-style addressing

${bold('Examples:')}
  keyfisher -b nightly-builds 2021 linux
  echo nightly-builds > default_bucket && keyfisher logs
`;
}

export interface MainDeps {
  workingDir: string;
  defaultBucket: DefaultBucketProvider;
  createStorage: (bucket: string, verbosity: number) => StorageService;
  createTerminal: () => Terminal;
  destroy?: () => void;
}

function createDefaultDeps(): MainDeps {
  const workingDir = process.cwd();
  const client = createS3Client(getStorageConfig());
  return {
    workingDir,
    defaultBucket: createDefaultBucketProvider(workingDir),
    createStorage: (bucket, verbosity) =>
      createStorageService(client, bucket, { verbosity }),
    createTerminal: () => createConsoleTerminal(),
    destroy: () => client.destroy(),
  };
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(
  rawArgs: string[],
  deps: MainDeps = createDefaultDeps(),
): Promise<number> {
  let terminal: Terminal | undefined;
  try {
    const args = parseCliArgs(rawArgs);

    if (args.help) {
      logger.always(usage());
      return EXIT_OK;
    }

    if (args.version) {
      logger.always(`keyfisher v${VERSION}`);
      return EXIT_OK;
    }

    const bucket = resolveBucket(args.bucket, deps.defaultBucket);
    const verbosity = args.verbose
      ? logger.Verbosity.Verbose
      : logger.Verbosity.Normal;

    terminal = deps.createTerminal();
    await fetchFiles(
      {
        bucket,
        filters: args.filters,
        workingDir: deps.workingDir,
        verbose: args.verbose,
      },
      { storageService: deps.createStorage(bucket, verbosity), terminal },
    );
    return EXIT_OK;
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorName =
      error instanceof Error && error.name !== 'Error' ? `${error.name}: ` : '';

    if (error instanceof UsageError) {
      logger.error(`Error: ${errorMessage}`);
      logger.always(usage());
      return EXIT_USAGE;
    }

    logger.error(`${errorName}${errorMessage}`);
    return EXIT_FAILURE;
  } finally {
    terminal?.close();
    deps.destroy?.();
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return fs.realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      const errorMessage = err instanceof Error ? err.message : String(err);
      console.error(red(`Error: ${errorMessage}`));
      process.exitCode = EXIT_FAILURE;
    },
  );
}
