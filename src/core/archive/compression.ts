/**
 * Compression detection and decompression of tar archives
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { open } from 'node:fs/promises';
import { createGunzip } from 'node:zlib';
import { pipeline } from 'node:stream/promises';
import bz2 from 'unbzip2-stream';
import * as logger from '../../utils/logger';
import { UnsupportedArchiveError } from '../../utils/errors';

export type Compression = 'gzip' | 'bzip2' | 'xz' | 'zstd' | 'none';

export const SUPPORTED_COMPRESSIONS: ReadonlySet<Compression> = new Set([
  'gzip',
  'bzip2',
  'none',
]);

const MAGIC_BYTES: ReadonlyArray<{ compression: Compression; magic: number[] }> = [
  { compression: 'gzip', magic: [0x1f, 0x8b] },
  { compression: 'bzip2', magic: [0x42, 0x5a, 0x68] },
  { compression: 'xz', magic: [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00] },
  { compression: 'zstd', magic: [0x28, 0xb5, 0x2f, 0xfd] },
];

const HEADER_LENGTH = 6;

export function detectCompression(header: Uint8Array): Compression {
  for (const { compression, magic } of MAGIC_BYTES) {
    if (
      header.length >= magic.length &&
      magic.every((byte, index) => header[index] === byte)
    ) {
      return compression;
    }
  }
  return 'none';
}

export async function detectFileCompression(filePath: string): Promise<Compression> {
  const handle = await open(filePath, 'r');
  try {
    const header = Buffer.alloc(HEADER_LENGTH);
    const { bytesRead } = await handle.read(header, 0, HEADER_LENGTH, 0);
    return detectCompression(header.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

function createDecompressor(
  compression: Compression,
): NodeJS.ReadWriteStream | null {
  switch (compression) {
    case 'gzip':
      return createGunzip();
    case 'bzip2':
      return bz2();
    default:
      return null;
  }
}

/**
 * Write the plain tar stream of `archivePath` to `outputPath`.
 * Returns the detected compression.
 */
export async function decompressArchive(
  archivePath: string,
  outputPath: string,
  verbosity: number = logger.Verbosity.Normal,
): Promise<Compression> {
  const compression = await detectFileCompression(archivePath);
  if (!SUPPORTED_COMPRESSIONS.has(compression)) {
    throw new UnsupportedArchiveError(compression, archivePath);
  }

  logger.verbose(`Detected ${compression} compression: ${archivePath}`, verbosity);

  const decompressor = createDecompressor(compression);
  if (decompressor) {
    await pipeline(
      createReadStream(archivePath),
      decompressor,
      createWriteStream(outputPath),
    );
  } else {
    await pipeline(createReadStream(archivePath), createWriteStream(outputPath));
  }

  return compression;
}
