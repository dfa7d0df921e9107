/**
 * Builds small ustar archives in memory for extraction tests
 */

import { gzipSync } from 'node:zlib';

export interface TarFixtureEntry {
  path: string;
  content?: string;
  type?: 'file' | 'directory' | 'symlink' | 'hardlink';
  linkpath?: string;
}

const BLOCK_SIZE = 512;

const TYPE_FLAGS: Record<NonNullable<TarFixtureEntry['type']>, string> = {
  file: '0',
  hardlink: '1',
  symlink: '2',
  directory: '5',
};

function writeString(block: Buffer, value: string, offset: number, length: number) {
  block.write(value.slice(0, length), offset, length, 'utf8');
}

function writeOctal(block: Buffer, value: number, offset: number, length: number) {
  writeString(block, value.toString(8).padStart(length - 1, '0') + '\0', offset, length);
}

function buildHeader(entry: TarFixtureEntry, size: number): Buffer {
  const type = entry.type ?? 'file';
  const block = Buffer.alloc(BLOCK_SIZE);

  writeString(block, entry.path, 0, 100);
  writeOctal(block, type === 'directory' ? 0o755 : 0o644, 100, 8);
  writeOctal(block, 0, 108, 8);
  writeOctal(block, 0, 116, 8);
  writeOctal(block, size, 124, 12);
  writeOctal(block, 1600000000, 136, 12);
  block.fill(' ', 148, 156);
  writeString(block, TYPE_FLAGS[type], 156, 1);
  writeString(block, entry.linkpath ?? '', 157, 100);
  writeString(block, 'ustar\0', 257, 6);
  writeString(block, '00', 263, 2);

  let checksum = 0;
  for (const byte of block) {
    checksum += byte;
  }
  writeString(block, checksum.toString(8).padStart(6, '0') + '\0 ', 148, 8);

  return block;
}

export function buildTar(entries: TarFixtureEntry[]): Buffer {
  const blocks: Buffer[] = [];

  for (const entry of entries) {
    const body =
      (entry.type ?? 'file') === 'file'
        ? Buffer.from(entry.content ?? '', 'utf8')
        : Buffer.alloc(0);
    blocks.push(buildHeader(entry, body.length));
    if (body.length > 0) {
      const padded = Buffer.alloc(Math.ceil(body.length / BLOCK_SIZE) * BLOCK_SIZE);
      body.copy(padded);
      blocks.push(padded);
    }
  }

  blocks.push(Buffer.alloc(BLOCK_SIZE * 2));
  return Buffer.concat(blocks);
}

export function buildTarGz(entries: TarFixtureEntry[]): Buffer {
  return gzipSync(buildTar(entries));
}
