import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  decompressArchive,
  detectCompression,
  detectFileCompression,
} from './compression';
import { UnsupportedArchiveError } from '../../utils/errors';
import { buildTar, buildTarGz } from '../../../test-config/fixtures/tar-builder';

const BZIP2_FIXTURE = fileURLToPath(
  new URL('../../../test-config/fixtures/logs.tar.bz2', import.meta.url),
);

describe('detectCompression', () => {
  it('should recognise magic bytes', () => {
    expect(detectCompression(Uint8Array.from([0x1f, 0x8b, 0x08]))).toBe('gzip');
    expect(detectCompression(Buffer.from('BZh91AY'))).toBe('bzip2');
    expect(
      detectCompression(Uint8Array.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00])),
    ).toBe('xz');
    expect(detectCompression(Uint8Array.from([0x28, 0xb5, 0x2f, 0xfd]))).toBe('zstd');
  });

  it('should fall back to a plain archive', () => {
    expect(detectCompression(Buffer.from('logs/a'))).toBe('none');
    expect(detectCompression(new Uint8Array(0))).toBe('none');
    expect(detectCompression(Uint8Array.from([0x1f]))).toBe('none');
  });
});

describe('decompressArchive', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyfisher-compression-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should gunzip a gzip archive', async () => {
    const plain = buildTar([{ path: 'a.txt', content: 'alpha' }]);
    const archivePath = path.join(tempDir, 'a.tar.gz');
    fs.writeFileSync(archivePath, buildTarGz([{ path: 'a.txt', content: 'alpha' }]));
    const outputPath = path.join(tempDir, 'a.tar');

    const compression = await decompressArchive(archivePath, outputPath);

    expect(compression).toBe('gzip');
    expect(fs.readFileSync(outputPath).equals(plain)).toBe(true);
  });

  it('should decompress a bzip2 archive', async () => {
    const outputPath = path.join(tempDir, 'logs.tar');

    expect(await detectFileCompression(BZIP2_FIXTURE)).toBe('bzip2');
    const compression = await decompressArchive(BZIP2_FIXTURE, outputPath);

    expect(compression).toBe('bzip2');
    const header = fs.readFileSync(outputPath).subarray(257, 262).toString('latin1');
    expect(header).toBe('ustar');
  });

  it('should copy a plain tar unchanged', async () => {
    const plain = buildTar([{ path: 'b.txt', content: 'beta' }]);
    const archivePath = path.join(tempDir, 'b.tar');
    fs.writeFileSync(archivePath, plain);
    const outputPath = path.join(tempDir, 'copy.tar');

    expect(await decompressArchive(archivePath, outputPath)).toBe('none');
    expect(fs.readFileSync(outputPath).equals(plain)).toBe(true);
  });

  it('should reject unsupported compression', async () => {
    const archivePath = path.join(tempDir, 'c.tar.xz');
    fs.writeFileSync(archivePath, Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00, 0x00]));

    await expect(
      decompressArchive(archivePath, path.join(tempDir, 'c.tar')),
    ).rejects.toBeInstanceOf(UnsupportedArchiveError);
    expect(fs.existsSync(path.join(tempDir, 'c.tar'))).toBe(false);
  });
});
