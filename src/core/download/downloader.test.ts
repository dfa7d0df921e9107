import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createDownloader, localNameForKey } from './downloader';
import { createTransferProgress } from './transfer-progress';
import {
  createMockStorageService,
  createMockTransferProgress,
} from '../../../test-config/mocks/test-helpers';
import { buildTarGz } from '../../../test-config/fixtures/tar-builder';
import type { ProgressCallback } from '../../interfaces/storage';
import { PathTraversalError } from '../../utils/errors';
import { Verbosity } from '../../interfaces/logger';

describe('localNameForKey', () => {
  it('should use the last path segment of the key', () => {
    expect(localNameForKey('logs-2021.tar.bz2')).toBe('logs-2021.tar.bz2');
    expect(localNameForKey('backups/2021/logs.tar.bz2')).toBe('logs.tar.bz2');
  });

  it('should reject keys without a file name', () => {
    expect(() => localNameForKey('backups/')).toThrow(
      'Cannot derive a file name from key: backups/',
    );
    expect(() => localNameForKey('..')).toThrow();
  });
});

describe('Downloader', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyfisher-download-'));
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should download the key, report progress and extract it', async () => {
    const archive = buildTarGz([{ path: 'report/summary.txt', content: 'ok\n' }]);
    const storageService = createMockStorageService();
    storageService.downloadToFile = vi.fn(
      (key: string, localPath: string, onProgress?: ProgressCallback) => {
        fs.writeFileSync(localPath, archive);
        onProgress?.(archive.length / 2, archive.length);
        onProgress?.(archive.length, archive.length);
        return Promise.resolve({ key, localPath, bytesWritten: archive.length });
      },
    );
    const printed: string[] = [];
    const progress = createTransferProgress((line) => printed.push(line));
    const downloader = createDownloader(workDir, Verbosity.Normal, {
      storageService,
      progress,
    });

    const result = await downloader.downloadKey({
      name: 'reports/report.tar.gz',
      size: 2097152,
    });

    expect(storageService.downloadToFile).toHaveBeenCalledTimes(1);
    expect(vi.mocked(storageService.downloadToFile).mock.calls[0][0]).toBe(
      'reports/report.tar.gz',
    );
    expect(result.localPath).toBe(path.join(workDir, 'report.tar.gz'));
    expect(result.entries).toEqual(['report/summary.txt']);
    expect(printed).toEqual(['downloading 2.00MiB...', '50%...', '100%...']);
    expect(fs.readFileSync(path.join(workDir, 'report/summary.txt'), 'utf8')).toBe('ok\n');
    expect(fs.existsSync(path.join(workDir, 'report.tar.gz'))).toBe(true);
  });

  it('should pass the downloaded file to the extractor for the working directory', async () => {
    const storageService = createMockStorageService();
    const progress = createMockTransferProgress();
    const extract = vi.fn(() => Promise.resolve({ entries: ['a', 'b'], compression: 'bzip2' }));
    const downloader = createDownloader(workDir, Verbosity.Quiet, {
      storageService,
      progress,
      extract,
    });

    const result = await downloader.downloadKey({ name: 'logs.tar.bz2', size: 10 });

    expect(progress.start).toHaveBeenCalledWith(10);
    expect(progress.finish).toHaveBeenCalledTimes(1);
    expect(extract).toHaveBeenCalledWith(
      path.join(workDir, 'logs.tar.bz2'),
      workDir,
      { verbosity: Verbosity.Quiet },
    );
    expect(result.entries).toEqual(['a', 'b']);
  });

  it('should not download a key without a file name', async () => {
    const storageService = createMockStorageService();
    const downloader = createDownloader(workDir, Verbosity.Normal, {
      storageService,
      progress: createMockTransferProgress(),
    });

    await expect(downloader.downloadKey({ name: 'folder/', size: 0 })).rejects.toThrow(
      'Cannot derive a file name from key',
    );
    expect(storageService.downloadToFile).not.toHaveBeenCalled();
  });

  it('should surface path traversal from the extractor', async () => {
    const evil = buildTarGz([{ path: '../escape.txt', content: 'x' }]);
    const storageService = createMockStorageService();
    storageService.downloadToFile = vi.fn((key: string, localPath: string) => {
      fs.writeFileSync(localPath, evil);
      return Promise.resolve({ key, localPath, bytesWritten: evil.length });
    });
    const downloader = createDownloader(workDir, Verbosity.Normal, {
      storageService,
      progress: createMockTransferProgress(),
    });

    await expect(
      downloader.downloadKey({ name: 'evil.tar.gz', size: evil.length }),
    ).rejects.toBeInstanceOf(PathTraversalError);
    expect(fs.existsSync(path.join(workDir, '..', 'escape.txt'))).toBe(false);
  });

  it('should propagate transfer failures without extracting', async () => {
    const storageService = createMockStorageService();
    storageService.downloadToFile = vi.fn(() => Promise.reject(new Error('socket hang up')));
    const extract = vi.fn(() => Promise.resolve({ entries: [], compression: 'none' }));
    const downloader = createDownloader(workDir, Verbosity.Normal, {
      storageService,
      progress: createMockTransferProgress(),
      extract,
    });

    await expect(downloader.downloadKey({ name: 'a.tar', size: 1 })).rejects.toThrow(
      'socket hang up',
    );
    expect(extract).not.toHaveBeenCalled();
  });
});
