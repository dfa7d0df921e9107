/**
 * Consolidated Test Helpers
 *
 * Mock factories return the same shape as real factory functions,
 * enabling direct dependency injection without type casting.
 */

import { vi } from 'vitest';
import type { StorageService } from '../../src/core/storage/s3-service';
import type { TransferProgress } from '../../src/core/download/transfer-progress';
import type { Downloader } from '../../src/core/download/downloader';
import type { RemoteItem } from '../../src/interfaces/storage';
import type { Terminal } from '../../src/interfaces/terminal';
import { InputClosedError } from '../../src/utils/errors';

export interface ScriptedTerminal extends Terminal {
  /** Every line printed, in order */
  readonly printed: string[];
  /** Every question asked, in order */
  readonly asked: string[];
  /** Prompts and printed lines interleaved as a user would see them */
  readonly transcript: string[];
}

/**
 * A terminal that answers prompts from a fixed script. Running out of
 * answers behaves like the user closing standard input.
 */
export function createScriptedTerminal(answers: string[]): ScriptedTerminal {
  const remaining = [...answers];
  const printed: string[] = [];
  const asked: string[] = [];
  const transcript: string[] = [];

  return {
    printed,
    asked,
    transcript,
    ask: vi.fn((question: string) => {
      asked.push(question);
      const answer = remaining.shift();
      if (answer === undefined) {
        return Promise.reject(new InputClosedError());
      }
      transcript.push(`${question}${answer}`);
      return Promise.resolve(answer);
    }),
    print: vi.fn((message: string) => {
      printed.push(message);
      transcript.push(message);
    }),
    close: vi.fn(() => {}),
  };
}

export function createRemoteItems(names: string[], size = 1024): RemoteItem[] {
  return names.map((name) => ({ name, size }));
}

/**
 * Creates a mock StorageService matching the factory return type
 */
export function createMockStorageService(
  items: RemoteItem[] = [],
): StorageService {
  return {
    checkBucket: vi.fn(() => Promise.resolve()),
    listItems: vi.fn(() => Promise.resolve(items)),
    downloadToFile: vi.fn((key: string, localPath: string) =>
      Promise.resolve({ key, localPath, bytesWritten: 0 }),
    ),
  };
}

/**
 * Creates a mock TransferProgress matching the factory return type
 */
export function createMockTransferProgress(): TransferProgress {
  return {
    start: vi.fn(() => {}),
    update: vi.fn(() => {}),
    finish: vi.fn(() => {}),
  };
}

/**
 * Creates a mock Downloader matching the factory return type
 */
export function createMockDownloader(): Downloader {
  return {
    downloadKey: vi.fn(() =>
      Promise.resolve({ localPath: '/tmp/archive.tar.bz2', entries: [] }),
    ),
  };
}
