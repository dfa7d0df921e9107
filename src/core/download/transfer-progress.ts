/**
 * TransferProgress
 * Reports percentage progress of a single object transfer
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';
import { formatBytes, formatPercent, percentComplete } from '../format/formatter';

export type PrintFn = (message: string) => void;

export class TransferProgressTracker {
  verbosity: number;
  print: PrintFn;
  totalBytes: number;
  lastPercent: number;
  startedAt: number;

  constructor(print: PrintFn, verbosity: number = logger.Verbosity.Normal) {
    this.print = print;
    this.verbosity = verbosity;
    this.totalBytes = 0;
    this.lastPercent = -1;
    this.startedAt = 0;
  }

  /**
   * Announce a transfer of the given size
   */
  start(totalBytes: number) {
    this.totalBytes = totalBytes;
    this.lastPercent = -1;
    this.startedAt = Date.now();
    this.print(`downloading ${formatBytes(totalBytes)}...`);
  }

  /**
   * Print the percentage when it differs from the last one printed
   */
  update(bytesSoFar: number, totalBytes: number) {
    const percent = percentComplete(bytesSoFar, totalBytes);
    if (percent === this.lastPercent) {
      return;
    }
    this.lastPercent = percent;
    this.print(formatPercent(bytesSoFar, totalBytes));
  }

  finish() {
    const elapsedSeconds = (Date.now() - this.startedAt) / 1000;
    logger.verbose(
      chalk.green(
        `Transferred ${formatBytes(this.totalBytes)} in ${elapsedSeconds.toFixed(1)}s`,
      ),
      this.verbosity,
    );
  }
}

export type TransferProgress = Pick<
  TransferProgressTracker,
  'start' | 'update' | 'finish'
>;

export function createTransferProgress(
  print: PrintFn,
  verbosity: number = logger.Verbosity.Normal,
): TransferProgress {
  return new TransferProgressTracker(print, verbosity);
}
