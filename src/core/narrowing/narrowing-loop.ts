/**
 * Interactive narrowing of a bucket listing down to a single item
 */

import { applyFilters } from '../filter/filter-engine';
import { formatBucket, formatContents } from '../format/formatter';
import type { RemoteItem } from '../../interfaces/storage';
import type { Terminal } from '../../interfaces/terminal';

export const LISTING_LIMIT = 9;
export const FILTER_PROMPT = 'filter: ';
export const CONFIRM_PROMPT = 'download and untar? [Y/n] ';
export const NO_MATCHES = 'no matches';

export type LoopState = 'narrowing' | 'confirming' | 'done';

export type LoopOutcome = 'downloaded' | 'declined' | 'empty';

export interface LoopResult {
  outcome: LoopOutcome;
  item?: RemoteItem;
}

export interface NarrowingLoopDeps {
  terminal: Terminal;
  download: (item: RemoteItem) => Promise<void>;
}

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === '' || normalized === 'y';
}

export function stateFor(workingSet: readonly RemoteItem[]): LoopState {
  if (workingSet.length === 0) {
    return 'done';
  }
  return workingSet.length === 1 ? 'confirming' : 'narrowing';
}

export function createNarrowingLoop(
  bucketName: string,
  deps: NarrowingLoopDeps,
) {
  const { terminal, download } = deps;

  let workingSet: RemoteItem[] = [];
  let state: LoopState = 'done';

  const display = (): void => {
    terminal.print(formatBucket(bucketName, workingSet));
    if (workingSet.length <= LISTING_LIMIT) {
      terminal.print(formatContents(workingSet));
    }
  };

  const narrow = async (): Promise<void> => {
    const filter = await terminal.ask(FILTER_PROMPT);
    const candidate = [...applyFilters(workingSet, [filter])];

    if (candidate.length === 0) {
      terminal.print(NO_MATCHES);
      return;
    }

    workingSet = candidate;
    state = stateFor(workingSet);
  };

  const confirm = async (): Promise<LoopResult> => {
    const [item] = workingSet;
    const answer = await terminal.ask(CONFIRM_PROMPT);
    state = 'done';

    if (!isAffirmative(answer)) {
      return { outcome: 'declined', item };
    }

    await download(item);
    return { outcome: 'downloaded', item };
  };

  const run = async (
    listing: Iterable<RemoteItem>,
    filters: readonly string[],
  ): Promise<LoopResult> => {
    workingSet = [...applyFilters(listing, filters)];
    state = stateFor(workingSet);

    if (state === 'done') {
      terminal.print(NO_MATCHES);
      terminal.print(formatBucket(bucketName, workingSet));
      return { outcome: 'empty' };
    }

    for (;;) {
      display();

      if (state === 'confirming') {
        return confirm();
      }

      await narrow();
    }
  };

  return { run };
}

export type NarrowingLoop = ReturnType<typeof createNarrowingLoop>;
