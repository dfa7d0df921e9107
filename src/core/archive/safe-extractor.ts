/**
 * Safe Extractor
 * Validates every archive entry before anything is written
 */

import fs from 'node:fs';
import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as tar from 'tar';
import * as logger from '../../utils/logger';
import { PathTraversalError } from '../../utils/errors';
import { decompressArchive } from './compression';

export interface ArchiveEntry {
  path: string;
  type: string;
  linkpath?: string;
}

export interface SafeExtractOptions {
  verbosity?: number;
}

export interface SafeExtractResult {
  entries: string[];
  compression: string;
}

/**
 * True when `candidate` is `root` or lies beneath it
 */
export function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return (
    relative === '' ||
    (relative !== '..' &&
      !relative.startsWith(`..${path.sep}`) &&
      !path.isAbsolute(relative))
  );
}

/**
 * Resolve symlinks along the part of `target` that already exists on disk
 */
export function resolveExisting(target: string): string {
  const absolute = path.resolve(target);
  const pending: string[] = [];
  let current = absolute;

  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) {
      return absolute;
    }
    pending.unshift(path.basename(current));
    current = parent;
  }

  return path.join(fs.realpathSync(current), ...pending);
}

const MAX_LINK_HOPS = 40;

function splitSegments(value: string): string[] {
  return value.split(/[\\/]+/).filter((segment) => segment !== '' && segment !== '.');
}

/**
 * Symlinks as they will exist once the archive is written: the ones declared
 * by earlier entries, falling back to what is already on disk under the root.
 */
function createLinkTable(root: string) {
  const declared = new Map<string, string>();
  const replaced = new Set<string>();

  const lookup = (key: string): string | undefined => {
    const target = declared.get(key);
    if (target !== undefined || replaced.has(key) || key === '') {
      return target;
    }
    const stats = fs.lstatSync(path.join(root, key), { throwIfNoEntry: false });
    return stats?.isSymbolicLink() ? fs.readlinkSync(path.join(root, key)) : undefined;
  };

  const record = (key: string, entry: ArchiveEntry) => {
    if (entry.type === 'SymbolicLink' && entry.linkpath !== undefined) {
      declared.set(key, entry.linkpath);
      return;
    }
    declared.delete(key);
    replaced.add(key);
  };

  /**
   * Walk `segments` from the root the way the kernel would, expanding every
   * symlink met on the way. Null when the walk leaves the root or loops.
   */
  const resolve = (segments: string[]): string[] | null => {
    let resolved: string[] = [];
    const pending = [...segments];
    let hops = 0;

    for (let segment = pending.shift(); segment !== undefined; segment = pending.shift()) {
      if (segment === '..') {
        if (resolved.length === 0) {
          return null;
        }
        resolved.pop();
        continue;
      }

      resolved.push(segment);
      const target = lookup(resolved.join('/'));
      if (target === undefined) {
        continue;
      }

      hops += 1;
      if (hops > MAX_LINK_HOPS) {
        return null;
      }
      resolved.pop();
      if (path.isAbsolute(target)) {
        if (!isWithin(root, target)) {
          return null;
        }
        resolved = [];
        pending.unshift(...splitSegments(path.relative(root, target)));
      } else {
        pending.unshift(...splitSegments(target));
      }
    }

    return resolved;
  };

  return { lookup, record, resolve };
}

/**
 * Check every entry against the extraction root, in archive order, taking the
 * symlinks created by earlier entries into account. Throws PathTraversalError
 * for absolute names, `..` segments, entries written through a symlink, and
 * links whose target resolves outside the root. Returns the output paths.
 */
export function validateEntries(entries: ArchiveEntry[], destination: string): string[] {
  const root = resolveExisting(destination);
  const links = createLinkTable(root);

  return entries.map((entry) => {
    if (path.isAbsolute(entry.path) || /^[a-zA-Z]:[\\/]/.test(entry.path)) {
      throw new PathTraversalError(entry.path, destination, 'absolute path');
    }

    const segments = splitSegments(entry.path);
    if (segments.includes('..')) {
      throw new PathTraversalError(entry.path, destination);
    }

    for (let depth = 1; depth < segments.length; depth++) {
      const ancestor = segments.slice(0, depth).join('/');
      if (links.lookup(ancestor) !== undefined) {
        throw new PathTraversalError(
          entry.path,
          destination,
          `through symbolic link ${ancestor}`,
        );
      }
    }

    if (entry.linkpath !== undefined) {
      const isSymlink = entry.type === 'SymbolicLink';
      if (!isSymlink && splitSegments(entry.linkpath).includes('..')) {
        throw new PathTraversalError(
          entry.path,
          destination,
          `link target ${entry.linkpath}`,
        );
      }
      const base = isSymlink ? segments.slice(0, -1) : [];
      const target = path.isAbsolute(entry.linkpath)
        ? isWithin(root, entry.linkpath)
          ? links.resolve(splitSegments(path.relative(root, entry.linkpath)))
          : null
        : links.resolve([...base, ...splitSegments(entry.linkpath)]);
      if (target === null) {
        throw new PathTraversalError(
          entry.path,
          destination,
          `link target ${entry.linkpath}`,
        );
      }
    }

    const key = segments.join('/');
    links.record(key, entry);
    return path.join(root, ...segments);
  });
}

export async function listEntries(tarPath: string): Promise<ArchiveEntry[]> {
  const entries: ArchiveEntry[] = [];
  await tar.list({
    file: tarPath,
    strict: true,
    onReadEntry: (entry) => {
      entries.push({
        path: entry.path,
        type: entry.type,
        linkpath: entry.linkpath || undefined,
      });
    },
  });
  return entries;
}

/**
 * Extract `archivePath` into `destination` only if every entry stays inside it.
 * A single offending entry aborts the whole archive before any write.
 */
export async function safeExtract(
  archivePath: string,
  destination: string,
  options: SafeExtractOptions = {},
): Promise<SafeExtractResult> {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const workDir = await mkdtemp(path.join(os.tmpdir(), 'keyfisher-'));

  try {
    const tarPath = path.join(workDir, 'archive.tar');
    const compression = await decompressArchive(archivePath, tarPath, verbosity);
    const entries = await listEntries(tarPath);

    validateEntries(entries, destination);
    logger.verbose(
      `Validated ${entries.length} entries against ${path.resolve(destination)}`,
      verbosity,
    );

    await mkdir(destination, { recursive: true });
    await tar.extract({
      file: tarPath,
      cwd: destination,
      strict: true,
      preserveOwner: false,
    });

    return { entries: entries.map((entry) => entry.path), compression };
  } finally {
    await rm(workDir, { recursive: true, force: true });
  }
}
