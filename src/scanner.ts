/**
 * Source tree discovery in a stable order
 */

import { readdir, stat } from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import { SourceRootError, errnoCode } from './errors.js';
import { Logger, errorMessage } from './logger.js';

const logger = new Logger({ context: 'scanner' });

export interface DiscoveredFile {
  absolutePath: string;
  /** POSIX path relative to the source root */
  relativePath: string;
  /** Size from lstat at scan time */
  sizeBytes: number;
}

export interface ScanOptions {
  includeGlobs?: string[];
  excludeGlobs?: string[];
  /** Absolute paths (files or directories) kept out of the scan */
  excludePaths?: string[];
  /** Receives one message per sub-directory whose contents could not be listed */
  onWarning?: (message: string) => void;
  listDirectory?: (absolutePath: string) => Promise<unknown>;
}

export function toPosixPath(value: string): string {
  return value.split(path.sep).join('/');
}

function pathStartsWithPrefix(relativePath: string, prefix: string): boolean {
  return relativePath === prefix || relativePath.startsWith(`${prefix}/`);
}

export function isInside(parentAbs: string, candidateAbs: string): boolean {
  const relative = path.relative(parentAbs, candidateAbs);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Relative prefixes for excluded paths that sit inside the root.
 */
export function excludedPrefixes(rootAbs: string, excludePaths: string[]): string[] {
  const prefixes: string[] = [];
  for (const excluded of excludePaths) {
    const excludedAbs = path.resolve(excluded);
    if (excludedAbs === rootAbs || !isInside(rootAbs, excludedAbs)) {
      continue;
    }
    const relative = toPosixPath(path.relative(rootAbs, excludedAbs));
    if (!prefixes.includes(relative)) {
      prefixes.push(relative);
    }
  }
  return prefixes;
}

/**
 * Plain code-unit ordering, identical on every machine and locale.
 */
export function compareRelativePaths(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * The scan root must exist, be a directory and be listable.
 */
export async function assertSourceRoot(rootAbs: string): Promise<void> {
  try {
    const rootStat = await stat(rootAbs);
    if (!rootStat.isDirectory()) {
      throw new SourceRootError(rootAbs, 'not a directory');
    }
    await readdir(rootAbs);
  } catch (error) {
    if (error instanceof SourceRootError) {
      throw error;
    }
    throw new SourceRootError(rootAbs, errnoCode(error) ?? errorMessage(error));
  }
}

export async function scanSourceTree(rootPath: string, options: ScanOptions = {}): Promise<DiscoveredFile[]> {
  const rootAbs = path.resolve(rootPath);
  const includePatterns = options.includeGlobs && options.includeGlobs.length > 0 ? options.includeGlobs : ['**/*'];
  const prefixes = excludedPrefixes(rootAbs, options.excludePaths ?? []);

  const entries = await fg(includePatterns, {
    cwd: rootAbs,
    ignore: options.excludeGlobs ?? [],
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    unique: true,
    stats: true,
  });

  const files: DiscoveredFile[] = [];
  for (const entry of entries) {
    if (!entry.dirent.isFile() && !entry.dirent.isSymbolicLink()) {
      continue;
    }

    const relativePath = toPosixPath(entry.path);
    if (prefixes.some(prefix => pathStartsWithPrefix(relativePath, prefix))) {
      continue;
    }

    files.push({
      absolutePath: path.join(rootAbs, relativePath),
      relativePath,
      sizeBytes: entry.stats?.size ?? 0,
    });
  }

  await reportUnlistedDirectories(rootAbs, prefixes, options);

  return files.sort((left, right) => compareRelativePaths(left.relativePath, right.relativePath));
}

/**
 * The glob suppresses read errors below the root, so directories it could
 * not enter are found with a second pass and reported through `onWarning`.
 */
async function reportUnlistedDirectories(rootAbs: string, prefixes: string[], options: ScanOptions): Promise<void> {
  const directories = await fg('**', {
    cwd: rootAbs,
    ignore: options.excludeGlobs ?? [],
    dot: true,
    onlyDirectories: true,
    followSymbolicLinks: false,
    suppressErrors: true,
  });

  const listDirectory = options.listDirectory ?? readdir;
  const unlisted = await Promise.all(
    directories
      .map(toPosixPath)
      .filter(relativePath => !prefixes.some(prefix => pathStartsWithPrefix(relativePath, prefix)))
      .sort(compareRelativePaths)
      .map(async relativePath => {
        const absolutePath = path.join(rootAbs, relativePath);
        try {
          await listDirectory(absolutePath);
          return null;
        } catch (error) {
          const reason = errnoCode(error) ?? errorMessage(error);
          return `Directory could not be listed: ${absolutePath} (${reason}); its files are not in this run`;
        }
      })
  );
  for (const message of unlisted) {
    if (message !== null) {
      logger.warn(message);
      options.onWarning?.(message);
    }
  }
}
