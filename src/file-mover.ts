/**
 * Atomic file transfer: copy to a temporary name beside the destination,
 * verify, publish under the final name without overwriting, then (in move
 * mode) remove the source. Any failure leaves the source untouched and no
 * partial file at the destination.
 */

import { copyFile, link, lstat, mkdir, rename, unlink, writeFile, constants } from 'fs/promises';
import { randomBytes } from 'crypto';
import { basename, dirname, join } from 'path';
import { MoveFailureError, errnoCode } from './errors.js';
import { hashFile, HashOptions } from './hasher.js';
import { Logger } from './logger.js';
import { TransferMode } from './types.js';

const logger = new Logger({ context: 'file-mover' });

/**
 * Filesystem calls the mover and organizer make. Injectable so tests can
 * simulate disk-full or permission failures part-way through a transfer.
 */
export interface FileSystemOps {
  copyFile(source: string, destination: string): Promise<void>;
  /** Create a new file; fails if the path exists */
  writeFile(path: string, content: string): Promise<void>;
  link(existingPath: string, newPath: string): Promise<void>;
  rename(oldPath: string, newPath: string): Promise<void>;
  unlink(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

export const nodeFileSystem: FileSystemOps = {
  copyFile: (source, destination) => copyFile(source, destination, constants.COPYFILE_EXCL),
  writeFile: (path, content) => writeFile(path, content, { encoding: 'utf8', flag: 'wx' }),
  link: (existingPath, newPath) => link(existingPath, newPath),
  rename: (oldPath, newPath) => rename(oldPath, newPath),
  unlink: path => unlink(path),
  mkdir: async path => {
    await mkdir(path, { recursive: true });
  },
  exists: async path => {
    try {
      await lstat(path);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
        return false;
      }
      throw error;
    }
  },
};

export interface TransferOptions {
  mode: TransferMode;
  /** Hash of the source; when verify is on the copy must match it */
  expectedHash: string;
  verify?: boolean;
  hashOptions?: HashOptions;
  fileSystem?: FileSystemOps;
}

// Codes for which a hard link can never work here; fall back to rename
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EXDEV', 'EMLINK']);

function destinationExists(path: string): Error {
  return Object.assign(new Error(`Destination already exists: ${path}`), { code: 'EEXIST' });
}

export function temporaryPathFor(destination: string): string {
  return join(dirname(destination), `.${basename(destination)}.${randomBytes(6).toString('hex')}.partial`);
}

/**
 * Give a fully written temp file its final name. Fails with EEXIST rather
 * than replace an existing file.
 */
export async function publishFile(
  tempPath: string,
  destination: string,
  fileSystem: FileSystemOps = nodeFileSystem
): Promise<void> {
  try {
    await fileSystem.link(tempPath, destination);
  } catch (error) {
    const code = errnoCode(error);
    if (!code || !LINK_UNSUPPORTED.has(code)) {
      throw error;
    }
    if (await fileSystem.exists(destination)) {
      throw destinationExists(destination);
    }
    await fileSystem.rename(tempPath, destination);
    return;
  }
  // Destination is complete from here on; a stray temp name is only clutter
  await removeIfPresent(tempPath, fileSystem);
}

/**
 * Remove a leftover file after a failed transfer. A file that is already
 * gone is fine; any other failure is logged since the primary error is
 * what the caller reports.
 */
export async function removeIfPresent(path: string, fileSystem: FileSystemOps = nodeFileSystem): Promise<void> {
  try {
    await fileSystem.unlink(path);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      logger.warn(`Could not remove ${path}`, { code: errnoCode(error) });
    }
  }
}

export async function transferFile(source: string, destination: string, options: TransferOptions): Promise<void> {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const tempPath = temporaryPathFor(destination);

  try {
    await fileSystem.mkdir(dirname(destination));
    await fileSystem.copyFile(source, tempPath);

    if (options.verify !== false) {
      const copied = await hashFile(tempPath, options.hashOptions);
      if (copied.hash !== options.expectedHash) {
        throw new Error('Copied content does not match the source hash');
      }
    }

    await publishFile(tempPath, destination, fileSystem);
  } catch (error) {
    await removeIfPresent(tempPath, fileSystem);
    throw new MoveFailureError(source, destination, error);
  }

  if (options.mode !== 'move') {
    return;
  }

  try {
    await fileSystem.unlink(source);
  } catch (error) {
    // Source could not be released: undo the published copy so the file lives in one place
    await removeIfPresent(destination, fileSystem);
    throw new MoveFailureError(source, destination, error);
  }
}
