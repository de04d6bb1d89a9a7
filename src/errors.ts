/**
 * Error taxonomy for organization runs.
 *
 * File-level errors (unreadable, move failure) are caught inside the
 * organizer loop and recorded on the file's record. Root errors abort the
 * run before any file is touched.
 */

import { AppError } from './logger.js';

function errnoCode(cause: unknown): string | undefined {
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

function describeCause(cause: unknown): string {
  const code = errnoCode(cause);
  const message = cause instanceof Error ? cause.message : String(cause);
  return code && !message.includes(code) ? `${code}: ${message}` : message;
}

export class UnreadableFileError extends AppError {
  readonly errno?: string;

  constructor(public readonly filePath: string, cause: unknown) {
    super(`Cannot read ${filePath}: ${describeCause(cause)}`, 'UNREADABLE_FILE', 422, {
      filePath,
      errno: errnoCode(cause),
    });
    this.name = 'UnreadableFileError';
    this.errno = errnoCode(cause);
  }
}

export class MoveFailureError extends AppError {
  constructor(
    public readonly sourcePath: string,
    public readonly destinationPath: string,
    cause: unknown
  ) {
    super(
      `Failed to transfer ${sourcePath} to ${destinationPath}: ${describeCause(cause)}`,
      'MOVE_FAILURE',
      500,
      { sourcePath, destinationPath, errno: errnoCode(cause) }
    );
    this.name = 'MoveFailureError';
  }
}

export class SourceRootError extends AppError {
  constructor(public readonly rootPath: string, reason: string) {
    super(`Source directory not accessible: ${rootPath} (${reason})`, 'SOURCE_ROOT_ERROR', 400, { rootPath });
    this.name = 'SourceRootError';
  }
}

export class DestinationRootError extends AppError {
  constructor(public readonly rootPath: string, reason: string) {
    super(`Destination root cannot be created: ${rootPath} (${reason})`, 'DESTINATION_ROOT_ERROR', 400, {
      rootPath,
    });
    this.name = 'DestinationRootError';
  }
}

export class CorruptIndexError extends AppError {
  constructor(public readonly indexPath: string, reason: string) {
    super(`Duplicate index at ${indexPath} is corrupt (${reason}); starting with an empty index`, 'CORRUPT_INDEX', 422, {
      indexPath,
    });
    this.name = 'CorruptIndexError';
  }
}

export class IndexReadError extends AppError {
  constructor(public readonly indexPath: string, cause: unknown) {
    super(
      `Duplicate index at ${indexPath} could not be read (${describeCause(cause)}); it will not be updated by this run`,
      'INDEX_READ_ERROR',
      500,
      { indexPath, errno: errnoCode(cause) }
    );
    this.name = 'IndexReadError';
  }
}

export { errnoCode, describeCause };
