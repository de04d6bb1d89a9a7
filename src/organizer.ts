/**
 * File organizer: scan, hash, classify, decide and transfer.
 *
 * Hashing runs ahead on a bounded pool; every decision that touches the
 * duplicate index or the destination tree happens in one loop, in
 * discovery order, so "first seen wins" and destination uniqueness hold
 * without locking.
 */

import { getHashes, randomUUID } from 'crypto';
import { stat } from 'fs/promises';
import path from 'path';
import pLimit from 'p-limit';
import { classify } from './classifier.js';
import { DuplicateIndex, DuplicateIndexEntry } from './duplicate-index.js';
import { DestinationRootError, UnreadableFileError, errnoCode } from './errors.js';
import { FileSystemOps, nodeFileSystem, transferFile } from './file-mover.js';
import { FileDigest, HashOptions, hashFile } from './hasher.js';
import { AppError, Logger, errorMessage } from './logger.js';
import { DiscoveredFile, assertSourceRoot, scanSourceTree } from './scanner.js';
import { CATEGORIES, Category, DuplicatePolicy, FileRecord, TransferMode } from './types.js';

const logger = new Logger({ context: 'organizer' });

const MAX_COLLISION_SUFFIX = 10_000;

export interface OrganizerOptions {
  sourceDirectory: string;
  destinationRoot: string;
  mode: TransferMode;
  dryRun?: boolean;
  duplicatePolicy?: DuplicatePolicy;
  /** Directory name under the destination root for quarantined duplicates */
  quarantineDir?: string;
  hashAlgorithm?: string;
  chunkSizeBytes?: number;
  hashConcurrency?: number;
  verifyCopies?: boolean;
  includeGlobs?: string[];
  excludeGlobs?: string[];
  /** Absolute paths kept out of the scan, e.g. the reports directory */
  excludePaths?: string[];
  runId?: string;
  /** Checked between files, never during a transfer */
  signal?: AbortSignal;
}

export interface OrganizerDependencies {
  index?: DuplicateIndex;
  fileSystem?: FileSystemOps;
  hasher?: (filePath: string, options: HashOptions) => Promise<FileDigest>;
  classifier?: (filePath: string) => Category;
}

export interface OrganizeOutcome {
  runId: string;
  startedAt: Date;
  elapsedMs: number;
  records: FileRecord[];
  warnings: string[];
}

type HashOutcome = { ok: true; digest: FileDigest } | { ok: false; reason: string };

type DestinationProbe =
  | { kind: 'free'; path: string; collisionResolved: boolean }
  | { kind: 'exists'; path: string };

/**
 * Split a file name for suffixing: `notes.txt` → `notes` + `.txt`,
 * `archive.tar.gz` → `archive.tar` + `.gz`, `.env` → `.env` + ``.
 */
export function suffixedName(fileName: string, attempt: number): string {
  if (attempt === 0) {
    return fileName;
  }
  const parsed = path.parse(fileName);
  return `${parsed.name}_${attempt}${parsed.ext}`;
}

export class FileOrganizer {
  readonly runId: string;
  private readonly options: OrganizerOptions;
  private readonly index: DuplicateIndex;
  private readonly fileSystem: FileSystemOps;
  private readonly hasher: (filePath: string, options: HashOptions) => Promise<FileDigest>;
  private readonly classifier: (filePath: string) => Category;
  private readonly sourceRoot: string;
  private readonly destinationRoot: string;
  private readonly reserved = new Set<string>();
  private readonly warnings: string[] = [];

  constructor(options: OrganizerOptions, dependencies: OrganizerDependencies = {}) {
    this.options = options;
    this.runId = options.runId ?? randomUUID();
    this.index = dependencies.index ?? new DuplicateIndex();
    this.fileSystem = dependencies.fileSystem ?? nodeFileSystem;
    this.hasher = dependencies.hasher ?? hashFile;
    this.classifier = dependencies.classifier ?? classify;
    this.sourceRoot = path.resolve(options.sourceDirectory);
    this.destinationRoot = path.resolve(options.destinationRoot);
  }

  get duplicateIndex(): DuplicateIndex {
    return this.index;
  }

  private get hashOptions(): HashOptions {
    return { algorithm: this.options.hashAlgorithm, chunkSizeBytes: this.options.chunkSizeBytes };
  }

  private get quarantineRoot(): string {
    return path.join(this.destinationRoot, this.options.quarantineDir ?? 'duplicates');
  }

  /**
   * Check the source root and create the destination layout. Throws
   * SourceRootError / DestinationRootError, or INVALID_CONFIG for a hash
   * algorithm the runtime lacks; nothing has been touched yet.
   */
  async prepare(): Promise<void> {
    const algorithm = this.options.hashAlgorithm;
    if (algorithm !== undefined && !getHashes().includes(algorithm.toLowerCase())) {
      throw new AppError(`Unsupported hash algorithm: ${algorithm}`, 'INVALID_CONFIG', 400, { algorithm });
    }

    await assertSourceRoot(this.sourceRoot);

    if (this.options.dryRun) {
      let isDirectory = true;
      try {
        isDirectory = !(await this.fileSystem.exists(this.destinationRoot)) || (await stat(this.destinationRoot)).isDirectory();
      } catch (error) {
        throw new DestinationRootError(this.destinationRoot, errnoCode(error) ?? errorMessage(error));
      }
      if (!isDirectory) {
        throw new DestinationRootError(this.destinationRoot, 'not a directory');
      }
      return;
    }

    try {
      await this.fileSystem.mkdir(this.destinationRoot);
      for (const category of CATEGORIES) {
        await this.fileSystem.mkdir(path.join(this.destinationRoot, category));
      }
    } catch (error) {
      throw new DestinationRootError(this.destinationRoot, errnoCode(error) ?? errorMessage(error));
    }
  }

  async organize(): Promise<OrganizeOutcome> {
    const startedAt = new Date();
    const started = Date.now();
    await this.prepare();

    const files = await scanSourceTree(this.sourceRoot, {
      includeGlobs: this.options.includeGlobs,
      excludeGlobs: this.options.excludeGlobs,
      excludePaths: [...(this.options.excludePaths ?? []), this.quarantineRoot],
      onWarning: message => this.warnings.push(message),
    });

    logger.info(`Organizing ${files.length} files`, {
      runId: this.runId,
      source: this.sourceRoot,
      destination: this.destinationRoot,
      mode: this.options.mode,
      dryRun: this.options.dryRun === true,
    });

    const limit = pLimit(Math.max(1, this.options.hashConcurrency ?? 4));
    const digests = files.map(file => limit(() => this.digest(file)));
    const records: FileRecord[] = [];

    for (let position = 0; position < files.length; position++) {
      const file = files[position];

      if (this.options.signal?.aborted) {
        limit.clearQueue();
        for (const remaining of files.slice(position)) {
          records.push(this.cancelledRecord(remaining));
        }
        this.warnings.push(`Run cancelled after ${position} of ${files.length} files`);
        logger.warn('Run cancelled', { runId: this.runId, processed: position, total: files.length });
        break;
      }

      const hashed = await digests[position];
      try {
        records.push(await this.decide(file, hashed));
      } catch (error) {
        records.push(this.failedRecord(file, hashed, error));
      }
    }

    const elapsedMs = Date.now() - started;
    logger.info(`Run finished in ${elapsedMs}ms`, { runId: this.runId, files: records.length });

    return { runId: this.runId, startedAt, elapsedMs, records, warnings: [...this.warnings] };
  }

  private async digest(file: DiscoveredFile): Promise<HashOutcome> {
    try {
      return { ok: true, digest: await this.hasher(file.absolutePath, this.hashOptions) };
    } catch (error) {
      const failure = error instanceof UnreadableFileError ? error : new UnreadableFileError(file.absolutePath, error);
      return { ok: false, reason: failure.message };
    }
  }

  private baseRecord(file: DiscoveredFile, category: Category): FileRecord {
    return {
      sourcePath: file.absolutePath,
      relativePath: file.relativePath,
      sizeBytes: file.sizeBytes,
      contentHash: null,
      category,
      destinationPath: null,
      isDuplicate: false,
      collisionResolved: false,
      status: 'skipped_unreadable',
    };
  }

  private cancelledRecord(file: DiscoveredFile): FileRecord {
    return {
      ...this.baseRecord(file, this.classifier(file.absolutePath)),
      status: 'skipped_cancelled',
      reason: 'Run cancelled before this file was processed',
    };
  }

  private failedRecord(file: DiscoveredFile, hashed: HashOutcome, error: unknown): FileRecord {
    const reason = errorMessage(error);
    logger.warn('File could not be placed', { path: file.absolutePath, reason });
    return {
      ...this.baseRecord(file, this.classifier(file.absolutePath)),
      contentHash: hashed.ok ? hashed.digest.hash : null,
      sizeBytes: hashed.ok ? hashed.digest.sizeBytes : file.sizeBytes,
      status: 'move_failed',
      reason,
    };
  }

  private async decide(file: DiscoveredFile, hashed: HashOutcome): Promise<FileRecord> {
    const record = this.baseRecord(file, this.classifier(file.absolutePath));

    if (!hashed.ok) {
      logger.warn('Skipping unreadable file', { path: file.absolutePath, reason: hashed.reason });
      return { ...record, reason: hashed.reason };
    }

    record.contentHash = hashed.digest.hash;
    record.sizeBytes = hashed.digest.sizeBytes;

    const naturalDirectory = path.join(this.destinationRoot, record.category);
    const canonical = this.index.get(hashed.digest.hash);

    if (canonical && canonical.path !== file.absolutePath) {
      if (canonical.runId !== this.runId) {
        // Seeded from an earlier run: the canonical copy may be this very file, already in place
        const probe = await this.probeDestination(naturalDirectory, path.basename(file.absolutePath), hashed.digest.hash);
        if (probe.kind === 'exists' && probe.path === canonical.path) {
          return { ...record, destinationPath: probe.path, status: 'skipped_exists' };
        }
      }
      return this.handleDuplicate(file, record, canonical);
    }

    const naturalPath = path.join(naturalDirectory, path.basename(file.absolutePath));
    if (naturalPath === file.absolutePath) {
      this.remember(record, file.absolutePath);
      return { ...record, destinationPath: naturalPath, status: 'skipped_exists' };
    }

    const probe = await this.probeDestination(naturalDirectory, path.basename(file.absolutePath), hashed.digest.hash);
    if (probe.kind === 'exists') {
      this.remember(record, probe.path);
      return { ...record, destinationPath: probe.path, status: 'skipped_exists' };
    }

    this.reserved.add(probe.path);
    if (probe.collisionResolved) {
      logger.info('DestinationCollisionResolved', {
        source: file.absolutePath,
        destination: probe.path,
      });
    }

    const planned: FileRecord = {
      ...record,
      destinationPath: probe.path,
      collisionResolved: probe.collisionResolved,
    };

    const failure = await this.transfer(file.absolutePath, probe.path, hashed.digest.hash);
    if (failure) {
      this.remember(record, file.absolutePath);
      return { ...planned, status: 'move_failed', reason: failure };
    }

    this.remember(record, probe.path);
    return { ...planned, status: 'organized' };
  }

  private async handleDuplicate(
    file: DiscoveredFile,
    record: FileRecord,
    canonical: DuplicateIndexEntry
  ): Promise<FileRecord> {
    const duplicate: FileRecord = {
      ...record,
      isDuplicate: true,
      duplicateOf: canonical.path,
      status: 'duplicate',
    };

    if (this.options.duplicatePolicy !== 'quarantine' || record.contentHash === null) {
      return duplicate;
    }

    const probe = await this.probeDestination(this.quarantineRoot, path.basename(file.absolutePath), record.contentHash);
    if (probe.kind === 'exists') {
      return { ...duplicate, destinationPath: probe.path };
    }

    this.reserved.add(probe.path);
    const failure = await this.transfer(file.absolutePath, probe.path, record.contentHash);
    if (failure) {
      return { ...duplicate, destinationPath: probe.path, status: 'move_failed', reason: failure };
    }
    return { ...duplicate, destinationPath: probe.path, collisionResolved: probe.collisionResolved };
  }

  /**
   * Returns a failure reason, or null when the transfer succeeded (or
   * would have, in a dry run).
   */
  private async transfer(source: string, destination: string, expectedHash: string): Promise<string | null> {
    if (this.options.dryRun) {
      return null;
    }

    try {
      await transferFile(source, destination, {
        mode: this.options.mode,
        expectedHash,
        verify: this.options.verifyCopies,
        hashOptions: this.hashOptions,
        fileSystem: this.fileSystem,
      });
      return null;
    } catch (error) {
      logger.warn('Transfer failed; source left in place', { source, destination, reason: errorMessage(error) });
      return errorMessage(error);
    }
  }

  private remember(record: FileRecord, canonicalPath: string): void {
    if (record.contentHash === null) return;
    this.index.add({
      hash: record.contentHash,
      path: canonicalPath,
      sizeBytes: record.sizeBytes,
      firstSeenAt: new Date().toISOString(),
      runId: this.runId,
    });
  }

  /**
   * Find where a file named `fileName` lands in `directory`: the first name
   * that is neither taken nor reserved in this run, or an existing file
   * that already holds the same bytes.
   */
  private async probeDestination(directory: string, fileName: string, hash: string): Promise<DestinationProbe> {
    for (let attempt = 0; attempt < MAX_COLLISION_SUFFIX; attempt++) {
      const candidate = path.join(directory, suffixedName(fileName, attempt));
      if (this.reserved.has(candidate)) {
        continue;
      }
      if (!(await this.fileSystem.exists(candidate))) {
        return { kind: 'free', path: candidate, collisionResolved: attempt > 0 };
      }
      if (await this.holdsSameContent(candidate, hash)) {
        return { kind: 'exists', path: candidate };
      }
    }
    throw new Error(`No free name for ${fileName} in ${directory}`);
  }

  private async holdsSameContent(candidate: string, hash: string): Promise<boolean> {
    try {
      const existing = await this.hasher(candidate, this.hashOptions);
      return existing.hash === hash;
    } catch (error) {
      logger.debug('Existing destination unreadable; treating as a collision', {
        path: candidate,
        reason: errorMessage(error),
      });
      return false;
    }
  }
}
