/**
 * Content-hash index used to detect repeats within and across runs.
 *
 * Loaded read-only at run start, appended to by the organizer's single
 * decision loop, flushed once at run end.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from 'fs';
import { dirname, join, basename } from 'path';
import { randomBytes } from 'crypto';
import { CorruptIndexError, IndexReadError } from './errors.js';
import { Logger, errorMessage } from './logger.js';

const logger = new Logger({ context: 'duplicate-index' });

export const INDEX_FORMAT_VERSION = 1;

export interface DuplicateIndexEntry {
  hash: string;
  /** Where the canonical copy lives: its destination, or its source when left in place */
  path: string;
  sizeBytes: number;
  firstSeenAt: string;
  runId: string;
}

interface PersistedEntry {
  hash: string;
  path: string;
  size_bytes: number;
  first_seen_at: string;
  run_id: string;
}

interface PersistedIndex {
  version: number;
  updated_at: string;
  entries: PersistedEntry[];
}

export interface LoadedIndex {
  index: DuplicateIndex;
  warning?: string;
  /** False when the file exists but could not be read; saving would discard it */
  saveable: boolean;
}

export type IndexReader = (indexPath: string) => string;

const readIndexFile: IndexReader = indexPath => readFileSync(indexPath, 'utf-8');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEntry(value: unknown): DuplicateIndexEntry | null {
  if (!isRecord(value)) return null;
  const { hash, path, size_bytes, first_seen_at, run_id } = value;
  if (
    typeof hash !== 'string' ||
    hash.length === 0 ||
    typeof path !== 'string' ||
    typeof size_bytes !== 'number' ||
    typeof first_seen_at !== 'string' ||
    typeof run_id !== 'string'
  ) {
    return null;
  }
  return { hash, path, sizeBytes: size_bytes, firstSeenAt: first_seen_at, runId: run_id };
}

export class DuplicateIndex {
  private entries = new Map<string, DuplicateIndexEntry>();

  constructor(entries: Iterable<DuplicateIndexEntry> = []) {
    for (const entry of entries) {
      if (!this.entries.has(entry.hash)) {
        this.entries.set(entry.hash, entry);
      }
    }
  }

  /**
   * Read a persisted index. A missing file is an empty index; an unparsable
   * one is also an empty index, with a warning for the report. A file that
   * cannot be read at all gives an empty index that must not be saved.
   */
  static load(indexPath: string, read: IndexReader = readIndexFile): LoadedIndex {
    if (!existsSync(indexPath)) {
      return { index: new DuplicateIndex(), saveable: true };
    }

    let content: string;
    try {
      content = read(indexPath);
    } catch (error) {
      const failure = new IndexReadError(indexPath, error);
      logger.warn(failure.message, { indexPath });
      return { index: new DuplicateIndex(), warning: failure.message, saveable: false };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return DuplicateIndex.corrupt(indexPath, errorMessage(error));
    }

    if (!isRecord(parsed) || parsed.version !== INDEX_FORMAT_VERSION || !Array.isArray(parsed.entries)) {
      return DuplicateIndex.corrupt(indexPath, 'unexpected structure');
    }

    const entries: DuplicateIndexEntry[] = [];
    for (const raw of parsed.entries) {
      const entry = parseEntry(raw);
      if (!entry) {
        return DuplicateIndex.corrupt(indexPath, 'malformed entry');
      }
      entries.push(entry);
    }

    logger.debug(`Loaded ${entries.length} index entries`, { indexPath });
    return { index: new DuplicateIndex(entries), saveable: true };
  }

  private static corrupt(indexPath: string, reason: string): LoadedIndex {
    const error = new CorruptIndexError(indexPath, reason);
    logger.warn(error.message, { indexPath });
    return { index: new DuplicateIndex(), warning: error.message, saveable: true };
  }

  get size(): number {
    return this.entries.size;
  }

  has(hash: string): boolean {
    return this.entries.has(hash);
  }

  get(hash: string): DuplicateIndexEntry | undefined {
    return this.entries.get(hash);
  }

  /**
   * Record a hash. First seen wins: an existing entry is kept and returned.
   */
  add(entry: DuplicateIndexEntry): DuplicateIndexEntry {
    const existing = this.entries.get(entry.hash);
    if (existing) {
      return existing;
    }
    this.entries.set(entry.hash, entry);
    return entry;
  }

  values(): DuplicateIndexEntry[] {
    return [...this.entries.values()];
  }

  toJSON(): PersistedIndex {
    const entries = this.values()
      .sort((left, right) => (left.hash < right.hash ? -1 : left.hash > right.hash ? 1 : 0))
      .map(entry => ({
        hash: entry.hash,
        path: entry.path,
        size_bytes: entry.sizeBytes,
        first_seen_at: entry.firstSeenAt,
        run_id: entry.runId,
      }));

    return {
      version: INDEX_FORMAT_VERSION,
      updated_at: new Date().toISOString(),
      entries,
    };
  }

  /**
   * Write through a temp file in the same directory, then rename into place.
   */
  save(indexPath: string): void {
    mkdirSync(dirname(indexPath), { recursive: true });
    const tempPath = join(dirname(indexPath), `.${basename(indexPath)}.${randomBytes(6).toString('hex')}.tmp`);

    try {
      writeFileSync(tempPath, `${JSON.stringify(this.toJSON(), null, 2)}\n`, 'utf8');
      renameSync(tempPath, indexPath);
    } catch (error) {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath);
      }
      throw error;
    }

    logger.debug(`Saved ${this.entries.size} index entries`, { indexPath });
  }
}
