import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { DuplicateIndex } from './duplicate-index.js';
import { DestinationRootError, SourceRootError, UnreadableFileError } from './errors.js';
import { FileSystemOps, nodeFileSystem } from './file-mover.js';
import { FileDigest, HashOptions, hashBuffer, hashFile } from './hasher.js';
import { FileOrganizer, OrganizerOptions, suffixedName } from './organizer.js';
import { FileRecord } from './types.js';
import { cleanupTestTempDir, createTestTempDir, writeTestFile } from './test-utils/temp-paths.js';

/** Hasher that fails for files named locked.* the way a permission error would */
function lockingHasher(filePath: string, options: HashOptions): Promise<FileDigest> {
  if (filePath.includes('locked.')) {
    const cause = Object.assign(new Error('permission denied'), { code: 'EACCES' });
    return Promise.reject(new UnreadableFileError(filePath, cause));
  }
  return hashFile(filePath, options);
}

function byName(records: FileRecord[]): Record<string, FileRecord> {
  return Object.fromEntries(records.map(record => [record.relativePath, record]));
}

describe('FileOrganizer', () => {
  let tempDir: string;
  let source: string;
  let destination: string;

  beforeEach(() => {
    tempDir = createTestTempDir('organizer');
    source = join(tempDir, 'inbox');
    destination = join(tempDir, 'library');
  });

  afterEach(() => {
    cleanupTestTempDir(tempDir);
  });

  const organizer = (options: Partial<OrganizerOptions> = {}, fileSystem?: FileSystemOps, index?: DuplicateIndex) =>
    new FileOrganizer(
      { sourceDirectory: source, destinationRoot: destination, mode: 'move', ...options },
      { hasher: lockingHasher, fileSystem, index }
    );

  describe('suffixedName', () => {
    it('should insert the suffix before the last extension', () => {
      expect(suffixedName('notes.txt', 0)).toBe('notes.txt');
      expect(suffixedName('notes.txt', 1)).toBe('notes_1.txt');
      expect(suffixedName('archive.tar.gz', 2)).toBe('archive.tar_2.gz');
      expect(suffixedName('.env', 1)).toBe('.env_1');
      expect(suffixedName('README', 3)).toBe('README_3');
    });
  });

  it('should organize, detect duplicates and skip unreadable files', async () => {
    writeTestFile(source, 'report.pdf', 'A');
    writeTestFile(source, 'report_copy.pdf', 'A');
    writeTestFile(source, 'photo.jpg', 'B');
    writeTestFile(source, 'script.py', 'C');
    writeTestFile(source, 'locked.txt', 'D');

    const outcome = await organizer().organize();
    const records = byName(outcome.records);

    expect(outcome.records.map(record => record.relativePath)).toEqual([
      'locked.txt',
      'photo.jpg',
      'report.pdf',
      'report_copy.pdf',
      'script.py',
    ]);
    expect(records['report.pdf']).toMatchObject({
      status: 'organized',
      category: 'document',
      destinationPath: join(destination, 'document', 'report.pdf'),
      contentHash: hashBuffer('A'),
      sizeBytes: 1,
    });
    expect(records['report_copy.pdf']).toMatchObject({
      status: 'duplicate',
      isDuplicate: true,
      duplicateOf: join(destination, 'document', 'report.pdf'),
      destinationPath: null,
    });
    expect(records['photo.jpg'].destinationPath).toBe(join(destination, 'image', 'photo.jpg'));
    expect(records['script.py'].destinationPath).toBe(join(destination, 'code', 'script.py'));
    expect(records['locked.txt']).toMatchObject({ status: 'skipped_unreadable', contentHash: null });
    expect(records['locked.txt'].reason).toContain('EACCES');

    expect(readdirSync(source).sort()).toEqual(['locked.txt', 'report_copy.pdf']);
    expect(readdirSync(destination).sort()).toEqual(['archive', 'audio', 'code', 'document', 'image', 'other', 'video']);
  });

  it('should suffix a name already taken by different content', async () => {
    writeTestFile(destination, 'document/notes.txt', 'old notes');
    writeTestFile(source, 'notes.txt', 'new notes');

    const { records } = await organizer().organize();

    expect(records[0]).toMatchObject({
      status: 'organized',
      destinationPath: join(destination, 'document', 'notes_1.txt'),
      collisionResolved: true,
    });
    expect(readFileSync(join(destination, 'document', 'notes.txt'), 'utf-8')).toBe('old notes');
    expect(readFileSync(join(destination, 'document', 'notes_1.txt'), 'utf-8')).toBe('new notes');
  });

  it('should give same-named files from different folders distinct destinations', async () => {
    writeTestFile(source, 'a/notes.txt', 'first');
    writeTestFile(source, 'b/notes.txt', 'second');

    const records = byName((await organizer().organize()).records);

    expect(records['a/notes.txt'].destinationPath).toBe(join(destination, 'document', 'notes.txt'));
    expect(records['b/notes.txt'].destinationPath).toBe(join(destination, 'document', 'notes_1.txt'));
  });

  it('should skip a file whose identical copy is already at the destination', async () => {
    writeTestFile(destination, 'image/photo.jpg', 'B');
    writeTestFile(source, 'photo.jpg', 'B');

    const { records } = await organizer().organize();

    expect(records[0]).toMatchObject({
      status: 'skipped_exists',
      destinationPath: join(destination, 'image', 'photo.jpg'),
    });
    expect(existsSync(join(source, 'photo.jpg'))).toBe(true);
  });

  it('should keep sources in copy mode', async () => {
    writeTestFile(source, 'song.mp3', 'tune');

    const { records } = await organizer({ mode: 'copy' }).organize();

    expect(records[0].status).toBe('organized');
    expect(readFileSync(join(source, 'song.mp3'), 'utf-8')).toBe('tune');
    expect(readFileSync(join(destination, 'audio', 'song.mp3'), 'utf-8')).toBe('tune');
  });

  it('should plan without touching the filesystem in dry-run mode', async () => {
    writeTestFile(source, 'clip.mp4', 'frames');
    writeTestFile(source, 'clip-again.mp4', 'frames');

    const records = byName((await organizer({ dryRun: true }).organize()).records);

    // 'clip-again.mp4' sorts first ('-' < '.'), so it is the canonical copy
    expect(records['clip-again.mp4']).toMatchObject({
      status: 'organized',
      destinationPath: join(destination, 'video', 'clip-again.mp4'),
    });
    expect(records['clip.mp4'].status).toBe('duplicate');
    expect(existsSync(destination)).toBe(false);
    expect(readdirSync(source).sort()).toEqual(['clip-again.mp4', 'clip.mp4']);
  });

  it('should record a move failure and leave the source untouched', async () => {
    writeTestFile(source, 'big.zip', 'zipped');
    writeTestFile(source, 'small.txt', 'text');
    const fileSystem: FileSystemOps = {
      ...nodeFileSystem,
      copyFile: async (from, to) => {
        if (from.endsWith('big.zip')) {
          throw Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
        }
        await nodeFileSystem.copyFile(from, to);
      },
    };

    const records = byName((await organizer({}, fileSystem).organize()).records);

    expect(records['big.zip']).toMatchObject({ status: 'move_failed', category: 'archive' });
    expect(records['big.zip'].reason).toContain('ENOSPC');
    expect(readFileSync(join(source, 'big.zip'), 'utf-8')).toBe('zipped');
    expect(readdirSync(join(destination, 'archive'))).toEqual([]);
    expect(records['small.txt'].status).toBe('organized');
  });

  it('should quarantine duplicates when asked to', async () => {
    writeTestFile(source, 'report.pdf', 'A');
    writeTestFile(source, 'report_copy.pdf', 'A');

    const records = byName((await organizer({ duplicatePolicy: 'quarantine' }).organize()).records);

    expect(records['report_copy.pdf']).toMatchObject({
      status: 'duplicate',
      destinationPath: join(destination, 'duplicates', 'report_copy.pdf'),
    });
    expect(existsSync(join(source, 'report_copy.pdf'))).toBe(false);
    expect(readFileSync(join(destination, 'duplicates', 'report_copy.pdf'), 'utf-8')).toBe('A');
  });

  it('should mark every file cancelled when the signal is already aborted', async () => {
    writeTestFile(source, 'a.txt', 'a');
    writeTestFile(source, 'b.txt', 'b');
    const controller = new AbortController();
    controller.abort();

    const outcome = await organizer({ signal: controller.signal }).organize();

    expect(outcome.records.map(record => record.status)).toEqual(['skipped_cancelled', 'skipped_cancelled']);
    expect(outcome.warnings).toEqual(['Run cancelled after 0 of 2 files']);
    expect(existsSync(join(source, 'a.txt'))).toBe(true);
  });

  it('should let the earlier file win the duplicate slot even when it hashes last', async () => {
    writeTestFile(source, 'a.txt', 'same');
    writeTestFile(source, 'b.txt', 'same');
    const finished: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });
    const slowFirstHasher = async (filePath: string, options: HashOptions): Promise<FileDigest> => {
      if (filePath.endsWith('a.txt')) {
        await firstGate;
      }
      const digest = await hashFile(filePath, options);
      finished.push(filePath.endsWith('a.txt') ? 'a.txt' : 'b.txt');
      releaseFirst();
      return digest;
    };

    const outcome = await new FileOrganizer(
      { sourceDirectory: source, destinationRoot: destination, mode: 'move', hashConcurrency: 2 },
      { hasher: slowFirstHasher }
    ).organize();
    const records = byName(outcome.records);

    expect(finished).toEqual(['b.txt', 'a.txt']);
    expect(records['a.txt']).toMatchObject({
      status: 'organized',
      destinationPath: join(destination, 'document', 'a.txt'),
    });
    expect(records['b.txt']).toMatchObject({
      status: 'duplicate',
      duplicateOf: join(destination, 'document', 'a.txt'),
    });
    expect(existsSync(join(source, 'b.txt'))).toBe(true);
  });

  it('should finish the transfer in progress and cancel the files after it', async () => {
    writeTestFile(source, 'a.txt', 'a');
    writeTestFile(source, 'b.txt', 'b');
    writeTestFile(source, 'c.txt', 'c');
    const controller = new AbortController();
    const fileSystem: FileSystemOps = {
      ...nodeFileSystem,
      copyFile: async (from, to) => {
        controller.abort();
        await nodeFileSystem.copyFile(from, to);
      },
    };

    const outcome = await organizer({ signal: controller.signal }, fileSystem).organize();

    expect(outcome.records.map(record => [record.relativePath, record.status])).toEqual([
      ['a.txt', 'organized'],
      ['b.txt', 'skipped_cancelled'],
      ['c.txt', 'skipped_cancelled'],
    ]);
    expect(outcome.warnings).toEqual(['Run cancelled after 1 of 3 files']);
    expect(readFileSync(join(destination, 'document', 'a.txt'), 'utf-8')).toBe('a');
    expect(existsSync(join(source, 'a.txt'))).toBe(false);
    expect(readdirSync(join(destination, 'document'))).toEqual(['a.txt']);
    expect(readdirSync(source).sort()).toEqual(['b.txt', 'c.txt']);
  });

  it('should refuse to start with a hash algorithm the runtime lacks', async () => {
    writeTestFile(source, 'a.txt', 'a');

    await expect(organizer({ hashAlgorithm: 'sha257' }).organize()).rejects.toMatchObject({
      code: 'INVALID_CONFIG',
      message: 'Unsupported hash algorithm: sha257',
    });
    expect(existsSync(destination)).toBe(false);
    expect(existsSync(join(source, 'a.txt'))).toBe(true);
  });

  it('should treat a file already at its category path as in place', async () => {
    writeTestFile(tempDir, 'library/document/kept.pdf', 'K');
    writeTestFile(tempDir, 'library/loose.png', 'L');
    source = destination;

    const records = byName((await organizer().organize()).records);

    expect(records['document/kept.pdf']).toMatchObject({
      status: 'skipped_exists',
      destinationPath: join(destination, 'document', 'kept.pdf'),
    });
    expect(records['loose.png'].destinationPath).toBe(join(destination, 'image', 'loose.png'));
  });

  it('should recognise files placed by an earlier run through a seeded index', async () => {
    writeTestFile(destination, 'document/report.pdf', 'A');
    const index = new DuplicateIndex([
      {
        hash: hashBuffer('A'),
        path: join(destination, 'document', 'report.pdf'),
        sizeBytes: 1,
        firstSeenAt: '2026-01-01T00:00:00.000Z',
        runId: 'earlier-run',
      },
    ]);
    writeTestFile(source, 'old/report.pdf', 'A');
    writeTestFile(source, 'renamed.pdf', 'A');

    const records = byName((await organizer({}, undefined, index).organize()).records);

    expect(records['old/report.pdf'].status).toBe('skipped_exists');
    expect(records['renamed.pdf']).toMatchObject({
      status: 'duplicate',
      duplicateOf: join(destination, 'document', 'report.pdf'),
    });
  });

  it('should fail fast when the source root is missing', async () => {
    await expect(organizer().organize()).rejects.toBeInstanceOf(SourceRootError);
  });

  it('should fail fast when the destination root cannot be created', async () => {
    writeTestFile(source, 'a.txt', 'a');
    writeTestFile(tempDir, 'library', 'I am a file');

    await expect(organizer().organize()).rejects.toBeInstanceOf(DestinationRootError);
    expect(existsSync(join(source, 'a.txt'))).toBe(true);
  });
});
