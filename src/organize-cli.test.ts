import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { exitCodeFor, formatSummary, main, parseArgs } from './organize-cli.js';
import { buildReport } from './reporter.js';
import { cleanupTestTempDir, createTestTempDir, writeTestFile } from './test-utils/temp-paths.js';

describe('organize-cli', () => {
  describe('parseArgs', () => {
    it('should read every flag', () => {
      expect(
        parseArgs([
          '--source',
          'inbox',
          '--dest',
          'library',
          '--mode',
          'copy',
          '--dry-run',
          '--index',
          'state/index.json',
          '--reports-dir',
          'reports',
          '--duplicates',
          'quarantine',
          '--config',
          'custom.yaml',
        ])
      ).toEqual({
        source: 'inbox',
        dest: 'library',
        mode: 'copy',
        dryRun: true,
        index: 'state/index.json',
        reportsDir: 'reports',
        duplicates: 'quarantine',
        configPath: 'custom.yaml',
        help: false,
      });
    });

    it('should require source and destination', () => {
      expect(() => parseArgs(['--source', 'inbox'])).toThrow('--source and --dest are required');
    });

    it('should reject unknown flags and bad values', () => {
      expect(() => parseArgs(['--force'])).toThrow('Unknown argument: --force');
      expect(() => parseArgs(['--source', 'a', '--dest', 'b', '--mode', 'link'])).toThrow('--mode must be move or copy');
      expect(() => parseArgs(['--source', '--dest', 'b'])).toThrow('--source requires a value');
    });

    it('should allow help without directories', () => {
      expect(parseArgs(['--help']).help).toBe(true);
    });
  });

  it('should map run status to exit codes', () => {
    expect(exitCodeFor('ok')).toBe(0);
    expect(exitCodeFor('partial_failure')).toBe(2);
    expect(exitCodeFor('fatal_error')).toBe(1);
  });

  it('should format a summary', () => {
    const report = buildReport([], {
      runId: 'run-1',
      startedAt: new Date('2026-03-01T10:00:00.000Z'),
      elapsedMs: 5,
      mode: 'move',
      dryRun: true,
      sourceDirectory: '/inbox',
      destinationRoot: '/lib',
    });

    expect(formatSummary(report, null)).toEqual([
      'Status:     ok (dry run)',
      'Scanned:    0',
      'Organized:  0',
      'Duplicates: 0',
      'Skipped:    0',
      'Report:     (not written)',
    ]);
  });

  describe('main', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTestTempDir('cli');
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
      cleanupTestTempDir(tempDir);
    });

    const baseArgs = () => [
      '--config',
      join(tempDir, 'absent.yaml'),
      '--reports-dir',
      join(tempDir, 'reports'),
      '--dest',
      join(tempDir, 'library'),
    ];

    it('should organize and exit 0 on a clean run', async () => {
      writeTestFile(tempDir, 'inbox/notes.txt', 'hello');

      const code = await main([...baseArgs(), '--source', join(tempDir, 'inbox')]);

      expect(code).toBe(0);
      expect(existsSync(join(tempDir, 'library', 'document', 'notes.txt'))).toBe(true);
      expect(readdirSync(join(tempDir, 'reports'))).toHaveLength(1);
    });

    it('should exit 1 when the source is missing', async () => {
      const code = await main([...baseArgs(), '--source', join(tempDir, 'missing')]);
      expect(code).toBe(1);
    });

    it('should exit 1 on a usage error', async () => {
      expect(await main(['--bogus'])).toBe(1);
    });

    it('should exit 1 on an invalid config file', async () => {
      const configPath = writeTestFile(tempDir, 'bad.yaml', 'organizer:\n  mode: shuffle\n');
      const code = await main(['--config', configPath, '--source', tempDir, '--dest', join(tempDir, 'library')]);
      expect(code).toBe(1);
    });

    it('should exit 1 before touching files when the hash algorithm is unsupported', async () => {
      const configPath = writeTestFile(tempDir, 'bad-hash.yaml', 'organizer:\n  hashAlgorithm: sha257\n');
      const code = await main(['--config', configPath, '--source', tempDir, '--dest', join(tempDir, 'library')]);
      expect(code).toBe(1);
      expect(existsSync(join(tempDir, 'library'))).toBe(false);
    });
  });
});
