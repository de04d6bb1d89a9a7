import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

/**
 * Create a unique scratch directory under the OS temp dir.
 */
export function createTestTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `file-organizer-${prefix}-`));
}

export function cleanupTestTempDir(dir: string | undefined): void {
  if (dir) {
    rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Write a file (and its parent directories) under `root`.
 */
export function writeTestFile(root: string, relativePath: string, content: string | Buffer): string {
  const target = join(root, relativePath);
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, content);
  return target;
}
