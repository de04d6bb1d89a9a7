/**
 * Streaming content hashes for duplicate detection
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { UnreadableFileError } from './errors.js';

export interface HashOptions {
  algorithm?: string;
  chunkSizeBytes?: number;
}

export interface FileDigest {
  hash: string;
  /** Bytes actually read, which may differ from a stale stat */
  sizeBytes: number;
}

export const DEFAULT_HASH_ALGORITHM = 'sha256';
export const DEFAULT_CHUNK_SIZE_BYTES = 64 * 1024;

export function hashBuffer(content: Buffer | string, algorithm: string = DEFAULT_HASH_ALGORITHM): string {
  return createHash(algorithm).update(content).digest('hex');
}

/**
 * Hash a file in bounded chunks. Rejects with UnreadableFileError when the
 * file cannot be opened or a read fails mid-stream; never retries.
 */
export function hashFile(filePath: string, options: HashOptions = {}): Promise<FileDigest> {
  const algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
  const chunkSizeBytes = options.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE_BYTES;

  return new Promise<FileDigest>((resolve, reject) => {
    const digest = createHash(algorithm);
    let sizeBytes = 0;
    const stream = createReadStream(filePath, { highWaterMark: chunkSizeBytes });

    stream.on('error', error => {
      stream.destroy();
      reject(new UnreadableFileError(filePath, error));
    });
    stream.on('data', chunk => {
      sizeBytes += chunk.length;
      digest.update(chunk);
    });
    stream.on('end', () => resolve({ hash: digest.digest('hex'), sizeBytes }));
  });
}
