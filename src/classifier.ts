/**
 * Maps a file name to one of the fixed categories.
 * Pure function of the path: no filesystem access.
 */

import { basename, extname } from 'path';
import mime from 'mime-types';
import { CATEGORIES, Category } from './types.js';

const CATEGORY_EXTENSIONS: Record<Exclude<Category, 'other'>, readonly string[]> = {
  document: [
    'pdf', 'doc', 'docx', 'txt', 'md', 'rtf', 'odt', 'csv', 'xls', 'xlsx', 'ods',
    'ppt', 'pptx', 'odp', 'pages', 'numbers', 'key', 'epub', 'tex', 'log',
  ],
  image: [
    'jpg', 'jpeg', 'png', 'gif', 'bmp', 'tiff', 'tif', 'webp', 'svg', 'heic', 'heif',
    'ico', 'raw', 'psd',
  ],
  video: ['mp4', 'mov', 'avi', 'mkv', 'wmv', 'flv', 'webm', 'm4v', 'mpeg', 'mpg', '3gp'],
  audio: ['mp3', 'wav', 'm4a', 'flac', 'aac', 'ogg', 'wma', 'aiff', 'opus', 'mid', 'midi'],
  code: [
    'py', 'js', 'mjs', 'cjs', 'ts', 'tsx', 'jsx', 'java', 'c', 'h', 'cpp', 'hpp', 'cs',
    'go', 'rs', 'rb', 'php', 'swift', 'kt', 'scala', 'sh', 'bash', 'html', 'css', 'scss',
    'json', 'yaml', 'yml', 'toml', 'xml', 'sql', 'ipynb',
  ],
  archive: ['zip', 'rar', '7z', 'tar', 'gz', 'tgz', 'bz2', 'xz', 'dmg', 'iso'],
};

const EXTENSION_TABLE = new Map<string, Category>();
for (const category of CATEGORIES) {
  for (const extension of extensionsFor(category)) {
    EXTENSION_TABLE.set(extension, category);
  }
}

const ARCHIVE_MIME_TYPES = new Set([
  'application/zip',
  'application/x-tar',
  'application/gzip',
  'application/x-gzip',
  'application/x-7z-compressed',
  'application/x-rar-compressed',
  'application/vnd.rar',
  'application/x-bzip2',
]);

/**
 * Lower-cased last extension without the dot, or '' when there is none.
 * Dotfiles such as `.env` have no extension.
 */
export function extensionOf(filePath: string): string {
  return extname(basename(filePath)).slice(1).toLowerCase();
}

export function categoryFromMimeType(mimeType: string): Category {
  const [topLevel] = mimeType.split('/');
  if (topLevel === 'image' || topLevel === 'video' || topLevel === 'audio') {
    return topLevel;
  }
  if (topLevel === 'text') {
    return 'document';
  }
  if (ARCHIVE_MIME_TYPES.has(mimeType)) {
    return 'archive';
  }
  return 'other';
}

export function classify(filePath: string): Category {
  const extension = extensionOf(filePath);
  if (!extension) {
    return 'other';
  }

  const byExtension = EXTENSION_TABLE.get(extension);
  if (byExtension) {
    return byExtension;
  }

  const mimeType = mime.lookup(extension);
  return mimeType ? categoryFromMimeType(mimeType) : 'other';
}

export function extensionsFor(category: Category): readonly string[] {
  return category === 'other' ? [] : CATEGORY_EXTENSIONS[category];
}
