import path from 'path';
import { InvalidFilePathError, MAX_FILE_PATH_LENGTH } from '@symbolscope/core';

/**
 * Validate a caller-supplied path before it reaches the cache or a parser.
 *
 * Separators are normalized to `/` and the result is cleaned with posix rules,
 * so `a/../b` is fine while `../b` is not. An empty path is accepted.
 *
 * @returns The path exactly as given
 * @throws InvalidFilePathError with reason `null bytes`, `too long` or `path traversal detected`
 */
export function sanitizeFilePath(filePath: string, operation = 'sanitize_path'): string {
  if (filePath === '') {
    return filePath;
  }

  if (filePath.includes('\0')) {
    throw new InvalidFilePathError('null bytes', { operation });
  }

  if (filePath.length > MAX_FILE_PATH_LENGTH) {
    throw new InvalidFilePathError('too long', {
      operation,
      context: { length: filePath.length, limit: MAX_FILE_PATH_LENGTH },
    });
  }

  const cleaned = path.posix.normalize(filePath.replace(/\\/g, '/'));
  if (cleaned.split('/').includes('..')) {
    throw new InvalidFilePathError('path traversal detected', { operation, filePath });
  }

  return filePath;
}

/**
 * Final extension of a path, lowercased and without the dot.
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}
