import { describe, it, expect } from 'vitest';
import { InvalidFilePathError, ParserErrorKind } from '@symbolscope/core';
import { sanitizeFilePath, fileExtension } from './file-path.js';

function reasonOf(filePath: string): string | undefined {
  try {
    sanitizeFilePath(filePath);
    return undefined;
  } catch (error) {
    return error instanceof InvalidFilePathError ? error.reason : 'unexpected';
  }
}

describe('sanitizeFilePath', () => {
  it('should accept ordinary relative and absolute paths', () => {
    expect(sanitizeFilePath('src/widget.dart')).toBe('src/widget.dart');
    expect(sanitizeFilePath('/repo/include/math.hpp')).toBe('/repo/include/math.hpp');
  });

  it('should accept an empty path', () => {
    expect(sanitizeFilePath('')).toBe('');
  });

  it('should reject NUL bytes', () => {
    expect(reasonOf('src/a\0.cpp')).toBe('null bytes');
  });

  it('should reject paths longer than 4096 characters', () => {
    expect(reasonOf('a'.repeat(4096))).toBeUndefined();
    expect(reasonOf('a'.repeat(4097))).toBe('too long');
  });

  it('should reject traversal that survives cleaning', () => {
    expect(reasonOf('../../../etc/passwd')).toBe('path traversal detected');
    expect(reasonOf('src/../../secret.swift')).toBe('path traversal detected');
    expect(reasonOf('src\\..\\..\\secret.swift')).toBe('path traversal detected');
  });

  it('should accept dot-dot segments that clean away', () => {
    expect(reasonOf('src/nested/../main.cpp')).toBeUndefined();
  });

  it('should tag the error with the invalid_file_path kind', () => {
    try {
      sanitizeFilePath('../x.dart', 'parse');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidFilePathError);
      if (error instanceof InvalidFilePathError) {
        expect(error.kind).toBe(ParserErrorKind.INVALID_FILE_PATH);
        expect(error.message).toBe('parse ../x.dart: path traversal detected');
      }
    }
  });
});

describe('fileExtension', () => {
  it('should return the final extension lowercased', () => {
    expect(fileExtension('lib/model.g.dart')).toBe('dart');
    expect(fileExtension('Sources/App.SWIFT')).toBe('swift');
    expect(fileExtension('Makefile')).toBe('');
  });
});
