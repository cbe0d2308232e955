import { describe, it, expect } from 'vitest';
import {
  ParserError,
  ParserErrorKind,
  ValidationError,
  InvalidFilePathError,
  ParsingError,
  PanicError,
  CacheError,
  wrapError,
  isParserError,
  isErrorKind,
  getErrorMessage,
  getErrorStack,
} from './index.js';

describe('ParserError', () => {
  it('should create error with all properties', () => {
    const error = new ParserError(ParserErrorKind.PARSING, 'grammar failed', {
      operation: 'parse_cpp',
      filePath: 'src/a.cpp',
      language: 'cpp',
      context: { attempt: 1 },
      severity: 'high',
      recoverable: false,
    });

    expect(error.message).toBe('parse_cpp src/a.cpp (cpp): grammar failed');
    expect(error.kind).toBe('parsing');
    expect(error.reason).toBe('grammar failed');
    expect(error.operation).toBe('parse_cpp');
    expect(error.filePath).toBe('src/a.cpp');
    expect(error.language).toBe('cpp');
    expect(error.context).toEqual({ attempt: 1 });
    expect(error.severity).toBe('high');
    expect(error.recoverable).toBe(false);
    expect(error.name).toBe('ParserError');
  });

  it('should create error with defaults', () => {
    const error = new ParserError(ParserErrorKind.AST, 'node is missing', { operation: 'walk' });

    expect(error.message).toBe('walk: node is missing');
    expect(error.filePath).toBeUndefined();
    expect(error.language).toBeUndefined();
    expect(error.severity).toBe('medium');
    expect(error.recoverable).toBe(true);
    expect(error.isRecoverable()).toBe(true);
  });

  it('should keep the cause chain', () => {
    const root = new Error('disk gone');
    const error = new CacheError('set failed', { operation: 'cache_set', cause: root });

    expect(error.cause).toBe(root);
  });

  it('should serialize to JSON correctly', () => {
    const error = new ValidationError('content is empty', {
      operation: 'validate_inputs',
      filePath: 'main.cpp',
      language: 'cpp',
    });

    expect(error.toJSON()).toEqual({
      error: 'validate_inputs main.cpp (cpp): content is empty',
      kind: 'validation',
      reason: 'content is empty',
      operation: 'validate_inputs',
      filePath: 'main.cpp',
      language: 'cpp',
      severity: 'medium',
      recoverable: true,
      context: undefined,
    });
  });
});

describe('Error subclasses', () => {
  it('should tag each subclass with its kind', () => {
    expect(new InvalidFilePathError('null bytes', { operation: 'sanitize' }).kind).toBe(
      ParserErrorKind.INVALID_FILE_PATH,
    );
    expect(new ParsingError('parsing exceeded timeout', { operation: 'parse' }).kind).toBe(
      ParserErrorKind.PARSING,
    );
    expect(new CacheError('miss', { operation: 'get' }).kind).toBe(ParserErrorKind.CACHE);
  });

  it('should be instances of ParserError and Error', () => {
    const error = new InvalidFilePathError('too long', { operation: 'sanitize' });

    expect(error).toBeInstanceOf(ParserError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InvalidFilePathError');
    expect(error.reason).toBe('too long');
  });

  it('should capture the thrown value and stack in PanicError', () => {
    const thrown = new TypeError('cannot read properties of undefined');
    const error = new PanicError(thrown, {
      operation: 'extract_classes',
      filePath: 'lib/main.dart',
      language: 'dart',
    });

    expect(error.kind).toBe('panic_recovered');
    expect(error.panicValue).toBe('cannot read properties of undefined');
    expect(error.panicStack).toBe(thrown.stack);
    expect(error.reason).toBe('panic recovered: cannot read properties of undefined');
    expect(error.cause).toBe(thrown);
  });

  it('should stringify non-Error panic values', () => {
    const error = new PanicError('boom', { operation: 'step' });

    expect(error.panicValue).toBe('boom');
    expect(error.panicStack).toBe(error.stack);
  });
});

describe('wrapError', () => {
  it('should wrap standard Error', () => {
    const original = new Error('Original error');
    const wrapped = wrapError(original, 'parse_dart', { filePath: 'a.dart' });

    expect(wrapped).toBeInstanceOf(ParserError);
    expect(wrapped.message).toBe('parse_dart a.dart: Original error');
    expect(wrapped.stack).toContain('Caused by:');
    expect(wrapped.cause).toBe(original);
  });

  it('should wrap string errors', () => {
    const wrapped = wrapError('String error', 'op');

    expect(wrapped.message).toBe('op: String error');
  });

  it('should pass ParserErrors through unchanged', () => {
    const original = new ValidationError('content is empty', { operation: 'validate' });

    expect(wrapError(original, 'other')).toBe(original);
  });
});

describe('helpers', () => {
  it('should identify ParserError instances', () => {
    expect(isParserError(new ValidationError('x', { operation: 'o' }))).toBe(true);
    expect(isParserError(new Error('x'))).toBe(false);
    expect(isParserError('x')).toBe(false);
  });

  it('should check kinds', () => {
    const error = new CacheError('x', { operation: 'o' });

    expect(isErrorKind(error, ParserErrorKind.CACHE)).toBe(true);
    expect(isErrorKind(error, ParserErrorKind.PARSING)).toBe(false);
    expect(isErrorKind(new Error('x'), ParserErrorKind.CACHE)).toBe(false);
  });

  it('should extract messages and stacks from unknown values', () => {
    expect(getErrorMessage(new Error('Test message'))).toBe('Test message');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorStack(new Error('x'))).toContain('Error: x');
    expect(getErrorStack('x')).toBeUndefined();
  });
});
