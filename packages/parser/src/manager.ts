import {
  AST_VERSION,
  UnsupportedLanguageError,
  ValidationError,
  defaultParserConfig,
  errorFields,
  getErrorMessage,
  isParserError,
  nopLogger,
  recoverPanic,
  withFilePath,
  withLanguage,
  type Logger,
  type ParseContext,
  type ParserConfig,
} from '@symbolscope/core';
import { LRUCache, type ASTCache, type CacheStats } from './cache.js';
import { hashContent } from './content-hash.js';
import type { AST, FileClassification, SymbolInfo } from './ast/types.js';
import {
  describeLanguage,
  detectLanguage,
  getAllLanguages,
  getLanguage,
  isSupportedLanguage,
  type SupportedLanguage,
} from './ast/languages/registry.js';
import type { LanguageDescriptor, LanguageParser } from './ast/languages/types.js';
import { fileExtension, sanitizeFilePath } from './utils/file-path.js';

export interface ParserManagerOptions {
  config?: ParserConfig;
  logger?: Logger;
  /** Overrides the cache the config would build; ignored when caching is disabled */
  cache?: ASTCache;
  /** Epoch-millisecond clock shared with the cache and the parsers */
  now?: () => number;
}

const TEST_MARKERS = ['_test.', '.test.', '/test/'];
const GENERATED_MARKERS = ['.g.dart', '.freezed.dart', '.pb.h', '.pb.cc', '.generated.'];

function isTestPath(normalized: string): boolean {
  const rooted = `/${normalized}`;
  return rooted.endsWith('Tests.swift') || TEST_MARKERS.some(marker => rooted.includes(marker));
}

function isGeneratedPath(normalized: string): boolean {
  return GENERATED_MARKERS.some(marker => normalized.includes(marker));
}

/**
 * Entry point of the parsing pipeline.
 *
 * Sanitizes paths, consults the AST cache, dispatches to the registered language parser
 * and drives symbol extraction. Language parsers are created on first use and reused.
 */
export class ParserManager {
  readonly config: ParserConfig;
  private readonly logger: Logger;
  private readonly cache?: ASTCache;
  private readonly now: () => number;
  private readonly parsers = new Map<SupportedLanguage, LanguageParser>();

  constructor(options: ParserManagerOptions = {}) {
    this.config = options.config ?? defaultParserConfig();
    this.logger = options.logger ?? nopLogger;
    this.now = options.now ?? Date.now;

    if (this.config.cache.enabled && this.config.performance.enableCaching) {
      this.cache =
        options.cache ??
        new LRUCache({
          maxSize: this.config.cache.maxSize,
          ttlMs: this.config.cache.ttlMs,
          now: this.now,
        });
    }

    this.logger.debug('parser manager initialized', {
      caching: this.cache !== undefined,
      languages: getAllLanguages().map(def => def.id).join(','),
    });
  }

  /**
   * Classify a path by its final extension.
   *
   * @throws UnsupportedLanguageError when no registered language claims the extension
   */
  classify(filePath: string): FileClassification {
    const language = detectLanguage(filePath);
    if (!language) {
      throw new UnsupportedLanguageError(`no language registered for extension "${fileExtension(filePath)}"`, {
        operation: 'classify',
        filePath,
      });
    }

    const normalized = filePath.replace(/\\/g, '/');
    const isTest = isTestPath(normalized);
    const isHeader = getLanguage(language).headerExtensions.includes(fileExtension(filePath));

    return {
      language,
      fileType: isTest ? 'test' : isHeader ? 'header' : 'source',
      isGenerated: isGeneratedPath(normalized),
      isTest,
    };
  }

  /**
   * Parse content into an AST, serving it from the cache when the content hash still matches.
   *
   * @param language - Descriptor from `supportedLanguages()` or a canonical id
   * @throws InvalidFilePathError before the cache is touched when the path is rejected
   */
  parse(ctx: ParseContext, content: string, language: LanguageDescriptor | string, filePath: string): AST {
    sanitizeFilePath(filePath, 'parse');

    const name = typeof language === 'string' ? language : language.name;
    if (!isSupportedLanguage(name)) {
      throw new UnsupportedLanguageError(`unsupported language: ${name}`, {
        operation: 'parse',
        filePath,
        language: name,
      });
    }

    const lookupStart = this.now();
    const cached = this.lookup(filePath, hashContent(content));
    if (cached) {
      this.logger.debug('AST cache hit', { file_path: filePath, language: name });
      return cached;
    }

    const parser = this.getParser(name);
    const parseStart = this.now();
    let ast: AST;
    try {
      ast = parser.parse(content, filePath, ctx);
    } catch (error) {
      if (isParserError(error)) throw error;
      throw recoverPanic(withLanguage(withFilePath(ctx, filePath), name), 'parse', error, this.logger);
    }
    const storeStart = this.now();

    this.store(filePath, ast);
    const end = this.now();

    this.logger.debug('parsed file', {
      file_path: filePath,
      language: name,
      ...(this.config.logging.enableMetrics ? { parse_time_ms: storeStart - parseStart } : {}),
    });
    if (this.config.logging.enableProfiling) {
      this.logger.debug('parse profile', {
        file_path: filePath,
        lookup_ms: parseStart - lookupStart,
        parse_ms: storeStart - parseStart,
        store_ms: end - storeStart,
      });
    }

    return ast;
  }

  /**
   * Walk an AST with its language's symbol extractor.
   *
   * @throws ValidationError when the AST or its root is missing
   */
  extractSymbols(ast: AST | null | undefined): SymbolInfo[] {
    if (!ast) {
      throw new ValidationError('ast is nil', { operation: 'extract_symbols' });
    }
    if (ast.root == null) {
      throw new ValidationError('ast root is nil', { operation: 'extract_symbols', filePath: ast.filePath });
    }
    if (!isSupportedLanguage(ast.language)) {
      throw new UnsupportedLanguageError(`unsupported language: ${ast.language}`, {
        operation: 'extract_symbols',
        filePath: ast.filePath,
      });
    }

    const parser = this.getParser(ast.language);
    try {
      return parser.extractSymbols(ast);
    } catch (error) {
      if (isParserError(error)) throw error;
      throw recoverPanic(
        { filePath: ast.filePath, language: ast.language },
        'extract_symbols',
        error,
        this.logger,
      );
    }
  }

  supportedLanguages(): LanguageDescriptor[] {
    return getAllLanguages().map(describeLanguage);
  }

  /**
   * Cache counters, or undefined when caching is disabled.
   */
  getCacheStats(): CacheStats | undefined {
    return this.cache?.stats();
  }

  clearCache(): void {
    this.cache?.clear();
  }

  private getParser(language: SupportedLanguage): LanguageParser {
    let parser = this.parsers.get(language);
    if (!parser) {
      parser = getLanguage(language).createParser({
        config: this.config,
        logger: this.logger,
        cache: this.cache,
        now: this.now,
      });
      this.parsers.set(language, parser);
    }
    return parser;
  }

  private lookup(filePath: string, hash: string): AST | undefined {
    if (!this.cache) return undefined;

    try {
      const entry = this.cache.get(filePath, AST_VERSION);
      if (entry && entry.hash === hash) {
        return entry.ast;
      }
      this.cache.invalidate(filePath);
    } catch (error) {
      this.logger.warning('AST cache lookup failed', { file_path: filePath, ...errorFields(error) });
    }
    return undefined;
  }

  private store(filePath: string, ast: AST): void {
    if (!this.cache) return;
    if (ast.root.metadata?.cache_invalidated === true) return;

    try {
      this.cache.set(filePath, { ast, version: ast.version, hash: ast.hash });
    } catch (error) {
      const reason = getErrorMessage(error);
      ast.root.metadata = { ...ast.root.metadata, cache_error: reason };
      this.logger.warning('failed to cache AST', { file_path: filePath, error: reason });
    }
  }
}
