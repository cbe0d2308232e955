import {
  AST_VERSION,
  ParsingError,
  ValidationError,
  getErrorMessage,
  isCancelled,
  type Logger,
  type ParseContext,
  type ParserConfig,
} from '@symbolscope/core';
import type { ASTCache } from '../../cache.js';
import { hashContent } from '../../content-hash.js';
import { LineIndex, countMatches } from '../../utils/text.js';
import { analyzeFlutter, integrateFlutterAnalysis } from '../flutter.js';
import type { AST, ASTNode, NodeMetadata, SymbolInfo } from '../types.js';
import { DartExtractor, type DartStrategy } from './dart-extractor.js';
import {
  ASYNC_FEATURES,
  ERROR_HANDLING_FEATURES,
  PATTERN_MATCHING_FEATURES,
  RECORD_FEATURES,
} from './dart-patterns.js';
import { extractDartSymbols } from './dart-symbols.js';
import type { LanguageDefinition, LanguageParser, ParserDependencies } from './types.js';

type FeatureTable = Readonly<Record<string, RegExp>>;

/**
 * Write `<name>_count` and `has_<name>` for every feature that occurs at least once.
 */
function recordFeatureCounts(metadata: NodeMetadata, content: string, features: FeatureTable): void {
  for (const [key, pattern] of Object.entries(features)) {
    const count = countMatches(content, pattern);
    if (count === 0) continue;
    metadata[key] = count;
    metadata[`has_${key.replace(/_count$/, '')}`] = true;
  }
}

/**
 * Pattern-based Dart parser.
 *
 * There is no Dart grammar behind it: declarations are recognized with the table in
 * dart-patterns.ts and nesting comes from brace depth. Output has the same shape as the
 * tree-sitter backed parsers.
 */
export class DartParser implements LanguageParser {
  readonly language = 'dart' as const;

  private readonly config: ParserConfig;
  private readonly logger: Logger;
  private readonly cache?: ASTCache;
  private readonly now: () => number;

  constructor(deps: ParserDependencies) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.cache = deps.cache;
    this.now = deps.now;
  }

  selectStrategy(size: number): DartStrategy {
    const { streamingThreshold, limitedThreshold } = this.config.performance;
    if (size > streamingThreshold) return 'streaming';
    if (size > limitedThreshold) return 'limited';
    return 'full';
  }

  parse(content: string, filePath: string, ctx: ParseContext): AST {
    const errorOptions = { operation: 'parse_dart', filePath, language: 'dart' };

    const size = Buffer.byteLength(content, 'utf8');
    if (size > this.config.dart.maxFileSize) {
      throw new ValidationError(`file too large: ${size} > ${this.config.dart.maxFileSize} bytes`, {
        ...errorOptions,
        context: { size, max_size: this.config.dart.maxFileSize },
      });
    }
    const start = this.now();
    if (isCancelled(ctx, start)) {
      throw new ParsingError('parsing cancelled before start', errorOptions);
    }

    const strategy = this.selectStrategy(size);
    const extractor = new DartExtractor(
      content,
      {
        filePath,
        strategy,
        maxSymbols: this.config.performance.maxSymbols,
        asyncAnalysis: this.config.dart.enableAsyncAnalysis,
      },
      ctx,
      this.logger,
    );
    const children = extractor.run();

    const metadata: NodeMetadata = {
      parser: 'regex',
      parse_quality: 'basic',
      strategy,
      has_flutter: false,
      has_errors: extractor.failures.length > 0,
      error_count: extractor.failures.length,
    };
    if (extractor.failures.length > 0) {
      metadata.extraction_errors = extractor.failures.map(failure => ({ ...failure }));
    }
    if (extractor.truncated) {
      metadata.truncated = true;
    }

    // A recovered failure while streaming leaves partial results that must not be served from cache
    if (strategy === 'streaming' && extractor.failures.length > 0) {
      this.cache?.invalidate(filePath);
      metadata.cache_invalidated = true;
    }

    if (this.config.dart.enableAsyncAnalysis) {
      recordFeatureCounts(metadata, content, ASYNC_FEATURES);
    }
    recordFeatureCounts(metadata, content, ERROR_HANDLING_FEATURES);
    recordFeatureCounts(metadata, content, PATTERN_MATCHING_FEATURES);
    recordFeatureCounts(metadata, content, RECORD_FEATURES);

    const index = new LineIndex(content);
    const root: ASTNode = {
      id: 'root',
      type: 'compilation_unit',
      value: content,
      location: {
        filePath,
        line: 1,
        column: 1,
        endLine: index.lineCount,
        endColumn: index.columnOf(content.length),
      },
      children,
      metadata,
    };

    if (this.config.dart.enableFlutterDetection) {
      try {
        integrateFlutterAnalysis(root, analyzeFlutter(content));
      } catch (error) {
        metadata.flutter_integration_error = getErrorMessage(error);
        this.logger.warning('flutter analysis failed', { file_path: filePath, error: getErrorMessage(error) });
      }
    }

    this.logger.debug('parsed Dart file', {
      file_path: filePath,
      size,
      strategy,
      nodes: children.length,
      errors: extractor.failures.length,
      parse_time_ms: this.now() - start,
    });

    return {
      language: 'dart',
      content,
      hash: hashContent(content),
      version: AST_VERSION,
      parsedAt: new Date(this.now()),
      root,
      filePath,
    };
  }

  extractSymbols(ast: AST): SymbolInfo[] {
    return extractDartSymbols(ast.root, { filePath: ast.filePath, lastModified: ast.parsedAt });
  }
}

export const dartDefinition: LanguageDefinition = {
  id: 'dart',
  displayName: 'Dart',
  extensions: ['dart'],
  headerExtensions: [],
  backend: 'regex',
  createParser: deps => new DartParser(deps),
};
