import Parser from 'tree-sitter';
import Cpp from 'tree-sitter-cpp';
import {
  AST_VERSION,
  InitializationError,
  ParsingError,
  ValidationError,
  isCancelled,
  type Logger,
  type ParseContext,
  type ParserConfig,
} from '@symbolscope/core';
import { hashContent } from '../../content-hash.js';
import { convertTree } from '../converter.js';
import type { AST, ASTNode, SymbolInfo } from '../types.js';
import { detectCppFeatures } from './cpp-features.js';
import { CppSymbolWalker } from './cpp-symbols.js';
import type { LanguageDefinition, LanguageParser, ParserDependencies, TreeSitterLanguage } from './types.js';

const grammar: TreeSitterLanguage = Cpp;

/** tree-sitter's default input buffer is too small for large translation units */
const MIN_BUFFER_SIZE = 1024 * 1024;

function templateNesting(node: ASTNode, depth = 0): number {
  const here = node.type === 'template_declaration' ? depth + 1 : depth;
  return node.children.reduce((max, child) => Math.max(max, templateNesting(child, here)), here);
}

/**
 * Tree-sitter backed C++ parser.
 *
 * One instance owns one tree-sitter parser; instances are not shared across concurrent parses.
 */
export class CppParser implements LanguageParser {
  readonly language = 'cpp' as const;

  private readonly parser: Parser;
  private readonly config: ParserConfig['cpp'];
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: ParserDependencies) {
    this.config = deps.config.cpp;
    this.logger = deps.logger;
    this.now = deps.now;

    try {
      const parser = new Parser();
      parser.setLanguage(grammar);
      this.parser = parser;
    } catch (error) {
      throw new InitializationError('failed to load tree-sitter C++ grammar', {
        operation: 'new_cpp_parser',
        language: 'cpp',
        cause: error,
      });
    }

    this.logger.debug('C++ parser initialized', {
      max_file_size: this.config.maxFileSize,
      parse_timeout_ms: this.config.parseTimeoutMs,
      strict_timeout: this.config.strictTimeoutEnforcement,
    });
  }

  parse(content: string, filePath: string, ctx: ParseContext): AST {
    const errorOptions = { operation: 'parse_cpp', filePath, language: 'cpp' };

    if (content.length === 0) {
      throw new ValidationError('content is empty', errorOptions);
    }
    const size = Buffer.byteLength(content, 'utf8');
    if (size > this.config.maxFileSize) {
      throw new ValidationError(`file too large: ${size} > ${this.config.maxFileSize} bytes`, {
        ...errorOptions,
        context: { size, max_size: this.config.maxFileSize },
      });
    }

    const start = this.now();
    if (isCancelled(ctx, start)) {
      throw new ParsingError('parsing cancelled before start', errorOptions);
    }

    let tree: Parser.Tree;
    try {
      tree = this.parser.parse(content, undefined, {
        bufferSize: Math.max(MIN_BUFFER_SIZE, content.length * 2),
      });
    } catch (error) {
      throw new ParsingError('failed to parse content with tree-sitter', { ...errorOptions, cause: error });
    }
    const elapsed = this.now() - start;

    if (elapsed > this.config.parseTimeoutMs) {
      const timeoutError = new ParsingError('parsing exceeded timeout', {
        ...errorOptions,
        context: { elapsed_ms: elapsed, timeout_ms: this.config.parseTimeoutMs },
      });
      this.logger.error('parsing exceeded timeout', timeoutError, {
        file_path: filePath,
        elapsed_ms: elapsed,
        timeout_ms: this.config.parseTimeoutMs,
        strict: this.config.strictTimeoutEnforcement,
      });
      if (this.config.strictTimeoutEnforcement) throw timeoutError;
    }

    const converted = convertTree(tree.rootNode, content, filePath);
    const root = converted.root;
    const templateDepth = templateNesting(root);
    root.metadata = {
      ...detectCppFeatures(root, content),
      parse_time_ms: elapsed,
      // hasError is a property, not a method
      has_parse_errors: tree.rootNode.hasError,
      max_depth: converted.maxDepth,
      exceeds_nesting_depth: converted.maxDepth > this.config.maxNestingDepth,
      template_depth: templateDepth,
      exceeds_template_depth: templateDepth > this.config.maxTemplateDepth,
      ...(converted.truncatedCount > 0 ? { truncated_nodes: converted.truncatedCount } : {}),
    };

    this.logger.debug('parsed C++ file', {
      file_path: filePath,
      size,
      parse_time_ms: elapsed,
      has_parse_errors: tree.rootNode.hasError,
    });

    return {
      language: 'cpp',
      content,
      hash: hashContent(content),
      version: AST_VERSION,
      parsedAt: new Date(this.now()),
      root,
      filePath,
    };
  }

  extractSymbols(ast: AST): SymbolInfo[] {
    const walker = new CppSymbolWalker({
      filePath: ast.filePath,
      enableVirtualDetection: this.config.enableVirtualDetection,
      lastModified: ast.parsedAt,
      maxClassesPerFile: this.config.maxClassesPerFile,
      maxMethodsPerClass: this.config.maxMethodsPerClass,
    });
    const symbols = walker.extract(ast.root);

    if (walker.skipped > 0) {
      this.logger.warning('C++ symbol limits reached', {
        file_path: ast.filePath,
        skipped: walker.skipped,
        max_classes: this.config.maxClassesPerFile,
        max_methods_per_class: this.config.maxMethodsPerClass,
      });
    }
    return symbols;
  }
}

export const cppDefinition: LanguageDefinition = {
  id: 'cpp',
  displayName: 'C++',
  extensions: ['cpp', 'cc', 'cxx', 'c++', 'hpp', 'hh', 'hxx', 'h', 'h++'],
  headerExtensions: ['hpp', 'hh', 'hxx', 'h', 'h++'],
  backend: 'tree-sitter',
  createParser: deps => new CppParser(deps),
};
