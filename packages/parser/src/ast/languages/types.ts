import type { Logger, ParseContext, ParserConfig } from '@symbolscope/core';
import type { AST, SymbolInfo } from '../types.js';
import type { ASTCache } from '../../cache.js';
import type { SupportedLanguage } from './registry.js';

/**
 * Tree-sitter language grammar type.
 * Using any due to type incompatibility between parser packages and tree-sitter core.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type TreeSitterLanguage = any;

export type ParserBackend = 'tree-sitter' | 'regex';

/**
 * Collaborators every language parser is constructed with.
 */
export interface ParserDependencies {
  config: ParserConfig;
  logger: Logger;
  /** Present only when caching is enabled; parsers may invalidate but never populate it */
  cache?: ASTCache;
  /** Epoch-millisecond clock */
  now: () => number;
}

/**
 * A per-language parser: content to AST, AST to symbols.
 */
export interface LanguageParser {
  readonly language: SupportedLanguage;
  parse(content: string, filePath: string, ctx: ParseContext): AST;
  extractSymbols(ast: AST): SymbolInfo[];
}

/**
 * Complete definition for a registered language.
 *
 * Each language has a single definition file that assembles its extensions,
 * classification hints and parser factory in one place.
 */
export interface LanguageDefinition {
  /** Canonical id (e.g. 'cpp', 'dart') */
  id: SupportedLanguage;

  displayName: string;

  /** File extensions without dots (e.g. ['cpp', 'hpp']) */
  extensions: string[];

  /** Extensions that classify as headers rather than sources */
  headerExtensions: string[];

  backend: ParserBackend;

  /** Build a parser instance; may throw InitializationError */
  createParser(deps: ParserDependencies): LanguageParser;
}

/**
 * Registered language as reported to callers.
 */
export interface LanguageDescriptor {
  name: SupportedLanguage;
  displayName: string;
  extensions: string[];
  parser: ParserBackend;
}
