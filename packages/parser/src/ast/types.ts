import type { SupportedLanguage } from './languages/registry.js';

/**
 * Supported languages for parsing.
 * Canonical definition lives in languages/registry.ts; re-exported here for convenience.
 */
export type { SupportedLanguage } from './languages/registry.js';

/**
 * Source span. Lines and columns are 1-based.
 */
export interface FileLocation {
  filePath: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
}

export type NodeMetadata = Record<string, unknown>;

/**
 * Language-agnostic tree node.
 *
 * `type` is a free-form tag (`class_specifier`, `import_statement`, `<kind>_truncated`, ...)
 * and `value` is the verbatim source slice the node covers.
 */
export interface ASTNode {
  id: string;
  type: string;
  value: string;
  location: FileLocation;
  children: ASTNode[];
  metadata?: NodeMetadata;
}

/**
 * Per-file parse result.
 */
export interface AST {
  language: SupportedLanguage;
  content: string;
  hash: string;
  version: string;
  parsedAt: Date;
  root: ASTNode;
  filePath: string;
}

export type SymbolKind =
  | 'class'
  | 'struct'
  | 'interface'
  | 'enum'
  | 'namespace'
  | 'function'
  | 'method'
  | 'constructor'
  | 'destructor'
  | 'operator'
  | 'variable'
  | 'template'
  | 'type'
  | 'import'
  | 'directive'
  | 'mixin'
  | 'extension'
  | 'typedef'
  | 'widget'
  | 'state-class'
  | 'build-method'
  | 'lifecycle-method';

export type Visibility = 'public' | 'private' | 'protected';

/**
 * Extracted named entity.
 */
export interface SymbolInfo {
  /** Formed from kind, path and line: `func-src/a.cpp-12` */
  id: string;
  name: string;
  kind: SymbolKind;
  location: FileLocation;
  language: SupportedLanguage;
  signature?: string;
  visibility?: Visibility;
  /** Content hash of the declaration text */
  hash: string;
  lastModified: Date;
  /** Annotations copied from the producing node (`is_actor`, `async_type`, ...) */
  metadata?: NodeMetadata;
}

/**
 * Result of classifying a path by extension.
 */
export interface FileClassification {
  language: SupportedLanguage;
  fileType: 'source' | 'header' | 'test';
  isGenerated: boolean;
  isTest: boolean;
}
