// @symbolscope/parser - C++, Dart and Swift parsing to a shared AST and symbol model

// =============================================================================
// TYPES
// =============================================================================

export type {
  SupportedLanguage,
  FileLocation,
  NodeMetadata,
  ASTNode,
  AST,
  SymbolKind,
  Visibility,
  SymbolInfo,
  FileClassification,
} from './ast/types.js';

export type {
  LanguageDefinition,
  LanguageDescriptor,
  LanguageParser,
  ParserBackend,
  ParserDependencies,
} from './ast/languages/types.js';

// =============================================================================
// MANAGER
// =============================================================================

export { ParserManager } from './manager.js';
export type { ParserManagerOptions } from './manager.js';
export { ParserManagerBuilder } from './builder.js';

// =============================================================================
// CACHE
// =============================================================================

export { LRUCache } from './cache.js';
export type { ASTCache, CachedAST, CacheStats, LRUCacheOptions } from './cache.js';
export { hashContent } from './content-hash.js';

// =============================================================================
// LANGUAGES
// =============================================================================

export {
  LANGUAGE_IDS,
  getLanguage,
  getAllLanguages,
  detectLanguage,
  isSupportedLanguage,
  describeLanguage,
  getSupportedExtensions,
} from './ast/languages/registry.js';

export { CppParser } from './ast/languages/cpp.js';
export { DartParser } from './ast/languages/dart.js';
export { SwiftParser } from './ast/languages/swift.js';

// Flutter
export { analyzeFlutter, integrateFlutterAnalysis } from './ast/flutter.js';
export type {
  FlutterAnalysis,
  FlutterWidget,
  WidgetKind,
  StateManagement,
  UIFramework,
} from './ast/flutter.js';

// =============================================================================
// UTILITIES
// =============================================================================

export { sanitizeFilePath, fileExtension } from './utils/file-path.js';
