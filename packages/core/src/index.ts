/**
 * @symbolscope/core
 *
 * Shared foundations for the symbolscope parsers: error model, request context and
 * panic recovery, logging, and configuration.
 */

// =============================================================================
// Constants
// =============================================================================
export * from './constants.js';

// =============================================================================
// Errors
// =============================================================================
export {
  ParserError,
  ParserErrorKind,
  InitializationError,
  ValidationError,
  InvalidFilePathError,
  ParsingError,
  UnsupportedLanguageError,
  CacheError,
  ASTError,
  PanicError,
  wrapError,
  isParserError,
  isErrorKind,
  getErrorMessage,
  getErrorStack,
} from './errors/index.js';
export type { ErrorSeverity, ParserErrorOptions, InvalidPathReason } from './errors/index.js';

// =============================================================================
// Context & panic recovery
// =============================================================================
export {
  backgroundContext,
  withRequestId,
  withFilePath,
  withLanguage,
  withOperation,
  withDeadline,
  isCancelled,
  recoverPanic,
  runGuarded,
} from './context/index.js';
export type { ParseContext, GuardedResult } from './context/index.js';

// =============================================================================
// Logging
// =============================================================================
export {
  nopLogger,
  consoleLogger,
  jsonLogger,
  createLogger,
  withFields,
  errorFields,
  formatFields,
} from './logging/logger.js';
export type { Logger, LogLevel, LogFields, LoggerOptions } from './logging/logger.js';

// =============================================================================
// Configuration
// =============================================================================
export { parserConfigSchema, logLevelSchema } from './config/schema.js';
export type { ParserConfig, ParserConfigInput } from './config/schema.js';
export {
  loadParserConfig,
  defaultParserConfig,
  mergeParserConfig,
  normalizeParserConfig,
} from './config/loader.js';
export {
  productionConfig,
  developmentConfig,
  testingConfig,
  presetConfig,
} from './config/presets.js';
export type { ConfigPreset } from './config/presets.js';
