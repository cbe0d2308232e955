/**
 * Error kinds raised by the parsing pipeline.
 * Tags, not type names: consumers switch on `error.kind`.
 */
export enum ParserErrorKind {
  // Setup
  INITIALIZATION = 'initialization',
  VALIDATION = 'validation',

  // Input
  INVALID_FILE_PATH = 'invalid_file_path',
  UNSUPPORTED_LANGUAGE = 'unsupported_language',

  // Parsing
  PARSING = 'parsing',
  AST = 'ast',

  // Locally recovered
  CACHE = 'cache',
  PANIC_RECOVERED = 'panic_recovered',
}

/**
 * Sub-reasons for path sanitization failures.
 */
export type InvalidPathReason = 'null bytes' | 'too long' | 'path traversal detected';
