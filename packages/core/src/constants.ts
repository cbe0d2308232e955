/**
 * Centralized constants for @symbolscope/core.
 * This file contains all magic numbers and configuration defaults.
 */

// Size tiers for the pattern-based parsers
export const DEFAULT_STREAMING_THRESHOLD_BYTES = 200 * 1024;
export const DEFAULT_LIMITED_THRESHOLD_BYTES = 50 * 1024;
export const DEFAULT_MAX_SYMBOLS_PER_FILE = 10_000;

// Hard per-file input limit (10MB)
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

// Cache
export const DEFAULT_CACHE_MAX_SIZE = 1000;
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

// C++
export const DEFAULT_MAX_NESTING_DEPTH = 100;
export const DEFAULT_MAX_TEMPLATE_DEPTH = 20;
export const DEFAULT_MAX_CLASSES_PER_FILE = 1000;
export const DEFAULT_MAX_METHODS_PER_CLASS = 500;
export const DEFAULT_PARSE_TIMEOUT_MS = 30 * 1000;

// Hard cap on CST -> AST conversion depth; deeper subtrees become truncation sentinels
export const MAX_AST_CONVERSION_DEPTH = 1000;

// Path sanitization
export const MAX_FILE_PATH_LENGTH = 4096;

// Version tag stamped on every AST and used in cache keys
export const AST_VERSION = '1.0';
