import type { z } from 'zod';
import { parserConfigSchema } from './schema.js';
import type { ParserConfig, ParserConfigInput } from './schema.js';
import { ValidationError } from '../errors/index.js';
import {
  DEFAULT_CACHE_MAX_SIZE,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_LIMITED_THRESHOLD_BYTES,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_SYMBOLS_PER_FILE,
  DEFAULT_PARSE_TIMEOUT_MS,
  DEFAULT_STREAMING_THRESHOLD_BYTES,
} from '../constants.js';

type MutableParserConfig = z.output<typeof parserConfigSchema>;

/**
 * Replace out-of-range values with defaults. Mutates and returns its argument.
 */
export function normalizeParserConfig(config: MutableParserConfig): MutableParserConfig {
  if (config.cache.maxSize <= 0) {
    config.cache.maxSize = DEFAULT_CACHE_MAX_SIZE;
  }
  if (config.cache.ttlMs <= 0) {
    config.cache.ttlMs = DEFAULT_CACHE_TTL_MS;
  }

  // Tiers must be ordered; a crossed pair is reset as a whole
  if (config.performance.streamingThreshold <= config.performance.limitedThreshold) {
    config.performance.streamingThreshold = DEFAULT_STREAMING_THRESHOLD_BYTES;
    config.performance.limitedThreshold = DEFAULT_LIMITED_THRESHOLD_BYTES;
  }
  if (config.performance.maxSymbols <= 0) {
    config.performance.maxSymbols = DEFAULT_MAX_SYMBOLS_PER_FILE;
  }

  if (config.dart.maxFileSize <= 0) {
    config.dart.maxFileSize = DEFAULT_MAX_FILE_SIZE;
  }
  if (config.cpp.maxFileSize <= 0) {
    config.cpp.maxFileSize = DEFAULT_MAX_FILE_SIZE;
  }
  if (config.cpp.parseTimeoutMs <= 0) {
    config.cpp.parseTimeoutMs = DEFAULT_PARSE_TIMEOUT_MS;
  }

  return config;
}

function freezeConfig(config: MutableParserConfig): ParserConfig {
  for (const group of Object.values(config)) {
    Object.freeze(group);
  }
  return Object.freeze(config);
}

/**
 * Load parser settings from a neutral settings record.
 *
 * Missing groups and keys take their defaults; wrong types raise a ValidationError
 * listing every offending key.
 *
 * @param raw - Plain settings object (already read from wherever the host keeps it)
 */
export function loadParserConfig(raw: unknown = {}): ParserConfig {
  const result = parserConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`invalid configuration (${issues.join('; ')})`, {
      operation: 'load_config',
      context: { issues },
    });
  }
  return freezeConfig(normalizeParserConfig(result.data));
}

/**
 * Default settings.
 */
export function defaultParserConfig(): ParserConfig {
  return loadParserConfig({});
}

/**
 * Overlay per-group overrides on an existing config and re-normalize.
 */
export function mergeParserConfig(base: ParserConfig, overrides: ParserConfigInput): ParserConfig {
  return loadParserConfig({
    cache: { ...base.cache, ...overrides.cache },
    performance: { ...base.performance, ...overrides.performance },
    cpp: { ...base.cpp, ...overrides.cpp },
    dart: { ...base.dart, ...overrides.dart },
    logging: { ...base.logging, ...overrides.logging },
  });
}
