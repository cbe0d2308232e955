import { defaultParserConfig, mergeParserConfig } from './loader.js';
import type { ParserConfig } from './schema.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export type ConfigPreset = 'production' | 'development' | 'testing';

/**
 * Larger, longer-lived cache; only warnings and errors are logged.
 */
export function productionConfig(): ParserConfig {
  return mergeParserConfig(defaultParserConfig(), {
    cache: { maxSize: 5000, ttlMs: 2 * HOUR_MS },
    logging: { level: 'warn' },
  });
}

/**
 * Short cache lifetime, verbose logging and profiling.
 */
export function developmentConfig(): ParserConfig {
  return mergeParserConfig(defaultParserConfig(), {
    cache: { maxSize: 1000, ttlMs: 30 * MINUTE_MS },
    logging: { level: 'debug', enableProfiling: true },
  });
}

/**
 * Caching off so every parse hits the language parser; tight symbol cap.
 */
export function testingConfig(): ParserConfig {
  return mergeParserConfig(defaultParserConfig(), {
    cache: { maxSize: 100, ttlMs: MINUTE_MS, enabled: false },
    performance: { maxSymbols: 1000 },
    dart: { enableAsyncAnalysis: false },
    logging: { level: 'error', enableMetrics: false },
  });
}

export function presetConfig(preset: ConfigPreset): ParserConfig {
  switch (preset) {
    case 'production':
      return productionConfig();
    case 'development':
      return developmentConfig();
    case 'testing':
      return testingConfig();
  }
}
