import { z } from 'zod';
import {
  DEFAULT_CACHE_MAX_SIZE,
  DEFAULT_CACHE_TTL_MS,
  DEFAULT_LIMITED_THRESHOLD_BYTES,
  DEFAULT_MAX_CLASSES_PER_FILE,
  DEFAULT_MAX_FILE_SIZE,
  DEFAULT_MAX_METHODS_PER_CLASS,
  DEFAULT_MAX_NESTING_DEPTH,
  DEFAULT_MAX_SYMBOLS_PER_FILE,
  DEFAULT_MAX_TEMPLATE_DEPTH,
  DEFAULT_PARSE_TIMEOUT_MS,
  DEFAULT_STREAMING_THRESHOLD_BYTES,
} from '../constants.js';

// ---------------------------------------------------------------------------
// Config Schema
// ---------------------------------------------------------------------------

const cacheSchema = z
  .object({
    maxSize: z.number().int().default(DEFAULT_CACHE_MAX_SIZE),
    ttlMs: z.number().default(DEFAULT_CACHE_TTL_MS),
    enabled: z.boolean().default(true),
  })
  .default({});

const performanceSchema = z
  .object({
    streamingThreshold: z.number().int().default(DEFAULT_STREAMING_THRESHOLD_BYTES),
    limitedThreshold: z.number().int().default(DEFAULT_LIMITED_THRESHOLD_BYTES),
    maxSymbols: z.number().int().default(DEFAULT_MAX_SYMBOLS_PER_FILE),
    enableCaching: z.boolean().default(true),
  })
  .default({});

const cppSchema = z
  .object({
    maxNestingDepth: z.number().int().default(DEFAULT_MAX_NESTING_DEPTH),
    maxTemplateDepth: z.number().int().default(DEFAULT_MAX_TEMPLATE_DEPTH),
    maxClassesPerFile: z.number().int().default(DEFAULT_MAX_CLASSES_PER_FILE),
    maxMethodsPerClass: z.number().int().default(DEFAULT_MAX_METHODS_PER_CLASS),
    maxFileSize: z.number().int().default(DEFAULT_MAX_FILE_SIZE),
    enableVirtualDetection: z.boolean().default(true),
    parseTimeoutMs: z.number().default(DEFAULT_PARSE_TIMEOUT_MS),
    strictTimeoutEnforcement: z.boolean().default(false),
  })
  .default({});

const dartSchema = z
  .object({
    enableFlutterDetection: z.boolean().default(true),
    maxFileSize: z.number().int().default(DEFAULT_MAX_FILE_SIZE),
    enableAsyncAnalysis: z.boolean().default(true),
  })
  .default({});

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const loggingSchema = z
  .object({
    level: logLevelSchema.default('info'),
    enableMetrics: z.boolean().default(true),
    enableProfiling: z.boolean().default(false),
  })
  .default({});

export const parserConfigSchema = z.object({
  cache: cacheSchema,
  performance: performanceSchema,
  cpp: cppSchema,
  dart: dartSchema,
  logging: loggingSchema,
});

/** Raw settings as a host would hand them over: every group and key optional. */
export type ParserConfigInput = z.input<typeof parserConfigSchema>;

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

/** Normalized, frozen per-run settings. */
export type ParserConfig = DeepReadonly<z.output<typeof parserConfigSchema>>;
