import chalk from 'chalk';
import { isParserError, getErrorMessage, ParserErrorKind } from '../errors/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

/**
 * Narrow logger the parsers depend on.
 * Sinks are supplied by the host; the parsers never pick one themselves.
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warning(message: string, fields?: LogFields): void;
  error(message: string, error?: unknown, fields?: LogFields): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Logger that drops everything. Default when no sink is supplied.
 */
export const nopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warning: () => {},
  error: () => {},
};

/**
 * Fields derived from an error: message plus path/language/panic flag for ParserErrors.
 */
export function errorFields(error: unknown): LogFields {
  if (error === undefined || error === null) return {};
  const fields: LogFields = { error: getErrorMessage(error) };
  if (isParserError(error)) {
    if (error.filePath) fields.file_path = error.filePath;
    if (error.language) fields.language = error.language;
    if (error.kind === ParserErrorKind.PANIC_RECOVERED) fields.panic_recovered = true;
  }
  return fields;
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Render `k=v` pairs in insertion order.
 */
export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .map(([key, value]) => `${key}=${formatValue(value)}`)
    .join(' ');
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function writeText(level: LogLevel, message: string, fields: LogFields): void {
  const tag = LEVEL_COLORS[level](level.toUpperCase());
  const rendered = formatFields(fields);
  const line = `[parser] ${new Date().toISOString()} ${tag} ${message}${rendered ? ` ${rendered}` : ''}`;
  process.stderr.write(line + '\n');
}

function writeJson(level: LogLevel, message: string, fields: LogFields): void {
  const entry = JSON.stringify({
    level,
    message,
    timestamp: new Date().toISOString(),
    service: 'symbolscope-parser',
    ...fields,
  });
  process.stderr.write(entry + '\n');
}

type Writer = (level: LogLevel, message: string, fields: LogFields) => void;

function loggerFromWriter(write: Writer, minLevel: LogLevel): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  return {
    debug: (message, fields = {}) => {
      if (enabled('debug')) write('debug', message, fields);
    },
    info: (message, fields = {}) => {
      if (enabled('info')) write('info', message, fields);
    },
    warning: (message, fields = {}) => {
      if (enabled('warn')) write('warn', message, fields);
    },
    error: (message, error, fields = {}) => {
      if (enabled('error')) write('error', message, { ...fields, ...errorFields(error) });
    },
  };
}

/**
 * Human-readable logger on stderr (stdout stays free for tool output).
 */
export const consoleLogger: Logger = loggerFromWriter(writeText, 'debug');

/**
 * Structured JSON logger for log aggregation. Writes to stderr.
 */
export const jsonLogger: Logger = loggerFromWriter(writeJson, 'debug');

export interface LoggerOptions {
  level?: LogLevel;
  format?: 'text' | 'json';
}

/**
 * Build a level-filtered logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const writer = options.format === 'json' ? writeJson : writeText;
  return loggerFromWriter(writer, options.level ?? 'info');
}

/**
 * Bind structured fields to every entry written through the returned logger.
 */
export function withFields(logger: Logger, bound: LogFields): Logger {
  return {
    debug: (message, fields) => logger.debug(message, { ...bound, ...fields }),
    info: (message, fields) => logger.info(message, { ...bound, ...fields }),
    warning: (message, fields) => logger.warning(message, { ...bound, ...fields }),
    error: (message, error, fields) => logger.error(message, error, { ...bound, ...fields }),
  };
}
