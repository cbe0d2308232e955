import { PanicError, getErrorMessage, getErrorStack } from '../errors/index.js';
import type { Logger } from '../logging/logger.js';

/**
 * Request-scoped values carried alongside a parse.
 * Every key is optional; helpers return copies and never mutate.
 */
export interface ParseContext {
  readonly signal?: AbortSignal;
  /** Epoch milliseconds after which the request counts as cancelled */
  readonly deadline?: number;
  readonly requestId?: string;
  readonly filePath?: string;
  readonly language?: string;
  readonly operation?: string;
}

export const backgroundContext: ParseContext = Object.freeze({});

export function withRequestId(ctx: ParseContext, requestId: string): ParseContext {
  return { ...ctx, requestId };
}

export function withFilePath(ctx: ParseContext, filePath: string): ParseContext {
  return { ...ctx, filePath };
}

export function withLanguage(ctx: ParseContext, language: string): ParseContext {
  return { ...ctx, language };
}

export function withOperation(ctx: ParseContext, operation: string): ParseContext {
  return { ...ctx, operation };
}

export function withDeadline(ctx: ParseContext, deadline: number): ParseContext {
  return { ...ctx, deadline };
}

/**
 * True once the signal has fired or the deadline has passed.
 */
export function isCancelled(ctx: ParseContext, now: number = Date.now()): boolean {
  if (ctx.signal?.aborted) return true;
  return ctx.deadline !== undefined && now >= ctx.deadline;
}

/**
 * Convert a thrown value into a PanicError tagged from the context and log it.
 */
export function recoverPanic(
  ctx: ParseContext,
  operation: string,
  thrown: unknown,
  logger: Logger,
): PanicError {
  const op = ctx.requestId ? `${operation}[${ctx.requestId}]` : operation;
  const error = new PanicError(thrown, {
    operation: op,
    filePath: ctx.filePath,
    language: ctx.language,
  });

  logger.error('panic recovered', error, {
    operation: op,
    panic_value: getErrorMessage(thrown),
    has_stack: getErrorStack(thrown) !== undefined,
  });

  return error;
}

export type GuardedResult<T> = { value: T; error?: undefined } | { value: T; error: PanicError };

/**
 * Run one step; anything it throws is recovered, logged and replaced by the fallback.
 */
export function runGuarded<T>(
  ctx: ParseContext,
  operation: string,
  logger: Logger,
  step: () => T,
  fallback: T,
): GuardedResult<T> {
  try {
    return { value: step() };
  } catch (thrown) {
    return { value: fallback, error: recoverPanic(ctx, operation, thrown, logger) };
  }
}
