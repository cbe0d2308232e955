import {
  createLogger,
  defaultParserConfig,
  developmentConfig,
  loadParserConfig,
  nopLogger,
  productionConfig,
  testingConfig,
  type Logger,
  type ParserConfig,
  type ParserConfigInput,
} from '@symbolscope/core';
import type { ASTCache } from './cache.js';
import { ParserManager } from './manager.js';

/**
 * Fluent construction of a ParserManager.
 *
 * @example
 * ```ts
 * const manager = new ParserManagerBuilder()
 *   .withConfig({ cache: { maxSize: 200 } })
 *   .withLogger(createLogger({ level: 'debug' }))
 *   .build();
 * ```
 */
export class ParserManagerBuilder {
  private config: ParserConfig = defaultParserConfig();
  private logger: Logger = nopLogger;
  private cache?: ASTCache;
  private now: () => number = Date.now;

  /**
   * Replace the configuration. Partial input is filled from the defaults and validated.
   */
  withConfig(config: ParserConfig | ParserConfigInput): this {
    this.config = loadParserConfig(config);
    return this;
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /** Use a caller-owned cache instead of the LRU the config would build */
  withCache(cache: ASTCache): this {
    this.cache = cache;
    return this;
  }

  withClock(now: () => number): this {
    this.now = now;
    return this;
  }

  build(): ParserManager {
    return new ParserManager({
      config: this.config,
      logger: this.logger,
      cache: this.cache,
      now: this.now,
    });
  }

  /** JSON logs at warn, large long-lived cache */
  static forProduction(): ParserManagerBuilder {
    const config = productionConfig();
    return new ParserManagerBuilder()
      .withConfig(config)
      .withLogger(createLogger({ level: config.logging.level, format: 'json' }));
  }

  static forDevelopment(): ParserManagerBuilder {
    const config = developmentConfig();
    return new ParserManagerBuilder()
      .withConfig(config)
      .withLogger(createLogger({ level: config.logging.level }));
  }

  /** Silent, uncached */
  static forTesting(): ParserManagerBuilder {
    return new ParserManagerBuilder().withConfig(testingConfig());
  }
}
